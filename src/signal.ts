// Minimal typed signal - a listener set with connect/emit
export class Signal<T> {
  private listeners = new Set<(value: T) => void>();

  // Subscribe; returns an unsubscribe function
  connect(callback: (value: T) => void): () => void {
    this.listeners.add(callback);
    return () => this.listeners.delete(callback);
  }

  emit(value: T) {
    // Copy so listeners may disconnect themselves mid-emit
    [...this.listeners].forEach(cb => cb(value));
  }

  clear() {
    this.listeners.clear();
  }

  get size(): number {
    return this.listeners.size;
  }
}
