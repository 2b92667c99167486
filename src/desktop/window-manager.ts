/**
 * Window Manager - owns the live windows, their stacking and focus, and the
 * pointer drag lifecycle (window moves and item drags between windows).
 *
 * Stacking is kept bottom-first and sorted by layer, then by recency, so a
 * toast always stacks above desktop windows and a modal above everything.
 * Tab cycling walks insertion order instead, so it stays stable while
 * clicks reshuffle the stack.
 */

import { findItem, holdsItem, transferItem } from '../windows/items';
import type { GameWindow } from './window';
import type {
  ContentTarget,
  DesktopScene,
  DragState,
  Point,
  PointerDownResult,
  PointerUpResult,
  Renderer,
  SceneExtras,
} from './types';
import { LAYER_RANK } from './types';

export class WindowManager {
  // Map iteration order is insertion order
  private windowsById = new Map<string, GameWindow>();
  private stack: GameWindow[] = [];
  private focusedWindowId: string | null = null;
  private drag: DragState = { kind: 'idle' };
  private unsubscribers = new Map<string, () => void>();

  spawn(win: GameWindow): GameWindow {
    if (this.windowsById.has(win.id)) {
      throw new Error(`Window ${win.id} is already open`);
    }
    if (!win.isOpen) {
      throw new Error(`Window ${win.id} was already closed`);
    }

    this.windowsById.set(win.id, win);
    this.insertOnTop(win);
    this.unsubscribers.set(win.id, win.closed.connect(() => this.remove(win.id)));

    if (win.focusable) {
      this.focus(win.id);
    }
    return win;
  }

  /**
   * Raise a window to the top of its layer and give it focus if it takes
   * focus and nothing above it (a modal) holds focus instead.
   */
  focus(id: string): boolean {
    const win = this.windowsById.get(id);
    if (!win) return false;

    this.raise(win);
    if (win.focusable && !this.focusableAbove(win)) {
      this.focusedWindowId = id;
    }
    return this.focusedWindowId === id;
  }

  /** Close a window. Unknown ids are ignored. */
  close(id: string): boolean {
    const win = this.windowsById.get(id);
    if (!win) return false;
    // closed signal calls remove()
    win.close();
    return true;
  }

  get(id: string): GameWindow | undefined {
    return this.windowsById.get(id);
  }

  /** Bottom-first. */
  windows(): readonly GameWindow[] {
    return [...this.stack];
  }

  /** Ids, topmost first. */
  zOrder(): string[] {
    return this.stack.map(win => win.id).reverse();
  }

  focusedId(): string | null {
    return this.focusedWindowId;
  }

  focused(): GameWindow | undefined {
    return this.focusedWindowId ? this.windowsById.get(this.focusedWindowId) : undefined;
  }

  dragState(): DragState {
    return this.drag;
  }

  count(): number {
    return this.windowsById.size;
  }

  modalOpen(): boolean {
    return this.stack.some(win => win.modal && win.visible);
  }

  /** Close every window and reset drag and focus. */
  clear() {
    for (const win of [...this.stack]) {
      win.close();
    }
    this.drag = { kind: 'idle' };
    this.focusedWindowId = null;
  }

  dispatchPointerDown(point: Point, target?: ContentTarget): PointerDownResult {
    const win = this.topmostAt(candidate => candidate.hitTest(point));
    if (!win) return { kind: 'none' };

    if (win.closeBoxContains(point)) {
      this.close(win.id);
      return { kind: 'closed', window: win };
    }

    if (win.movable && win.titleBarContains(point)) {
      this.focus(win.id);
      win.beginDrag(point);
      this.drag = { kind: 'window', windowId: win.id };
      return { kind: 'titlebar', window: win };
    }

    this.focus(win.id);
    if (target && target.action === 'item' && target.arg && holdsItem(win.content, target.arg)) {
      this.drag = { kind: 'item', sourceId: win.id, itemId: target.arg, pointer: { ...point } };
      win.touch();
    }
    return { kind: 'content', window: win, target };
  }

  dispatchPointerMove(point: Point) {
    const drag = this.drag;
    if (drag.kind === 'window') {
      this.windowsById.get(drag.windowId)?.dragTo(point);
    } else if (drag.kind === 'item') {
      drag.pointer = { ...point };
    }
  }

  dispatchPointerUp(point: Point): PointerUpResult {
    const drag = this.drag;
    this.drag = { kind: 'idle' };

    if (drag.kind === 'window') {
      const win = this.windowsById.get(drag.windowId);
      if (!win) return { kind: 'none' };
      win.endDrag();
      return { kind: 'window-moved', window: win };
    }

    if (drag.kind === 'item') {
      const source = this.windowsById.get(drag.sourceId);
      if (!source) return { kind: 'none' };
      source.touch();

      const dest = this.topmostAt(win => win.hitTest(point));
      if (dest && dest !== source && dest.contentContains(point) && transferItem(source.content, dest.content, drag.itemId)) {
        dest.touch();
        return { kind: 'item-transferred', source, dest, itemId: drag.itemId };
      }
      return { kind: 'item-rejected', source, itemId: drag.itemId };
    }

    return { kind: 'none' };
  }

  /**
   * Focus the next focusable window after the focused one, in insertion
   * order, wrapping around. Does nothing while a modal is open.
   */
  cycleFocus(): string | null {
    if (this.modalOpen()) return this.focusedWindowId;

    const order = [...this.windowsById.values()].filter(win => win.focusable && win.visible);
    if (order.length === 0) return null;

    const current = order.findIndex(win => win.id === this.focusedWindowId);
    const next = order[(current + 1) % order.length];
    this.focus(next.id);
    return this.focusedWindowId;
  }

  renderAll(renderer: Renderer, extras: SceneExtras) {
    renderer.renderDesktop(this.scene(extras));
  }

  scene(extras: SceneExtras): DesktopScene {
    let carried: DesktopScene['carried'] = null;
    const drag = this.drag;
    if (drag.kind === 'item') {
      const source = this.windowsById.get(drag.sourceId);
      const item = source ? findItem(source.content, drag.itemId) : undefined;
      if (item) carried = { item, pointer: drag.pointer };
    }
    return {
      windows: this.windows(),
      focusedId: this.focusedWindowId,
      carried,
      clock: extras.clock,
    };
  }

  private remove(id: string) {
    const win = this.windowsById.get(id);
    if (!win) return;

    this.windowsById.delete(id);
    this.stack = this.stack.filter(w => w !== win);
    this.unsubscribers.get(id)?.();
    this.unsubscribers.delete(id);

    const drag = this.drag;
    if ((drag.kind === 'window' && drag.windowId === id) || (drag.kind === 'item' && drag.sourceId === id)) {
      this.drag = { kind: 'idle' };
    }

    if (this.focusedWindowId === id) {
      this.resolveFocus();
    }
  }

  /** Focus goes to the topmost focusable window, or nowhere. */
  private resolveFocus() {
    this.focusedWindowId = null;
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const win = this.stack[i];
      if (win.focusable && win.visible) {
        this.focusedWindowId = win.id;
        return;
      }
    }
  }

  private insertOnTop(win: GameWindow) {
    const rank = LAYER_RANK[win.layer];
    let index = this.stack.length;
    while (index > 0 && LAYER_RANK[this.stack[index - 1].layer] > rank) {
      index--;
    }
    this.stack.splice(index, 0, win);
  }

  private raise(win: GameWindow) {
    this.stack = this.stack.filter(w => w !== win);
    this.insertOnTop(win);
  }

  private focusableAbove(win: GameWindow): boolean {
    const rank = LAYER_RANK[win.layer];
    return this.stack.some(other => other !== win && other.focusable && other.visible && LAYER_RANK[other.layer] > rank);
  }

  /**
   * Topmost visible window matching the predicate. While a modal is open only
   * modal-layer windows take pointer input.
   */
  private topmostAt(predicate: (win: GameWindow) => boolean): GameWindow | undefined {
    const modal = this.modalOpen();
    for (let i = this.stack.length - 1; i >= 0; i--) {
      const win = this.stack[i];
      if (!win.visible) continue;
      if (modal && win.layer !== 'modal') continue;
      if (predicate(win)) return win;
    }
    return undefined;
  }
}
