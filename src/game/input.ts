/**
 * Input Controller - turns DOM pointer and keyboard events on the desktop
 * element into queued game input, in desktop coordinates.
 */

import type { ContentTarget, Point } from '../desktop/types';
import type { Screen } from '../windows/factory';

export type GameInput =
  | { type: 'pointer-down'; point: Point; target?: ContentTarget }
  | { type: 'pointer-move'; point: Point }
  | { type: 'pointer-up'; point: Point }
  | { type: 'key'; key: string };

export interface InputSink {
  enqueue(input: GameInput): void;
}

export function targetOf(node: EventTarget | null): ContentTarget | undefined {
  if (!(node instanceof Element)) return undefined;
  const el = node.closest('[data-action]');
  const action = el?.getAttribute('data-action');
  if (!el || !action) return undefined;
  const arg = el.getAttribute('data-arg');
  return arg === null ? { action } : { action, arg };
}

export class InputController {
  private desktop: HTMLElement;
  private sink: InputSink;
  private screen: Screen;
  private pressed = false;
  private lastPoint: Point = { x: 0, y: 0 };

  constructor(desktop: HTMLElement, sink: InputSink, screen: Screen) {
    this.desktop = desktop;
    this.sink = sink;
    this.screen = screen;
  }

  attach() {
    this.desktop.addEventListener('mousedown', this.onMouseDown);
    document.addEventListener('mousemove', this.onMouseMove);
    document.addEventListener('mouseup', this.onMouseUp);
    this.desktop.addEventListener('touchstart', this.onTouchStart, { passive: false });
    document.addEventListener('touchmove', this.onTouchMove, { passive: false });
    document.addEventListener('touchend', this.onTouchEnd);
    document.addEventListener('keydown', this.onKeyDown);
  }

  detach() {
    this.desktop.removeEventListener('mousedown', this.onMouseDown);
    document.removeEventListener('mousemove', this.onMouseMove);
    document.removeEventListener('mouseup', this.onMouseUp);
    this.desktop.removeEventListener('touchstart', this.onTouchStart);
    document.removeEventListener('touchmove', this.onTouchMove);
    document.removeEventListener('touchend', this.onTouchEnd);
    document.removeEventListener('keydown', this.onKeyDown);
  }

  /** Client coordinates to the fixed-size desktop. */
  toDesktop(clientX: number, clientY: number): Point {
    const rect = this.desktop.getBoundingClientRect();
    const scaleX = rect.width > 0 ? this.screen.width / rect.width : 1;
    const scaleY = rect.height > 0 ? this.screen.height / rect.height : 1;
    return { x: (clientX - rect.left) * scaleX, y: (clientY - rect.top) * scaleY };
  }

  private press(clientX: number, clientY: number, target: EventTarget | null) {
    this.pressed = true;
    this.lastPoint = this.toDesktop(clientX, clientY);
    this.sink.enqueue({ type: 'pointer-down', point: this.lastPoint, target: targetOf(target) });
  }

  private move(clientX: number, clientY: number) {
    if (!this.pressed) return;
    this.lastPoint = this.toDesktop(clientX, clientY);
    this.sink.enqueue({ type: 'pointer-move', point: this.lastPoint });
  }

  private release(point: Point) {
    if (!this.pressed) return;
    this.pressed = false;
    this.sink.enqueue({ type: 'pointer-up', point });
  }

  private onMouseDown = (e: MouseEvent) => {
    if (e.button !== 0) return;
    e.preventDefault();
    this.press(e.clientX, e.clientY, e.target);
  };

  private onMouseMove = (e: MouseEvent) => this.move(e.clientX, e.clientY);

  private onMouseUp = (e: MouseEvent) => this.release(this.toDesktop(e.clientX, e.clientY));

  private onTouchStart = (e: TouchEvent) => {
    const t = e.touches[0];
    if (!t) return;
    e.preventDefault();
    this.press(t.clientX, t.clientY, e.target);
  };

  private onTouchMove = (e: TouchEvent) => {
    const t = e.touches[0];
    if (!t || !this.pressed) return;
    e.preventDefault();
    this.move(t.clientX, t.clientY);
  };

  // touchend has no touches left; release where the finger last was
  private onTouchEnd = () => this.release(this.lastPoint);

  private onKeyDown = (e: KeyboardEvent) => {
    if (e.ctrlKey || e.metaKey || e.altKey) return;
    if (e.key === 'Tab') e.preventDefault();
    this.sink.enqueue({ type: 'key', key: e.key });
  };
}
