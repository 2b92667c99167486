/**
 * Game Window - one rectangular surface on the desktop.
 *
 * Geometry and hit regions are computed here; the DOM is only a projection
 * of this state (see DomRenderer). A window knows nothing about its
 * neighbours: closing emits `closed` and the manager takes it from there.
 */

import { Signal } from '../signal';
import { renderContent } from '../windows/render';
import type { WindowContent, WindowKind } from '../windows/types';
import type { Layer, Point, Rect, Size, WindowDrag } from './types';
import { CLOSE_BOX_INSET, CLOSE_BOX_SIZE, TITLEBAR_HEIGHT, rectContains } from './types';

export interface WindowOptions {
  id: string;
  title: string;
  rect: Rect;
  content: WindowContent;
  layer?: Layer;
  focusable?: boolean;
  closable?: boolean;
  movable?: boolean;
  modal?: boolean;
  minSize?: Size;
}

const DEFAULT_MIN_SIZE: Size = { width: 200, height: 100 };

export class GameWindow {
  readonly id: string;
  title: string;
  rect: Rect;
  content: WindowContent;
  readonly layer: Layer;
  readonly focusable: boolean;
  readonly closable: boolean;
  readonly movable: boolean;
  readonly modal: boolean;
  readonly minSize: Size;
  readonly closed = new Signal<GameWindow>();

  drag: WindowDrag = { state: 'idle' };
  visible = true;
  revision = 0;
  private isClosed = false;

  constructor(options: WindowOptions) {
    this.id = options.id;
    this.title = options.title;
    this.rect = { ...options.rect };
    this.content = options.content;
    this.layer = options.layer ?? 'desktop';
    this.focusable = options.focusable ?? true;
    this.closable = options.closable ?? true;
    this.movable = options.movable ?? true;
    this.modal = options.modal ?? false;
    this.minSize = options.minSize ?? DEFAULT_MIN_SIZE;
  }

  get kind(): WindowKind {
    return this.content.kind;
  }

  get isOpen(): boolean {
    return !this.isClosed;
  }

  moveTo(point: Point) {
    this.rect.x = point.x;
    this.rect.y = Math.max(0, point.y);
  }

  resize(size: Size) {
    this.rect.width = Math.max(this.minSize.width, size.width);
    this.rect.height = Math.max(this.minSize.height, size.height);
    this.touch();
  }

  /** Close once; later calls do nothing. */
  close(): boolean {
    if (this.isClosed) return false;
    this.isClosed = true;
    this.visible = false;
    this.drag = { state: 'idle' };
    this.closed.emit(this);
    this.closed.clear();
    return true;
  }

  render(el: HTMLElement) {
    renderContent(this.content, el);
  }

  /** Content changed; the renderer repaints on the next frame. */
  touch() {
    this.revision++;
  }

  hitTest(point: Point): boolean {
    return this.visible && rectContains(this.rect, point);
  }

  titleBarRect(): Rect {
    return { x: this.rect.x, y: this.rect.y, width: this.rect.width, height: TITLEBAR_HEIGHT };
  }

  contentRect(): Rect {
    return {
      x: this.rect.x,
      y: this.rect.y + TITLEBAR_HEIGHT,
      width: this.rect.width,
      height: Math.max(0, this.rect.height - TITLEBAR_HEIGHT),
    };
  }

  closeBoxRect(): Rect {
    return {
      x: this.rect.x + this.rect.width - CLOSE_BOX_SIZE - CLOSE_BOX_INSET,
      y: this.rect.y + CLOSE_BOX_INSET,
      width: CLOSE_BOX_SIZE,
      height: CLOSE_BOX_SIZE,
    };
  }

  titleBarContains(point: Point): boolean {
    return this.visible && rectContains(this.titleBarRect(), point);
  }

  contentContains(point: Point): boolean {
    return this.visible && rectContains(this.contentRect(), point);
  }

  closeBoxContains(point: Point): boolean {
    return this.visible && this.closable && rectContains(this.closeBoxRect(), point);
  }

  beginDrag(pointer: Point) {
    this.drag = { state: 'dragging', offset: { x: pointer.x - this.rect.x, y: pointer.y - this.rect.y } };
  }

  dragTo(pointer: Point) {
    if (this.drag.state !== 'dragging') return;
    this.moveTo({ x: pointer.x - this.drag.offset.x, y: pointer.y - this.drag.offset.y });
  }

  endDrag() {
    this.drag = { state: 'idle' };
  }
}
