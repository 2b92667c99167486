import { describe, it, expect, vi } from 'vitest';
import { GameWindow } from './window';
import { createFtlHold } from '../windows/items';

function makeWindow(overrides: Partial<ConstructorParameters<typeof GameWindow>[0]> = {}) {
  return new GameWindow({
    id: 'w',
    title: 'Test',
    rect: { x: 100, y: 100, width: 400, height: 300 },
    content: createFtlHold(),
    ...overrides,
  });
}

describe('GameWindow', () => {
  it('should default to a focusable, closable, movable desktop window', () => {
    const win = makeWindow();

    expect(win.layer).toBe('desktop');
    expect(win.focusable).toBe(true);
    expect(win.closable).toBe(true);
    expect(win.movable).toBe(true);
    expect(win.modal).toBe(false);
    expect(win.kind).toBe('ftl');
  });

  it('should clamp y to the top of the screen when moved', () => {
    const win = makeWindow();

    win.moveTo({ x: -50, y: -20 });

    expect(win.rect).toEqual({ x: -50, y: 0, width: 400, height: 300 });
  });

  it('should clamp resize to the minimum size and bump the revision', () => {
    const win = makeWindow({ minSize: { width: 300, height: 200 } });

    win.resize({ width: 100, height: 500 });

    expect(win.rect.width).toBe(300);
    expect(win.rect.height).toBe(500);
    expect(win.revision).toBe(1);
  });

  it('should emit closed exactly once', () => {
    const win = makeWindow();
    const onClosed = vi.fn();
    win.closed.connect(onClosed);

    expect(win.close()).toBe(true);
    expect(win.close()).toBe(false);

    expect(onClosed).toHaveBeenCalledTimes(1);
    expect(onClosed).toHaveBeenCalledWith(win);
    expect(win.visible).toBe(false);
    expect(win.isOpen).toBe(false);
  });

  it('should split the rectangle into title bar and content regions', () => {
    const win = makeWindow();

    expect(win.hitTest({ x: 100, y: 100 })).toBe(true);
    expect(win.hitTest({ x: 500, y: 100 })).toBe(false);
    expect(win.titleBarContains({ x: 200, y: 131 })).toBe(true);
    expect(win.titleBarContains({ x: 200, y: 132 })).toBe(false);
    expect(win.contentContains({ x: 200, y: 132 })).toBe(true);
    expect(win.contentContains({ x: 200, y: 131 })).toBe(false);
  });

  it('should place the close box in the top-right corner of the title bar', () => {
    const win = makeWindow();

    expect(win.closeBoxRect()).toEqual({ x: 472, y: 104, width: 24, height: 24 });
    expect(win.closeBoxContains({ x: 480, y: 110 })).toBe(true);
    expect(win.closeBoxContains({ x: 470, y: 110 })).toBe(false);
  });

  it('should not report a close box when not closable', () => {
    const win = makeWindow({ closable: false });

    expect(win.closeBoxContains({ x: 480, y: 110 })).toBe(false);
  });

  it('should not hit-test once hidden', () => {
    const win = makeWindow();
    win.visible = false;

    expect(win.hitTest({ x: 200, y: 200 })).toBe(false);
  });

  it('should follow the pointer by the grab offset while dragging', () => {
    const win = makeWindow();

    win.beginDrag({ x: 150, y: 110 });
    win.dragTo({ x: 250, y: 60 });

    expect(win.rect.x).toBe(200);
    expect(win.rect.y).toBe(50);

    win.endDrag();
    win.dragTo({ x: 900, y: 900 });

    expect(win.rect.x).toBe(200);
    expect(win.drag).toEqual({ state: 'idle' });
  });

  it('should render its content into an element', () => {
    const win = makeWindow();
    const el = document.createElement('div');

    win.render(el);

    expect(el.querySelectorAll('.slot')).toHaveLength(4);
    expect(el.querySelectorAll('[data-action="item"]')).toHaveLength(2);
  });
});
