import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { InputController, targetOf } from './input';
import type { GameInput, InputSink } from './input';

describe('targetOf', () => {
  it('should find the nearest element with an action', () => {
    const button = document.createElement('button');
    button.dataset.action = 'respond';
    button.dataset.arg = '2';
    const label = document.createElement('span');
    button.appendChild(label);

    expect(targetOf(label)).toEqual({ action: 'respond', arg: '2' });
  });

  it('should leave out a missing arg', () => {
    const el = document.createElement('div');
    el.dataset.action = 'compose';

    expect(targetOf(el)).toEqual({ action: 'compose' });
  });

  it('should return nothing outside an action element', () => {
    expect(targetOf(document.createElement('div'))).toBeUndefined();
    expect(targetOf(null)).toBeUndefined();
  });
});

describe('InputController', () => {
  let desktop: HTMLElement;
  let received: GameInput[];
  let controller: InputController;

  beforeEach(() => {
    desktop = document.createElement('div');
    document.body.appendChild(desktop);
    // Rendered at half size, offset on the page
    desktop.getBoundingClientRect = () => ({
      x: 100, y: 50, left: 100, top: 50, width: 960, height: 540, right: 1060, bottom: 590,
      toJSON: () => ({}),
    });
    received = [];
    const sink: InputSink = { enqueue: input => { received.push(input); } };
    controller = new InputController(desktop, sink, { width: 1920, height: 1080 });
    controller.attach();
  });

  afterEach(() => {
    controller.detach();
    desktop.remove();
  });

  function mouse(type: string, target: EventTarget, clientX: number, clientY: number, init: MouseEventInit = {}) {
    target.dispatchEvent(new MouseEvent(type, { bubbles: true, cancelable: true, clientX, clientY, ...init }));
  }

  it('should scale client coordinates to the desktop', () => {
    expect(controller.toDesktop(580, 320)).toEqual({ x: 960, y: 540 });
  });

  it('should queue a press, drag and release in desktop coordinates', () => {
    const button = document.createElement('button');
    button.dataset.action = 'item';
    button.dataset.arg = 'item-7';
    desktop.appendChild(button);

    mouse('mousedown', button, 110, 60);
    mouse('mousemove', document, 120, 70);
    mouse('mouseup', document, 130, 80);

    expect(received).toEqual([
      { type: 'pointer-down', point: { x: 20, y: 20 }, target: { action: 'item', arg: 'item-7' } },
      { type: 'pointer-move', point: { x: 40, y: 40 } },
      { type: 'pointer-up', point: { x: 60, y: 60 } },
    ]);
  });

  it('should ignore moves and releases without a press', () => {
    mouse('mousemove', document, 120, 70);
    mouse('mouseup', document, 130, 80);

    expect(received).toEqual([]);
  });

  it('should ignore buttons other than the primary one', () => {
    mouse('mousedown', desktop, 110, 60, { button: 2 });

    expect(received).toEqual([]);
  });

  it('should queue key presses and keep Tab from leaving the page', () => {
    const tab = new KeyboardEvent('keydown', { key: 'Tab', cancelable: true });
    document.dispatchEvent(tab);
    document.dispatchEvent(new KeyboardEvent('keydown', { key: 'a' }));

    expect(tab.defaultPrevented).toBe(true);
    expect(received).toEqual([{ type: 'key', key: 'Tab' }, { type: 'key', key: 'a' }]);
  });

  it('should ignore shortcuts with modifier keys', () => {
    document.dispatchEvent(new KeyboardEvent('keydown', { key: 'r', ctrlKey: true }));

    expect(received).toEqual([]);
  });

  it('should stop listening once detached', () => {
    controller.detach();

    document.dispatchEvent(new KeyboardEvent('keydown', { key: 'a' }));

    expect(received).toEqual([]);
  });
});
