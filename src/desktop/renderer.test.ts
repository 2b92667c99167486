import { describe, it, expect, beforeEach } from 'vitest';
import { DomRenderer } from './renderer';
import { WindowManager } from './window-manager';
import { GameWindow } from './window';
import { createFtlHold, createInventory, itemsOf } from '../windows/items';

describe('DomRenderer', () => {
  let root: HTMLElement;
  let renderer: DomRenderer;
  let manager: WindowManager;

  beforeEach(() => {
    root = document.createElement('div');
    renderer = new DomRenderer(root);
    manager = new WindowManager();
    manager.spawn(new GameWindow({ id: 'inventory', title: 'Inventory', rect: { x: 10, y: 20, width: 400, height: 300 }, content: createInventory() }));
    manager.spawn(new GameWindow({ id: 'ftl', title: 'FTL', rect: { x: 500, y: 20, width: 400, height: 300 }, content: createFtlHold(), closable: false }));
  });

  function windowEl(id: string): HTMLElement {
    const el = root.querySelector<HTMLElement>(`[data-window="${id}"]`);
    if (!el) throw new Error(`No element for ${id}`);
    return el;
  }

  it('should mount one element per window with its geometry and stacking', () => {
    manager.renderAll(renderer, { clock: '9:00 AM' });

    expect(root.classList.contains('desktop')).toBe(true);
    expect(root.querySelectorAll('.window')).toHaveLength(2);

    const inventory = windowEl('inventory');
    expect(inventory.style.left).toBe('10px');
    expect(inventory.style.top).toBe('20px');
    expect(inventory.style.zIndex).toBe('1');
    expect(inventory.classList.contains('inactive')).toBe(true);
    expect(inventory.querySelector('.window-title')?.textContent).toBe('Inventory');
    expect(inventory.querySelector('.window-close')).not.toBeNull();

    const ftl = windowEl('ftl');
    expect(ftl.style.zIndex).toBe('2');
    expect(ftl.classList.contains('inactive')).toBe(false);
    expect(ftl.querySelector('.window-close')).toBeNull();
  });

  it('should show the clock', () => {
    manager.renderAll(renderer, { clock: '9:42 AM' });

    expect(root.querySelector('.desktop-clock')?.textContent).toBe('9:42 AM');
  });

  it('should only repaint content after the window is touched', () => {
    manager.renderAll(renderer, { clock: '9:00 AM' });
    const content = windowEl('ftl').querySelector('.window-content');
    const before = content?.firstElementChild;

    manager.renderAll(renderer, { clock: '9:00 AM' });
    expect(content?.firstElementChild).toBe(before);

    manager.get('ftl')?.touch();
    manager.renderAll(renderer, { clock: '9:00 AM' });
    expect(content?.firstElementChild).not.toBe(before);
  });

  it('should remove elements of closed windows', () => {
    manager.renderAll(renderer, { clock: '9:00 AM' });

    manager.close('inventory');
    manager.renderAll(renderer, { clock: '9:00 AM' });

    expect(root.querySelector('[data-window="inventory"]')).toBeNull();
    expect(root.querySelectorAll('.window')).toHaveLength(1);
  });

  it('should mark the carried item and show the drag ghost', () => {
    const inventory = manager.get('inventory');
    if (!inventory) throw new Error('inventory missing');
    const sword = itemsOf(inventory.content)[0];

    manager.dispatchPointerDown({ x: 50, y: 100 }, { action: 'item', arg: sword.id });
    manager.dispatchPointerMove({ x: 300, y: 400 });
    manager.renderAll(renderer, { clock: '9:00 AM' });

    const ghost = root.querySelector<HTMLElement>('.drag-item');
    expect(ghost?.hidden).toBe(false);
    expect(ghost?.style.left).toBe('300px');
    expect(root.querySelectorAll('.item.carried')).toHaveLength(1);

    manager.dispatchPointerUp({ x: 1800, y: 900 });
    manager.renderAll(renderer, { clock: '9:00 AM' });

    expect(ghost?.hidden).toBe(true);
    expect(root.querySelectorAll('.item.carried')).toHaveLength(0);
  });

  it('should replace the desktop with the ending summary', () => {
    manager.renderAll(renderer, { clock: '9:00 AM' });

    renderer.renderEnding({
      elapsed: '4:05',
      itemsMoved: 3,
      interruptionsDismissed: 2,
      emailsReplied: 1,
      callsAnswered: 0,
      playerShare: 12,
      coworkerShare: 88,
      headline: 'Priya did most of the work.',
    });

    expect(root.querySelectorAll('.window')).toHaveLength(0);
    expect(root.querySelector('.ending-headline')?.textContent).toBe('Priya did most of the work.');
    expect(root.querySelectorAll('.ending-stats dd')[0]?.textContent).toBe('4:05');
    expect(root.querySelector('.share-legend')?.textContent).toBe('You: 12% · Priya: 88%');
  });
});
