/**
 * DOM Renderer - projects the window manager's scene onto absolutely
 * positioned `.window` elements inside the fixed-size desktop element.
 *
 * Geometry and stacking are written every frame. Content HTML is only
 * rebuilt when the window's revision moves.
 */

import { escapeHtml } from './html';
import type { GameWindow } from './window';
import type { DesktopScene, EndingSummary, Renderer } from './types';

interface Mounted {
  el: HTMLElement;
  titleEl: HTMLElement;
  contentEl: HTMLElement;
  title: string;
  revision: number;
}

function requireChild(parent: HTMLElement, selector: string): HTMLElement {
  const el = parent.querySelector<HTMLElement>(selector);
  if (!el) throw new Error(`Missing ${selector} in window template`);
  return el;
}

export class DomRenderer implements Renderer {
  private root: HTMLElement;
  private mounted = new Map<string, Mounted>();
  private ghost: HTMLElement;
  private clock: HTMLElement;

  constructor(root: HTMLElement) {
    this.root = root;
    this.root.classList.add('desktop');

    this.clock = document.createElement('div');
    this.clock.className = 'desktop-clock';
    this.root.appendChild(this.clock);

    this.ghost = document.createElement('div');
    this.ghost.className = 'drag-item';
    this.ghost.hidden = true;
    this.root.appendChild(this.ghost);
  }

  renderDesktop(scene: DesktopScene) {
    const live = new Set<string>();

    scene.windows.forEach((win, index) => {
      live.add(win.id);
      const mounted = this.mounted.get(win.id) ?? this.mount(win);
      const { x, y, width, height } = win.rect;

      mounted.el.style.cssText = `left:${x}px;top:${y}px;width:${width}px;height:${height}px;z-index:${index + 1}`;
      mounted.el.classList.toggle('inactive', win.id !== scene.focusedId);
      mounted.el.hidden = !win.visible;

      if (mounted.title !== win.title) {
        mounted.titleEl.textContent = win.title;
        mounted.title = win.title;
      }
      if (mounted.revision !== win.revision) {
        win.render(mounted.contentEl);
        mounted.revision = win.revision;
      }
    });

    for (const [id, mounted] of this.mounted) {
      if (!live.has(id)) {
        mounted.el.remove();
        this.mounted.delete(id);
      }
    }

    const carried = scene.carried;
    this.root.querySelectorAll<HTMLElement>('.item').forEach(el => {
      el.classList.toggle('carried', carried !== null && el.dataset.arg === carried.item.id);
    });
    if (carried) {
      this.ghost.hidden = false;
      this.ghost.textContent = carried.item.icon;
      this.ghost.style.cssText = `left:${carried.pointer.x}px;top:${carried.pointer.y}px`;
    } else {
      this.ghost.hidden = true;
    }

    this.clock.textContent = scene.clock;
  }

  renderEnding(summary: EndingSummary) {
    for (const mounted of this.mounted.values()) {
      mounted.el.remove();
    }
    this.mounted.clear();
    this.ghost.hidden = true;

    let ending = this.root.querySelector<HTMLElement>('.ending');
    if (!ending) {
      ending = document.createElement('div');
      ending.className = 'ending';
      this.root.appendChild(ending);
    }

    ending.innerHTML = `
      <h1 class="ending-headline">${escapeHtml(summary.headline)}</h1>
      <dl class="ending-stats">
        <dt>Time at your desk</dt><dd>${escapeHtml(summary.elapsed)}</dd>
        <dt>Items shuffled</dt><dd>${summary.itemsMoved}</dd>
        <dt>Interruptions dismissed</dt><dd>${summary.interruptionsDismissed}</dd>
        <dt>Emails answered</dt><dd>${summary.emailsReplied}</dd>
        <dt>Calls taken</dt><dd>${summary.callsAnswered}</dd>
      </dl>
      <div class="ending-share">
        <div class="share-bar">
          <div class="share-player" style="width:${summary.playerShare}%"></div>
          <div class="share-coworker" style="width:${summary.coworkerShare}%"></div>
        </div>
        <div class="share-legend">You: ${summary.playerShare}% &middot; Priya: ${summary.coworkerShare}%</div>
      </div>
      <div class="ending-hint">Press Esc to exit</div>
    `;
  }

  private mount(win: GameWindow): Mounted {
    const el = document.createElement('div');
    el.className = `window layer-${win.layer} kind-${win.kind}`;
    if (win.content.kind === 'popup') {
      el.classList.add(`popup-${win.content.popup.type}`);
    }
    el.dataset.window = win.id;
    el.innerHTML = `
      <div class="window-titlebar">
        <div class="window-title"></div>
        ${win.closable ? '<div class="window-close" aria-label="Close">&times;</div>' : ''}
      </div>
      <div class="window-content"></div>
    `;
    this.root.appendChild(el);

    const mounted: Mounted = {
      el,
      titleEl: requireChild(el, '.window-title'),
      contentEl: requireChild(el, '.window-content'),
      title: '',
      revision: -1,
    };
    this.mounted.set(win.id, mounted);
    return mounted;
  }
}
