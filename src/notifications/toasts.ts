/**
 * Toasts - short-lived notification popups stacked in the bottom-right
 * corner, newest at the bottom.
 */

import { createToastWindow, TOAST_SIZE } from '../windows/factory';
import type { Screen } from '../windows/factory';
import type { ToastPopup, ToastTarget } from '../windows/types';
import type { GameWindow } from '../desktop/window';
import type { WindowManager } from '../desktop/window-manager';
import type { SchedulerContext } from './scheduler';

const MARGIN = 20;
const GAP = 10;

export function spawnToast(ctx: SchedulerContext, title: string, heading: string, body: string, target: ToastTarget, lifetimeMs: number): GameWindow {
  const sequence = Math.max(0, ...openToasts(ctx.manager).map(({ popup }) => popup.sequence)) + 1;
  const toast = createToastWindow(ctx.nextId('toast'), sequence, title, heading, body, target, lifetimeMs);
  ctx.manager.spawn(toast);
  ctx.sound.play('notify');
  return toast;
}

function toastOf(win: GameWindow): ToastPopup | null {
  return win.content.kind === 'popup' && win.content.popup.type === 'toast' ? win.content.popup : null;
}

export function isToast(win: GameWindow): boolean {
  return toastOf(win) !== null;
}

function openToasts(manager: WindowManager): Array<{ win: GameWindow; popup: ToastPopup }> {
  return manager.windows().flatMap(win => {
    const popup = toastOf(win);
    return popup ? [{ win, popup }] : [];
  });
}

/** Lay toasts out bottom-up in the order they were spawned. */
export function stackToasts(manager: WindowManager, screen: Screen) {
  const toasts = openToasts(manager).sort((a, b) => a.popup.sequence - b.popup.sequence);

  const x = screen.width - TOAST_SIZE.width - MARGIN;
  let y = screen.height - MARGIN;
  for (let i = toasts.length - 1; i >= 0; i--) {
    const { win } = toasts[i];
    y -= win.rect.height;
    win.moveTo({ x, y });
    y -= GAP;
  }
}
