/**
 * Milestone toasts - raised by the progress tracker's threshold callbacks
 * rather than a timer.
 */

import { createMilestoneWindow, milestoneTop } from '../windows/factory';
import type { GameWindow } from '../desktop/window';
import type { MilestoneEvent, SchedulerContext } from './scheduler';

export function milestoneEvent(threshold: number, firedAtMs: number, ctx: SchedulerContext): MilestoneEvent {
  return {
    kind: 'milestone',
    firedAtMs,
    entry: { threshold, text: ctx.content.milestoneText(threshold) },
    exhausted: false,
  };
}

function isMilestone(win: GameWindow): boolean {
  return win.content.kind === 'popup' && win.content.popup.type === 'milestone';
}

/** Lowest banner slot no open milestone occupies. */
function freeSlot(ctx: SchedulerContext): number {
  const taken = new Set(ctx.manager.windows().filter(isMilestone).map(win => win.rect.y));
  let slot = 0;
  while (taken.has(milestoneTop(slot))) slot++;
  return slot;
}

export function deliverMilestone(event: MilestoneEvent, ctx: SchedulerContext): GameWindow {
  const popup = createMilestoneWindow(
    ctx.nextId('milestone'),
    ctx.config.screen,
    freeSlot(ctx),
    event.entry.threshold,
    event.entry.text,
    ctx.config.milestoneToastMs,
  );
  ctx.manager.spawn(popup);
  ctx.sound.play('notify');
  return popup;
}
