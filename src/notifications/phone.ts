/**
 * Phone scheduler - an incoming call rings in a popup. Only one call at a
 * time; a call that comes due while the phone is busy is skipped.
 */

import { createPhoneWindow } from '../windows/factory';
import type { GameWindow } from '../desktop/window';
import type { Rng } from '../random';
import type { GameConfig } from '../config';
import { NotificationScheduler } from './scheduler';
import type { PhoneEvent, SchedulerContext } from './scheduler';

export function isPhonePopup(win: GameWindow): boolean {
  return win.content.kind === 'popup' && win.content.popup.type === 'phone';
}

export class PhoneScheduler extends NotificationScheduler<PhoneEvent> {
  readonly kind = 'phone';
  protected readonly tag = 'Phone';

  constructor(config: GameConfig['phone'], random: Rng) {
    super(config.interval, random);
  }

  protected blocked(ctx: SchedulerContext): boolean {
    const busy = ctx.manager.windows().some(isPhonePopup);
    if (busy) console.log('[Phone] Line busy, skipping call');
    return busy;
  }

  protected fire(ctx: SchedulerContext): PhoneEvent {
    const { entry, exhausted } = ctx.content.draw('phone.callers', 'shuffle', ctx.random);
    this.warnIfExhausted(exhausted, 'phone.callers');
    return { kind: 'phone', firedAtMs: this.elapsedMs, entry, exhausted };
  }

  deliver(event: PhoneEvent, ctx: SchedulerContext): GameWindow | null {
    const popup = createPhoneWindow(ctx.nextId('phone'), ctx.config.screen, event.entry, ctx.config.phone.ringTimeoutMs);
    ctx.manager.spawn(popup);
    ctx.sound.play('ring');
    return popup;
  }
}
