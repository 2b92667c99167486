/**
 * Discord interrupt scheduler - a fullscreen modal ping that blocks the
 * desktop until it is dismissed. The timer does not run while one is open.
 */

import { createInterruptWindow } from '../windows/factory';
import type { GameWindow } from '../desktop/window';
import type { Rng } from '../random';
import type { GameConfig } from '../config';
import { NotificationScheduler } from './scheduler';
import type { InterruptEvent, SchedulerContext } from './scheduler';

export const INTERRUPT_SENDER = 'Priya';

export class DiscordInterruptScheduler extends NotificationScheduler<InterruptEvent> {
  readonly kind = 'discord-interrupt';
  protected readonly tag = 'Discord';

  constructor(config: GameConfig['interrupt'], random: Rng) {
    super(config.interval, random);
  }

  protected paused(ctx: SchedulerContext): boolean {
    return ctx.manager.modalOpen();
  }

  protected fire(ctx: SchedulerContext): InterruptEvent {
    const { entry, exhausted } = ctx.content.draw('chat.interrupts', 'random', ctx.random);
    this.warnIfExhausted(exhausted, 'chat.interrupts');
    return {
      kind: 'discord-interrupt',
      firedAtMs: this.elapsedMs,
      entry: { from: INTERRUPT_SENDER, text: entry },
      exhausted,
    };
  }

  deliver(event: InterruptEvent, ctx: SchedulerContext): GameWindow | null {
    const popup = createInterruptWindow(ctx.nextId('interrupt'), ctx.config.screen, event.entry.from, event.entry.text);
    ctx.manager.spawn(popup);
    ctx.sound.play('discord');
    return popup;
  }
}
