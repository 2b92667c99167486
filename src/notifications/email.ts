/**
 * Email scheduler - new mail lands in the Outlook inbox and pops a toast.
 * Praise for the coworker can also be queued to arrive after a short delay.
 */

import { addEmail } from '../windows/mail';
import type { GameWindow } from '../desktop/window';
import type { Rng } from '../random';
import type { GameConfig } from '../config';
import { NotificationScheduler } from './scheduler';
import type { EmailEvent, SchedulerContext } from './scheduler';
import { spawnToast } from './toasts';

const URGENT_SUBJECT = /urgent|needed|required|asap/i;

export class EmailScheduler extends NotificationScheduler<EmailEvent> {
  readonly kind = 'email';
  protected readonly tag = 'Email';
  private praiseChance: number;
  private queuedPraise: number[] = [];

  constructor(config: GameConfig['email'], random: Rng) {
    super(config.interval, random);
    this.praiseChance = config.praiseChance;
  }

  /** Send a praise email in `delayMs`, independent of the regular timer. */
  queuePraise(delayMs: number) {
    this.queuedPraise.push(Math.max(0, delayMs));
  }

  get queued(): number {
    return this.queuedPraise.length;
  }

  protected pending(dtMs: number, ctx: SchedulerContext): EmailEvent | null {
    if (this.queuedPraise.length === 0) return null;

    this.queuedPraise = this.queuedPraise.map(ms => ms - dtMs);
    const due = this.queuedPraise.findIndex(ms => ms <= 0);
    if (due < 0) return null;

    this.queuedPraise.splice(due, 1);
    return this.draw(true, ctx);
  }

  protected fire(ctx: SchedulerContext): EmailEvent {
    return this.draw(ctx.random() < this.praiseChance, ctx);
  }

  private draw(praise: boolean, ctx: SchedulerContext): EmailEvent {
    const channel = praise ? 'emails.praise' : 'emails.regular';
    const { entry, exhausted } = ctx.content.draw(channel, 'shuffle', ctx.random);
    this.warnIfExhausted(exhausted, channel);
    return { kind: 'email', firedAtMs: this.elapsedMs, entry: { template: entry, praise }, exhausted };
  }

  deliver(event: EmailEvent, ctx: SchedulerContext): GameWindow | null {
    const outlook = ctx.manager.get('outlook');
    if (!outlook || outlook.content.kind !== 'outlook') {
      console.warn('[Email] No inbox open, dropping email');
      return null;
    }

    const { template, praise } = event.entry;
    const email = addEmail(outlook.content, template, ctx.clock(), !praise && URGENT_SUBJECT.test(template.subject));
    outlook.touch();

    return spawnToast(
      ctx,
      'Outlook',
      email.sender,
      email.subject,
      { kind: 'email', emailId: email.id },
      ctx.config.email.toastLifetimeMs,
    );
  }
}
