/**
 * Coworker activity - every few seconds Priya gets something done. The entry
 * goes into the Activity Log, the progress bar moves, and a praise email
 * follows shortly after.
 */

import { logActivity, setProgress } from '../windows/activity-log';
import type { GameWindow } from '../desktop/window';
import { credit } from '../game/state';
import { rollInterval, uniform } from '../random';
import type { Rng } from '../random';
import type { GameConfig } from '../config';
import type { EmailScheduler } from './email';
import { NotificationScheduler } from './scheduler';
import type { ActivityEvent, SchedulerContext } from './scheduler';

export class ActivityScheduler extends NotificationScheduler<ActivityEvent> {
  readonly kind = 'activity';
  protected readonly tag = 'Activity';
  private config: GameConfig['activity'];
  private email: EmailScheduler;

  constructor(config: GameConfig['activity'], random: Rng, email: EmailScheduler) {
    super(config.interval, random);
    this.config = config;
    this.email = email;
  }

  protected fire(ctx: SchedulerContext): ActivityEvent {
    const { entry, exhausted } = ctx.content.draw('chat.activities', 'shuffle', ctx.random);
    this.warnIfExhausted(exhausted, 'chat.activities');
    const gain = uniform(ctx.random, this.config.gain.min, this.config.gain.max);
    return { kind: 'activity', firedAtMs: this.elapsedMs, entry: { text: entry, gain }, exhausted };
  }

  deliver(event: ActivityEvent, ctx: SchedulerContext): GameWindow | null {
    credit(ctx.state, 'coworker', event.entry.gain);

    const log = ctx.manager.get('activity-log');
    if (log && log.content.kind === 'activity-log') {
      logActivity(log.content, ctx.clock(), event.entry.text);
      setProgress(log.content, ctx.state.progress.value);
      log.touch();
    }

    this.email.queuePraise(rollInterval(ctx.random, this.config.praiseDelay));
    return null;
  }
}
