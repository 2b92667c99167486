/**
 * Notification scheduling - each scheduler owns a countdown that is advanced
 * by the frame delta. When it runs out the scheduler draws content and
 * produces one event, which `deliver` turns into a window.
 */

import { rollInterval } from '../random';
import type { Interval, Rng } from '../random';
import type { GameConfig } from '../config';
import type { SoundPlayer } from '../audio';
import type { ContentStore } from '../content/content-store';
import type { CallerScript, EmailTemplate } from '../content/types';
import type { GameWindow } from '../desktop/window';
import type { WindowManager } from '../desktop/window-manager';
import type { GameState } from '../game/state';
import type { ChatPlatform } from '../windows/types';

export class Countdown {
  private interval: Interval;
  private random: Rng;
  private remainingMs = 0;

  constructor(interval: Interval, random: Rng) {
    this.interval = interval;
    this.random = random;
    this.reset();
  }

  get remaining(): number {
    return this.remainingMs;
  }

  /** Start a new period with a freshly rolled length. */
  reset() {
    this.remainingMs = rollInterval(this.random, this.interval);
  }

  /** Run the clock down without firing. */
  elapse(dtMs: number) {
    this.remainingMs -= dtMs;
  }

  /** Returns true when the period ran out; the next one starts immediately. */
  advance(dtMs: number): boolean {
    this.remainingMs -= dtMs;
    if (this.remainingMs > 0) return false;
    this.reset();
    return true;
  }
}

interface EventOf<K extends string, E> {
  kind: K;
  firedAtMs: number;
  entry: E;
  /** The content channel had nothing left; `entry` is a placeholder */
  exhausted: boolean;
}

export interface EmailEntry {
  template: EmailTemplate;
  praise: boolean;
}

export interface ChatEntry {
  platform: ChatPlatform;
  thread: string;
  from: string;
  text: string;
}

export interface InterruptEntry {
  from: string;
  text: string;
}

export interface ActivityEntryEvent {
  text: string;
  gain: number;
}

export interface MilestoneEntry {
  threshold: number;
  text: string;
}

export type EmailEvent = EventOf<'email', EmailEntry>;
export type ChatEvent = EventOf<'chat', ChatEntry>;
export type PhoneEvent = EventOf<'phone', CallerScript>;
export type InterruptEvent = EventOf<'discord-interrupt', InterruptEntry>;
export type ActivityEvent = EventOf<'activity', ActivityEntryEvent>;
export type MilestoneEvent = EventOf<'milestone', MilestoneEntry>;

export type NotificationEvent = EmailEvent | ChatEvent | PhoneEvent | InterruptEvent | ActivityEvent | MilestoneEvent;

export type NotificationKind = NotificationEvent['kind'];

/** What schedulers see of the running game. */
export interface SchedulerContext {
  manager: WindowManager;
  content: ContentStore;
  config: GameConfig;
  state: GameState;
  sound: SoundPlayer;
  random: Rng;
  /** Game clock text, e.g. "9:41 AM" */
  clock(): string;
  nextId(prefix: string): string;
}

/** Anything the game advances once per frame. */
export interface Ticking {
  tick(dtMs: number, ctx: SchedulerContext): GameWindow | null;
}

export abstract class NotificationScheduler<E extends NotificationEvent> implements Ticking {
  abstract readonly kind: E['kind'];
  protected countdown: Countdown;
  protected elapsedMs = 0;

  constructor(interval: Interval, random: Rng) {
    this.countdown = new Countdown(interval, random);
  }

  /** At most one event per call, however large the delta. */
  advance(dtMs: number, ctx: SchedulerContext): E | null {
    this.elapsedMs += dtMs;
    if (this.paused(ctx)) return null;

    const early = this.pending(dtMs, ctx);
    if (early) {
      // A period that runs out under an early event fires on the next call
      this.countdown.elapse(dtMs);
      return early;
    }

    if (!this.countdown.advance(dtMs)) return null;
    if (this.blocked(ctx)) return null;
    return this.fire(ctx);
  }

  abstract deliver(event: E, ctx: SchedulerContext): GameWindow | null;

  tick(dtMs: number, ctx: SchedulerContext): GameWindow | null {
    const event = this.advance(dtMs, ctx);
    return event ? this.deliver(event, ctx) : null;
  }

  get remainingMs(): number {
    return this.countdown.remaining;
  }

  /** Paused schedulers keep their remaining time. */
  protected paused(_ctx: SchedulerContext): boolean {
    return false;
  }

  /** A due event that is skipped still resets the countdown. */
  protected blocked(_ctx: SchedulerContext): boolean {
    return false;
  }

  /** Events queued ahead of the countdown. */
  protected pending(_dtMs: number, _ctx: SchedulerContext): E | null {
    return null;
  }

  protected abstract fire(ctx: SchedulerContext): E;

  /** Log tag, e.g. "Email" */
  protected abstract readonly tag: string;

  protected warnIfExhausted(exhausted: boolean, channel: string) {
    if (exhausted) {
      console.warn(`[${this.tag}] ${channel} exhausted, using placeholder`);
    }
  }
}
