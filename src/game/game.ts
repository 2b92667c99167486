/**
 * Game - the Playing → Ending state machine and its per-frame update.
 *
 * One tick, in order: check for completion, drain input, passive progress,
 * schedulers, content timers, toast layout, render. Progress reaching max is
 * picked up at the start of the following tick.
 */

import { silentPlayer } from '../audio';
import type { SoundPlayer } from '../audio';
import type { GameConfig } from '../config';
import type { ContentStore } from '../content/content-store';
import { WindowManager } from '../desktop/window-manager';
import type { EndingSummary, Renderer } from '../desktop/types';
import {
  ActivityScheduler,
  ChatScheduler,
  DiscordInterruptScheduler,
  EmailScheduler,
  PhoneScheduler,
  deliverMilestone,
  milestoneEvent,
  stackToasts,
} from '../notifications';
import type { MilestoneEvent, SchedulerContext, Ticking } from '../notifications';
import { setProgress } from '../windows/activity-log';
import { advanceContent } from '../windows/advance';
import type { ContentTiming } from '../windows/advance';
import { createDesktopWindows } from '../windows/factory';
import type { Rng } from '../random';
import { handleAction, onClosedByPlayer, typeInto } from './actions';
import { officeClock } from './clock';
import { summarize } from './ending';
import type { GameInput, InputSink } from './input';
import { createGameState, credit } from './state';
import type { GamePhase, GameState } from './state';

export interface GameOptions {
  config: GameConfig;
  content: ContentStore;
  renderer: Renderer;
  sound?: SoundPlayer;
  random?: Rng;
  onExit?: () => void;
}

export class Game implements InputSink {
  readonly manager = new WindowManager();
  readonly state: GameState;
  readonly email: EmailScheduler;
  private config: GameConfig;
  private renderer: Renderer;
  private sound: SoundPlayer;
  private onExit: () => void;
  private schedulers: Ticking[];
  private queue: GameInput[] = [];
  private milestones: MilestoneEvent[] = [];
  private timing: ContentTiming;
  private ctx: SchedulerContext;
  private idCounter = 0;
  private summary: EndingSummary | null = null;
  private isExited = false;

  constructor(options: GameOptions) {
    this.config = options.config;
    this.renderer = options.renderer;
    this.sound = options.sound ?? silentPlayer;
    this.onExit = options.onExit ?? (() => {});
    const random = options.random ?? Math.random;

    this.state = createGameState(this.config);
    this.ctx = {
      manager: this.manager,
      content: options.content,
      config: this.config,
      state: this.state,
      sound: this.sound,
      random,
      clock: () => officeClock(this.state.stats.elapsedMs),
      nextId: prefix => `${prefix}-${++this.idCounter}`,
    };

    this.email = new EmailScheduler(this.config.email, random);
    this.schedulers = [
      this.email,
      new ChatScheduler(this.config.chat, random),
      new PhoneScheduler(this.config.phone, random),
      new DiscordInterruptScheduler(this.config.interrupt, random),
      new ActivityScheduler(this.config.activity, random, this.email),
    ];

    this.timing = {
      zomboidSceneMs: this.config.zomboidSceneMs,
      phone: {
        msPerChar: this.config.phone.msPerChar,
        pauseBetweenTurnsMs: this.config.phone.pauseBetweenTurnsMs,
        hangUpBufferMs: this.config.phone.hangUpBufferMs,
      },
    };

    this.state.progress.onThresholdCrossed(threshold => {
      this.milestones.push(milestoneEvent(threshold, this.state.stats.elapsedMs, this.ctx));
    });
  }

  get phase(): GamePhase {
    return this.state.phase;
  }

  get exited(): boolean {
    return this.isExited;
  }

  get endingSummary(): EndingSummary | null {
    return this.summary;
  }

  /** Open the desktop windows and draw the first frame. */
  start() {
    if (this.manager.count() > 0) return;
    for (const win of createDesktopWindows({
      screen: this.config.screen,
      inboxLimit: this.config.email.inboxLimit,
      logLimit: this.config.activity.logLimit,
      progressMax: this.config.progress.max,
    })) {
      this.manager.spawn(win);
    }
    console.log('[Game] Started');
    this.render();
  }

  enqueue(input: GameInput) {
    if (this.isExited) return;
    // Ending only listens for the exit key
    if (this.state.phase === 'ending' && input.type !== 'key') return;
    this.queue.push(input);
  }

  tick(dtMs: number) {
    if (this.isExited) return;

    if (this.state.phase === 'playing' && this.state.progress.complete) {
      this.enterEnding();
      return;
    }

    if (this.state.phase === 'ending') {
      this.drainInput();
      return;
    }

    this.state.stats.elapsedMs += dtMs;
    this.drainInput();

    credit(this.state, 'passive', this.config.progress.passivePerSecond * dtMs / 1000);

    for (const scheduler of this.schedulers) {
      scheduler.tick(dtMs, this.ctx);
    }
    while (this.milestones.length > 0) {
      const event = this.milestones.shift();
      if (event) deliverMilestone(event, this.ctx);
    }

    this.advanceTimers(dtMs);
    this.syncProgressBar();
    stackToasts(this.manager, this.config.screen);
    this.render();
  }

  private drainInput() {
    const inputs = this.queue;
    this.queue = [];
    for (const input of inputs) {
      if (this.isExited) return;
      this.handleInput(input);
    }
  }

  private handleInput(input: GameInput) {
    if (this.state.phase === 'ending') {
      if (input.type === 'key' && input.key === 'Escape') this.exit();
      return;
    }

    switch (input.type) {
      case 'pointer-down': {
        const result = this.manager.dispatchPointerDown(input.point, input.target);
        if (result.kind === 'none') return;
        this.sound.play('click');
        if (result.kind === 'closed') {
          onClosedByPlayer(this.ctx, result.window);
        } else if (result.kind === 'content' && result.target) {
          handleAction(this.ctx, result.window, result.target);
        }
        return;
      }

      case 'pointer-move':
        this.manager.dispatchPointerMove(input.point);
        return;

      case 'pointer-up': {
        const result = this.manager.dispatchPointerUp(input.point);
        if (result.kind === 'item-transferred') {
          this.state.stats.itemsMoved++;
          credit(this.state, 'player', this.config.work.itemTransfer);
        }
        return;
      }

      case 'key':
        this.handleKey(input.key);
        return;
    }
  }

  private handleKey(key: string) {
    if (key === 'Tab') {
      this.manager.cycleFocus();
      return;
    }
    if (key.length !== 1) return;
    const focused = this.manager.focused();
    if (focused) typeInto(focused);
  }

  private advanceTimers(dtMs: number) {
    for (const win of this.manager.windows()) {
      const result = advanceContent(win.content, dtMs, this.timing);
      if (result === 'changed') win.touch();
      if (result === 'expired') this.manager.close(win.id);
    }
  }

  private syncProgressBar() {
    const log = this.manager.get('activity-log');
    if (log && log.content.kind === 'activity-log' && setProgress(log.content, this.state.progress.value)) {
      log.touch();
    }
  }

  private render() {
    this.manager.renderAll(this.renderer, { clock: officeClock(this.state.stats.elapsedMs) });
  }

  private enterEnding() {
    this.state.phase = 'ending';
    this.manager.clear();
    this.queue = [];
    this.milestones = [];

    this.summary = summarize(this.state.stats, this.state.progress);
    this.renderer.renderEnding(this.summary);
    this.sound.play('celebration');
    console.log(`[Game] Ending reached after ${this.summary.elapsed}`);
  }

  private exit() {
    this.isExited = true;
    this.queue = [];
    console.log('[Game] Exit');
    this.onExit();
  }
}
