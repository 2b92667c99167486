/**
 * Game configuration - every tunable number lives here.
 *
 * Times are milliseconds unless the name says otherwise. Progress amounts are
 * percentage points of the bar (max 100).
 */

import type { Interval, Range } from './random';
import type { SoundCue } from './audio';

export interface SchedulerConfig {
  interval: Interval;
}

export interface GameConfig {
  screen: { width: number; height: number };
  progress: {
    max: number;
    milestones: number[];
    passivePerSecond: number;
  };
  /** Progress credited for things the player does */
  work: {
    itemTransfer: number;
    interruptionDismissed: number;
    replySent: number;
  };
  email: SchedulerConfig & { praiseChance: number; toastLifetimeMs: number; inboxLimit: number };
  chat: SchedulerConfig & { toastLifetimeMs: number };
  phone: SchedulerConfig & {
    ringTimeoutMs: number;
    msPerChar: number;
    pauseBetweenTurnsMs: number;
    hangUpBufferMs: number;
  };
  interrupt: SchedulerConfig;
  activity: SchedulerConfig & { gain: Range; praiseDelay: Interval; logLimit: number };
  milestoneToastMs: number;
  zomboidSceneMs: number;
  contentBaseUrl: string;
  sounds: Partial<Record<SoundCue, string>>;
  muted: boolean;
}

export const DEFAULT_CONFIG: GameConfig = {
  screen: { width: 1920, height: 1080 },
  progress: {
    max: 100,
    milestones: [25, 50, 75, 90, 100],
    passivePerSecond: 0.05,
  },
  work: {
    itemTransfer: 0.5,
    interruptionDismissed: 0.25,
    replySent: 1,
  },
  email: { interval: { minMs: 10_000, maxMs: 20_000 }, praiseChance: 0.3, toastLifetimeMs: 8_000, inboxLimit: 50 },
  chat: { interval: { minMs: 10_000, maxMs: 20_000 }, toastLifetimeMs: 5_000 },
  phone: {
    interval: { minMs: 45_000, maxMs: 90_000 },
    ringTimeoutMs: 15_000,
    msPerChar: 50,
    pauseBetweenTurnsMs: 800,
    hangUpBufferMs: 5_000,
  },
  interrupt: { interval: { minMs: 30_000, maxMs: 60_000 } },
  activity: {
    interval: { minMs: 5_000, maxMs: 15_000 },
    gain: { min: 5, max: 12.5 },
    praiseDelay: { minMs: 1_000, maxMs: 3_000 },
    logLimit: 30,
  },
  milestoneToastMs: 3_000,
  zomboidSceneMs: 3_000,
  contentBaseUrl: './content',
  sounds: {},
  muted: false,
};

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * Merge overrides onto the defaults, section by section. Arrays replace
 * rather than merge.
 */
export function resolveConfig(overrides: DeepPartial<GameConfig> = {}, base: GameConfig = DEFAULT_CONFIG): GameConfig {
  const o = overrides;
  return {
    screen: { ...base.screen, ...o.screen },
    progress: {
      ...base.progress,
      ...o.progress,
      milestones: [...(o.progress?.milestones ?? base.progress.milestones)],
    },
    work: { ...base.work, ...o.work },
    email: { ...base.email, ...o.email, interval: { ...base.email.interval, ...o.email?.interval } },
    chat: { ...base.chat, ...o.chat, interval: { ...base.chat.interval, ...o.chat?.interval } },
    phone: { ...base.phone, ...o.phone, interval: { ...base.phone.interval, ...o.phone?.interval } },
    interrupt: { interval: { ...base.interrupt.interval, ...o.interrupt?.interval } },
    activity: {
      ...base.activity,
      ...o.activity,
      interval: { ...base.activity.interval, ...o.activity?.interval },
      gain: { ...base.activity.gain, ...o.activity?.gain },
      praiseDelay: { ...base.activity.praiseDelay, ...o.activity?.praiseDelay },
    },
    milestoneToastMs: o.milestoneToastMs ?? base.milestoneToastMs,
    zomboidSceneMs: o.zomboidSceneMs ?? base.zomboidSceneMs,
    contentBaseUrl: o.contentBaseUrl ?? base.contentBaseUrl,
    sounds: { ...base.sounds, ...o.sounds },
    muted: o.muted ?? base.muted,
  };
}

function scaleInterval(interval: Interval, factor: number): Interval {
  return { minMs: interval.minMs / factor, maxMs: interval.maxMs / factor };
}

/**
 * Speed the game up (timeScale > 1) or slow it down. Divides every scheduler
 * interval and multiplies the passive progress rate.
 */
export function applyTimeScale(config: GameConfig, timeScale: number): GameConfig {
  return {
    ...config,
    progress: { ...config.progress, passivePerSecond: config.progress.passivePerSecond * timeScale },
    email: { ...config.email, interval: scaleInterval(config.email.interval, timeScale) },
    chat: { ...config.chat, interval: scaleInterval(config.chat.interval, timeScale) },
    phone: { ...config.phone, interval: scaleInterval(config.phone.interval, timeScale) },
    interrupt: { ...config.interrupt, interval: scaleInterval(config.interrupt.interval, timeScale) },
    activity: { ...config.activity, interval: scaleInterval(config.activity.interval, timeScale) },
  };
}

/**
 * Build a config from the page query string: ?timeScale=4&muted=1
 */
export function configFromQuery(search: string, base: GameConfig = DEFAULT_CONFIG): GameConfig {
  const params = new URLSearchParams(search);
  let config = resolveConfig({}, base);

  const rawScale = params.get('timeScale');
  if (rawScale !== null) {
    const timeScale = Number(rawScale);
    if (Number.isFinite(timeScale) && timeScale > 0) {
      config = applyTimeScale(config, timeScale);
    } else {
      console.warn(`[Config] Ignoring invalid timeScale: ${rawScale}`);
    }
  }

  const rawMuted = params.get('muted');
  if (rawMuted !== null) {
    if (rawMuted === '1' || rawMuted === 'true') {
      config.muted = true;
    } else if (rawMuted === '0' || rawMuted === 'false') {
      config.muted = false;
    } else {
      console.warn(`[Config] Ignoring invalid muted flag: ${rawMuted}`);
    }
  }

  return config;
}
