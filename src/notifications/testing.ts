/**
 * Scheduler context for tests: an empty desktop, a fixed clock and a
 * recorded sound player.
 */

import type { SoundCue } from '../audio';
import { resolveConfig } from '../config';
import type { DeepPartial, GameConfig } from '../config';
import { ContentStore } from '../content/content-store';
import type { RawDocuments } from '../content/types';
import { WindowManager } from '../desktop/window-manager';
import { createGameState } from '../game/state';
import type { Rng } from '../random';
import type { SchedulerContext } from './scheduler';

export interface TestContext extends SchedulerContext {
  played: SoundCue[];
}

export interface TestContextOptions {
  config?: DeepPartial<GameConfig>;
  documents?: RawDocuments;
  random?: Rng;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const config = resolveConfig(options.config);
  const played: SoundCue[] = [];
  let counter = 0;
  return {
    manager: new WindowManager(),
    content: ContentStore.fromDocuments(options.documents ?? {}),
    config,
    state: createGameState(config),
    sound: { play: cue => { played.push(cue); } },
    random: options.random ?? (() => 0),
    clock: () => '9:00 AM',
    nextId: prefix => `${prefix}-${++counter}`,
    played,
  };
}

/** A scheduler interval that always rolls the same length. */
export function every(ms: number) {
  return { interval: { minMs: ms, maxMs: ms } };
}
