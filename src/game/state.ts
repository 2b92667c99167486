/**
 * Game state - everything the loop mutates, owned by one Game instance and
 * passed explicitly to the parts that need it.
 */

import { ProgressTracker } from './progress';
import type { GameConfig } from '../config';

export type GamePhase = 'playing' | 'ending';

export interface GameStats {
  itemsMoved: number;
  interruptionsDismissed: number;
  emailsReplied: number;
  callsAnswered: number;
  elapsedMs: number;
  /** Progress points earned by each party */
  playerWork: number;
  coworkerWork: number;
  passiveWork: number;
}

export interface GameState {
  phase: GamePhase;
  progress: ProgressTracker;
  stats: GameStats;
}

export type WorkSource = 'player' | 'coworker' | 'passive';

export function createStats(): GameStats {
  return {
    itemsMoved: 0,
    interruptionsDismissed: 0,
    emailsReplied: 0,
    callsAnswered: 0,
    elapsedMs: 0,
    playerWork: 0,
    coworkerWork: 0,
    passiveWork: 0,
  };
}

export function createGameState(config: GameConfig): GameState {
  return {
    phase: 'playing',
    progress: new ProgressTracker(config.progress.max, config.progress.milestones),
    stats: createStats(),
  };
}

/** Add progress and book it to whoever earned it. Returns the amount applied. */
export function credit(state: GameState, source: WorkSource, amount: number): number {
  const applied = state.progress.add(amount);
  switch (source) {
    case 'player': state.stats.playerWork += applied; break;
    case 'coworker': state.stats.coworkerWork += applied; break;
    case 'passive': state.stats.passiveWork += applied; break;
  }
  return applied;
}
