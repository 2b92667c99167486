/**
 * Ending summary - how the session went, and who really did the work.
 */

import type { EndingSummary } from '../desktop/types';
import type { ProgressTracker } from './progress';
import type { GameStats } from './state';

export function formatElapsed(ms: number): string {
  const totalSeconds = Math.max(0, Math.floor(ms / 1000));
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = (totalSeconds % 60).toString().padStart(2, '0');
  return `${minutes}:${seconds}`;
}

function headline(playerShare: number): string {
  if (playerShare >= 50) return 'You actually pulled your weight!';
  if (playerShare >= 10) return 'Priya did most of the work.';
  return 'The conference is funded. Priya did it.';
}

/**
 * Passive progress happened while nobody was looking, so it counts toward
 * the coworker's share.
 */
export function summarize(stats: GameStats, progress: ProgressTracker): EndingSummary {
  const total = stats.playerWork + stats.coworkerWork + stats.passiveWork;
  const playerShare = total > 0 ? Math.round((stats.playerWork / total) * 100) : 0;
  const coworkerShare = total > 0 ? 100 - playerShare : 0;

  return {
    elapsed: formatElapsed(stats.elapsedMs),
    itemsMoved: stats.itemsMoved,
    interruptionsDismissed: stats.interruptionsDismissed,
    emailsReplied: stats.emailsReplied,
    callsAnswered: stats.callsAnswered,
    playerShare,
    coworkerShare,
    headline: progress.complete ? headline(playerShare) : 'The conference is not funded yet.',
  };
}
