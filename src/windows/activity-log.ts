/**
 * Activity Log - what the coworker got done, newest first, and the shared
 * progress bar.
 */

import type { ActivityEntry, ActivityLogContent } from './types';

export function createActivityLog(limit: number, max: number): ActivityLogContent {
  return { kind: 'activity-log', entries: [], limit, progress: 0, max };
}

export function logActivity(log: ActivityLogContent, time: string, text: string): ActivityEntry {
  const entry = { time, text };
  log.entries.unshift(entry);
  if (log.entries.length > log.limit) {
    log.entries.length = log.limit;
  }
  return entry;
}

/** Returns true when the rounded percentage shown changed. */
export function setProgress(log: ActivityLogContent, value: number): boolean {
  const before = Math.floor(log.progress);
  log.progress = value;
  return Math.floor(value) !== before;
}
