import { formatClock } from '../desktop/html';

const DAY_START_HOUR = 9;

/** Office clock: the day starts at 9:00 AM and a real second is one minute. */
export function officeClock(elapsedMs: number): string {
  const minutes = Math.floor(elapsedMs / 1000);
  return formatClock(DAY_START_HOUR + Math.floor(minutes / 60), minutes % 60);
}
