import { describe, it, expect } from 'vitest';
import { Countdown } from './scheduler';

describe('Countdown', () => {
  it('should roll its first period on creation', () => {
    const countdown = new Countdown({ minMs: 100, maxMs: 200 }, () => 0.5);

    expect(countdown.remaining).toBe(150);
  });

  it('should fire once the period runs out and start a new one', () => {
    const rolls = [0, 1 / 2];
    const countdown = new Countdown({ minMs: 100, maxMs: 200 }, () => rolls.shift() ?? 0);

    expect(countdown.advance(60)).toBe(false);
    expect(countdown.remaining).toBe(40);
    expect(countdown.advance(40)).toBe(true);
    expect(countdown.remaining).toBe(150);
  });

  it('should fire only once for a delta longer than several periods', () => {
    const countdown = new Countdown({ minMs: 100, maxMs: 100 }, () => 0);

    expect(countdown.advance(1_000)).toBe(true);
    expect(countdown.remaining).toBe(100);
  });
});
