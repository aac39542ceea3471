import { describe, expect, it } from 'vitest';
import { shouldRun } from '../src/commands/cron.js';

describe('shouldRun', () => {
  const now = new Date('2024-06-01T12:00:00.000Z');

  it('runs when nothing has been refreshed yet', () => {
    expect(shouldRun(null, 1, now)).toBe(true);
  });

  it('waits until the interval has passed', () => {
    expect(shouldRun('2024-06-01T11:30:00.000Z', 1, now)).toBe(false);
    expect(shouldRun('2024-06-01T11:00:00.000Z', 1, now)).toBe(true);
    expect(shouldRun('2024-06-01T06:00:00.000Z', 6, now)).toBe(true);
  });

  it('always runs with a zero interval', () => {
    expect(shouldRun('2024-06-01T12:00:00.000Z', 0, now)).toBe(true);
  });
});
