/**
 * Unit tests for Timedelta and Timestamp
 */

import { describe, it, expect } from 'vitest';
import { Timedelta, Timestamp } from './Time';

describe('Timedelta', () => {
  it('should use the largest fitting unit', () => {
    expect(new Timedelta(90).toString()).toBe('1m');
    expect(new Timedelta(7200).toString()).toBe('2h');
    expect(new Timedelta(3 * 86400).toString()).toBe('3d');
  });

  it('should show short spans as now', () => {
    expect(new Timedelta(3).toString()).toBe('now');
  });

  it('should render sentinels', () => {
    expect(new Timedelta(Timedelta.UNKNOWN).toString()).toBe('?');
    expect(new Timedelta(Timedelta.NOT_APPLICABLE).toString()).toBe('');
    expect(new Timedelta(Timedelta.UNKNOWN).isKnown).toBe(false);
  });
});

describe('Timestamp', () => {
  const now = 1700000000;

  it('should compute the time left until it', () => {
    expect(new Timestamp(now + 600).delta(now).seconds).toBe(600);
    expect(new Timestamp(now + 600).delta(now).toString()).toBe('10m');
  });

  it('should treat zero as an event that never happened', () => {
    const never = new Timestamp(0);

    expect(never.isKnown).toBe(false);
    expect(never.delta(now).seconds).toBe(Timedelta.NOT_APPLICABLE);
    expect(never.format(now)).toBe('');
  });

  it('should render unknown timestamps', () => {
    expect(new Timestamp(Timestamp.UNKNOWN).format(now)).toBe('?');
    expect(new Timestamp(Timestamp.UNKNOWN).delta(now).seconds).toBe(Timedelta.UNKNOWN);
  });

  it('should show more of the date the further away it is', () => {
    expect(new Timestamp(now + 3600).format(now)).toMatch(/^\d{2}:\d{2}:\d{2}$/);
    expect(new Timestamp(now + 36 * 3600).format(now)).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);
    expect(new Timestamp(now + 10 * 86400).format(now)).toMatch(/^\d{4}-\d{2}-\d{2}$/);
  });
});
