import { describe, expect, it } from 'vitest';

import { ANCHOR_DAYS, getAnchor, isAnchorDay, stageForDay } from '@/data/characteristics';

describe('characteristic table', () => {
  it('has one frozen anchor per day 1..8', () => {
    expect(ANCHOR_DAYS).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
    for (const d of ANCHOR_DAYS) {
      const a = getAnchor(d);
      expect(Object.isFrozen(a)).toBe(true);
      expect(Object.isFrozen(a.color_base)).toBe(true);
      expect(a.elongation).toBeGreaterThanOrEqual(1);
    }
  });

  it('runs from round immature cells to fragmented damage', () => {
    expect(getAnchor(1).shape).toBe('round');
    expect(getAnchor(1).title).toBe('Immature Stage');
    expect(getAnchor(6).beating_strength).toBe(1);
    expect(getAnchor(8).shape).toBe('fragmented');
    expect(getAnchor(8).color_base).toEqual([153, 51, 51]);
  });

  it('recognises anchor days and stages', () => {
    expect(isAnchorDay(3)).toBe(true);
    expect(isAnchorDay(3.5)).toBe(false);
    expect(isAnchorDay(9)).toBe(false);
    expect(stageForDay(1).label).toBe('Immature');
    expect(stageForDay(6.5).label).toBe('Peak');
    expect(stageForDay(8).label).toBe('Decline');
  });
});
