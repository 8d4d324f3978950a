import { describe, it, expect } from 'vitest';
import { assignRanks, groupByRank } from './ranks.js';

describe('assignRanks', () => {
  it('puts sources on rank 0 and others one below their deepest predecessor', () => {
    const ranks = assignRanks(['A', 'B', 'C', 'D'], [
      { from: 'A', to: 'B' },
      { from: 'B', to: 'C' },
      { from: 'A', to: 'C' },
      { from: 'A', to: 'D' },
    ]);
    expect(Object.fromEntries(ranks)).toEqual({ A: 0, B: 1, C: 2, D: 1 });
  });

  it('ignores self edges', () => {
    const ranks = assignRanks(['A'], [{ from: 'A', to: 'A' }]);
    expect(ranks.get('A')).toBe(0);
  });

  it('terminates on cycles, counting the re-entered node as rank 0', () => {
    // A is ranked first; reaching A again through B contributes 0
    const ranks = assignRanks(['A', 'B'], [
      { from: 'A', to: 'B' },
      { from: 'B', to: 'A' },
    ]);
    expect(ranks.get('B')).toBe(1);
    expect(ranks.get('A')).toBe(2);
  });

  it('ranks endpoints missing from the node list', () => {
    const ranks = assignRanks([], [{ from: 'X', to: 'Y' }]);
    expect(ranks.get('X')).toBe(0);
    expect(ranks.get('Y')).toBe(1);
  });
});

describe('groupByRank', () => {
  it('groups in declaration order', () => {
    const ranks = new Map([['A', 0], ['B', 1], ['C', 0]]);
    expect(groupByRank(['A', 'B', 'C'], ranks)).toEqual([['A', 'C'], ['B']]);
  });
});
