import { describe, it, expect } from 'vitest';
import { createRunState, createRunStatistics, snapshotStatistics } from './stats.ts';

describe('run statistics', () => {
  it('start at zero', () => {
    expect(Object.values(createRunStatistics()).every((n) => n === 0)).toBe(true);
  });

  it('snapshots are frozen copies', () => {
    const stats = createRunStatistics();
    stats.linksChecked = 5;
    const snapshot = snapshotStatistics(stats);
    stats.linksChecked = 6;

    expect(snapshot.linksChecked).toBe(5);
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('each run state gets its own cache and counters', () => {
    const a = createRunState();
    const b = createRunState();
    a.stats.cacheHits++;
    a.cache.store('https://a.example/', { isBroken: false, kind: 'ok', reason: 'OK', servedFromCache: false });

    expect(b.stats.cacheHits).toBe(0);
    expect(b.cache.size).toBe(0);
  });
});
