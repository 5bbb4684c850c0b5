import { describe, it, expect } from 'vitest';
import { SampleRing } from '../src/core/ring.js';

const ts = (r: SampleRing) => r.toArray().map((s) => s.timestamp);

describe('SampleRing', () => {
  it('evicts the oldest sample once full', () => {
    const r = new SampleRing(3);
    for (const [v, t] of [[1, 1], [2, 2], [3, 3], [4, 4]]) r.push({ value: v, timestamp: t });
    expect(r.size).toBe(3);
    expect(r.values()).toEqual([2, 3, 4]);
  });

  it('keeps exactly the most recent cap samples', () => {
    const r = new SampleRing(4);
    for (let i = 1; i <= 10; i++) r.push({ value: i, timestamp: i });
    expect(r.values()).toEqual([7, 8, 9, 10]);
  });

  it('keeps a sample exactly at the cutoff', () => {
    const r = new SampleRing(10);
    for (const t of [100, 200, 300]) r.push({ value: t, timestamp: t });
    expect(r.evictOlderThan(200)).toBe(1);
    expect(ts(r)).toEqual([200, 300]);
  });

  it('removes late samples older than the cutoff', () => {
    const r = new SampleRing(10);
    for (const t of [100, 300, 50, 400]) r.push({ value: t, timestamp: t });
    expect(r.evictOlderThan(200)).toBe(2);
    expect(ts(r)).toEqual([300, 400]);
  });

  it('stays consistent across wraparound and eviction', () => {
    const r = new SampleRing(3);
    for (let t = 1; t <= 5; t++) r.push({ value: t, timestamp: t });
    expect(ts(r)).toEqual([3, 4, 5]);
    expect(r.evictOlderThan(5)).toBe(2);
    expect(ts(r)).toEqual([5]);
    for (const t of [6, 7, 8]) r.push({ value: t, timestamp: t });
    expect(ts(r)).toEqual([6, 7, 8]);
  });

  it('returns copies', () => {
    const r = new SampleRing(2);
    r.push({ value: 1, timestamp: 1 });
    const copy = r.toArray();
    copy.pop();
    expect(r.size).toBe(1);
  });

  it('clears', () => {
    const r = new SampleRing(2);
    r.push({ value: 1, timestamp: 1 });
    r.clear();
    expect(r.size).toBe(0);
    expect(r.values()).toEqual([]);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new SampleRing(0)).toThrow(RangeError);
  });
});
