import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from './metrics.js';

describe('MetricsRegistry', () => {
  it('accumulates counters by name', () => {
    const m = new MetricsRegistry();
    m.increment('mirror.refresh.updated');
    m.increment('mirror.refresh.updated');
    m.increment('service.outcome.comment-added', 3);

    const snap = m.snapshot();
    expect(snap.counters['mirror.refresh.updated']).toBe(2);
    expect(snap.counters['service.outcome.comment-added']).toBe(3);
    expect(m.get('never.touched')).toBe(0);
  });

  it('ignores non-finite increments', () => {
    const m = new MetricsRegistry();
    m.increment('x', Number.NaN);
    m.increment('x', Number.POSITIVE_INFINITY);
    expect(m.get('x')).toBe(0);
  });

  it('reset clears all counters', () => {
    const m = new MetricsRegistry();
    m.increment('a');
    m.reset();
    expect(m.snapshot().counters).toEqual({});
  });
});
