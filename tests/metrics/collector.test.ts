import { describe, it, expect, beforeEach } from 'vitest';
import { ResolutionMetricsCollector } from '../../src/metrics/collector.js';
import { SelectorGroup } from '../../src/selectors/selector-group.js';
import { css } from '../../src/selectors/selector.js';
import { err, ok } from '../../src/types/index.js';
import type { Selector } from '../../src/selectors/selector.js';

const fail = () => err(new Error('Timeout 100ms exceeded'));

describe('ResolutionMetricsCollector', () => {
  let collector: ResolutionMetricsCollector;
  let group: SelectorGroup;

  beforeEach(() => {
    collector = new ResolutionMetricsCollector();
    group = SelectorGroup.create('login', css('.a'), css('.b'));
  });

  it('starts empty', () => {
    const metrics = collector.finalize();
    expect(metrics.executions).toBe(0);
    expect(metrics.attempts).toBe(0);
    expect(metrics.groups).toEqual({});
    expect(metrics.durationMs).toBeGreaterThanOrEqual(0);
  });

  it('counts first-choice and fallback resolutions', async () => {
    const observers = [collector];
    await group.execute(() => ok(1), { observers });
    await group.execute((s: Selector) => (s.value === '.b' ? ok(2) : fail()), { observers });

    const metrics = collector.finalize();
    expect(metrics.executions).toBe(2);
    expect(metrics.resolved).toBe(2);
    expect(metrics.exhausted).toBe(0);
    expect(metrics.attempts).toBe(3);
    expect(metrics.failedAttempts).toBe(1);
    expect(metrics.fallbackResolutions).toBe(1);
    expect(metrics.errorTypes).toEqual({ Timeout: 1 });
    expect(metrics.groups.login.winningIndex).toEqual({ 0: 1, 1: 1 });
  });

  it('counts exhausted executions per group', async () => {
    await group.execute(fail, { observers: [collector] });

    const metrics = collector.finalize();
    expect(metrics.exhausted).toBe(1);
    expect(metrics.groups.login).toEqual({
      executions: 1,
      resolved: 0,
      exhausted: 1,
      attempts: 2,
      winningIndex: {},
    });
  });

  it('resets its counters', async () => {
    await group.execute(fail, { observers: [collector] });
    collector.reset();

    const metrics = collector.finalize();
    expect(metrics.executions).toBe(0);
    expect(metrics.errorTypes).toEqual({});
  });
});
