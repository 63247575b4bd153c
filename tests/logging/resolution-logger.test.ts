import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import { ResolutionLogger } from '../../src/logging/resolution-logger.js';
import { SelectorGroup } from '../../src/selectors/selector-group.js';
import { css, xpath } from '../../src/selectors/selector.js';
import { err, ok } from '../../src/types/index.js';

async function readEntries(path: string): Promise<Record<string, unknown>[]> {
  const content = await readFile(path, 'utf-8');
  return content.trim().split('\n').map((line) => JSON.parse(line) as Record<string, unknown>);
}

describe('ResolutionLogger', () => {
  let logDir: string;
  let logger: ResolutionLogger;

  beforeEach(() => {
    logDir = join(tmpdir(), `resolution-logger-test-${randomUUID()}`);
    logger = new ResolutionLogger(logDir);
  });

  afterEach(async () => {
    await rm(logDir, { recursive: true, force: true });
  });

  it('creates the log directory and writes resolution.jsonl', async () => {
    await logger.onAttempt({ group: 'login', index: 0, selector: css('.a'), ok: true, durationMs: 3 });

    const entries = await readEntries(join(logDir, 'resolution.jsonl'));
    expect(entries).toHaveLength(1);
    expect(entries[0].type).toBe('attempt');
    expect(entries[0].selector).toBe('css:.a');
    expect(entries[0].ok).toBe(true);
    expect(entries[0].timestamp).toBeDefined();
  });

  it('logs every attempt and the settled outcome of an execution', async () => {
    const group = SelectorGroup.create('login', css('.a'), xpath('//b'));

    await group.execute(
      (selector) => (selector.isCss() ? err(new Error('element not found')) : ok('B')),
      { observers: [logger] },
    );

    const entries = await readEntries(logger.getLogPath());
    expect(entries.map((e) => e.type)).toEqual(['attempt', 'attempt', 'settled']);
    expect(entries[0]).toMatchObject({
      group: 'login',
      index: 0,
      selector: 'css:.a',
      ok: false,
      errorType: 'TargetNotFound',
      message: 'element not found',
    });
    expect(entries[1]).toMatchObject({ index: 1, selector: 'xpath://b', ok: true });
    expect(entries[2]).toMatchObject({ group: 'login', outcome: 'resolved', attempts: 2, resolvedIndex: 1 });
  });

  it('returns the log path', () => {
    expect(logger.getLogPath()).toBe(join(logDir, 'resolution.jsonl'));
  });
});
