#!/usr/bin/env node
/**
 * CLI: resolve selector groups against a live page, JSONL events on stdout.
 *
 * Usage: echo '{"url":"https://example.com","groups":{...}}' | npx tsx src/cli/resolve-groups.ts
 *
 * Each group is executed once, in the key order of `groups` (integer-like names
 * first, as for any JavaScript object), with the Playwright resolver.
 */

import { chromium } from 'playwright';
import type { Browser } from 'playwright';

import { CliInputSchema } from '../schemas/cli-input.schema.js';
import { parseSelectorGroups } from '../selectors/loader.js';
import type { SelectorGroupCatalogue } from '../selectors/loader.js';
import { createPlaywrightResolver } from '../engines/playwright-resolver.js';
import { ResolutionMetricsCollector } from '../metrics/collector.js';
import { describeError } from '../exception/classifier.js';
import type { ResolutionObserver } from '../types/index.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

const stdoutObserver: ResolutionObserver = {
  onAttempt(event) {
    emit({ type: 'attempt', ...event, selector: event.selector.toString() });
  },
};

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  const raw = await readStdin();
  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(raw);
  } catch {
    emit({ type: 'run_error', error: 'Invalid JSON on stdin' });
    process.exitCode = 1;
    return;
  }

  const input = CliInputSchema.safeParse(parsedJson);
  if (!input.success) {
    emit({ type: 'run_error', error: input.error.message });
    process.exitCode = 1;
    return;
  }

  const { url, options } = input.data;
  let groups: SelectorGroupCatalogue;
  try {
    groups = parseSelectorGroups(input.data.groups);
  } catch (error) {
    emit({ type: 'run_error', error: describeError(error) });
    process.exitCode = 1;
    return;
  }

  const names = Object.keys(groups);
  emit({ type: 'run_start', url, totalGroups: names.length });

  let browser: Browser;
  try {
    browser = await chromium.launch({ headless: options.headless });
  } catch (error) {
    emit({ type: 'run_error', error: `Browser launch failed: ${describeError(error)}` });
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Run timed out after ${options.timeoutMs}ms`)), options.timeoutMs);
  const metrics = new ResolutionMetricsCollector();

  try {
    const page = await browser.newPage();
    await page.goto(url, { waitUntil: 'domcontentloaded' });
    const resolve = createPlaywrightResolver(page, { defaultTimeoutMs: options.defaultSelectorTimeoutMs });

    let allResolved = true;
    for (const name of names) {
      const result = await groups[name].execute(resolve, {
        signal: controller.signal,
        observers: [stdoutObserver, metrics],
      });

      if (result.ok) {
        emit({ type: 'group_resolved', group: name });
      } else {
        allResolved = false;
        emit({
          type: 'group_exhausted',
          group: name,
          error: result.error.message,
          failures: result.error.failures.map((f) => ({
            index: f.index,
            selector: f.selector.toString(),
            errorType: f.errorType,
          })),
        });
      }
    }

    emit({ type: 'run_complete', ok: allResolved, metrics: metrics.finalize() });
    if (!allResolved) process.exitCode = 2;
  } catch (error) {
    emit({ type: 'run_error', error: describeError(error) });
    process.exitCode = 1;
  } finally {
    clearTimeout(timer);
    await browser.close();
  }
}

main().catch((error: unknown) => {
  emit({ type: 'run_error', error: describeError(error) });
  process.exitCode = 1;
});
