import type { ResolveFn } from '../types/index.js';
import { err, ok } from '../types/result.js';
import type { Selector } from '../selectors/selector.js';

export interface PlaywrightLocator {
  waitFor(options?: {
    state?: 'attached' | 'detached' | 'visible' | 'hidden';
    timeout?: number;
  }): Promise<void>;
}

export interface PlaywrightPage<L extends PlaywrightLocator = PlaywrightLocator> {
  locator(selector: string): L;
  getByText(text: string): L;
}

export interface PlaywrightResolverOptions {
  /** Used when a selector carries no timeout of its own. */
  defaultTimeoutMs?: number;
  state?: 'attached' | 'visible';
}

export const DEFAULT_RESOLVE_TIMEOUT_MS = 5000;

export function toLocator<L extends PlaywrightLocator>(page: PlaywrightPage<L>, selector: Selector): L {
  switch (selector.kind) {
    case 'css':
      return page.locator(selector.value);
    case 'xpath':
      return page.locator(`xpath=${selector.value}`);
    case 'text':
      return page.getByText(selector.value);
  }
}

/**
 * Resolution capability backed by a Playwright page: a selector resolves to
 * its locator once that locator reaches the wanted state within the timeout.
 */
export function createPlaywrightResolver<L extends PlaywrightLocator>(
  page: PlaywrightPage<L>,
  options: PlaywrightResolverOptions = {},
): ResolveFn<L, Error> {
  const defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_RESOLVE_TIMEOUT_MS;
  const state = options.state ?? 'visible';

  return async (selector, context = {}) => {
    const { signal } = context;
    if (signal?.aborted) {
      return err(toError(signal.reason));
    }

    const timeout = selector.getTimeout() ?? defaultTimeoutMs;
    try {
      const locator = toLocator(page, selector);
      await untilAborted(locator.waitFor({ state, timeout }), signal);
      return ok(locator);
    } catch (error) {
      return err(toError(error));
    }
  };
}

/** Settles with the signal's reason as soon as it aborts, without waiting for `work`. */
function untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) return work;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
