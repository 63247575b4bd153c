import type { Selector } from '../selectors/selector.js';
import type { Result } from './result.js';

export const SelectorKind = {
  CSS: 'css',
  XPATH: 'xpath',
  TEXT: 'text',
} as const;

export type SelectorKind = (typeof SelectorKind)[keyof typeof SelectorKind];

export interface SelectorSpec {
  kind: SelectorKind | string;
  value: string;
  timeoutMs?: number;
}

/**
 * Anything a group can be built from. Strings are CSS; tuples and specs
 * carry their kind as a case-insensitive token.
 */
export type SelectorDescriptor =
  | Selector
  | string
  | readonly [value: string, kind: SelectorKind | string]
  | readonly [value: string, kind: SelectorKind | string, timeoutMs: number]
  | SelectorSpec;

export interface ResolveContext {
  /** Aborted when the caller cancels the surrounding `execute`. */
  signal?: AbortSignal;
}

export type ResolveFn<T, E = unknown> = (
  selector: Selector,
  context?: ResolveContext,
) => Result<T, E> | Promise<Result<T, E>>;
