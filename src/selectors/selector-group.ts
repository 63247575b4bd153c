import type {
  AttemptEvent,
  AttemptFailure,
  ExecuteOptions,
  ResolutionObserver,
  ResolveFn,
  SelectorDescriptor,
  SettledEvent,
} from '../types/index.js';
import { err, ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import { classifyResolutionError, describeError } from '../exception/classifier.js';
import { Selector, normalizeDescriptor } from './selector.js';
import {
  EmptyGroupError,
  GroupExhaustionError,
  InvalidGroupNameError,
} from './errors.js';
import type { SelectorConstructionError } from './errors.js';

interface GroupParts {
  name: string;
  selectors: readonly Selector[];
}

// Output of `buildGroup` handed to the next constructor call so it is not normalized twice.
let preBuilt: GroupParts | undefined;

/**
 * Ranked alternative selectors for one logical target.
 *
 * `execute` offers each selector to the resolver in stored order and stops at
 * the first success, so a group of n selectors costs at most n resolver calls.
 */
export class SelectorGroup implements Iterable<Selector> {
  readonly name: string;
  readonly selectors: readonly Selector[];

  constructor(name: string, ...descriptors: SelectorDescriptor[]) {
    let parts = preBuilt;
    preBuilt = undefined;
    if (!parts) {
      const built = buildGroup(name, descriptors);
      if (!built.ok) throw built.error;
      parts = built.value;
    }

    this.name = parts.name;
    this.selectors = parts.selectors;
    Object.freeze(this);
  }

  static create(name: string, ...selectors: Selector[]): SelectorGroup {
    return new SelectorGroup(name, ...selectors);
  }

  static createMixed(name: string, ...descriptors: SelectorDescriptor[]): SelectorGroup {
    return new SelectorGroup(name, ...descriptors);
  }

  /** Non-throwing mixed construction for input whose shape is not known statically. */
  static parse(name: unknown, ...inputs: unknown[]): Result<SelectorGroup, SelectorConstructionError> {
    const built = buildGroup(name, inputs);
    if (!built.ok) return built;

    preBuilt = built.value;
    return ok(new SelectorGroup(built.value.name));
  }

  get size(): number {
    return this.selectors.length;
  }

  at(index: number): Selector | undefined {
    return this.selectors[index];
  }

  [Symbol.iterator](): Iterator<Selector> {
    return this.selectors[Symbol.iterator]();
  }

  toString(): string {
    return `${this.name}[${this.selectors.map((s) => s.toString()).join(', ')}]`;
  }

  async execute<T>(
    resolve: ResolveFn<T>,
    options: ExecuteOptions = {},
  ): Promise<Result<T, GroupExhaustionError>> {
    const { signal, observers = [] } = options;
    const startedAt = Date.now();
    const failures: AttemptFailure[] = [];

    for (let i = 0; i < this.selectors.length; i++) {
      signal?.throwIfAborted();

      const selector = this.selectors[i];
      const attemptStart = Date.now();
      const result = await attempt(resolve, selector, signal);
      const durationMs = Date.now() - attemptStart;
      signal?.throwIfAborted();

      if (result.ok) {
        await notifyAttempt(observers, { group: this.name, index: i, selector, ok: true, durationMs });
        await notifySettled(observers, {
          group: this.name,
          outcome: 'resolved',
          attempts: i + 1,
          resolvedIndex: i,
          durationMs: Date.now() - startedAt,
        });
        return result;
      }

      const errorType = classifyResolutionError(result.error);
      failures.push({ index: i, selector, error: result.error, errorType });
      await notifyAttempt(observers, {
        group: this.name,
        index: i,
        selector,
        ok: false,
        durationMs,
        errorType,
        message: describeError(result.error),
      });
    }

    await notifySettled(observers, {
      group: this.name,
      outcome: 'exhausted',
      attempts: this.selectors.length,
      durationMs: Date.now() - startedAt,
    });
    return err(new GroupExhaustionError(this.name, failures));
  }
}

function buildGroup(
  name: unknown,
  inputs: readonly unknown[],
): Result<GroupParts, SelectorConstructionError> {
  if (typeof name !== 'string' || name.trim().length === 0) {
    return err(new InvalidGroupNameError(name));
  }
  if (inputs.length === 0) {
    return err(new EmptyGroupError(name));
  }

  const selectors: Selector[] = [];
  for (const input of inputs) {
    const normalized = normalizeDescriptor(input);
    if (!normalized.ok) return normalized;
    selectors.push(normalized.value);
  }

  return ok({ name, selectors: Object.freeze(selectors) });
}

/** A resolver that throws is treated the same as one that returns a failure. */
async function attempt<T>(
  resolve: ResolveFn<T>,
  selector: Selector,
  signal: AbortSignal | undefined,
): Promise<Result<T, unknown>> {
  try {
    return await resolve(selector, signal ? { signal } : {});
  } catch (error) {
    return err(error);
  }
}

async function notifyAttempt(
  observers: readonly ResolutionObserver[],
  event: AttemptEvent,
): Promise<void> {
  for (const observer of observers) {
    await observer.onAttempt?.(event);
  }
}

async function notifySettled(
  observers: readonly ResolutionObserver[],
  event: SettledEvent,
): Promise<void> {
  for (const observer of observers) {
    await observer.onSettled?.(event);
  }
}
