import type { AttemptFailure } from '../types/index.js';
import { describeError } from '../exception/classifier.js';

export class SelectorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SelectorError';
  }
}

/** Raised while building a Selector or SelectorGroup; never after. */
export class SelectorConstructionError extends SelectorError {
  constructor(message: string) {
    super(message);
    this.name = 'SelectorConstructionError';
  }
}

export class InvalidSelectorDescriptorError extends SelectorConstructionError {
  constructor(
    public readonly descriptor: unknown,
    reason: string,
  ) {
    super(`Invalid selector descriptor: ${reason}`);
    this.name = 'InvalidSelectorDescriptorError';
  }
}

export class InvalidSelectorKindError extends SelectorConstructionError {
  constructor(public readonly token: unknown) {
    super(`Unknown selector kind: ${typeof token === 'string' ? `'${token}'` : String(token)}`);
    this.name = 'InvalidSelectorKindError';
  }
}

export class EmptyGroupError extends SelectorConstructionError {
  constructor(public readonly groupName: string) {
    super(`Selector group '${groupName}' needs at least one selector`);
    this.name = 'EmptyGroupError';
  }
}

export class InvalidGroupNameError extends SelectorConstructionError {
  constructor(public readonly groupName: unknown) {
    super('Selector group name must be a non-empty string');
    this.name = 'InvalidGroupNameError';
  }
}

/**
 * The only failure `SelectorGroup.execute` returns. The first line is always
 * `All selectors in group '<name>' failed`; one line per attempt follows.
 */
export class GroupExhaustionError<E = unknown> extends SelectorError {
  constructor(
    public readonly groupName: string,
    public readonly failures: readonly AttemptFailure<E>[],
  ) {
    super(formatExhaustion(groupName, failures));
    this.name = 'GroupExhaustionError';
  }
}

function formatExhaustion(groupName: string, failures: readonly AttemptFailure<unknown>[]): string {
  const header = `All selectors in group '${groupName}' failed`;
  const lines = failures.map(
    (f) => `  [${f.index}] ${f.selector.toString()} (${f.errorType}): ${describeError(f.error)}`,
  );
  return [header, ...lines].join('\n');
}
