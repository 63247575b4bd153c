import { SelectorKind } from '../types/selector.js';
import type { SelectorSpec } from '../types/selector.js';
import { err, ok } from '../types/result.js';
import type { Result } from '../types/result.js';
import {
  SelectorKindSchema,
  StructuredDescriptorSchema,
  TimeoutMsSchema,
} from '../schemas/selector.schema.js';
import {
  InvalidSelectorDescriptorError,
  InvalidSelectorKindError,
} from './errors.js';
import type { SelectorConstructionError } from './errors.js';

interface SelectorFields {
  kind: SelectorKind;
  value: string;
  timeoutMs?: number;
}

// Fields already validated by `checkFields`, consumed by the next constructor call.
let preChecked: SelectorFields | undefined;

function fromCheckedFields(fields: SelectorFields): Selector {
  preChecked = fields;
  return new Selector(fields.kind, fields.value, fields.timeoutMs);
}

/**
 * One strategy for locating an element. Equality is kind + value;
 * `timeoutMs` is advisory and forwarded untouched to whoever resolves it.
 */
export class Selector {
  readonly kind: SelectorKind;
  readonly value: string;
  readonly timeoutMs?: number;

  constructor(kind: SelectorKind, value: string, timeoutMs?: number) {
    let fields = preChecked;
    preChecked = undefined;
    if (!fields) {
      const checked = checkFields(kind, value, timeoutMs, { kind, value, timeoutMs });
      if (!checked.ok) throw checked.error;
      fields = checked.value;
    }

    this.kind = fields.kind;
    this.value = fields.value;
    this.timeoutMs = fields.timeoutMs;
    Object.freeze(this);
  }

  /** Throwing counterpart of `normalizeDescriptor`. */
  static from(descriptor: unknown): Selector {
    const result = normalizeDescriptor(descriptor);
    if (!result.ok) throw result.error;
    return result.value;
  }

  getKind(): SelectorKind {
    return this.kind;
  }

  getValue(): string {
    return this.value;
  }

  getTimeout(): number | undefined {
    return this.timeoutMs;
  }

  isCss(): boolean {
    return this.kind === SelectorKind.CSS;
  }

  isXpath(): boolean {
    return this.kind === SelectorKind.XPATH;
  }

  isText(): boolean {
    return this.kind === SelectorKind.TEXT;
  }

  equals(other: Selector): boolean {
    return this.kind === other.kind && this.value === other.value;
  }

  /** Canonical `kind:value` form, for logs only. */
  toString(): string {
    return `${this.kind}:${this.value}`;
  }

  inspect(): string {
    return `Selector(kind=${this.kind}, value=${this.value})`;
  }

  toJSON(): SelectorSpec {
    return this.timeoutMs === undefined
      ? { kind: this.kind, value: this.value }
      : { kind: this.kind, value: this.value, timeoutMs: this.timeoutMs };
  }
}

export function css(value: string, timeoutMs?: number): Selector {
  return new Selector(SelectorKind.CSS, value, timeoutMs);
}

export function xpath(value: string, timeoutMs?: number): Selector {
  return new Selector(SelectorKind.XPATH, value, timeoutMs);
}

export function text(value: string, timeoutMs?: number): Selector {
  return new Selector(SelectorKind.TEXT, value, timeoutMs);
}

/**
 * Turn a loosely typed descriptor into a Selector:
 *   - a Selector is returned as is
 *   - a bare string is CSS
 *   - `[value, kind]`, `[value, kind, timeoutMs]` and `{ kind, value, timeoutMs? }`
 *     take a case-insensitive kind token
 * Anything else is an InvalidSelectorDescriptorError.
 */
export function normalizeDescriptor(input: unknown): Result<Selector, SelectorConstructionError> {
  if (input instanceof Selector) {
    return ok(input);
  }

  if (typeof input === 'string') {
    return buildSelector(SelectorKind.CSS, input, undefined, input);
  }

  const parsed = StructuredDescriptorSchema.safeParse(input);
  if (!parsed.success) {
    return err(
      new InvalidSelectorDescriptorError(
        input,
        'expected a string, a [value, kind] tuple, a { kind, value } object or a Selector',
      ),
    );
  }

  const { kind, value, timeoutMs } = parsed.data;
  return buildSelector(kind, value, timeoutMs, input);
}

function buildSelector(
  kind: unknown,
  value: unknown,
  timeoutMs: unknown,
  descriptor: unknown,
): Result<Selector, SelectorConstructionError> {
  const checked = checkFields(kind, value, timeoutMs, descriptor);
  if (!checked.ok) return checked;
  return ok(fromCheckedFields(checked.value));
}

function checkFields(
  kind: unknown,
  value: unknown,
  timeoutMs: unknown,
  descriptor: unknown,
): Result<SelectorFields, SelectorConstructionError> {
  const parsedKind = SelectorKindSchema.safeParse(kind);
  if (!parsedKind.success) {
    return err(new InvalidSelectorKindError(kind));
  }

  if (typeof value !== 'string' || value.length === 0) {
    return err(new InvalidSelectorDescriptorError(descriptor, 'value must be a non-empty string'));
  }

  if (timeoutMs === undefined) {
    return ok({ kind: parsedKind.data, value });
  }

  const parsedTimeout = TimeoutMsSchema.safeParse(timeoutMs);
  if (!parsedTimeout.success) {
    return err(
      new InvalidSelectorDescriptorError(descriptor, 'timeoutMs must be a non-negative finite number'),
    );
  }

  return ok({ kind: parsedKind.data, value, timeoutMs: parsedTimeout.data });
}
