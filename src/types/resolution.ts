import type { Selector } from '../selectors/selector.js';

export type ResolutionErrorType =
  | 'Timeout'
  | 'InvalidSelector'
  | 'TargetNotFound'
  | 'Unknown';

export interface AttemptFailure<E = unknown> {
  index: number;
  selector: Selector;
  error: E;
  errorType: ResolutionErrorType;
}

export interface AttemptEvent {
  group: string;
  index: number;
  selector: Selector;
  ok: boolean;
  durationMs: number;
  errorType?: ResolutionErrorType;
  message?: string;
}

export type SettledOutcome = 'resolved' | 'exhausted';

export interface SettledEvent {
  group: string;
  outcome: SettledOutcome;
  attempts: number;
  /** Position of the winning selector, only set when resolved. */
  resolvedIndex?: number;
  durationMs: number;
}

export interface ResolutionObserver {
  onAttempt?(event: AttemptEvent): void | Promise<void>;
  onSettled?(event: SettledEvent): void | Promise<void>;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  observers?: readonly ResolutionObserver[];
}
