import type { ResolutionErrorType } from '../types/index.js';

export function classifyResolutionError(error: unknown): ResolutionErrorType {
  const text = describeError(error).toLowerCase();

  if (isTimeout(error, text)) {
    return 'Timeout';
  }

  if (isInvalidSelector(text)) {
    return 'InvalidSelector';
  }

  if (isTargetNotFound(text)) {
    return 'TargetNotFound';
  }

  return 'Unknown';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function isTimeout(error: unknown, text: string): boolean {
  if (error instanceof Error && error.name === 'TimeoutError') {
    return true;
  }
  const patterns = ['timeout', 'timed out', 'ms exceeded'];
  return patterns.some((p) => text.includes(p));
}

function isInvalidSelector(text: string): boolean {
  const patterns = [
    'invalid selector',
    'is not a valid selector',
    'not a valid xpath',
    'unexpected token',
    'syntaxerror',
    'unknown engine',
  ];
  return patterns.some((p) => text.includes(p));
}

function isTargetNotFound(text: string): boolean {
  const patterns = [
    'no element found',
    'element not found',
    'target not found',
    'not found',
    'could not find',
    'unable to find',
    'resolved to 0 elements',
    'not visible',
    'hidden',
  ];
  return patterns.some((p) => text.includes(p));
}
