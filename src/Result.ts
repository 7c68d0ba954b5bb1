export type BuildErrorKind =
  | 'unknown-element'
  | 'unknown-attribute'
  | 'illegal-enum'
  | 'type-mismatch'
  | 'duplicate-block'
  | 'structure'
  | 'internal'
  | 'syntax'
  | 'io';

/**
 * A fatal problem found while building the tree. `line` is filled in by the
 * tokenizer when the error surfaces from an event callback.
 */
export interface BuildError {
  kind: BuildErrorKind;
  message: string;
  line?: number;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: BuildError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export const OK: Result<void> = { ok: true, value: undefined };

export function fail<T>(kind: BuildErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, message } };
}

/**
 * Thrown by the convenience accessors when a value the schema marks as
 * required is absent or unreadable.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContractViolationError';
  }
}
