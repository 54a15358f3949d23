// errors.ts - Error taxonomy for the diagnostic engine
import { Category, FailureKind } from '../types';

export class DiagnosticError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A whole domain could not be queried. Surfaces as a `failure` on the
 * collector result, never out of the scan.
 */
export class CollectorUnavailableError extends DiagnosticError {
  readonly category: Category;

  constructor(category: Category, message: string) {
    super(message);
    this.category = category;
  }
}

export class CollectorTimeoutError extends DiagnosticError {
  readonly category: Category;
  readonly timeoutMs: number;

  constructor(category: Category, timeoutMs: number) {
    super(`${category} collection timed out after ${timeoutMs}ms`);
    this.category = category;
    this.timeoutMs = timeoutMs;
  }
}

export class ScanCancelledError extends DiagnosticError {
  constructor(message = 'Scan cancelled') {
    super(message);
  }
}

export class ScanStateError extends DiagnosticError {}

export class PowerShellError extends DiagnosticError {
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(message: string, exitCode: number | null, stderr = '') {
    super(message);
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

export class ConfigError extends DiagnosticError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Map an error caught at the collector boundary to its failure kind. */
export function failureKindOf(error: unknown): FailureKind {
  if (error instanceof CollectorTimeoutError) return 'timeout';
  if (error instanceof ScanCancelledError) return 'cancelled';
  return 'unavailable';
}
