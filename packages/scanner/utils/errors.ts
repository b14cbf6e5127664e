// Scanner error hierarchy
// Every failure surfaced by the pipeline is a ScannerError carrying a stable `code`.

import type { ZodError } from 'zod';

export type ScannerErrorCode =
  | 'VALIDATION'
  | 'PROVIDER'
  | 'TIMEOUT'
  | 'COMPUTATION'
  | 'RETRY_EXHAUSTED'
  | 'CANCELLED'
  | 'ILLEGAL_TRANSITION';

export type ProviderKind = 'holdings' | 'news' | 'report';

export class ScannerError extends Error {
  readonly code: ScannerErrorCode;

  constructor(code: ScannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = new.target.name;
  }
}

/** Malformed input or configuration. Never retried. */
export class ValidationError extends ScannerError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: { cause?: unknown }) {
    super('VALIDATION', message, options);
    this.issues = issues;
  }
}

export class ProviderError extends ScannerError {
  readonly provider: ProviderKind;

  constructor(
    provider: ProviderKind,
    message: string,
    options?: { cause?: unknown; code?: ScannerErrorCode },
  ) {
    super(options?.code ?? 'PROVIDER', message, options);
    this.provider = provider;
  }
}

/** Raised when a single provider attempt exceeds its time budget. */
export class TimeoutError extends ProviderError {
  readonly timeoutMs: number;

  constructor(provider: ProviderKind, timeoutMs: number) {
    super(provider, `${provider} provider timed out after ${timeoutMs}ms`, { code: 'TIMEOUT' });
    this.timeoutMs = timeoutMs;
  }
}

export class ComputationError extends ScannerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('COMPUTATION', message, options);
  }
}

export class RetryExhaustedError extends ScannerError {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(label: string, attempts: number, lastError: unknown) {
    super(
      'RETRY_EXHAUSTED',
      `${label} failed after ${attempts} attempt${attempts === 1 ? '' : 's'}: ${errorMessage(lastError)}`,
      { cause: lastError },
    );
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

export class CancelledError extends ScannerError {
  constructor(message = 'Operation cancelled') {
    super('CANCELLED', message);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Flatten zod issues into "path: message" lines. */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

export function fromZodError(context: string, error: ZodError): ValidationError {
  const issues = formatZodIssues(error);
  return new ValidationError(`${context}: ${issues.join('; ')}`, issues, { cause: error });
}

/** Throws CancelledError when the signal has already fired. */
export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}
