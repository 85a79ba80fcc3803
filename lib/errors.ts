/**
 * Error taxonomy for host and instance operations.
 *
 * Every operation fails fast: the first error aborts the remaining steps and
 * nothing already done is rolled back. Surfaces map these to exit codes
 * (CLI) or `{ success: false, code }` responses (control server).
 */

export type HostErrorCode =
  | 'validation'
  | 'not_found'
  | 'database'
  | 'dependency'
  | 'external_tool'
  | 'ports_exhausted'
  | 'cancelled';

export class HostError extends Error {
  readonly code: HostErrorCode;
  readonly exitCode: number = 1;

  constructor(code: HostErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HostError';
    this.code = code;
  }
}

/** Malformed instance name, domain or email. */
export class ValidationError extends HostError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

/** No instances registered, bad selection, or an unknown instance name. */
export class NotFoundError extends HostError {
  constructor(message: string) {
    super('not_found', message);
    this.name = 'NotFoundError';
  }
}

/** PostgreSQL role or database operation failed. */
export class DatabaseError extends HostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('database', message, options);
    this.name = 'DatabaseError';
  }
}

/** Virtualenv creation or dependency installation failed. */
export class DependencyError extends HostError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('dependency', message, options);
    this.name = 'DependencyError';
  }
}

/** An invoked command exited non-zero, timed out or could not be spawned. */
export class ExternalToolError extends HostError {
  readonly command: string;
  readonly status: number | null;
  readonly stderr: string;

  constructor(command: string, status: number | null, stderr: string, options?: { cause?: unknown }) {
    const detail = stderr.trim() ? `: ${stderr.trim()}` : '';
    const outcome = status === null ? 'did not complete' : `exited with code ${status}`;
    super('external_tool', `${command} ${outcome}${detail}`, options);
    this.name = 'ExternalToolError';
    this.command = command;
    this.status = status;
    this.stderr = stderr;
  }
}

export class PortExhaustedError extends HostError {
  constructor(base: number, max: number) {
    super('ports_exhausted', `No free TCP port between ${base} and ${max}`);
    this.name = 'PortExhaustedError';
  }
}

/** The operator declined a confirmation prompt. */
export class OperationCancelledError extends HostError {
  constructor(message = 'Operation canceled.') {
    super('cancelled', message);
    this.name = 'OperationCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error occurred';
}
