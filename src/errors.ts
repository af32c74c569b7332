/**
 * ABOUTME: Error taxonomy shared by trackers, the config loader and the engine.
 * Fatal errors (config, auth) stop a run before or between iterations;
 * the rest are recovered locally or recorded on the iteration result.
 */

/**
 * Machine-readable error codes.
 */
export type TaskloopErrorCode =
  | 'CONFIG_ERROR'
  | 'AUTH_ERROR'
  | 'NETWORK_ERROR'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'GATE_FAILURE'
  | 'PARTIAL_UPDATE';

/**
 * Base class for all errors raised by taskloop.
 */
export class TaskloopError extends Error {
  readonly code: TaskloopErrorCode;

  constructor(message: string, code: TaskloopErrorCode, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }

  toJSON(): { name: string; code: TaskloopErrorCode; message: string } {
    return { name: this.name, code: this.code, message: this.message };
  }
}

/**
 * Invalid configuration: unknown mode, schema violation, malformed task file.
 */
export class ConfigError extends TaskloopError {
  /** Individual validation issues, formatted as `path: message` */
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message, 'CONFIG_ERROR', options);
    this.issues = issues;
  }
}

/**
 * Missing or rejected credentials for a network-backed tracker.
 */
export class AuthError extends TaskloopError {
  /** What the user can do about it */
  readonly remediation: string;

  constructor(message: string, remediation: string, options?: { cause?: unknown }) {
    super(`${message}\n${remediation}`, 'AUTH_ERROR', options);
    this.remediation = remediation;
  }
}

/**
 * Transient connectivity or server-side failure.
 */
export class NetworkError extends TaskloopError {
  /** HTTP status, when a response was received */
  readonly status?: number;
  /** Whether another attempt may succeed */
  readonly retryable: boolean;

  constructor(
    message: string,
    details: { status?: number; retryable?: boolean; cause?: unknown } = {},
    code: TaskloopErrorCode = 'NETWORK_ERROR'
  ) {
    super(message, code, { cause: details.cause });
    this.status = details.status;
    this.retryable = details.retryable ?? true;
  }
}

/**
 * The remote API refused the call because the quota is exhausted and the
 * reset lies beyond the caller's patience.
 */
export class RateLimitError extends NetworkError {
  /** Epoch milliseconds at which the quota resets, if reported */
  readonly resetAt: number | null;

  constructor(message: string, resetAt: number | null, status?: number) {
    super(message, { status, retryable: false }, 'RATE_LIMITED');
    this.resetAt = resetAt;
  }
}

/**
 * A task id the tracker does not know.
 */
export class NotFoundError extends TaskloopError {
  readonly taskId: string;

  constructor(taskId: string, message = `Task not found: ${taskId}`) {
    super(message, 'NOT_FOUND');
    this.taskId = taskId;
  }
}

/**
 * One or more quality gates failed. Recorded on the iteration result;
 * the task stays open.
 */
export class GateFailure extends TaskloopError {
  readonly failedGates: string[];

  constructor(failedGates: string[]) {
    super(`Gate(s) failed: ${failedGates.join(', ')}`, 'GATE_FAILURE');
    this.failedGates = failedGates;
  }
}

/**
 * The atomic completion path could not apply every sub-step.
 * Observable state has been restored when `rolledBack` is true;
 * otherwise `residual` lists what could not be undone.
 */
export class PartialUpdateError extends TaskloopError {
  readonly taskId: string;
  readonly failedStep: string;
  readonly rolledBack: boolean;
  readonly residual: string[];

  constructor(
    taskId: string,
    failedStep: string,
    rolledBack: boolean,
    residual: string[] = [],
    options?: { cause?: unknown }
  ) {
    const suffix = rolledBack
      ? 'prior state restored'
      : `rollback incomplete: ${residual.join('; ')}`;
    const cause = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super(`Completing task ${taskId} failed at step '${failedStep}'${cause} (${suffix})`, 'PARTIAL_UPDATE', options);
    this.taskId = taskId;
    this.failedStep = failedStep;
    this.rolledBack = rolledBack;
    this.residual = residual;
  }
}

/**
 * Fatal errors end the run; everything else is recoverable at the next
 * decision point.
 */
export function isFatalError(err: unknown): boolean {
  return err instanceof ConfigError || err instanceof AuthError;
}

/**
 * Render any thrown value as a single message.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
