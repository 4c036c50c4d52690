import type { TaskStatus } from './task';
import { PromiseTimeoutError } from './utils/promise-utils';

/**
 * Raised when code attempts a status change outside `VALID_TRANSITIONS`.
 * This is a logic bug, never an environmental failure.
 */
export class InvalidStateTransitionError extends Error {
  constructor(
    readonly from: TaskStatus,
    readonly to: TaskStatus,
    readonly taskId: string,
  ) {
    super(`Invalid status transition ${from} -> ${to} for task ${taskId}`);
    this.name = 'InvalidStateTransitionError';
  }
}

export class TaskNotFoundError extends Error {
  constructor(readonly taskId: string) {
    super(`Task ${taskId} not found`);
    this.name = 'TaskNotFoundError';
  }
}

export class TaskValidationError extends Error {
  constructor(
    readonly taskId: string,
    readonly issues: string[],
  ) {
    super(`Task ${taskId} failed validation: ${issues.join('; ')}`);
    this.name = 'TaskValidationError';
  }
}

/**
 * The worker no longer owns the task it was running, usually because its lease went stale
 * and another worker reclaimed it.
 */
export class LeaseLostError extends Error {
  constructor(
    readonly taskId: string,
    readonly workerId: string,
  ) {
    super(`Worker ${workerId} lost the lease on task ${taskId}`);
    this.name = 'LeaseLostError';
  }
}

export const StepErrorKind = {
  /** Worth retrying: timeouts, connection failures, 5xx responses */
  TRANSIENT: 'transient',
  /** The service is throttling; retry and stop claiming work for it for a while */
  RATE_LIMITED: 'rate_limited',
  /** Retrying will not help: authorization failures, malformed requests */
  PERMANENT: 'permanent',
} as const;
export type StepErrorKind = (typeof StepErrorKind)[keyof typeof StepErrorKind];

export type StepExecutionErrorOptions = {
  kind: StepErrorKind;
  /** How long the service asked us to back off */
  retryAfterMs?: number;
  cause?: unknown;
};

export class StepExecutionError extends Error {
  readonly kind: StepErrorKind;
  readonly retryAfterMs?: number;

  constructor(message: string, options: StepExecutionErrorOptions) {
    super(message, { cause: options.cause });
    this.name = 'StepExecutionError';
    this.kind = options.kind;
    this.retryAfterMs = options.retryAfterMs;
  }
}

const TRANSIENT_ERROR_NAMES = new Set(['TimeoutError', 'AbortError', 'PromiseTimeoutError']);
const TRANSIENT_ERROR_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN']);

/**
 * Decides how a step failure is handled. Unknown errors are permanent so that
 * a misbehaving step ends up in front of an operator instead of burning quota.
 */
export function classifyStepError(error: unknown): StepErrorKind {
  if (error instanceof StepExecutionError) {
    return error.kind;
  }

  if (error instanceof PromiseTimeoutError) {
    return StepErrorKind.TRANSIENT;
  }

  if (!(error instanceof Error)) {
    return StepErrorKind.PERMANENT;
  }

  const message = error.message.toLowerCase();

  if (message.includes('rate limit') || message.includes('429')) {
    return StepErrorKind.RATE_LIMITED;
  }

  if (TRANSIENT_ERROR_NAMES.has(error.name) || message.includes('timeout') || message.includes('timed out')) {
    return StepErrorKind.TRANSIENT;
  }

  if ('code' in error && typeof error.code === 'string' && TRANSIENT_ERROR_CODES.has(error.code)) {
    return StepErrorKind.TRANSIENT;
  }

  return StepErrorKind.PERMANENT;
}
