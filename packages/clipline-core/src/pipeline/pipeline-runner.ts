import type { EventEmitter } from 'node:events';
import { setTimeout } from 'node:timers/promises';

import { type BackoffStrategy, type BackoffStrategyOptions, backoffStrategyFactory } from '../backoff-strategy';
import type { WorkerState } from '../claimer/worker-state';
import type { TaskStore, TransitionPatch } from '../datastore';
import type { AlertDispatcher } from '../dispatch/alert-dispatcher';
import { classifyStepError, LeaseLostError, StepErrorKind, StepExecutionError } from '../errors';
import type { QuotaAlertPolicy } from '../quota/quota-alert-policy';
import type { QuotaLedger, QuotaUsage } from '../quota/quota-ledger';
import { type CycleOutcome, WorkerRuntimeEvents, type WorkerRuntimeEventsMap } from '../runtime/events';
import {
  CHECKPOINT_ADVANCES,
  ENTRY_STEPS,
  isInFlight,
  isReviewGate,
  STEP_DEFINITIONS,
  type StepDefinition,
  stepForRunningStatus,
} from '../status-graph';
import { type Resource, type StepProgress, type Task, TaskStatus, errorMessage, formatErrorLogEntry } from '../task';
import { PromiseTimeoutError, promiseWithTimeout } from '../utils/promise-utils';
import type { StepExecutor, StepResult } from './step-executor';
import type { TaskTransitioner } from './task-transitions';

export type PipelineRunnerConfig = {
  /** The maximum time a single step attempt may take @default 1800000ms */
  stepTimeoutMs: number;
  /** Attempts per step before a retryable failure becomes an error status @default 3 */
  maxStepAttempts: number;
  /** Delay between attempts of the same step */
  retryBackoffStrategyOptions: BackoffStrategyOptions;
  /** Upper bound on any delay between attempts, retry hints included @default 300000ms */
  maxRetryDelayMs: number;
  /** How long to stop claiming work for a throttled service when it sends no retry hint @default 60000ms */
  rateLimitCooldownMs: number;
};

export const DEFAULT_PIPELINE_RUNNER_CONFIG: PipelineRunnerConfig = {
  stepTimeoutMs: 1_800_000,
  maxStepAttempts: 3,
  retryBackoffStrategyOptions: { type: 'exponential', baseDelayMs: 5_000, maxDelayMs: 60_000, jitter: 'full' },
  maxRetryDelayMs: 300_000,
  rateLimitCooldownMs: 60_000,
};

export type PipelineRunnerInput = {
  store: TaskStore;
  ledger: QuotaLedger;
  transitions: TaskTransitioner;
  executor: StepExecutor;
  quotaAlertPolicy?: QuotaAlertPolicy;
  alerts?: AlertDispatcher;
};

export type RunContext = {
  state: WorkerState;
  /** Checked between steps and between attempts of a step; an attempt in flight always finishes */
  shouldStop: () => boolean;
  events: EventEmitter<WorkerRuntimeEventsMap>;
};

type AttemptResult = StepResult | { outcome: 'thrown'; error: unknown };

type StepRunResult =
  | { outcome: 'completed'; task: Task }
  | { outcome: 'failed'; task: Task; error: unknown }
  | { outcome: 'interrupted'; task: Task };

/**
 * Drives a claimed task forward from its current status until it reaches a review gate,
 * publishes, fails, or the worker is asked to stop.
 */
export class PipelineRunner {
  private readonly config: PipelineRunnerConfig;
  private readonly backoffStrategy: BackoffStrategy;

  constructor(
    private readonly input: PipelineRunnerInput,
    config?: Partial<PipelineRunnerConfig>,
  ) {
    this.config = { ...DEFAULT_PIPELINE_RUNNER_CONFIG, ...config };
    this.backoffStrategy = backoffStrategyFactory(this.config.retryBackoffStrategyOptions);

    if (this.config.maxStepAttempts < 1) {
      throw new Error(`Max step attempts (${this.config.maxStepAttempts}) must be at least 1`);
    }
  }

  get stepTimeoutMs(): number {
    return this.config.stepTimeoutMs;
  }

  get maxRetryDelayMs(): number {
    return this.config.maxRetryDelayMs;
  }

  async run(task: Task, context: RunContext): Promise<CycleOutcome> {
    let current = task;
    let stepsRun = 0;

    for (;;) {
      if (current.status === TaskStatus.PUBLISHED) {
        return { outcome: 'published', task: current };
      }

      if (isReviewGate(current.status)) {
        return { outcome: 'awaiting_review', task: current };
      }

      if (stepsRun > 0 && context.shouldStop()) {
        return { outcome: 'interrupted', task: current };
      }

      if (current.status === TaskStatus.CLAIMED) {
        current = await this.startCycle(current, context.state);
        continue;
      }

      const checkpointNext = CHECKPOINT_ADVANCES[current.status];

      if (checkpointNext) {
        current = await this.advance(current, checkpointNext, context.state);
        continue;
      }

      const definition = stepForRunningStatus(current.status);

      if (!definition) {
        throw new Error(`Task ${current.id} cannot run from status ${current.status}`);
      }

      const result = await this.runStep(current, definition, context);
      stepsRun++;

      if (result.outcome !== 'completed') {
        return result;
      }

      current = result.task;
    }
  }

  private async startCycle(task: Task, state: WorkerState): Promise<Task> {
    const entry = task.claimedFrom ? ENTRY_STEPS[task.claimedFrom] : undefined;

    if (!entry) {
      throw new Error(`Claimed task ${task.id} has no entry step (claimed from ${task.claimedFrom ?? 'nothing'})`);
    }

    return this.advance(task, STEP_DEFINITIONS[entry].runningStatus, state);
  }

  private async advance(task: Task, to: TaskStatus, state: WorkerState, extra: TransitionPatch = {}): Promise<Task> {
    const patch: TransitionPatch = { ...extra };

    if (isReviewGate(to)) {
      patch.reviewStartedAt = new Date();
      patch.reviewCompletedAt = null;
    }

    if (!isInFlight(to)) {
      patch.clearLease = true;
    }

    const updated = await this.input.transitions.apply(task, to, { workerId: state.workerId, patch });

    if (!updated) {
      throw new LeaseLostError(task.id, state.workerId);
    }

    return updated;
  }

  private async runStep(task: Task, definition: StepDefinition, context: RunContext): Promise<StepRunResult> {
    const { events, state } = context;
    let current = task;

    for (let attempt = 0; ; attempt++) {
      if (attempt > 0) {
        current = await this.renewLease(current, state);
      }

      const resumeFrom = current.stepProgress[definition.step];
      events.emit(WorkerRuntimeEvents.STEP_STARTED, { task: current, step: definition.step, attempt, resumeFrom });

      const result = await this.attempt(current, definition, resumeFrom);

      if (result.outcome === 'success') {
        const completed = await this.completeStep(current, definition, result.outputRef, context);
        return { outcome: 'completed', task: completed };
      }

      if (result.outcome === 'partial') {
        current = await this.saveProgress(current, definition, result.progress, context);
      }

      const kind = this.failureKind(result);

      if (kind === StepErrorKind.RATE_LIMITED && definition.resource) {
        this.markExhausted(definition.resource, result.error, state);
      }

      if (kind === StepErrorKind.PERMANENT || attempt + 1 >= this.config.maxStepAttempts) {
        return this.failStep(current, definition, result.error, context);
      }

      // The task keeps its lease and saved progress; a stale-lease claim resumes it.
      if (context.shouldStop()) {
        return { outcome: 'interrupted', task: current };
      }

      const delayMs = this.retryDelay(attempt, result.error);
      events.emit(WorkerRuntimeEvents.STEP_RETRY_SCHEDULED, {
        task: current,
        step: definition.step,
        attempt,
        error: result.error,
        retryScheduledAt: new Date(Date.now() + delayMs),
      });
      await setTimeout(delayMs);

      if (context.shouldStop()) {
        return { outcome: 'interrupted', task: current };
      }
    }
  }

  /**
   * Refreshes the lease before a retry so that no other worker takes the task over while
   * this one is still attempting it.
   */
  private async renewLease(task: Task, state: WorkerState): Promise<Task> {
    const renewed = await this.input.store.renewLease({
      taskId: task.id,
      workerId: state.workerId,
      status: task.status,
    });

    if (!renewed) {
      throw new LeaseLostError(task.id, state.workerId);
    }

    return renewed;
  }

  private async attempt(task: Task, definition: StepDefinition, resumeFrom?: StepProgress): Promise<AttemptResult> {
    const controller = new AbortController();

    try {
      return await promiseWithTimeout(
        this.input.executor.execute({
          taskId: task.id,
          channelId: task.channelId,
          step: definition.step,
          input: task.data,
          resumeFrom,
          signal: controller.signal,
        }),
        this.config.stepTimeoutMs,
      );
    } catch (error) {
      if (error instanceof PromiseTimeoutError) {
        controller.abort(error);
      }

      return { outcome: 'thrown', error };
    }
  }

  private failureKind(result: Exclude<AttemptResult, { outcome: 'success' }>): StepErrorKind {
    switch (result.outcome) {
      case 'failure':
        return StepErrorKind.PERMANENT;
      case 'partial':
        // Partial results are retryable by contract; only throttling changes how.
        return classifyStepError(result.error) === StepErrorKind.RATE_LIMITED
          ? StepErrorKind.RATE_LIMITED
          : StepErrorKind.TRANSIENT;
      case 'thrown':
        return classifyStepError(result.error);
      default: {
        const _exhaustiveCheck: never = result;
        throw new Error(`Unknown step result ${JSON.stringify(_exhaustiveCheck)}`);
      }
    }
  }

  private retryDelay(attempt: number, error: unknown): number {
    const backoffMs = this.backoffStrategy({ retryAttempt: attempt });
    const delayMs =
      error instanceof StepExecutionError && error.retryAfterMs !== undefined
        ? Math.max(backoffMs, error.retryAfterMs)
        : backoffMs;

    return Math.min(delayMs, this.config.maxRetryDelayMs);
  }

  private markExhausted(resource: Resource, error: unknown, state: WorkerState): void {
    const cooldownMs =
      error instanceof StepExecutionError && error.retryAfterMs !== undefined
        ? error.retryAfterMs
        : this.config.rateLimitCooldownMs;

    state.markExhausted(resource, new Date(Date.now() + cooldownMs));
  }

  private async saveProgress(
    task: Task,
    definition: StepDefinition,
    reported: { completedUnits: number; totalUnits: number },
    context: RunContext,
  ): Promise<Task> {
    const previous = task.stepProgress[definition.step];
    const valid =
      Number.isInteger(reported.completedUnits) &&
      Number.isInteger(reported.totalUnits) &&
      reported.completedUnits >= 0 &&
      reported.completedUnits <= reported.totalUnits;

    // Progress never moves backwards.
    if (!valid || (previous && reported.completedUnits <= previous.completedUnits)) {
      return task;
    }

    const progress: StepProgress = { ...reported, updatedAt: new Date() };
    const updated = await this.input.store.saveStepProgress({
      taskId: task.id,
      workerId: context.state.workerId,
      step: definition.step,
      progress,
    });

    if (!updated) {
      throw new LeaseLostError(task.id, context.state.workerId);
    }

    context.events.emit(WorkerRuntimeEvents.STEP_PROGRESS_SAVED, { task: updated, step: definition.step, progress });

    return updated;
  }

  /**
   * Spend is recorded while the task still holds its executing status. Claimers count the lease
   * until then, so the used units and the lease are never both missing from their budget check.
   */
  private async completeStep(
    task: Task,
    definition: StepDefinition,
    outputRef: string,
    context: RunContext,
  ): Promise<Task> {
    const usage =
      definition.resource && this.input.ledger.isMetered(definition.resource)
        ? await this.recordUsage(task, definition.resource, context)
        : undefined;

    const completed = await this.advance(task, definition.doneStatus, context.state, {
      clearStepProgress: definition.step,
    });

    context.events.emit(WorkerRuntimeEvents.STEP_COMPLETED, {
      task: completed,
      step: definition.step,
      outputRef,
      completedAt: new Date(),
    });

    if (usage) {
      context.events.emit(WorkerRuntimeEvents.QUOTA_RECORDED, { task: completed, usage });

      const alert = this.input.quotaAlertPolicy?.evaluate(usage);

      if (alert) {
        this.input.alerts?.notify(alert);
      }
    }

    return completed;
  }

  private async recordUsage(task: Task, resource: Resource, context: RunContext): Promise<QuotaUsage | undefined> {
    const { ledger } = this.input;

    try {
      return await ledger.record(task.channelId, resource, ledger.policy(resource).unitCost);
    } catch (error) {
      // The step output already exists; losing the spend record must not fail the task.
      context.events.emit(WorkerRuntimeEvents.UNKNOWN_PROCESSING_ERROR, { error, task, timestamp: new Date() });
      return undefined;
    }
  }

  private async failStep(
    task: Task,
    definition: StepDefinition,
    error: unknown,
    context: RunContext,
  ): Promise<StepRunResult> {
    const failed = await this.advance(task, definition.errorStatus, context.state, {
      appendError: formatErrorLogEntry(task.status, errorMessage(error)),
    });

    context.events.emit(WorkerRuntimeEvents.STEP_FAILED, {
      task: failed,
      step: definition.step,
      error,
      failedAt: new Date(),
    });

    return { outcome: 'failed', task: failed, error };
  }
}
