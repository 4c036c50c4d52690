import type { InvalidStateTransitionError } from '../errors';
import type { QuotaUsage } from '../quota/quota-ledger';
import type { PipelineStep, Resource, StepProgress, Task } from '../task';

export const WorkerRuntimeEvents = {
  /** A task has been claimed by this worker and its cycle is about to run */
  TASK_CLAIMED: 'taskClaimed',
  /** A claim was undone because the quota re-check after claiming failed */
  TASK_RELEASED: 'taskReleased',
  /** A step attempt is starting, possibly from saved progress */
  STEP_STARTED: 'stepStarted',
  /** Partial progress has been persisted for a step */
  STEP_PROGRESS_SAVED: 'stepProgressSaved',
  /** A step attempt failed with a retryable error and will run again after a delay */
  STEP_RETRY_SCHEDULED: 'stepRetryScheduled',
  /** A step finished and the task has moved to the step's done status */
  STEP_COMPLETED: 'stepCompleted',
  /** A step failed for good and the task has moved to the step's error status */
  STEP_FAILED: 'stepFailed',
  /** Spend for a metered step has been added to the quota ledger */
  QUOTA_RECORDED: 'quotaRecorded',
  /** The cycle for a claimed task has ended (review gate, published, failed or interrupted) */
  CYCLE_COMPLETED: 'cycleCompleted',
  /** A status change outside the transition table was attempted. Indicates a bug */
  INVARIANT_VIOLATION: 'invariantViolation',
  /** Consecutive failures reached the escalation threshold */
  FAILURE_ESCALATED: 'failureEscalated',
  /** An unexpected error escaped a cycle or the claim loop. The loop pauses for processLoopRetryIntervalMs */
  UNKNOWN_PROCESSING_ERROR: 'unknownProcessingError',
} as const;

export type WorkerRuntimeEvents = (typeof WorkerRuntimeEvents)[keyof typeof WorkerRuntimeEvents];

export type CycleOutcome =
  | { outcome: 'awaiting_review'; task: Task }
  | { outcome: 'published'; task: Task }
  | { outcome: 'failed'; task: Task; error: unknown }
  | { outcome: 'interrupted'; task: Task };

export type WorkerRuntimeEventsMap = {
  [WorkerRuntimeEvents.TASK_CLAIMED]: [{ task: Task; resource?: Resource; claimedAt: Date }];
  [WorkerRuntimeEvents.TASK_RELEASED]: [{ task: Task; resource: Resource; releasedAt: Date }];
  [WorkerRuntimeEvents.STEP_STARTED]: [{ task: Task; step: PipelineStep; attempt: number; resumeFrom?: StepProgress }];
  [WorkerRuntimeEvents.STEP_PROGRESS_SAVED]: [{ task: Task; step: PipelineStep; progress: StepProgress }];
  [WorkerRuntimeEvents.STEP_RETRY_SCHEDULED]: [
    { task: Task; step: PipelineStep; attempt: number; error: unknown; retryScheduledAt: Date },
  ];
  [WorkerRuntimeEvents.STEP_COMPLETED]: [{ task: Task; step: PipelineStep; outputRef: string; completedAt: Date }];
  [WorkerRuntimeEvents.STEP_FAILED]: [{ task: Task; step: PipelineStep; error: unknown; failedAt: Date }];
  [WorkerRuntimeEvents.QUOTA_RECORDED]: [{ task: Task; usage: QuotaUsage }];
  [WorkerRuntimeEvents.CYCLE_COMPLETED]: [{ result: CycleOutcome; completedAt: Date }];
  [WorkerRuntimeEvents.INVARIANT_VIOLATION]: [{ error: InvalidStateTransitionError; task?: Task; timestamp: Date }];
  [WorkerRuntimeEvents.FAILURE_ESCALATED]: [{ workerId: string; consecutiveFailures: number; timestamp: Date }];
  [WorkerRuntimeEvents.UNKNOWN_PROCESSING_ERROR]: [{ error: unknown; task?: Task; timestamp: Date }];
};
