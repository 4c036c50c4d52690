import type { PipelineStep, StepProgress, TaskData } from '../task';

export type StepExecutionInput = {
  taskId: string;
  channelId: string;
  step: PipelineStep;
  input: TaskData;
  /** Progress saved by an earlier attempt; absent means start from the first sub-unit */
  resumeFrom?: StepProgress;
  /** Aborted when the step exceeds its timeout */
  signal: AbortSignal;
};

export type StepResult =
  | { outcome: 'success'; outputRef: string }
  /** Some sub-units finished before a retryable failure */
  | { outcome: 'partial'; progress: { completedUnits: number; totalUnits: number }; error: unknown }
  /** Not worth retrying */
  | { outcome: 'failure'; error: unknown };

/**
 * Runs one pipeline step against the service that does the real work. Implementations may throw;
 * thrown errors are classified with `classifyStepError`.
 */
export interface StepExecutor {
  execute(input: StepExecutionInput): Promise<StepResult>;
}
