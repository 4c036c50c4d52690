import { EventEmitter } from 'node:events';
import { setTimeout } from 'node:timers/promises';

import type { AdmissionClaimer } from '../claimer/admission-claimer';
import type { WorkerState } from '../claimer/worker-state';
import { AlertLevel } from '../dispatch/collaborators';
import type { AlertDispatcher } from '../dispatch/alert-dispatcher';
import { InvalidStateTransitionError } from '../errors';
import type { PipelineRunner } from '../pipeline/pipeline-runner';
import type { Resource, Task } from '../task';
import { WorkerRuntimeEvents, type WorkerRuntimeEventsMap } from './events';

export type WorkerRuntimeConfig = {
  /** Claim loops run side by side in this worker, sharing its state. @default 1 */
  maxConcurrency: number;
  /** The wait before the next claim after a cycle ends @default 50ms */
  claimIntervalMs: number;
  /** The wait before the next claim when nothing was eligible @default 5000ms */
  idleIntervalMs: number;
  /** The wait before resuming after an unexpected error in the loop @default 20000ms */
  processLoopRetryIntervalMs: number;
  /** Consecutive failed cycles that trigger an escalation alert @default 10 */
  failureEscalationThreshold: number;
};

export const DEFAULT_WORKER_RUNTIME_CONFIG: WorkerRuntimeConfig = {
  maxConcurrency: 1,
  claimIntervalMs: 50,
  idleIntervalMs: 5_000,
  processLoopRetryIntervalMs: 20_000,
  failureEscalationThreshold: 10,
};

export type WorkerRuntimeInput = {
  claimer: AdmissionClaimer;
  runner: PipelineRunner;
  state: WorkerState;
  alerts?: AlertDispatcher;
};

const InternalRuntimeEvents = { PROCESS_LOOP_EXIT: 'processLoopExit' } as const;

type InternalRuntimeEventsMap = {
  [InternalRuntimeEvents.PROCESS_LOOP_EXIT]: [];
};

export class WorkerRuntime extends EventEmitter<WorkerRuntimeEventsMap> {
  private readonly config: WorkerRuntimeConfig;
  private readonly claimer: AdmissionClaimer;
  private readonly runner: PipelineRunner;
  private readonly alerts?: AlertDispatcher;
  private exitChannels: EventEmitter<InternalRuntimeEventsMap>[] = [];
  private stopRequested = false;

  readonly state: WorkerState;

  constructor(input: WorkerRuntimeInput, config?: Partial<WorkerRuntimeConfig>) {
    super();
    this.claimer = input.claimer;
    this.runner = input.runner;
    this.state = input.state;
    this.alerts = input.alerts;
    this.config = { ...DEFAULT_WORKER_RUNTIME_CONFIG, ...config };
    this.validateTimeouts();
  }

  get workerId(): string {
    return this.state.workerId;
  }

  /**
   * The longest `stop` waits when every store call answers promptly: one step attempt or one
   * retry delay, then the loop's pause before it checks the stop flag again.
   */
  get maxStopDelayMs(): number {
    const { stepTimeoutMs, maxRetryDelayMs } = this.runner;
    const { idleIntervalMs, processLoopRetryIntervalMs } = this.config;

    return stepTimeoutMs + maxRetryDelayMs + Math.max(idleIntervalMs, processLoopRetryIntervalMs);
  }

  /**
   * The runner renews its lease before every retry, so the longest a lease goes unrenewed is one
   * attempt plus one retry delay. Anything longer lets another worker reclaim a running step.
   *
   * @throws {Error} If a step attempt plus the longest retry delay is not below the claim stale timeout.
   */
  private validateTimeouts(): void {
    const { stepTimeoutMs, maxRetryDelayMs } = this.runner;
    const { claimStaleTimeoutMs } = this.claimer;
    const { claimIntervalMs, idleIntervalMs } = this.config;

    if (stepTimeoutMs + maxRetryDelayMs >= claimStaleTimeoutMs) {
      throw new Error(
        `Step timeout (${stepTimeoutMs}ms) plus the longest retry delay (${maxRetryDelayMs}ms) ` +
          `must be less than the claim stale timeout (${claimStaleTimeoutMs}ms)`,
      );
    }

    if (claimIntervalMs >= idleIntervalMs) {
      throw new Error(
        `Claim interval (${claimIntervalMs}ms) must be less than the idle interval (${idleIntervalMs}ms)`,
      );
    }
  }

  /**
   * Starts `maxConcurrency` claim loops.
   */
  async start(): Promise<void> {
    if (this.stopRequested || this.exitChannels.length > 0) return;

    for (let i = 0; i < this.config.maxConcurrency; i++) {
      const exitChannel = new EventEmitter<InternalRuntimeEventsMap>();
      this.exitChannels.push(exitChannel);
      void this.runProcessLoop(exitChannel);
    }
  }

  /**
   * Asks every loop to exit after the step it is running, then waits for them.
   */
  async stop(): Promise<void> {
    const exitPromises = this.exitChannels.map(
      (channel) =>
        new Promise<void>((resolve) => channel.once(InternalRuntimeEvents.PROCESS_LOOP_EXIT, () => resolve())),
    );
    this.stopRequested = true;

    await Promise.all(exitPromises);
  }

  private async runProcessLoop(exitChannel: EventEmitter<InternalRuntimeEventsMap>): Promise<void> {
    while (!this.stopRequested) {
      try {
        const outcome = await this.claimer.claimNext(this.state);

        if (outcome.type === 'released') {
          this.emit(WorkerRuntimeEvents.TASK_RELEASED, {
            task: outcome.task,
            resource: outcome.resource,
            releasedAt: new Date(),
          });
        }

        if (outcome.type !== 'claimed') {
          await setTimeout(this.config.idleIntervalMs);
          continue;
        }

        this.emit(WorkerRuntimeEvents.TASK_CLAIMED, {
          task: outcome.task,
          resource: outcome.resource,
          claimedAt: outcome.task.claimedAt ?? new Date(),
        });

        await this.handleClaim(outcome.task, outcome.resource);

        await setTimeout(this.config.claimIntervalMs);
      } catch (error) {
        this.reportError(error);
        this.recordFailure();
        await setTimeout(this.config.processLoopRetryIntervalMs);
      }
    }

    exitChannel.emit(InternalRuntimeEvents.PROCESS_LOOP_EXIT);
  }

  /**
   * Runs one cycle. Errors are reported and counted here so the loop keeps going.
   */
  private async handleClaim(task: Task, resource: Resource | undefined): Promise<void> {
    try {
      const result = await this.runner.run(task, {
        state: this.state,
        shouldStop: () => this.stopRequested,
        events: this,
      });

      this.emit(WorkerRuntimeEvents.CYCLE_COMPLETED, { result, completedAt: new Date() });

      if (result.outcome === 'failed') {
        this.recordFailure();
      } else {
        this.state.recordSuccess();
      }
    } catch (error) {
      this.reportError(error, task);
      this.recordFailure();
    } finally {
      if (resource) {
        this.state.release(resource);
      }
    }
  }

  private reportError(error: unknown, task?: Task): void {
    if (error instanceof InvalidStateTransitionError) {
      this.emit(WorkerRuntimeEvents.INVARIANT_VIOLATION, { error, task, timestamp: new Date() });
      return;
    }

    this.emit(WorkerRuntimeEvents.UNKNOWN_PROCESSING_ERROR, { error, task, timestamp: new Date() });
  }

  private recordFailure(): void {
    const consecutiveFailures = this.state.recordFailure();
    const threshold = this.config.failureEscalationThreshold;

    if (consecutiveFailures < threshold || consecutiveFailures % threshold !== 0) {
      return;
    }

    this.emit(WorkerRuntimeEvents.FAILURE_ESCALATED, {
      workerId: this.workerId,
      consecutiveFailures,
      timestamp: new Date(),
    });

    this.alerts?.notify({
      level: AlertLevel.CRITICAL,
      title: 'Worker failing repeatedly',
      message: `Worker ${this.workerId} has failed ${consecutiveFailures} cycles in a row`,
      fields: { worker: this.workerId, consecutiveFailures },
      occurredAt: new Date(),
    });
  }
}
