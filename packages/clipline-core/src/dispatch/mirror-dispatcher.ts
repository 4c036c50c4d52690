import { EventEmitter } from 'node:events';

import { type BackoffStrategyOptions, backoffStrategyFactory } from '../backoff-strategy';
import { toPlanningStatus } from '../planning/planning-status';
import type { Task } from '../task';
import { retryWithBackoff } from '../utils/retry';
import type { StatusMirror } from './collaborators';
import { DispatchEvents, type MirrorDispatcherEventsMap } from './events';

export type MirrorDispatcherConfig = {
  /** @default 3 */
  maxAttempts: number;
  backoffStrategyOptions: BackoffStrategyOptions;
};

const DEFAULT_CONFIG: MirrorDispatcherConfig = {
  maxAttempts: 3,
  backoffStrategyOptions: { type: 'exponential', baseDelayMs: 2_000, maxDelayMs: 30_000, jitter: 'full' },
};

/**
 * Pushes committed status changes to the planning surface. Runs after the store write has
 * committed and never blocks or fails the transition that triggered it.
 */
export class MirrorDispatcher extends EventEmitter<MirrorDispatcherEventsMap> {
  private readonly config: MirrorDispatcherConfig;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly mirror: StatusMirror | undefined,
    config?: Partial<MirrorDispatcherConfig>,
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  statusChanged(task: Task): void {
    const planningStatus = toPlanningStatus(task.status);

    if (!this.mirror || !planningStatus) {
      return;
    }

    const mirror = this.mirror;
    const delivery = retryWithBackoff(() => mirror.setStatus(task.externalRef, planningStatus), {
      maxAttempts: this.config.maxAttempts,
      backoffStrategy: backoffStrategyFactory(this.config.backoffStrategyOptions),
      onRetry: ({ attempt, error }) => {
        this.emit(DispatchEvents.MIRROR_RETRY_SCHEDULED, { task, planningStatus, attempt, error });
      },
    }).catch((error: unknown) => {
      this.emit(DispatchEvents.MIRROR_FAILED, { task, planningStatus, error, failedAt: new Date() });
    });

    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }

  async flush(): Promise<void> {
    await Promise.all(this.inFlight);
  }
}
