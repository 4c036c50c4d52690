import { EventEmitter } from 'node:events';
import timers from 'node:timers/promises';

import type { PlanningEventHandler, PlanningOutcome, PlanningWorkItem } from './planning-event-handler';

/**
 * Read side of the planning surface, for deployments that poll instead of receiving webhooks.
 */
export interface PlanningFeed {
  listPendingWorkItems(): Promise<PlanningWorkItem[]>;
}

export const PlanningPollerEvents = {
  /** One pass over the feed finished */
  POLL_COMPLETED: 'pollCompleted',
  /** The feed could not be read; the next pass retries */
  POLL_FAILED: 'pollFailed',
  /** A single work item could not be applied */
  ITEM_FAILED: 'itemFailed',
} as const;

export type PlanningPollerEvents = (typeof PlanningPollerEvents)[keyof typeof PlanningPollerEvents];

export type PlanningPollerEventsMap = {
  [PlanningPollerEvents.POLL_COMPLETED]: [{ outcomes: PlanningOutcome[]; timestamp: Date }];
  [PlanningPollerEvents.POLL_FAILED]: [{ error: unknown; timestamp: Date }];
  [PlanningPollerEvents.ITEM_FAILED]: [{ item: PlanningWorkItem; error: unknown; timestamp: Date }];
};

export interface PlanningPollerConfiguration {
  /** The interval between passes over the feed. @default 60_000ms */
  pollIntervalMs?: number;
}

const DEFAULT_CONFIG: Required<PlanningPollerConfiguration> = {
  pollIntervalMs: 60_000,
};

export class PlanningPoller extends EventEmitter<PlanningPollerEventsMap> {
  private readonly config: Required<PlanningPollerConfiguration>;
  private interval: { abortController: AbortController; promise: Promise<void> } | undefined;

  constructor(
    private readonly feed: PlanningFeed,
    private readonly handler: PlanningEventHandler,
    configuration?: PlanningPollerConfiguration,
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...configuration };
  }

  async start(): Promise<void> {
    if (this.interval) {
      return;
    }

    const abortController = new AbortController();
    const promise = this.runPollLoop(abortController);

    this.interval = { abortController, promise };
  }

  async stop(): Promise<void> {
    if (!this.interval) {
      return;
    }

    this.interval.abortController.abort();
    await this.interval.promise;
    this.interval = undefined;
  }

  /** Reads the feed once and applies every item. */
  async pollOnce(): Promise<PlanningOutcome[]> {
    const items = await this.feed.listPendingWorkItems();
    const outcomes: PlanningOutcome[] = [];

    for (const item of items) {
      try {
        outcomes.push(await this.handler.handle(item));
      } catch (error) {
        this.emit(PlanningPollerEvents.ITEM_FAILED, { item, error, timestamp: new Date() });
      }
    }

    return outcomes;
  }

  private async runPollLoop(abortController: AbortController): Promise<void> {
    try {
      for await (const _ of timers.setInterval(this.config.pollIntervalMs, undefined, {
        signal: abortController.signal,
      })) {
        try {
          const outcomes = await this.pollOnce();
          this.emit(PlanningPollerEvents.POLL_COMPLETED, { outcomes, timestamp: new Date() });
        } catch (error) {
          this.emit(PlanningPollerEvents.POLL_FAILED, { error, timestamp: new Date() });
        }
      }
    } catch (error) {
      if (abortController.signal.aborted && error instanceof Error && error.name === 'AbortError') {
        return;
      }

      throw error;
    }
  }
}
