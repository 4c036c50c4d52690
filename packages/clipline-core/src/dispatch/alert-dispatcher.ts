import { EventEmitter } from 'node:events';

import { type BackoffStrategyOptions, backoffStrategyFactory } from '../backoff-strategy';
import { retryWithBackoff } from '../utils/retry';
import type { Alert, AlertSink } from './collaborators';
import { type AlertDispatcherEventsMap, DispatchEvents } from './events';

export type AlertDispatcherConfig = {
  /** @default 3 */
  maxAttempts: number;
  backoffStrategyOptions: BackoffStrategyOptions;
};

const DEFAULT_CONFIG: AlertDispatcherConfig = {
  maxAttempts: 3,
  backoffStrategyOptions: { type: 'exponential', baseDelayMs: 1_000, maxDelayMs: 10_000 },
};

/**
 * Fire-and-forget delivery to the alerting channel. Failures are retried a few times and then
 * dropped with an `alertDropped` event; nothing here ever throws into the caller.
 */
export class AlertDispatcher extends EventEmitter<AlertDispatcherEventsMap> {
  private readonly config: AlertDispatcherConfig;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly sink: AlertSink | undefined,
    config?: Partial<AlertDispatcherConfig>,
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  notify(alert: Alert): void {
    if (!this.sink) {
      return;
    }

    const sink = this.sink;
    const delivery = retryWithBackoff(() => sink.send(alert), {
      maxAttempts: this.config.maxAttempts,
      backoffStrategy: backoffStrategyFactory(this.config.backoffStrategyOptions),
    }).catch((error: unknown) => {
      this.emit(DispatchEvents.ALERT_DROPPED, { alert, error, droppedAt: new Date() });
    });

    this.track(delivery);
  }

  /** Resolves once every alert handed over so far has been delivered or dropped. */
  async flush(): Promise<void> {
    await Promise.all(this.inFlight);
  }

  private track(delivery: Promise<void>): void {
    this.inFlight.add(delivery);
    void delivery.finally(() => this.inFlight.delete(delivery));
  }
}
