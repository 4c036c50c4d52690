import { type Alert, AlertLevel } from '../dispatch/collaborators';
import type { QuotaUsage } from './quota-ledger';

export type QuotaAlertPolicyConfig = {
  /** @default 0.8 */
  warningThreshold: number;
  /** @default 1.0 */
  criticalThreshold: number;
  /** Minimum gap between two alerts of the same level for the same channel and resource @default 300000ms */
  throttleMs: number;
};

const DEFAULT_CONFIG: QuotaAlertPolicyConfig = {
  warningThreshold: 0.8,
  criticalThreshold: 1.0,
  throttleMs: 300_000,
};

/**
 * Turns the usage fraction returned by `QuotaLedger.record` into warning and critical alerts.
 * Throttle state is process-local.
 */
export class QuotaAlertPolicy {
  private readonly config: QuotaAlertPolicyConfig;
  private readonly lastAlertAt = new Map<string, number>();

  constructor(config?: Partial<QuotaAlertPolicyConfig>) {
    this.config = { ...DEFAULT_CONFIG, ...config };

    const { warningThreshold, criticalThreshold } = this.config;

    if (warningThreshold >= criticalThreshold) {
      throw new Error(
        `Warning threshold (${warningThreshold}) must be less than the critical threshold (${criticalThreshold})`,
      );
    }
  }

  evaluate(usage: QuotaUsage, at: Date = new Date()): Alert | undefined {
    const level = this.levelFor(usage.fraction);

    if (!level) {
      return undefined;
    }

    const key = `${usage.channelId}:${usage.resource}:${level}`;
    const previous = this.lastAlertAt.get(key);

    if (previous !== undefined && at.getTime() - previous < this.config.throttleMs) {
      return undefined;
    }

    this.lastAlertAt.set(key, at.getTime());
    const percent = Math.round(usage.fraction * 100);

    return {
      level,
      title: level === AlertLevel.CRITICAL ? 'Quota exhausted' : 'Quota running low',
      message: `Channel ${usage.channelId} has used ${percent}% of its daily ${usage.resource} quota`,
      fields: {
        channel: usage.channelId,
        resource: usage.resource,
        used: usage.total,
        limit: usage.dailyLimit,
        day: usage.day,
      },
      occurredAt: at,
    };
  }

  private levelFor(fraction: number): AlertLevel | undefined {
    if (fraction >= this.config.criticalThreshold) {
      return AlertLevel.CRITICAL;
    }

    if (fraction >= this.config.warningThreshold) {
      return AlertLevel.WARNING;
    }

    return undefined;
  }
}
