import type { QuotaStore } from '../datastore';
import type { Resource } from '../task';
import { calendarDay } from '../utils/calendar-day';
import { DEFAULT_RESOURCE_POLICIES, type ResourceCatalog, type ResourcePolicy } from './resources';

export type QuotaLedgerConfig = {
  /** Time zone whose midnight starts a new quota day @default 'UTC' */
  timeZone: string;
  resources: ResourceCatalog;
};

const DEFAULT_CONFIG: QuotaLedgerConfig = {
  timeZone: 'UTC',
  resources: DEFAULT_RESOURCE_POLICIES,
};

export type QuotaUsage = {
  channelId: string;
  resource: Resource;
  day: string;
  total: number;
  dailyLimit: number;
  /** `total / dailyLimit`; 1 means the budget is spent */
  fraction: number;
};

/**
 * Per channel, per resource, per day spend tracking. Side-effect free beyond persistence:
 * callers decide what to do with the usage fraction `record` returns.
 */
export class QuotaLedger {
  private readonly config: QuotaLedgerConfig;

  constructor(
    private readonly store: QuotaStore,
    config?: Partial<QuotaLedgerConfig>,
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    // Throws a RangeError on an unknown zone.
    calendarDay(new Date(), this.config.timeZone);
  }

  policy(resource: Resource): ResourcePolicy {
    return this.config.resources[resource];
  }

  isMetered(resource: Resource): boolean {
    return this.policy(resource).dailyLimit !== undefined;
  }

  day(at: Date = new Date()): string {
    return calendarDay(at, this.config.timeZone);
  }

  /**
   * Whether spending `projectedCost` more today stays within the budget. A channel with no
   * record for today has spent nothing.
   */
  async check(channelId: string, resource: Resource, projectedCost: number, at: Date = new Date()): Promise<boolean> {
    assertCost(projectedCost);
    const { dailyLimit } = this.policy(resource);

    if (dailyLimit === undefined) {
      return true;
    }

    const record = await this.store.get({ channelId, resource, day: this.day(at) });
    const unitsUsed = record?.unitsUsed ?? 0;
    const limit = record?.dailyLimit ?? dailyLimit;

    return unitsUsed + projectedCost <= limit;
  }

  /**
   * Adds `cost` to today's record, creating it on first use.
   */
  async record(channelId: string, resource: Resource, cost: number, at: Date = new Date()): Promise<QuotaUsage> {
    assertCost(cost);
    const { dailyLimit } = this.policy(resource);

    if (dailyLimit === undefined) {
      throw new Error(`Resource ${resource} has no daily limit and is not metered`);
    }

    const record = await this.store.increment({ channelId, resource, day: this.day(at), cost, dailyLimit });

    return toUsage(record.channelId, resource, record.day, record.unitsUsed, record.dailyLimit);
  }

  async usage(channelId: string, resource: Resource, at: Date = new Date()): Promise<QuotaUsage> {
    const day = this.day(at);
    const record = await this.store.get({ channelId, resource, day });
    const dailyLimit = record?.dailyLimit ?? this.policy(resource).dailyLimit ?? Number.POSITIVE_INFINITY;

    return toUsage(channelId, resource, day, record?.unitsUsed ?? 0, dailyLimit);
  }
}

function assertCost(cost: number): void {
  if (!Number.isInteger(cost) || cost < 0) {
    throw new RangeError(`Quota cost must be a non-negative integer, received ${cost}`);
  }
}

function toUsage(channelId: string, resource: Resource, day: string, total: number, dailyLimit: number): QuotaUsage {
  return { channelId, resource, day, total, dailyLimit, fraction: total / dailyLimit };
}
