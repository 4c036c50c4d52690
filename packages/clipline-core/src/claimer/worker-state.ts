import { DEFAULT_RESOURCE_POLICIES, type ResourceCatalog } from '../quota/resources';
import type { Resource } from '../task';

/**
 * Counters that belong to a single worker process: per-resource concurrency slots, exhaustion
 * flags raised when a service throttles us, and the consecutive failure count. Nothing here is
 * persisted or shared, so a restart resets it.
 */
export class WorkerState {
  private readonly activeSlots = new Map<Resource, number>();
  private readonly exhaustedUntil = new Map<Resource, number>();
  private failures = 0;

  constructor(
    readonly workerId: string,
    private readonly resources: ResourceCatalog = DEFAULT_RESOURCE_POLICIES,
  ) {}

  /**
   * Takes one slot for `resource` if the per-worker cap allows it.
   * Every successful reservation must be paired with `release`.
   */
  tryReserve(resource: Resource): boolean {
    const cap = this.resources[resource].maxConcurrentPerWorker;
    const active = this.activeCount(resource);

    if (cap !== undefined && active >= cap) {
      return false;
    }

    this.activeSlots.set(resource, active + 1);

    return true;
  }

  release(resource: Resource): void {
    const active = this.activeCount(resource);

    if (active <= 1) {
      this.activeSlots.delete(resource);
      return;
    }

    this.activeSlots.set(resource, active - 1);
  }

  activeCount(resource: Resource): number {
    return this.activeSlots.get(resource) ?? 0;
  }

  markExhausted(resource: Resource, until: Date): void {
    const current = this.exhaustedUntil.get(resource) ?? 0;
    this.exhaustedUntil.set(resource, Math.max(current, until.getTime()));
  }

  isExhausted(resource: Resource, now: Date = new Date()): boolean {
    const until = this.exhaustedUntil.get(resource);

    if (until === undefined) {
      return false;
    }

    if (now.getTime() >= until) {
      this.exhaustedUntil.delete(resource);
      return false;
    }

    return true;
  }

  /** @returns the consecutive failure count including this one */
  recordFailure(): number {
    this.failures++;
    return this.failures;
  }

  recordSuccess(): void {
    this.failures = 0;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }
}
