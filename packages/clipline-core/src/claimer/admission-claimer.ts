import type { ClaimTaskInput, TaskStore } from '../datastore';
import type { TaskTransitioner } from '../pipeline/task-transitions';
import type { QuotaLedger } from '../quota/quota-ledger';
import {
  assertTransition,
  AWAITING_WORK_STATUSES,
  IN_FLIGHT_STATUSES,
  isAwaitingWork,
  leaseStatusesFor,
  requiredResource,
} from '../status-graph';
import { type Resource, type Task, TaskStatus } from '../task';
import type { WorkerState } from './worker-state';

export type AdmissionClaimerConfig = {
  /** Leases not refreshed for this long are considered abandoned and can be reclaimed @default 3600000ms */
  claimStaleTimeoutMs: number;
  /** How many candidates one claim attempt looks at @default 50 */
  candidateLimit: number;
};

export const DEFAULT_ADMISSION_CLAIMER_CONFIG: AdmissionClaimerConfig = {
  claimStaleTimeoutMs: 3_600_000,
  candidateLimit: 50,
};

export type ClaimOutcome =
  | { type: 'claimed'; task: Task; resource?: Resource }
  /** The claim was won but the quota re-check failed; the task is back where it was */
  | { type: 'released'; task: Task; resource: Resource }
  | { type: 'none' };

/**
 * Hands one eligible task to a worker. Candidates come from the store in priority, tenant
 * rotation and FIFO order; each is filtered by worker-local limits and the quota ledger before
 * the atomic claim, and quota is checked again after it.
 */
export class AdmissionClaimer {
  private readonly config: AdmissionClaimerConfig;

  constructor(
    private readonly store: TaskStore,
    private readonly ledger: QuotaLedger,
    private readonly transitions: TaskTransitioner,
    config?: Partial<AdmissionClaimerConfig>,
  ) {
    this.config = { ...DEFAULT_ADMISSION_CLAIMER_CONFIG, ...config };
  }

  get claimStaleTimeoutMs(): number {
    return this.config.claimStaleTimeoutMs;
  }

  /**
   * On `claimed` with a resource, the caller owns one worker slot for it and must release it
   * through `state.release` when the cycle ends.
   */
  async claimNext(state: WorkerState, now: Date = new Date()): Promise<ClaimOutcome> {
    const staleBefore = new Date(now.getTime() - this.config.claimStaleTimeoutMs);
    const candidates = await this.store.listClaimCandidates({
      awaitingStatuses: AWAITING_WORK_STATUSES,
      staleStatuses: IN_FLIGHT_STATUSES,
      staleBefore,
      limit: this.config.candidateLimit,
    });

    for (const candidate of candidates) {
      const resource = requiredResource(candidate);

      if (resource && !(await this.admit(candidate, resource, state, now))) {
        continue;
      }

      let claimed: Task | undefined;

      try {
        claimed = await this.store.claim(this.claimInput(candidate, state.workerId, staleBefore));
      } catch (error) {
        if (resource) state.release(resource);
        throw error;
      }

      if (!claimed) {
        // Another worker got there first.
        if (resource) state.release(resource);
        continue;
      }

      if (resource && !(await this.recheck(claimed, candidate, resource, state))) {
        try {
          const released = await this.release(claimed, candidate, state.workerId);

          return { type: 'released', task: released, resource };
        } finally {
          state.release(resource);
        }
      }

      if (claimed.status !== candidate.status) {
        this.transitions.committed(claimed);
      }

      return { type: 'claimed', task: claimed, resource };
    }

    return { type: 'none' };
  }

  private claimInput(candidate: Task, workerId: string, staleBefore: Date): ClaimTaskInput {
    if (isAwaitingWork(candidate.status)) {
      assertTransition(candidate, TaskStatus.CLAIMED);

      return {
        taskId: candidate.id,
        expectedStatus: candidate.status,
        nextStatus: TaskStatus.CLAIMED,
        claimedFrom: candidate.status,
        workerId,
      };
    }

    // Taking over an abandoned lease keeps the task where it stopped.
    return {
      taskId: candidate.id,
      expectedStatus: candidate.status,
      nextStatus: candidate.status,
      claimedFrom: candidate.claimedFrom,
      workerId,
      staleBefore,
    };
  }

  /**
   * Pre-claim filter. Leases other workers already hold on the resource count against the
   * budget since they have not recorded their spend yet.
   */
  private async admit(candidate: Task, resource: Resource, state: WorkerState, now: Date): Promise<boolean> {
    if (state.isExhausted(resource, now) || !state.tryReserve(resource)) {
      return false;
    }

    try {
      const leases = await this.store.countInFlight({
        channelId: candidate.channelId,
        ...leaseStatusesFor(resource),
        excludeTaskId: candidate.id,
      });
      const admitted = await this.hasBudgetFor(candidate.channelId, resource, leases, now);

      if (!admitted) {
        state.release(resource);
      }

      return admitted;
    } catch (error) {
      state.release(resource);
      throw error;
    }
  }

  /**
   * Runs the post-claim re-check. When it throws, the claim is undone and the slot freed before
   * the error propagates.
   */
  private async recheck(claimed: Task, candidate: Task, resource: Resource, state: WorkerState): Promise<boolean> {
    try {
      return await this.hasQuotaAfterClaim(claimed, resource);
    } catch (error) {
      try {
        await this.release(claimed, candidate, state.workerId);
      } finally {
        state.release(resource);
      }

      throw error;
    }
  }

  /**
   * Post-claim re-check. Only leases taken before ours count, so when two claims race for the
   * last unit exactly one of them survives.
   */
  private async hasQuotaAfterClaim(claimed: Task, resource: Resource): Promise<boolean> {
    const claimedAt = claimed.claimedAt ?? new Date();
    const leases = await this.store.countInFlight({
      channelId: claimed.channelId,
      ...leaseStatusesFor(resource),
      excludeTaskId: claimed.id,
      claimedBefore: { claimedAt, taskId: claimed.id },
    });

    return this.hasBudgetFor(claimed.channelId, resource, leases, new Date());
  }

  private hasBudgetFor(channelId: string, resource: Resource, leases: number, at: Date): Promise<boolean> {
    const { unitCost } = this.ledger.policy(resource);

    return this.ledger.check(channelId, resource, unitCost * (leases + 1), at);
  }

  private async release(claimed: Task, previous: Task, workerId: string): Promise<Task> {
    if (claimed.status !== previous.status) {
      assertTransition(claimed, previous.status);
    }

    const released = await this.store.release({
      taskId: claimed.id,
      workerId,
      from: claimed.status,
      restore: {
        status: previous.status,
        claimedFrom: previous.claimedFrom,
        claimedBy: previous.claimedBy,
        claimedAt: previous.claimedAt,
      },
    });

    if (released && released.status !== claimed.status) {
      this.transitions.committed(released);
    }

    return released ?? previous;
  }
}
