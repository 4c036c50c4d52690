import type {
  PipelineStep,
  Resource,
  StepProgress,
  Task,
  TaskData,
  TaskPriority,
  TaskStatus,
} from './task';

export type InsertTaskInput = {
  channelId: string;
  externalRef: string;
  priority: TaskPriority;
  data: TaskData;
  /** Defaults to `draft` */
  status?: TaskStatus;
};

export type ListByStatusInput = {
  statuses: readonly TaskStatus[];
  /** `fifo` orders by creation time; `claim` uses the claimer's priority and tenant rotation order */
  order: 'fifo' | 'claim';
  limit?: number;
};

export type ListClaimCandidatesInput = {
  /** Statuses whose tasks are waiting for their next step */
  awaitingStatuses: readonly TaskStatus[];
  /** In-flight statuses whose leases may have gone stale */
  staleStatuses: readonly TaskStatus[];
  /** Leases not refreshed since this instant are stale */
  staleBefore: Date;
  limit: number;
};

export type ClaimTaskInput = {
  taskId: string;
  /** The claim only succeeds while the task is still in this status */
  expectedStatus: TaskStatus;
  nextStatus: TaskStatus;
  claimedFrom?: TaskStatus;
  workerId: string;
  /** Set when taking over a stale lease; the lease must not have been refreshed since */
  staleBefore?: Date;
};

export type ReleaseTaskInput = {
  taskId: string;
  workerId: string;
  /** Status the claim put the task in */
  from: TaskStatus;
  /** Lease fields as they were before the claim */
  restore: Pick<Task, 'status' | 'claimedFrom' | 'claimedBy' | 'claimedAt'>;
};

export type TransitionPatch = {
  reviewStartedAt?: Date;
  /** `null` clears the previous gate's exit time when entering the next gate */
  reviewCompletedAt?: Date | null;
  /** Removes this step's progress entry in the same write */
  clearStepProgress?: PipelineStep;
  /** Clears `claimedBy` and `claimedFrom` */
  clearLease?: boolean;
  /** A formatted entry appended to `errorLog` */
  appendError?: string;
};

export type TransitionInput = {
  taskId: string;
  from: TaskStatus;
  to: TaskStatus;
  /** When set, the write only applies while this worker still holds the lease */
  workerId?: string;
  patch?: TransitionPatch;
};

export type SaveStepProgressInput = {
  taskId: string;
  workerId: string;
  step: PipelineStep;
  progress: StepProgress;
};

export type RenewLeaseInput = {
  taskId: string;
  workerId: string;
  /** The renewal only applies while the task is still in this status */
  status: TaskStatus;
};

export type UpdateDetailsInput = {
  priority?: TaskPriority;
  data?: TaskData;
  appendError?: string;
};

export type CountInFlightInput = {
  channelId: string;
  executingStatuses: readonly TaskStatus[];
  claimedFromStatuses: readonly TaskStatus[];
  excludeTaskId?: string;
  /** Only count leases taken before this one, ordered by claim time then id */
  claimedBefore?: { claimedAt: Date; taskId: string };
};

/**
 * Durable storage for tasks. Every method is a single short transaction; none is ever held
 * open while a step runs.
 */
export interface TaskStore {
  insert(input: InsertTaskInput): Promise<Task>;
  get(taskId: string): Promise<Task | undefined>;
  getByExternalRef(externalRef: string): Promise<Task | undefined>;
  listByStatus(input: ListByStatusInput): Promise<Task[]>;
  listClaimCandidates(input: ListClaimCandidatesInput): Promise<Task[]>;
  /**
   * Atomically takes the lease on one task. Rows locked by a concurrent claim are skipped, not waited on.
   * @returns the claimed task, or undefined when the task was taken or changed first
   */
  claim(input: ClaimTaskInput): Promise<Task | undefined>;
  /** Undoes a claim made by `workerId`, leaving the task as it was before. */
  release(input: ReleaseTaskInput): Promise<Task | undefined>;
  /**
   * Compare-and-set on status.
   * @returns the updated task, or undefined when the task is no longer in `from` (or no longer leased by `workerId`)
   */
  transition(input: TransitionInput): Promise<Task | undefined>;
  saveStepProgress(input: SaveStepProgressInput): Promise<Task | undefined>;
  /**
   * Touches `updatedAt` so the lease does not go stale.
   * @returns the task, or undefined when `workerId` no longer holds it in `status`
   */
  renewLease(input: RenewLeaseInput): Promise<Task | undefined>;
  updateDetails(taskId: string, input: UpdateDetailsInput): Promise<Task | undefined>;
  countInFlight(input: CountInFlightInput): Promise<number>;
}

export type QuotaKey = {
  channelId: string;
  resource: Resource;
  /** `YYYY-MM-DD` */
  day: string;
};

export type QuotaRecord = QuotaKey & {
  unitsUsed: number;
  dailyLimit: number;
  updatedAt: Date;
};

export type IncrementQuotaInput = QuotaKey & {
  cost: number;
  /** Budget stored when the record is created by this increment */
  dailyLimit: number;
};

export interface QuotaStore {
  get(key: QuotaKey): Promise<QuotaRecord | undefined>;
  /** Creates the record if needed and adds `cost` under the row lock. */
  increment(input: IncrementQuotaInput): Promise<QuotaRecord>;
}
