import {
  type ClaimTaskInput,
  type CountInFlightInput,
  type InsertTaskInput,
  type ListByStatusInput,
  type ListClaimCandidatesInput,
  PRIORITY_RANK,
  type ReleaseTaskInput,
  type RenewLeaseInput,
  type SaveStepProgressInput,
  type Task,
  TaskStatus,
  type TaskStore,
  type TransitionInput,
  type UpdateDetailsInput,
} from '@clipline/core';

export type MemoryTaskStoreConfig = {
  /** Source of timestamps written by the store. @default () => new Date() */
  now?: () => Date;
};

/**
 * Task store kept in a Map. Every method does all of its work synchronously before its first
 * await, so each call is atomic with respect to the others.
 */
export class MemoryTaskStore implements TaskStore {
  #store: Map<string, Task>;
  #nextId: number;
  #now: () => Date;

  constructor(config?: MemoryTaskStoreConfig) {
    this.#store = new Map();
    this.#nextId = 0;
    this.#now = config?.now ?? (() => new Date());
  }

  async insert(input: InsertTaskInput): Promise<Task> {
    if (this.findByExternalRef(input.externalRef)) {
      throw new Error(`Task with externalRef ${input.externalRef} already exists`);
    }

    const now = this.#now();
    const task: Task = {
      id: (this.#nextId++).toString(),
      channelId: input.channelId,
      externalRef: input.externalRef,
      status: input.status ?? TaskStatus.DRAFT,
      priority: input.priority,
      data: { ...input.data },
      stepProgress: {},
      createdAt: now,
      updatedAt: now,
    };

    this.#store.set(task.id, task);

    return copy(task);
  }

  async get(taskId: string): Promise<Task | undefined> {
    const task = this.#store.get(taskId);

    return task ? copy(task) : undefined;
  }

  async getByExternalRef(externalRef: string): Promise<Task | undefined> {
    const task = this.findByExternalRef(externalRef);

    return task ? copy(task) : undefined;
  }

  async listByStatus(input: ListByStatusInput): Promise<Task[]> {
    const tasks = Array.from(this.#store.values()).filter((t) => input.statuses.includes(t.status));
    const sorted = input.order === 'claim' ? this.sortForClaim(tasks) : tasks.sort(byCreation);

    return sorted.slice(0, input.limit ?? sorted.length).map(copy);
  }

  async listClaimCandidates(input: ListClaimCandidatesInput): Promise<Task[]> {
    const staleBefore = input.staleBefore.getTime();
    const candidates = Array.from(this.#store.values()).filter(
      (t) =>
        input.awaitingStatuses.includes(t.status) ||
        (input.staleStatuses.includes(t.status) && t.updatedAt.getTime() <= staleBefore),
    );

    return this.sortForClaim(candidates).slice(0, input.limit).map(copy);
  }

  async claim(input: ClaimTaskInput): Promise<Task | undefined> {
    const task = this.#store.get(input.taskId);

    if (!task || task.status !== input.expectedStatus) {
      return undefined;
    }

    if (input.staleBefore && task.updatedAt.getTime() > input.staleBefore.getTime()) {
      return undefined;
    }

    const now = this.#now();

    task.status = input.nextStatus;
    task.claimedFrom = input.claimedFrom;
    task.claimedBy = input.workerId;
    task.claimedAt = now;
    task.updatedAt = now;

    return copy(task);
  }

  async release(input: ReleaseTaskInput): Promise<Task | undefined> {
    const task = this.#store.get(input.taskId);

    if (!task || task.status !== input.from || task.claimedBy !== input.workerId) {
      return undefined;
    }

    task.status = input.restore.status;
    task.claimedFrom = input.restore.claimedFrom;
    task.claimedBy = input.restore.claimedBy;
    task.claimedAt = input.restore.claimedAt;
    task.updatedAt = this.#now();

    return copy(task);
  }

  async transition(input: TransitionInput): Promise<Task | undefined> {
    const task = this.#store.get(input.taskId);

    if (!task || task.status !== input.from) {
      return undefined;
    }

    if (input.workerId !== undefined && task.claimedBy !== input.workerId) {
      return undefined;
    }

    const patch = input.patch ?? {};

    task.status = input.to;

    if (patch.reviewStartedAt) {
      task.reviewStartedAt = patch.reviewStartedAt;
    }

    if (patch.reviewCompletedAt !== undefined) {
      task.reviewCompletedAt = patch.reviewCompletedAt ?? undefined;
    }

    if (patch.clearStepProgress) {
      const { [patch.clearStepProgress]: _cleared, ...rest } = task.stepProgress;
      task.stepProgress = rest;
    }

    if (patch.clearLease) {
      task.claimedBy = undefined;
      task.claimedFrom = undefined;
    }

    if (patch.appendError) {
      task.errorLog = appendLine(task.errorLog, patch.appendError);
    }

    task.updatedAt = this.#now();

    return copy(task);
  }

  async saveStepProgress(input: SaveStepProgressInput): Promise<Task | undefined> {
    const task = this.#store.get(input.taskId);

    if (!task || task.claimedBy !== input.workerId) {
      return undefined;
    }

    task.stepProgress = { ...task.stepProgress, [input.step]: { ...input.progress } };
    task.updatedAt = this.#now();

    return copy(task);
  }

  async renewLease(input: RenewLeaseInput): Promise<Task | undefined> {
    const task = this.#store.get(input.taskId);

    if (!task || task.status !== input.status || task.claimedBy !== input.workerId) {
      return undefined;
    }

    task.updatedAt = this.#now();

    return copy(task);
  }

  async updateDetails(taskId: string, input: UpdateDetailsInput): Promise<Task | undefined> {
    const task = this.#store.get(taskId);

    if (!task) {
      return undefined;
    }

    if (input.priority) {
      task.priority = input.priority;
    }

    if (input.data) {
      task.data = { ...input.data };
    }

    if (input.appendError) {
      task.errorLog = appendLine(task.errorLog, input.appendError);
    }

    task.updatedAt = this.#now();

    return copy(task);
  }

  async countInFlight(input: CountInFlightInput): Promise<number> {
    const before = input.claimedBefore;

    return Array.from(this.#store.values()).filter((t) => {
      if (t.channelId !== input.channelId || t.id === input.excludeTaskId) {
        return false;
      }

      const leased =
        input.executingStatuses.includes(t.status) ||
        (t.status === TaskStatus.CLAIMED &&
          t.claimedFrom !== undefined &&
          input.claimedFromStatuses.includes(t.claimedFrom));

      if (!leased) {
        return false;
      }

      if (!before || !t.claimedAt) {
        return true;
      }

      const claimedAt = t.claimedAt.getTime();
      const cutoff = before.claimedAt.getTime();

      return claimedAt < cutoff || (claimedAt === cutoff && Number(t.id) < Number(before.taskId));
    }).length;
  }

  /** Number of tasks held, for tests and diagnostics. */
  size(): number {
    return this.#store.size;
  }

  private findByExternalRef(externalRef: string): Task | undefined {
    return Array.from(this.#store.values()).find((t) => t.externalRef === externalRef);
  }

  /**
   * Priority first, then the channel served least recently at that priority, then creation time.
   */
  private sortForClaim(tasks: Task[]): Task[] {
    const lastServed = new Map<string, number>();

    for (const task of this.#store.values()) {
      if (!task.claimedAt) continue;

      const key = `${task.channelId}:${task.priority}`;
      lastServed.set(key, Math.max(lastServed.get(key) ?? 0, task.claimedAt.getTime()));
    }

    const servedAt = (task: Task): number => lastServed.get(`${task.channelId}:${task.priority}`) ?? -1;

    return tasks.sort(
      (a, b) =>
        PRIORITY_RANK[a.priority] - PRIORITY_RANK[b.priority] || servedAt(a) - servedAt(b) || byCreation(a, b),
    );
  }
}

function byCreation(a: Task, b: Task): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || Number(a.id) - Number(b.id);
}

function appendLine(log: string | undefined, entry: string): string {
  return log ? `${log}\n${entry}` : entry;
}

function copy(task: Task): Task {
  return structuredClone(task);
}
