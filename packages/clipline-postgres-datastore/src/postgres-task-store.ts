import {
  type ClaimTaskInput,
  type CountInFlightInput,
  type InsertTaskInput,
  type ListByStatusInput,
  type ListClaimCandidatesInput,
  type ReleaseTaskInput,
  type RenewLeaseInput,
  type SaveStepProgressInput,
  type Task,
  TaskStatus,
  type TaskStore,
  type TransitionInput,
  type UpdateDetailsInput,
} from '@clipline/core';
import { z } from 'zod';

import {
  CLAIM_QUERY,
  COUNT_IN_FLIGHT_QUERY,
  FIND_BY_EXTERNAL_REF_QUERY,
  FIND_BY_ID_QUERY,
  INSERT_TASK_QUERY,
  LIST_BY_STATUS_CLAIM_ORDER_QUERY,
  LIST_BY_STATUS_FIFO_QUERY,
  LIST_CLAIM_CANDIDATES_QUERY,
  RELEASE_QUERY,
  RENEW_LEASE_QUERY,
  SAVE_STEP_PROGRESS_QUERY,
  TRANSITION_QUERY,
  UPDATE_DETAILS_QUERY,
} from './queries';
import { isUniqueViolation, type SqlClient, type SqlRow } from './sql-client';
import { CountRowSchema, toTask } from './types';

export type PostgresTaskStoreConfig = {
  /** Source of timestamps written by the store. @default () => new Date() */
  now?: () => Date;
};

const TaskIdSchema = z.string().uuid();

/**
 * Task store on the clipline_tasks table. Each method is one statement, so no transaction is
 * ever held open across a step.
 */
export class PostgresTaskStore implements TaskStore {
  private readonly now: () => Date;

  constructor(
    private readonly client: SqlClient,
    config?: PostgresTaskStoreConfig,
  ) {
    this.now = config?.now ?? (() => new Date());
  }

  async insert(input: InsertTaskInput): Promise<Task> {
    try {
      const { rows } = await this.client.query(INSERT_TASK_QUERY, [
        input.channelId,
        input.externalRef,
        input.status ?? TaskStatus.DRAFT,
        input.priority,
        JSON.stringify(input.data),
        this.now(),
      ]);

      return this.extractTaskOrThrow(rows, input.externalRef);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new Error(`Task with externalRef ${input.externalRef} already exists`);
      }

      throw error;
    }
  }

  async get(taskId: string): Promise<Task | undefined> {
    // Ids are uuids; anything else cannot match and would fail the cast.
    if (!TaskIdSchema.safeParse(taskId).success) {
      return undefined;
    }

    return this.first(await this.client.query(FIND_BY_ID_QUERY, [taskId]));
  }

  async getByExternalRef(externalRef: string): Promise<Task | undefined> {
    return this.first(await this.client.query(FIND_BY_EXTERNAL_REF_QUERY, [externalRef]));
  }

  async listByStatus(input: ListByStatusInput): Promise<Task[]> {
    const query = input.order === 'claim' ? LIST_BY_STATUS_CLAIM_ORDER_QUERY : LIST_BY_STATUS_FIFO_QUERY;
    const { rows } = await this.client.query(query, [input.statuses, input.limit ?? null]);

    return rows.map(toTask);
  }

  async listClaimCandidates(input: ListClaimCandidatesInput): Promise<Task[]> {
    const { rows } = await this.client.query(LIST_CLAIM_CANDIDATES_QUERY, [
      input.awaitingStatuses,
      input.staleStatuses,
      input.staleBefore,
      input.limit,
    ]);

    return rows.map(toTask);
  }

  async claim(input: ClaimTaskInput): Promise<Task | undefined> {
    if (!TaskIdSchema.safeParse(input.taskId).success) {
      return undefined;
    }

    const result = await this.client.query(CLAIM_QUERY, [
      input.taskId,
      input.expectedStatus,
      input.nextStatus,
      input.claimedFrom ?? null,
      input.workerId,
      this.now(),
      input.staleBefore ?? null,
    ]);

    return this.first(result);
  }

  async release(input: ReleaseTaskInput): Promise<Task | undefined> {
    const result = await this.client.query(RELEASE_QUERY, [
      input.taskId,
      input.from,
      input.workerId,
      input.restore.status,
      input.restore.claimedFrom ?? null,
      input.restore.claimedBy ?? null,
      input.restore.claimedAt ?? null,
      this.now(),
    ]);

    return this.first(result);
  }

  async transition(input: TransitionInput): Promise<Task | undefined> {
    const patch = input.patch ?? {};
    const result = await this.client.query(TRANSITION_QUERY, [
      input.taskId,
      input.from,
      input.to,
      input.workerId ?? null,
      patch.reviewStartedAt ?? null,
      patch.reviewCompletedAt !== undefined,
      patch.reviewCompletedAt ?? null,
      patch.clearStepProgress ?? null,
      patch.clearLease ?? false,
      patch.appendError ?? null,
      this.now(),
    ]);

    return this.first(result);
  }

  async saveStepProgress(input: SaveStepProgressInput): Promise<Task | undefined> {
    const result = await this.client.query(SAVE_STEP_PROGRESS_QUERY, [
      input.taskId,
      input.workerId,
      input.step,
      JSON.stringify(input.progress),
      this.now(),
    ]);

    return this.first(result);
  }

  async renewLease(input: RenewLeaseInput): Promise<Task | undefined> {
    if (!TaskIdSchema.safeParse(input.taskId).success) {
      return undefined;
    }

    const result = await this.client.query(RENEW_LEASE_QUERY, [input.taskId, input.status, input.workerId, this.now()]);

    return this.first(result);
  }

  async updateDetails(taskId: string, input: UpdateDetailsInput): Promise<Task | undefined> {
    if (!TaskIdSchema.safeParse(taskId).success) {
      return undefined;
    }

    const result = await this.client.query(UPDATE_DETAILS_QUERY, [
      taskId,
      input.priority ?? null,
      input.data ? JSON.stringify(input.data) : null,
      input.appendError ?? null,
      this.now(),
    ]);

    return this.first(result);
  }

  async countInFlight(input: CountInFlightInput): Promise<number> {
    const { rows } = await this.client.query(COUNT_IN_FLIGHT_QUERY, [
      input.channelId,
      input.executingStatuses,
      TaskStatus.CLAIMED,
      input.claimedFromStatuses,
      input.excludeTaskId ?? null,
      input.claimedBefore?.claimedAt ?? null,
      input.claimedBefore?.taskId ?? null,
    ]);

    return CountRowSchema.parse(rows[0]).count;
  }

  private first({ rows }: { rows: SqlRow[] }): Task | undefined {
    const [row] = rows;

    return row ? toTask(row) : undefined;
  }

  private extractTaskOrThrow(rows: SqlRow[], externalRef: string): Task {
    const task = this.first({ rows });

    if (!task) {
      throw new Error(`Insert of task for externalRef ${externalRef} returned no row`);
    }

    return task;
  }
}
