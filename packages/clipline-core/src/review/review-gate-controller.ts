import { EventEmitter } from 'node:events';

import type { TaskStore } from '../datastore';
import { TaskNotFoundError } from '../errors';
import type { TaskTransitioner } from '../pipeline/task-transitions';
import { GATE_APPROVALS, GATE_REJECTIONS } from '../status-graph';
import { formatErrorLogEntry, type Task, type TaskStatus } from '../task';

export const ReviewGateEvents = {
  /** A gated task was approved and is waiting for its next step */
  GATE_APPROVED: 'gateApproved',
  /** A gated task was rejected and moved to its error status */
  GATE_REJECTED: 'gateRejected',
} as const;

export type ReviewGateEvents = (typeof ReviewGateEvents)[keyof typeof ReviewGateEvents];

export type ReviewGateEventsMap = {
  [ReviewGateEvents.GATE_APPROVED]: [{ task: Task; gate: TaskStatus; reviewDurationMs: number | null }];
  [ReviewGateEvents.GATE_REJECTED]: [{ task: Task; gate: TaskStatus; reason: string; reviewDurationMs: number | null }];
};

export type ReviewDecision = {
  /** False when the task was not at a gate (for example, the signal was already applied) */
  applied: boolean;
  task: Task;
};

const MISSING_REASON = 'rejected without reason';

/**
 * Applies approval and rejection signals to tasks halted at a review gate. Approval returns the
 * task to an awaiting-work status so the claimer schedules the next step. Both operations are
 * idempotent: once the task has left the gate a repeated signal changes nothing.
 */
export class ReviewGateController extends EventEmitter<ReviewGateEventsMap> {
  constructor(
    private readonly store: TaskStore,
    private readonly transitions: TaskTransitioner,
  ) {
    super();
  }

  async approve(taskId: string): Promise<ReviewDecision> {
    const task = await this.load(taskId);
    const next = GATE_APPROVALS[task.status];

    if (!next) {
      return { applied: false, task };
    }

    const updated = await this.transitions.apply(task, next, {
      patch: { reviewCompletedAt: new Date(), clearLease: true },
    });

    if (!updated) {
      return { applied: false, task: await this.load(taskId) };
    }

    this.emit(ReviewGateEvents.GATE_APPROVED, {
      task: updated,
      gate: task.status,
      reviewDurationMs: reviewDuration(updated),
    });

    return { applied: true, task: updated };
  }

  async reject(taskId: string, reason?: string): Promise<ReviewDecision> {
    const task = await this.load(taskId);
    const next = GATE_REJECTIONS[task.status];

    if (!next) {
      return { applied: false, task };
    }

    const message = reason?.trim() || MISSING_REASON;
    const updated = await this.transitions.apply(task, next, {
      patch: {
        reviewCompletedAt: new Date(),
        clearLease: true,
        appendError: formatErrorLogEntry(task.status, message),
      },
    });

    if (!updated) {
      return { applied: false, task: await this.load(taskId) };
    }

    this.emit(ReviewGateEvents.GATE_REJECTED, {
      task: updated,
      gate: task.status,
      reason: message,
      reviewDurationMs: reviewDuration(updated),
    });

    return { applied: true, task: updated };
  }

  private async load(taskId: string): Promise<Task> {
    const task = await this.store.get(taskId);

    if (!task) {
      throw new TaskNotFoundError(taskId);
    }

    return task;
  }
}

/**
 * Milliseconds the task spent at its latest review gate, or `null` while it has not left it.
 */
export function reviewDuration(task: Pick<Task, 'reviewStartedAt' | 'reviewCompletedAt'>): number | null {
  if (!task.reviewStartedAt || !task.reviewCompletedAt) {
    return null;
  }

  return Math.max(0, task.reviewCompletedAt.getTime() - task.reviewStartedAt.getTime());
}
