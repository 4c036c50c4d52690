import { EventEmitter } from 'node:events';
import { z } from 'zod';

import type { TaskStore } from '../datastore';
import { TaskValidationError } from '../errors';
import type { TaskTransitioner } from '../pipeline/task-transitions';
import type { ReviewGateController } from '../review/review-gate-controller';
import {
  canTransition,
  GATE_APPROVALS,
  GATE_REJECTIONS,
  isAwaitingWork,
  isErrorStatus,
  isReviewGate,
} from '../status-graph';
import {
  formatErrorLogEntry,
  type Task,
  type TaskData,
  TaskPayloadSchema,
  TaskPriority,
  TaskStatus,
} from '../task';
import { fromPlanningPriority, fromPlanningStatus } from './planning-status';

/**
 * A validated, de-duplicated "work item changed" notification from the planning surface.
 */
export const PlanningWorkItemSchema = z.object({
  /** Opaque id of the upstream event, when the source has one */
  eventId: z.string().optional(),
  externalRef: z.string().min(1),
  channelId: z.string().min(1),
  /** Status name as shown on the planning surface */
  planningStatus: z.string().min(1),
  priority: z.string().optional(),
  data: z.record(z.string(), z.unknown()).default({}),
  rejectionReason: z.string().optional(),
});

export type PlanningWorkItem = z.input<typeof PlanningWorkItemSchema>;

type ParsedWorkItem = z.output<typeof PlanningWorkItemSchema>;

export type PlanningAction =
  | 'created'
  | 'admitted'
  | 'invalid'
  | 'approved'
  | 'rejected'
  | 'requeued'
  | 'cancelled'
  | 'returned_to_draft'
  | 'reprioritized'
  | 'ignored';

export type PlanningOutcome = { action: PlanningAction; task?: Task };

export const PlanningEvents = {
  /** A new work item produced a draft task */
  TASK_CREATED: 'taskCreated',
  /** A draft passed validation and joined the queue */
  TASK_ADMITTED: 'taskAdmitted',
  /** A draft's payload is incomplete; it stays in draft */
  VALIDATION_FAILED: 'validationFailed',
  /** A signal did not apply to the task's current status */
  SIGNAL_IGNORED: 'signalIgnored',
} as const;

export type PlanningEvents = (typeof PlanningEvents)[keyof typeof PlanningEvents];

export type PlanningEventsMap = {
  [PlanningEvents.TASK_CREATED]: [{ task: Task }];
  [PlanningEvents.TASK_ADMITTED]: [{ task: Task }];
  [PlanningEvents.VALIDATION_FAILED]: [{ task: Task; error: TaskValidationError }];
  [PlanningEvents.SIGNAL_IGNORED]: [{ item: PlanningWorkItem; task?: Task; reason: string }];
};

export type PlanningEventHandlerConfig = {
  /** Applied event ids kept for de-duplication, oldest forgotten first. @default 10_000 */
  rememberedEvents: number;
};

const DEFAULT_CONFIG: PlanningEventHandlerConfig = {
  rememberedEvents: 10_000,
};

/**
 * Applies planning-surface changes to the task store: creation, admission, priority changes,
 * review signals, manual re-queues and cancellation.
 */
export class PlanningEventHandler extends EventEmitter<PlanningEventsMap> {
  private readonly config: PlanningEventHandlerConfig;
  private readonly appliedEventIds = new Set<string>();

  constructor(
    private readonly store: TaskStore,
    private readonly transitions: TaskTransitioner,
    private readonly reviewGates: ReviewGateController,
    config?: Partial<PlanningEventHandlerConfig>,
  ) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  /**
   * An event id that already changed a task is ignored. Ignored events are not remembered, so a
   * signal that arrived too early applies once the task reaches the matching status.
   */
  async handle(input: PlanningWorkItem): Promise<PlanningOutcome> {
    const item = PlanningWorkItemSchema.parse(input);

    if (item.eventId && this.appliedEventIds.has(item.eventId)) {
      return this.ignore(input, undefined, `event ${item.eventId} was already applied`);
    }

    const outcome = await this.apply(input, item);

    if (item.eventId && outcome.action !== 'ignored') {
      this.rememberEvent(item.eventId);
    }

    return outcome;
  }

  private rememberEvent(eventId: string): void {
    this.appliedEventIds.add(eventId);

    for (const oldest of this.appliedEventIds) {
      if (this.appliedEventIds.size <= this.config.rememberedEvents) break;
      this.appliedEventIds.delete(oldest);
    }
  }

  private async apply(input: PlanningWorkItem, item: ParsedWorkItem): Promise<PlanningOutcome> {
    const desired = fromPlanningStatus(item.planningStatus);
    const priority = fromPlanningPriority(item.priority);
    const existing = await this.store.getByExternalRef(item.externalRef);

    if (!existing) {
      if (desired !== TaskStatus.DRAFT && desired !== TaskStatus.QUEUED) {
        const reason = `no task for ${item.externalRef} and "${item.planningStatus}" does not create one`;
        return this.ignore(input, undefined, reason);
      }

      const task = await this.store.insert({
        channelId: item.channelId,
        externalRef: item.externalRef,
        priority: priority ?? TaskPriority.NORMAL,
        data: item.data,
      });
      this.emit(PlanningEvents.TASK_CREATED, { task });

      return desired === TaskStatus.QUEUED ? this.admit(task) : { action: 'created', task };
    }

    let task = existing;
    let reprioritized = false;

    if (priority && priority !== task.priority) {
      task = (await this.store.updateDetails(task.id, { priority })) ?? task;
      reprioritized = true;
    }

    if (task.status === TaskStatus.DRAFT && hasChanges(task.data, item.data)) {
      task = (await this.store.updateDetails(task.id, { data: { ...task.data, ...item.data } })) ?? task;
    }

    if (!desired || desired === task.status) {
      return reprioritized ? { action: 'reprioritized', task } : { action: 'ignored', task };
    }

    return this.applyStatusSignal(input, task, desired, item.rejectionReason);
  }

  private async applyStatusSignal(
    item: PlanningWorkItem,
    task: Task,
    desired: TaskStatus,
    rejectionReason: string | undefined,
  ): Promise<PlanningOutcome> {
    if (isReviewGate(task.status)) {
      if (GATE_APPROVALS[task.status] === desired) {
        const decision = await this.reviewGates.approve(task.id);
        return { action: decision.applied ? 'approved' : 'ignored', task: decision.task };
      }

      if (GATE_REJECTIONS[task.status] === desired) {
        const decision = await this.reviewGates.reject(task.id, rejectionReason);
        return { action: decision.applied ? 'rejected' : 'ignored', task: decision.task };
      }
    }

    if (desired === TaskStatus.QUEUED && task.status === TaskStatus.DRAFT) {
      return this.admit(task);
    }

    if (isErrorStatus(task.status) && (desired === TaskStatus.QUEUED || isAwaitingWork(desired))) {
      if (canTransition(task.status, desired)) {
        return this.move(item, task, desired, 'requeued');
      }
    }

    if (desired === TaskStatus.CANCELLED && canTransition(task.status, desired)) {
      return this.move(item, task, desired, 'cancelled');
    }

    if (desired === TaskStatus.DRAFT && task.status === TaskStatus.QUEUED) {
      return this.move(item, task, desired, 'returned_to_draft');
    }

    return this.ignore(item, task, `"${item.planningStatus}" does not apply to a task in ${task.status}`);
  }

  /**
   * Validates a draft's payload and queues it. An invalid draft stays where it is with the
   * problems appended to its error log.
   */
  private async admit(task: Task): Promise<PlanningOutcome> {
    const parsed = TaskPayloadSchema.safeParse(task.data);

    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'data'}: ${issue.message}`);
      const error = new TaskValidationError(task.id, issues);
      const annotated = await this.store.updateDetails(task.id, {
        appendError: formatErrorLogEntry(task.status, `invalid input: ${issues.join('; ')}`),
      });
      this.emit(PlanningEvents.VALIDATION_FAILED, { task: annotated ?? task, error });

      return { action: 'invalid', task: annotated ?? task };
    }

    const admitted = await this.transitions.apply(task, TaskStatus.QUEUED);

    if (!admitted) {
      return { action: 'ignored', task };
    }

    this.emit(PlanningEvents.TASK_ADMITTED, { task: admitted });

    return { action: 'admitted', task: admitted };
  }

  private async move(
    item: PlanningWorkItem,
    task: Task,
    to: TaskStatus,
    action: PlanningAction,
  ): Promise<PlanningOutcome> {
    const updated = await this.transitions.apply(task, to, { patch: { clearLease: true } });

    if (!updated) {
      return this.ignore(item, task, `task ${task.id} changed before "${item.planningStatus}" could be applied`);
    }

    return { action, task: updated };
  }

  private ignore(item: PlanningWorkItem, task: Task | undefined, reason: string): PlanningOutcome {
    this.emit(PlanningEvents.SIGNAL_IGNORED, { item, task, reason });

    return { action: 'ignored', task };
  }
}

function hasChanges(current: TaskData, incoming: TaskData): boolean {
  return Object.keys(incoming).length > 0 && JSON.stringify(current) !== JSON.stringify({ ...current, ...incoming });
}
