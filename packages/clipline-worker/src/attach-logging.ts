import type { EventEmitter } from 'node:events';

import {
  type Clipline,
  CliplineEvents,
  DispatchEvents,
  PlanningEvents,
  type PlanningPoller,
  PlanningPollerEvents,
  ReviewGateEvents,
  type Task,
  WorkerRuntimeEvents,
  type WorkerRuntimeEventsMap,
} from '@clipline/core';
import type { Logger } from 'winston';

function taskMeta(task: Task) {
  return { taskId: task.id, externalRef: task.externalRef, channelId: task.channelId, status: task.status };
}

function errorMeta(error: unknown) {
  if (error instanceof Error) {
    return { error: error.message, errorName: error.name };
  }

  return { error: String(error) };
}

/**
 * Logs the claim loop and pipeline events of one worker.
 */
export function logWorkerEvents(logger: Logger, runtime: EventEmitter<WorkerRuntimeEventsMap>, workerId: string): void {
  const log = logger.child({ workerId });

  runtime.on(WorkerRuntimeEvents.TASK_CLAIMED, ({ task, resource }) => {
    log.info('task claimed', { ...taskMeta(task), resource, claimedFrom: task.claimedFrom });
  });
  runtime.on(WorkerRuntimeEvents.TASK_RELEASED, ({ task, resource }) => {
    log.info('claim released after quota re-check', { ...taskMeta(task), resource });
  });
  runtime.on(WorkerRuntimeEvents.STEP_STARTED, ({ task, step, attempt, resumeFrom }) => {
    log.info('step started', { ...taskMeta(task), step, attempt, resumeFromUnit: resumeFrom?.completedUnits });
  });
  runtime.on(WorkerRuntimeEvents.STEP_PROGRESS_SAVED, ({ task, step, progress }) => {
    log.debug('step progress saved', {
      ...taskMeta(task),
      step,
      completedUnits: progress.completedUnits,
      totalUnits: progress.totalUnits,
    });
  });
  runtime.on(WorkerRuntimeEvents.STEP_RETRY_SCHEDULED, ({ task, step, attempt, error, retryScheduledAt }) => {
    log.warn('step failed, retrying', {
      ...taskMeta(task),
      step,
      attempt,
      retryAt: retryScheduledAt.toISOString(),
      ...errorMeta(error),
    });
  });
  runtime.on(WorkerRuntimeEvents.STEP_COMPLETED, ({ task, step, outputRef }) => {
    log.info('step completed', { ...taskMeta(task), step, outputRef });
  });
  runtime.on(WorkerRuntimeEvents.STEP_FAILED, ({ task, step, error }) => {
    log.error('step failed', { ...taskMeta(task), step, ...errorMeta(error) });
  });
  runtime.on(WorkerRuntimeEvents.QUOTA_RECORDED, ({ task, usage }) => {
    log.info('quota recorded', {
      taskId: task.id,
      channelId: usage.channelId,
      resource: usage.resource,
      day: usage.day,
      total: usage.total,
      dailyLimit: usage.dailyLimit,
    });
  });
  runtime.on(WorkerRuntimeEvents.CYCLE_COMPLETED, ({ result }) => {
    log.info('cycle completed', { ...taskMeta(result.task), outcome: result.outcome });
  });
  runtime.on(WorkerRuntimeEvents.INVARIANT_VIOLATION, ({ error, task }) => {
    log.error('invalid status transition', {
      ...(task ? taskMeta(task) : {}),
      from: error.from,
      to: error.to,
      ...errorMeta(error),
    });
  });
  runtime.on(WorkerRuntimeEvents.FAILURE_ESCALATED, ({ consecutiveFailures }) => {
    log.error('worker failing repeatedly', { consecutiveFailures });
  });
  runtime.on(WorkerRuntimeEvents.UNKNOWN_PROCESSING_ERROR, ({ error, task }) => {
    log.error('unexpected processing error', { ...(task ? taskMeta(task) : {}), ...errorMeta(error) });
  });
}

/**
 * Logs lifecycle, review, planning and dispatch events shared by every worker.
 */
export function logCliplineEvents(logger: Logger, clipline: Clipline): void {
  clipline.on(CliplineEvents.STARTED, ({ startedAt }) => {
    logger.info('workers started', { startedAt: startedAt.toISOString() });
  });
  clipline.on(CliplineEvents.STOP_DELAYED, ({ waitedMs }) => {
    logger.warn('workers are still finishing their cycles; waiting for them', { waitedMs });
  });
  clipline.on(CliplineEvents.STOP_ABORTED, ({ error }) => {
    logger.error('pending status updates and alerts were dropped at shutdown', errorMeta(error));
  });

  clipline.reviewGates.on(ReviewGateEvents.GATE_APPROVED, ({ task, gate, reviewDurationMs }) => {
    logger.info('review approved', { ...taskMeta(task), gate, reviewDurationMs });
  });
  clipline.reviewGates.on(ReviewGateEvents.GATE_REJECTED, ({ task, gate, reason, reviewDurationMs }) => {
    logger.info('review rejected', { ...taskMeta(task), gate, reason, reviewDurationMs });
  });

  clipline.planning.on(PlanningEvents.TASK_CREATED, ({ task }) => {
    logger.info('task created', taskMeta(task));
  });
  clipline.planning.on(PlanningEvents.TASK_ADMITTED, ({ task }) => {
    logger.info('task queued', taskMeta(task));
  });
  clipline.planning.on(PlanningEvents.VALIDATION_FAILED, ({ task, error }) => {
    logger.warn('task brief is incomplete', { ...taskMeta(task), issues: error.issues });
  });
  clipline.planning.on(PlanningEvents.SIGNAL_IGNORED, ({ item, reason }) => {
    logger.debug('planning change ignored', { externalRef: item.externalRef, reason });
  });

  clipline.mirror.on(DispatchEvents.MIRROR_RETRY_SCHEDULED, ({ task, planningStatus, attempt, error }) => {
    logger.warn('planning status update failed, retrying', {
      ...taskMeta(task),
      planningStatus,
      attempt,
      ...errorMeta(error),
    });
  });
  clipline.mirror.on(DispatchEvents.MIRROR_FAILED, ({ task, planningStatus, error }) => {
    logger.error('planning status update gave up', { ...taskMeta(task), planningStatus, ...errorMeta(error) });
  });
  clipline.alerts.on(DispatchEvents.ALERT_DROPPED, ({ alert, error }) => {
    logger.error('alert dropped', { level: alert.level, title: alert.title, ...errorMeta(error) });
  });
}

export function logPollerEvents(logger: Logger, poller: PlanningPoller): void {
  poller.on(PlanningPollerEvents.POLL_COMPLETED, ({ outcomes }) => {
    const changed = outcomes.filter((outcome) => outcome.action !== 'ignored').length;
    logger.debug('planning poll completed', { items: outcomes.length, changed });
  });
  poller.on(PlanningPollerEvents.POLL_FAILED, ({ error }) => {
    logger.warn('planning poll failed', errorMeta(error));
  });
  poller.on(PlanningPollerEvents.ITEM_FAILED, ({ item, error }) => {
    logger.error('planning item could not be applied', { externalRef: item.externalRef, ...errorMeta(error) });
  });
}
