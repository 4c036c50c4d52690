import type { Task } from '../task';
import type { Alert } from './collaborators';

export const DispatchEvents = {
  /** A planning-surface status update is being retried after a failed attempt */
  MIRROR_RETRY_SCHEDULED: 'mirrorRetryScheduled',
  /** A planning-surface status update failed on every attempt and was given up */
  MIRROR_FAILED: 'mirrorFailed',
  /** An alert could not be delivered on any attempt and was dropped */
  ALERT_DROPPED: 'alertDropped',
} as const;

export type DispatchEvents = (typeof DispatchEvents)[keyof typeof DispatchEvents];

export type MirrorDispatcherEventsMap = {
  [DispatchEvents.MIRROR_RETRY_SCHEDULED]: [{ task: Task; planningStatus: string; attempt: number; error: unknown }];
  [DispatchEvents.MIRROR_FAILED]: [{ task: Task; planningStatus: string; error: unknown; failedAt: Date }];
};

export type AlertDispatcherEventsMap = {
  [DispatchEvents.ALERT_DROPPED]: [{ alert: Alert; error: unknown; droppedAt: Date }];
};
