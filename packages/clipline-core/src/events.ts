export const CliplineEvents = {
  /** Every registered worker has started its claim loops */
  STARTED: 'started',
  /** Workers are still finishing their cycles after the shutdown timeout; stop keeps waiting for them */
  STOP_DELAYED: 'stopDelayed',
  /** Pending mirror updates and alerts did not drain within the exit timeout and were dropped */
  STOP_ABORTED: 'stopAborted',
} as const;

export type CliplineEvents = (typeof CliplineEvents)[keyof typeof CliplineEvents];

export type CliplineEventsMap = {
  [CliplineEvents.STARTED]: [{ startedAt: Date }];
  [CliplineEvents.STOP_DELAYED]: [{ timestamp: Date; waitedMs: number }];
  [CliplineEvents.STOP_ABORTED]: [{ timestamp: Date; error: unknown }];
};
