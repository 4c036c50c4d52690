export const AlertLevel = {
  INFO: 'info',
  WARNING: 'warning',
  CRITICAL: 'critical',
} as const;
export type AlertLevel = (typeof AlertLevel)[keyof typeof AlertLevel];

export type Alert = {
  level: AlertLevel;
  title: string;
  message: string;
  /** Extra key/value context rendered alongside the message */
  fields?: Record<string, string | number>;
  occurredAt: Date;
};

export interface AlertSink {
  send(alert: Alert): Promise<void>;
}

/**
 * Writes status changes to the planning surface.
 */
export interface StatusMirror {
  setStatus(externalRef: string, planningStatus: string): Promise<void>;
}
