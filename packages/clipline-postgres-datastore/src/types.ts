import {
  PipelineStepSchema,
  type QuotaRecord,
  ResourceSchema,
  StepProgressSchema,
  type Task,
  TaskPrioritySchema,
  TaskStatusSchema,
} from '@clipline/core';
import { z } from 'zod';

const timestamp = z.coerce.date();

/**
 * A row from the clipline_tasks table. Column names are snake_case.
 */
export const TaskRowSchema = z.object({
  id: z.string(),
  channel_id: z.string(),
  external_ref: z.string(),
  status: TaskStatusSchema,
  priority: TaskPrioritySchema,
  data: z.record(z.string(), z.unknown()),
  step_progress: z.record(PipelineStepSchema, StepProgressSchema),
  claimed_from: TaskStatusSchema.nullable(),
  claimed_by: z.string().nullable(),
  claimed_at: timestamp.nullable(),
  review_started_at: timestamp.nullable(),
  review_completed_at: timestamp.nullable(),
  error_log: z.string().nullable(),
  created_at: timestamp,
  updated_at: timestamp,
});

export type TaskRow = z.infer<typeof TaskRowSchema>;

/**
 * A row from the clipline_quota_usage table, with `day` selected as text.
 */
export const QuotaRowSchema = z.object({
  channel_id: z.string(),
  resource: ResourceSchema,
  day: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  units_used: z.coerce.number().int(),
  daily_limit: z.coerce.number().int(),
  updated_at: timestamp,
});

export type QuotaRow = z.infer<typeof QuotaRowSchema>;

export const CountRowSchema = z.object({ count: z.coerce.number().int() });

export function toTask(raw: unknown): Task {
  const row = TaskRowSchema.parse(raw);

  return {
    id: row.id,
    channelId: row.channel_id,
    externalRef: row.external_ref,
    status: row.status,
    priority: row.priority,
    data: row.data,
    stepProgress: row.step_progress,
    claimedFrom: row.claimed_from ?? undefined,
    claimedBy: row.claimed_by ?? undefined,
    claimedAt: row.claimed_at ?? undefined,
    reviewStartedAt: row.review_started_at ?? undefined,
    reviewCompletedAt: row.review_completed_at ?? undefined,
    errorLog: row.error_log ?? undefined,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function toQuotaRecord(raw: unknown): QuotaRecord {
  const row = QuotaRowSchema.parse(raw);

  return {
    channelId: row.channel_id,
    resource: row.resource,
    day: row.day,
    unitsUsed: row.units_used,
    dailyLimit: row.daily_limit,
    updatedAt: row.updated_at,
  };
}
