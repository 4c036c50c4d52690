import { z } from 'zod';

import { TaskPrioritySchema, type TaskPriority, TaskStatusSchema, type TaskStatus } from '../task';
import planningStatuses from './planning-statuses.json';

const PlanningStatusTablesSchema = z.object({
  outbound: z.record(TaskStatusSchema, z.string()),
  inbound: z.record(z.string(), TaskStatusSchema),
  priorities: z.record(z.string(), TaskPrioritySchema),
});

const tables = PlanningStatusTablesSchema.parse(planningStatuses);

/** Status names shown on the planning surface, keyed by internal status. */
export const INTERNAL_TO_PLANNING_STATUS = tables.outbound;

/** Internal status a planning-surface status name asks for. Several names may map to one status. */
export const PLANNING_TO_INTERNAL_STATUS = tables.inbound;

export function toPlanningStatus(status: TaskStatus): string | undefined {
  return INTERNAL_TO_PLANNING_STATUS[status];
}

export function fromPlanningStatus(name: string): TaskStatus | undefined {
  return PLANNING_TO_INTERNAL_STATUS[name.trim()];
}

export function fromPlanningPriority(name: string | undefined): TaskPriority | undefined {
  if (!name) {
    return undefined;
  }

  const mapped = tables.priorities[name.trim()];

  if (mapped) {
    return mapped;
  }

  const parsed = TaskPrioritySchema.safeParse(name.trim().toLowerCase());

  return parsed.success ? parsed.data : undefined;
}
