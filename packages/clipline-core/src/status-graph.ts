import { InvalidStateTransitionError } from './errors';
import { PipelineStep, Resource, type Task, TaskStatus } from './task';

const allow = (...statuses: TaskStatus[]): ReadonlySet<TaskStatus> => new Set(statuses);

/**
 * Every status change a task may make. Anything not listed here is a logic error.
 */
export const VALID_TRANSITIONS: Record<TaskStatus, ReadonlySet<TaskStatus>> = {
  [TaskStatus.DRAFT]: allow(TaskStatus.QUEUED, TaskStatus.CANCELLED),
  [TaskStatus.QUEUED]: allow(TaskStatus.CLAIMED, TaskStatus.DRAFT, TaskStatus.CANCELLED),
  [TaskStatus.CLAIMED]: allow(
    TaskStatus.GENERATING_ASSETS,
    TaskStatus.GENERATING_COMPOSITES,
    TaskStatus.GENERATING_AUDIO,
    TaskStatus.GENERATING_SFX,
    TaskStatus.UPLOADING,
    TaskStatus.QUEUED,
    TaskStatus.ASSETS_APPROVED,
    TaskStatus.VIDEO_APPROVED,
    TaskStatus.AUDIO_APPROVED,
    TaskStatus.APPROVED,
  ),
  [TaskStatus.GENERATING_ASSETS]: allow(TaskStatus.ASSETS_READY, TaskStatus.ASSET_ERROR),
  [TaskStatus.ASSETS_READY]: allow(TaskStatus.ASSETS_APPROVED, TaskStatus.ASSET_ERROR, TaskStatus.CANCELLED),
  [TaskStatus.ASSETS_APPROVED]: allow(TaskStatus.CLAIMED, TaskStatus.CANCELLED),
  [TaskStatus.GENERATING_COMPOSITES]: allow(TaskStatus.COMPOSITES_READY, TaskStatus.ASSET_ERROR),
  [TaskStatus.COMPOSITES_READY]: allow(TaskStatus.GENERATING_VIDEO),
  [TaskStatus.GENERATING_VIDEO]: allow(TaskStatus.VIDEO_READY, TaskStatus.VIDEO_ERROR),
  [TaskStatus.VIDEO_READY]: allow(TaskStatus.VIDEO_APPROVED, TaskStatus.VIDEO_ERROR),
  [TaskStatus.VIDEO_APPROVED]: allow(TaskStatus.CLAIMED),
  [TaskStatus.GENERATING_AUDIO]: allow(TaskStatus.AUDIO_READY, TaskStatus.AUDIO_ERROR),
  [TaskStatus.AUDIO_READY]: allow(TaskStatus.AUDIO_APPROVED, TaskStatus.AUDIO_ERROR),
  [TaskStatus.AUDIO_APPROVED]: allow(TaskStatus.CLAIMED),
  [TaskStatus.GENERATING_SFX]: allow(TaskStatus.SFX_READY, TaskStatus.AUDIO_ERROR),
  [TaskStatus.SFX_READY]: allow(TaskStatus.ASSEMBLING),
  [TaskStatus.ASSEMBLING]: allow(TaskStatus.ASSEMBLY_READY, TaskStatus.UPLOAD_ERROR),
  [TaskStatus.ASSEMBLY_READY]: allow(TaskStatus.FINAL_REVIEW),
  [TaskStatus.FINAL_REVIEW]: allow(TaskStatus.APPROVED, TaskStatus.UPLOAD_ERROR),
  [TaskStatus.APPROVED]: allow(TaskStatus.CLAIMED),
  [TaskStatus.UPLOADING]: allow(TaskStatus.PUBLISHED, TaskStatus.UPLOAD_ERROR),
  [TaskStatus.PUBLISHED]: allow(),
  [TaskStatus.ASSET_ERROR]: allow(TaskStatus.QUEUED, TaskStatus.CANCELLED),
  [TaskStatus.VIDEO_ERROR]: allow(TaskStatus.QUEUED, TaskStatus.ASSETS_APPROVED, TaskStatus.CANCELLED),
  [TaskStatus.AUDIO_ERROR]: allow(
    TaskStatus.QUEUED,
    TaskStatus.VIDEO_APPROVED,
    TaskStatus.AUDIO_APPROVED,
    TaskStatus.CANCELLED,
  ),
  [TaskStatus.UPLOAD_ERROR]: allow(
    TaskStatus.QUEUED,
    TaskStatus.AUDIO_APPROVED,
    TaskStatus.APPROVED,
    TaskStatus.CANCELLED,
  ),
  [TaskStatus.CANCELLED]: allow(),
};

export type StepDefinition = {
  step: PipelineStep;
  runningStatus: TaskStatus;
  doneStatus: TaskStatus;
  errorStatus: TaskStatus;
  /** Metered service the step spends, if any */
  resource?: Resource;
};

export const STEP_DEFINITIONS: Record<PipelineStep, StepDefinition> = {
  [PipelineStep.ASSETS]: {
    step: PipelineStep.ASSETS,
    runningStatus: TaskStatus.GENERATING_ASSETS,
    doneStatus: TaskStatus.ASSETS_READY,
    errorStatus: TaskStatus.ASSET_ERROR,
    resource: Resource.GEMINI,
  },
  [PipelineStep.COMPOSITES]: {
    step: PipelineStep.COMPOSITES,
    runningStatus: TaskStatus.GENERATING_COMPOSITES,
    doneStatus: TaskStatus.COMPOSITES_READY,
    errorStatus: TaskStatus.ASSET_ERROR,
  },
  [PipelineStep.VIDEO]: {
    step: PipelineStep.VIDEO,
    runningStatus: TaskStatus.GENERATING_VIDEO,
    doneStatus: TaskStatus.VIDEO_READY,
    errorStatus: TaskStatus.VIDEO_ERROR,
    resource: Resource.KLING,
  },
  [PipelineStep.NARRATION]: {
    step: PipelineStep.NARRATION,
    runningStatus: TaskStatus.GENERATING_AUDIO,
    doneStatus: TaskStatus.AUDIO_READY,
    errorStatus: TaskStatus.AUDIO_ERROR,
    resource: Resource.ELEVENLABS,
  },
  [PipelineStep.SFX]: {
    step: PipelineStep.SFX,
    runningStatus: TaskStatus.GENERATING_SFX,
    doneStatus: TaskStatus.SFX_READY,
    errorStatus: TaskStatus.AUDIO_ERROR,
    resource: Resource.ELEVENLABS,
  },
  [PipelineStep.ASSEMBLY]: {
    step: PipelineStep.ASSEMBLY,
    runningStatus: TaskStatus.ASSEMBLING,
    doneStatus: TaskStatus.ASSEMBLY_READY,
    errorStatus: TaskStatus.UPLOAD_ERROR,
  },
  [PipelineStep.UPLOAD]: {
    step: PipelineStep.UPLOAD,
    runningStatus: TaskStatus.UPLOADING,
    doneStatus: TaskStatus.PUBLISHED,
    errorStatus: TaskStatus.UPLOAD_ERROR,
    resource: Resource.YOUTUBE,
  },
};

const STEP_BY_RUNNING_STATUS = new Map<TaskStatus, StepDefinition>(
  Object.values(STEP_DEFINITIONS).map((definition) => [definition.runningStatus, definition]),
);

/** Statuses the claimer picks work from, and the step each one starts. */
export const ENTRY_STEPS: Partial<Record<TaskStatus, PipelineStep>> = {
  [TaskStatus.QUEUED]: PipelineStep.ASSETS,
  [TaskStatus.ASSETS_APPROVED]: PipelineStep.COMPOSITES,
  [TaskStatus.VIDEO_APPROVED]: PipelineStep.NARRATION,
  [TaskStatus.AUDIO_APPROVED]: PipelineStep.SFX,
  [TaskStatus.APPROVED]: PipelineStep.UPLOAD,
};

export const AWAITING_WORK_STATUSES: readonly TaskStatus[] = [
  TaskStatus.QUEUED,
  TaskStatus.ASSETS_APPROVED,
  TaskStatus.VIDEO_APPROVED,
  TaskStatus.AUDIO_APPROVED,
  TaskStatus.APPROVED,
];

/** Cheap intermediate statuses the runner moves through without waiting. */
export const CHECKPOINT_ADVANCES: Partial<Record<TaskStatus, TaskStatus>> = {
  [TaskStatus.COMPOSITES_READY]: TaskStatus.GENERATING_VIDEO,
  [TaskStatus.SFX_READY]: TaskStatus.ASSEMBLING,
  [TaskStatus.ASSEMBLY_READY]: TaskStatus.FINAL_REVIEW,
};

export const REVIEW_GATES: readonly TaskStatus[] = [
  TaskStatus.ASSETS_READY,
  TaskStatus.VIDEO_READY,
  TaskStatus.AUDIO_READY,
  TaskStatus.FINAL_REVIEW,
];

export const GATE_APPROVALS: Partial<Record<TaskStatus, TaskStatus>> = {
  [TaskStatus.ASSETS_READY]: TaskStatus.ASSETS_APPROVED,
  [TaskStatus.VIDEO_READY]: TaskStatus.VIDEO_APPROVED,
  [TaskStatus.AUDIO_READY]: TaskStatus.AUDIO_APPROVED,
  [TaskStatus.FINAL_REVIEW]: TaskStatus.APPROVED,
};

export const GATE_REJECTIONS: Partial<Record<TaskStatus, TaskStatus>> = {
  [TaskStatus.ASSETS_READY]: TaskStatus.ASSET_ERROR,
  [TaskStatus.VIDEO_READY]: TaskStatus.VIDEO_ERROR,
  [TaskStatus.AUDIO_READY]: TaskStatus.AUDIO_ERROR,
  [TaskStatus.FINAL_REVIEW]: TaskStatus.UPLOAD_ERROR,
};

export const ERROR_STATUSES: readonly TaskStatus[] = [
  TaskStatus.ASSET_ERROR,
  TaskStatus.VIDEO_ERROR,
  TaskStatus.AUDIO_ERROR,
  TaskStatus.UPLOAD_ERROR,
];

export const TERMINAL_STATUSES: readonly TaskStatus[] = [TaskStatus.PUBLISHED, TaskStatus.CANCELLED];

/** Statuses that only exist while a worker holds the task; leases on them can go stale. */
export const IN_FLIGHT_STATUSES: readonly TaskStatus[] = [
  TaskStatus.CLAIMED,
  TaskStatus.GENERATING_ASSETS,
  TaskStatus.GENERATING_COMPOSITES,
  TaskStatus.COMPOSITES_READY,
  TaskStatus.GENERATING_VIDEO,
  TaskStatus.GENERATING_AUDIO,
  TaskStatus.GENERATING_SFX,
  TaskStatus.SFX_READY,
  TaskStatus.ASSEMBLING,
  TaskStatus.ASSEMBLY_READY,
  TaskStatus.UPLOADING,
];

/**
 * The metered service a cycle starting (or resuming) at a status will spend.
 * `claimed` resolves through the status the task was claimed from.
 */
export const RESOURCE_BY_STATUS: Partial<Record<TaskStatus, Resource>> = {
  [TaskStatus.QUEUED]: Resource.GEMINI,
  [TaskStatus.GENERATING_ASSETS]: Resource.GEMINI,
  [TaskStatus.ASSETS_APPROVED]: Resource.KLING,
  [TaskStatus.GENERATING_COMPOSITES]: Resource.KLING,
  [TaskStatus.COMPOSITES_READY]: Resource.KLING,
  [TaskStatus.GENERATING_VIDEO]: Resource.KLING,
  [TaskStatus.VIDEO_APPROVED]: Resource.ELEVENLABS,
  [TaskStatus.GENERATING_AUDIO]: Resource.ELEVENLABS,
  [TaskStatus.AUDIO_APPROVED]: Resource.ELEVENLABS,
  [TaskStatus.GENERATING_SFX]: Resource.ELEVENLABS,
  [TaskStatus.APPROVED]: Resource.YOUTUBE,
  [TaskStatus.UPLOADING]: Resource.YOUTUBE,
};

export function canTransition(from: TaskStatus, to: TaskStatus): boolean {
  return VALID_TRANSITIONS[from].has(to);
}

/**
 * @throws {InvalidStateTransitionError} when `to` is not reachable from the task's current status
 */
export function assertTransition(task: Pick<Task, 'id' | 'status'>, to: TaskStatus): void {
  if (!canTransition(task.status, to)) {
    throw new InvalidStateTransitionError(task.status, to, task.id);
  }
}

export function isReviewGate(status: TaskStatus): boolean {
  return REVIEW_GATES.includes(status);
}

export function isAwaitingWork(status: TaskStatus): boolean {
  return AWAITING_WORK_STATUSES.includes(status);
}

export function isErrorStatus(status: TaskStatus): boolean {
  return ERROR_STATUSES.includes(status);
}

export function isInFlight(status: TaskStatus): boolean {
  return IN_FLIGHT_STATUSES.includes(status);
}

export function stepForRunningStatus(status: TaskStatus): StepDefinition | undefined {
  return STEP_BY_RUNNING_STATUS.get(status);
}

export function requiredResource(task: Pick<Task, 'status' | 'claimedFrom'>): Resource | undefined {
  if (task.status === TaskStatus.CLAIMED) {
    return task.claimedFrom ? RESOURCE_BY_STATUS[task.claimedFrom] : undefined;
  }

  return RESOURCE_BY_STATUS[task.status];
}

export type ResourceLeaseStatuses = {
  /** In-flight statuses (other than `claimed`) that spend the resource */
  executingStatuses: TaskStatus[];
  /** Awaiting statuses whose claimed tasks will spend the resource */
  claimedFromStatuses: TaskStatus[];
};

/**
 * The statuses under which a leased task holds an unrecorded claim on `resource`.
 */
export function leaseStatusesFor(resource: Resource): ResourceLeaseStatuses {
  const executingStatuses = IN_FLIGHT_STATUSES.filter(
    (status) => status !== TaskStatus.CLAIMED && RESOURCE_BY_STATUS[status] === resource,
  );
  const claimedFromStatuses = AWAITING_WORK_STATUSES.filter((status) => RESOURCE_BY_STATUS[status] === resource);

  return { executingStatuses, claimedFromStatuses };
}
