import { z } from 'zod';

export const TaskStatus = {
  DRAFT: 'draft',
  QUEUED: 'queued',
  CLAIMED: 'claimed',
  GENERATING_ASSETS: 'generating_assets',
  ASSETS_READY: 'assets_ready',
  ASSETS_APPROVED: 'assets_approved',
  GENERATING_COMPOSITES: 'generating_composites',
  COMPOSITES_READY: 'composites_ready',
  GENERATING_VIDEO: 'generating_video',
  VIDEO_READY: 'video_ready',
  VIDEO_APPROVED: 'video_approved',
  GENERATING_AUDIO: 'generating_audio',
  AUDIO_READY: 'audio_ready',
  AUDIO_APPROVED: 'audio_approved',
  GENERATING_SFX: 'generating_sfx',
  SFX_READY: 'sfx_ready',
  ASSEMBLING: 'assembling',
  ASSEMBLY_READY: 'assembly_ready',
  FINAL_REVIEW: 'final_review',
  APPROVED: 'approved',
  UPLOADING: 'uploading',
  PUBLISHED: 'published',
  ASSET_ERROR: 'asset_error',
  VIDEO_ERROR: 'video_error',
  AUDIO_ERROR: 'audio_error',
  UPLOAD_ERROR: 'upload_error',
  CANCELLED: 'cancelled',
} as const;
export type TaskStatus = (typeof TaskStatus)[keyof typeof TaskStatus];

export const TaskStatusSchema = z.nativeEnum(TaskStatus);

export const TaskPriority = {
  HIGH: 'high',
  NORMAL: 'normal',
  LOW: 'low',
} as const;
export type TaskPriority = (typeof TaskPriority)[keyof typeof TaskPriority];

export const TaskPrioritySchema = z.nativeEnum(TaskPriority);

/** Claim precedence: lower rank is claimed first. */
export const PRIORITY_RANK: Record<TaskPriority, number> = {
  [TaskPriority.HIGH]: 1,
  [TaskPriority.NORMAL]: 2,
  [TaskPriority.LOW]: 3,
};

export const PipelineStep = {
  ASSETS: 'assets',
  COMPOSITES: 'composites',
  VIDEO: 'video',
  NARRATION: 'narration',
  SFX: 'sfx',
  ASSEMBLY: 'assembly',
  UPLOAD: 'upload',
} as const;
export type PipelineStep = (typeof PipelineStep)[keyof typeof PipelineStep];

export const PipelineStepSchema = z.nativeEnum(PipelineStep);

/** External services whose usage is metered per channel and day. */
export const Resource = {
  GEMINI: 'gemini',
  KLING: 'kling',
  ELEVENLABS: 'elevenlabs',
  YOUTUBE: 'youtube',
} as const;
export type Resource = (typeof Resource)[keyof typeof Resource];

export const ResourceSchema = z.nativeEnum(Resource);

export type StepProgress = {
  /** Sub-units already produced; a resumed run starts at `completedUnits + 1` */
  completedUnits: number;
  totalUnits: number;
  updatedAt: Date;
};

export const StepProgressSchema = z.object({
  completedUnits: z.number().int().nonnegative(),
  totalUnits: z.number().int().positive(),
  updatedAt: z.coerce.date(),
});

export type StepProgressMap = Partial<Record<PipelineStep, StepProgress>>;

export type TaskData = Record<string, unknown>;

/** Required content brief; validated before a draft is admitted to the queue. */
export const TaskPayloadSchema = z
  .object({
    title: z.string().trim().min(1, 'title is required'),
    topic: z.string().trim().min(1, 'topic is required'),
    storyDirection: z.string().trim().min(1).optional(),
  })
  .passthrough();

export type TaskPayload = z.infer<typeof TaskPayloadSchema>;

export type Task = {
  /** A unique identifier for the task */
  id: string;
  /** The tenant that owns the task */
  channelId: string;
  /** Identifier of the work item on the planning surface */
  externalRef: string;
  status: TaskStatus;
  priority: TaskPriority;
  /** The content brief the step services work from */
  data: TaskData;
  /** Resumption metadata for steps that are partially complete */
  stepProgress: StepProgressMap;
  /** The awaiting-work status a `claimed` task was taken from */
  claimedFrom?: TaskStatus;
  /** Id of the worker holding the lease */
  claimedBy?: string;
  /** The last time the task was claimed */
  claimedAt?: Date;
  reviewStartedAt?: Date;
  reviewCompletedAt?: Date;
  /** Newline separated `[timestamp] status: message` entries */
  errorLog?: string;
  createdAt: Date;
  updatedAt: Date;
};

export function formatErrorLogEntry(status: TaskStatus, message: string, at: Date = new Date()): string {
  return `[${at.toISOString()}] ${status}: ${message}`;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
