export {
  type BackoffStrategy,
  type BackoffStrategyOptions,
  backoffStrategyFactory,
} from './backoff-strategy';
export {
  AdmissionClaimer,
  type AdmissionClaimerConfig,
  type ClaimOutcome,
  DEFAULT_ADMISSION_CLAIMER_CONFIG,
} from './claimer/admission-claimer';
export { WorkerState } from './claimer/worker-state';
export {
  Clipline,
  type CliplineInput,
  type RegisterWorkerInput,
  type WorkerConfiguration,
} from './clipline';
export type {
  ClaimTaskInput,
  CountInFlightInput,
  IncrementQuotaInput,
  InsertTaskInput,
  ListByStatusInput,
  ListClaimCandidatesInput,
  QuotaKey,
  QuotaRecord,
  QuotaStore,
  ReleaseTaskInput,
  RenewLeaseInput,
  SaveStepProgressInput,
  TaskStore,
  TransitionInput,
  TransitionPatch,
  UpdateDetailsInput,
} from './datastore';
export { AlertDispatcher, type AlertDispatcherConfig } from './dispatch/alert-dispatcher';
export { type Alert, AlertLevel, type AlertSink, type StatusMirror } from './dispatch/collaborators';
export { DispatchEvents } from './dispatch/events';
export { MirrorDispatcher, type MirrorDispatcherConfig } from './dispatch/mirror-dispatcher';
export {
  classifyStepError,
  InvalidStateTransitionError,
  LeaseLostError,
  StepErrorKind,
  StepExecutionError,
  TaskNotFoundError,
  TaskValidationError,
} from './errors';
export { CliplineEvents, type CliplineEventsMap } from './events';
export {
  DEFAULT_PIPELINE_RUNNER_CONFIG,
  PipelineRunner,
  type PipelineRunnerConfig,
  type RunContext,
} from './pipeline/pipeline-runner';
export type { StepExecutionInput, StepExecutor, StepResult } from './pipeline/step-executor';
export { TaskTransitioner } from './pipeline/task-transitions';
export {
  type PlanningAction,
  PlanningEventHandler,
  type PlanningEventHandlerConfig,
  PlanningEvents,
  type PlanningOutcome,
  type PlanningWorkItem,
  PlanningWorkItemSchema,
} from './planning/planning-event-handler';
export { type PlanningFeed, PlanningPoller, PlanningPollerEvents } from './planning/planning-poller';
export {
  fromPlanningPriority,
  fromPlanningStatus,
  INTERNAL_TO_PLANNING_STATUS,
  PLANNING_TO_INTERNAL_STATUS,
  toPlanningStatus,
} from './planning/planning-status';
export { QuotaAlertPolicy, type QuotaAlertPolicyConfig } from './quota/quota-alert-policy';
export { QuotaLedger, type QuotaLedgerConfig, type QuotaUsage } from './quota/quota-ledger';
export {
  DEFAULT_RESOURCE_POLICIES,
  type ResourceCatalog,
  type ResourceCatalogOverrides,
  ResourceCatalogOverridesSchema,
  type ResourcePolicy,
  resolveResourceCatalog,
  YOUTUBE_OPERATION_COSTS,
} from './quota/resources';
export {
  type ReviewDecision,
  ReviewGateController,
  ReviewGateEvents,
  reviewDuration,
} from './review/review-gate-controller';
export { type CycleOutcome, WorkerRuntimeEvents, type WorkerRuntimeEventsMap } from './runtime/events';
export {
  DEFAULT_WORKER_RUNTIME_CONFIG,
  WorkerRuntime,
  type WorkerRuntimeConfig,
} from './runtime/worker-runtime';
export {
  assertTransition,
  AWAITING_WORK_STATUSES,
  canTransition,
  CHECKPOINT_ADVANCES,
  ENTRY_STEPS,
  ERROR_STATUSES,
  GATE_APPROVALS,
  GATE_REJECTIONS,
  IN_FLIGHT_STATUSES,
  isAwaitingWork,
  isErrorStatus,
  isInFlight,
  isReviewGate,
  leaseStatusesFor,
  RESOURCE_BY_STATUS,
  REVIEW_GATES,
  requiredResource,
  STEP_DEFINITIONS,
  type StepDefinition,
  stepForRunningStatus,
  TERMINAL_STATUSES,
  VALID_TRANSITIONS,
} from './status-graph';
export {
  errorMessage,
  formatErrorLogEntry,
  PipelineStep,
  PipelineStepSchema,
  PRIORITY_RANK,
  Resource,
  ResourceSchema,
  type StepProgress,
  type StepProgressMap,
  StepProgressSchema,
  type Task,
  type TaskData,
  type TaskPayload,
  TaskPayloadSchema,
  TaskPriority,
  TaskPrioritySchema,
  TaskStatus,
  TaskStatusSchema,
} from './task';
export { calendarDay } from './utils/calendar-day';
export { PromiseTimeoutError, promiseWithTimeout } from './utils/promise-utils';
