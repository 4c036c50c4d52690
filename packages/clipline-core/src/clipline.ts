import { EventEmitter } from 'node:events';

import { AdmissionClaimer, type AdmissionClaimerConfig } from './claimer/admission-claimer';
import { WorkerState } from './claimer/worker-state';
import type { QuotaStore, TaskStore } from './datastore';
import { AlertDispatcher, type AlertDispatcherConfig } from './dispatch/alert-dispatcher';
import type { AlertSink, StatusMirror } from './dispatch/collaborators';
import { MirrorDispatcher, type MirrorDispatcherConfig } from './dispatch/mirror-dispatcher';
import { CliplineEvents, type CliplineEventsMap } from './events';
import { PipelineRunner, type PipelineRunnerConfig } from './pipeline/pipeline-runner';
import type { StepExecutor } from './pipeline/step-executor';
import { TaskTransitioner } from './pipeline/task-transitions';
import { PlanningEventHandler, type PlanningEventHandlerConfig } from './planning/planning-event-handler';
import { QuotaAlertPolicy, type QuotaAlertPolicyConfig } from './quota/quota-alert-policy';
import { QuotaLedger } from './quota/quota-ledger';
import { DEFAULT_RESOURCE_POLICIES, type ResourceCatalog } from './quota/resources';
import { ReviewGateController } from './review/review-gate-controller';
import { WorkerRuntime, type WorkerRuntimeConfig } from './runtime/worker-runtime';
import { PromiseTimeoutError, promiseWithTimeout } from './utils/promise-utils';

export type CliplineInput = {
  taskStore: TaskStore;
  quotaStore: QuotaStore;
  /** Receives every committed status change. Optional for local runs */
  statusMirror?: StatusMirror;
  /** Receives quota threshold and failure escalation alerts */
  alertSink?: AlertSink;
  resources?: ResourceCatalog;
  /** Time zone whose midnight resets quota budgets @default 'UTC' */
  quotaTimeZone?: string;
  quotaAlerts?: Partial<QuotaAlertPolicyConfig>;
  mirrorConfiguration?: Partial<MirrorDispatcherConfig>;
  alertConfiguration?: Partial<AlertDispatcherConfig>;
  planningConfiguration?: Partial<PlanningEventHandlerConfig>;
  /**
   * How long `stop` waits for workers before reporting a delay, and for pending mirror updates
   * and alerts. Workers always get at least their own stop bound. @default 60000ms
   */
  exitTimeoutMs?: number;
};

export type WorkerConfiguration = Partial<WorkerRuntimeConfig> &
  Partial<PipelineRunnerConfig> &
  Partial<AdmissionClaimerConfig>;

export type RegisterWorkerInput = {
  workerId: string;
  /** Runs the pipeline steps for this worker */
  executor: StepExecutor;
  configuration?: WorkerConfiguration;
};

/**
 * Wires the stores and collaborators into the claimer, pipeline runner, review gates and
 * planning handler, and owns the lifecycle of the workers registered on it.
 */
export class Clipline extends EventEmitter<CliplineEventsMap> {
  readonly ledger: QuotaLedger;
  readonly mirror: MirrorDispatcher;
  readonly alerts: AlertDispatcher;
  readonly reviewGates: ReviewGateController;
  readonly planning: PlanningEventHandler;

  private readonly taskStore: TaskStore;
  private readonly resources: ResourceCatalog;
  private readonly transitions: TaskTransitioner;
  private readonly quotaAlertPolicy: QuotaAlertPolicy;
  private readonly workers = new Map<string, WorkerRuntime>();

  readonly exitTimeoutMs: number;

  constructor(input: CliplineInput) {
    super();

    this.taskStore = input.taskStore;
    this.exitTimeoutMs = input.exitTimeoutMs ?? 60_000;
    this.resources = input.resources ?? DEFAULT_RESOURCE_POLICIES;
    this.ledger = new QuotaLedger(input.quotaStore, {
      resources: this.resources,
      ...(input.quotaTimeZone ? { timeZone: input.quotaTimeZone } : {}),
    });
    this.quotaAlertPolicy = new QuotaAlertPolicy(input.quotaAlerts);
    this.mirror = new MirrorDispatcher(input.statusMirror, input.mirrorConfiguration);
    this.alerts = new AlertDispatcher(input.alertSink, input.alertConfiguration);
    this.transitions = new TaskTransitioner(this.taskStore, this.mirror);
    this.reviewGates = new ReviewGateController(this.taskStore, this.transitions);
    this.planning = new PlanningEventHandler(
      this.taskStore,
      this.transitions,
      this.reviewGates,
      input.planningConfiguration,
    );
  }

  public async start(): Promise<void> {
    for (const worker of this.workers.values()) {
      await worker.start();
    }

    this.emit(CliplineEvents.STARTED, { startedAt: new Date() });
  }

  /**
   * The exit timeout, raised to the slowest registered worker's stop bound.
   */
  get shutdownTimeoutMs(): number {
    const bounds = Array.from(this.workers.values()).map((worker) => worker.maxStopDelayMs);

    return Math.max(this.exitTimeoutMs, ...bounds);
  }

  /**
   * Stops every worker after its in-flight attempt, then waits for pending mirror updates and alerts.
   * Resolves only once every claim loop has exited, so callers may close the stores afterwards.
   */
  public async stop(): Promise<void> {
    const stopped = Promise.all(Array.from(this.workers.values()).map((worker) => worker.stop()));
    const waitedMs = this.shutdownTimeoutMs;

    try {
      await promiseWithTimeout(stopped, waitedMs);
    } catch (error) {
      if (!(error instanceof PromiseTimeoutError)) {
        throw error;
      }

      this.emit(CliplineEvents.STOP_DELAYED, { waitedMs, timestamp: new Date() });
      await stopped;
    }

    try {
      await promiseWithTimeout(Promise.all([this.mirror.flush(), this.alerts.flush()]), this.exitTimeoutMs);
    } catch (error) {
      this.emit(CliplineEvents.STOP_ABORTED, { error, timestamp: new Date() });
    }
  }

  public registerWorker(input: RegisterWorkerInput): WorkerRuntime {
    if (this.workers.has(input.workerId)) {
      throw new Error(`Worker ${input.workerId} is already registered`);
    }

    const configuration = input.configuration ?? {};
    const claimer = new AdmissionClaimer(this.taskStore, this.ledger, this.transitions, configuration);
    const runner = new PipelineRunner(
      {
        store: this.taskStore,
        ledger: this.ledger,
        transitions: this.transitions,
        executor: input.executor,
        quotaAlertPolicy: this.quotaAlertPolicy,
        alerts: this.alerts,
      },
      configuration,
    );
    const worker = new WorkerRuntime(
      { claimer, runner, state: new WorkerState(input.workerId, this.resources), alerts: this.alerts },
      configuration,
    );

    this.workers.set(input.workerId, worker);

    return worker;
  }
}
