import type { TaskStore, TransitionPatch } from '../datastore';
import type { MirrorDispatcher } from '../dispatch/mirror-dispatcher';
import { assertTransition } from '../status-graph';
import type { Task, TaskStatus } from '../task';

export type ApplyTransitionOptions = {
  /** Require the task to still be leased by this worker */
  workerId?: string;
  patch?: TransitionPatch;
};

/**
 * The only path through which tasks change status: validates against the transition table,
 * writes with compare-and-set, then mirrors the committed status.
 */
export class TaskTransitioner {
  constructor(
    private readonly store: TaskStore,
    private readonly mirror?: MirrorDispatcher,
  ) {}

  /**
   * @throws {InvalidStateTransitionError} when the table does not allow the change
   * @returns the updated task, or undefined when another writer changed the task first
   */
  async apply(task: Task, to: TaskStatus, options: ApplyTransitionOptions = {}): Promise<Task | undefined> {
    assertTransition(task, to);

    const updated = await this.store.transition({
      taskId: task.id,
      from: task.status,
      to,
      workerId: options.workerId,
      patch: options.patch,
    });

    if (updated) {
      this.mirror?.statusChanged(updated);
    }

    return updated;
  }

  /** For claims and releases, which the store applies itself. */
  committed(task: Task): void {
    this.mirror?.statusChanged(task);
  }
}
