import { mock } from 'vitest-mock-extended';

import { AdmissionClaimer } from '../../src/claimer/admission-claimer';
import { WorkerState } from '../../src/claimer/worker-state';
import type { QuotaStore, TaskStore } from '../../src/datastore';
import { TaskTransitioner } from '../../src/pipeline/task-transitions';
import { QuotaLedger } from '../../src/quota/quota-ledger';
import { AWAITING_WORK_STATUSES, IN_FLIGHT_STATUSES } from '../../src/status-graph';
import { Resource, TaskStatus } from '../../src/task';
import { taskFactory } from '../factories/task.factory';

describe('AdmissionClaimer', () => {
  const store = mock<TaskStore>();
  const quotaStore = mock<QuotaStore>();
  const ledger = new QuotaLedger(quotaStore);
  const claimer = new AdmissionClaimer(store, ledger, new TaskTransitioner(store));
  const now = new Date('2025-03-10T12:00:00.000Z');

  const youtubeRecord = (unitsUsed: number) => ({
    channelId: 'channel-a',
    resource: Resource.YOUTUBE,
    day: '2025-03-10',
    unitsUsed,
    dailyLimit: 10_000,
    updatedAt: now,
  });

  afterEach(() => {
    vi.resetAllMocks();
  });

  test('asks the store for awaiting tasks and stale leases', async () => {
    store.listClaimCandidates.mockResolvedValueOnce([]);

    await expect(claimer.claimNext(new WorkerState('worker-1'), now)).resolves.toEqual({ type: 'none' });
    expect(store.listClaimCandidates).toHaveBeenCalledWith({
      awaitingStatuses: AWAITING_WORK_STATUSES,
      staleStatuses: IN_FLIGHT_STATUSES,
      staleBefore: new Date('2025-03-10T11:00:00.000Z'),
      limit: 50,
    });
  });

  test('claims an awaiting task and keeps the resource slot for the cycle', async () => {
    const state = new WorkerState('worker-1');
    const candidate = taskFactory.build({ id: 'task-1', status: TaskStatus.QUEUED });
    const claimed = { ...candidate, status: TaskStatus.CLAIMED, claimedFrom: TaskStatus.QUEUED, claimedAt: now };
    store.listClaimCandidates.mockResolvedValueOnce([candidate]);
    store.countInFlight.mockResolvedValue(0);
    store.claim.mockResolvedValueOnce(claimed);
    quotaStore.get.mockResolvedValue(undefined);

    const outcome = await claimer.claimNext(state, now);

    expect(outcome).toEqual({ type: 'claimed', task: claimed, resource: Resource.GEMINI });
    expect(store.claim).toHaveBeenCalledWith({
      taskId: 'task-1',
      expectedStatus: TaskStatus.QUEUED,
      nextStatus: TaskStatus.CLAIMED,
      claimedFrom: TaskStatus.QUEUED,
      workerId: 'worker-1',
    });
    expect(state.activeCount(Resource.GEMINI)).toBe(1);
  });

  test('skips candidates for a resource the worker has no free slot for', async () => {
    const state = new WorkerState('worker-1');
    state.tryReserve(Resource.GEMINI);
    state.tryReserve(Resource.GEMINI);
    store.listClaimCandidates.mockResolvedValueOnce([taskFactory.build({ status: TaskStatus.QUEUED })]);

    await expect(claimer.claimNext(state, now)).resolves.toEqual({ type: 'none' });
    expect(store.claim).not.toHaveBeenCalled();
  });

  test('skips candidates for a resource marked exhausted', async () => {
    const state = new WorkerState('worker-1');
    state.markExhausted(Resource.KLING, new Date(now.getTime() + 60_000));
    store.listClaimCandidates.mockResolvedValueOnce([taskFactory.build({ status: TaskStatus.ASSETS_APPROVED })]);

    await expect(claimer.claimNext(state, now)).resolves.toEqual({ type: 'none' });
    expect(store.claim).not.toHaveBeenCalled();
    expect(state.activeCount(Resource.KLING)).toBe(0);
  });

  test('counts leases held by other workers against the remaining budget', async () => {
    const state = new WorkerState('worker-1');
    store.listClaimCandidates.mockResolvedValueOnce([
      taskFactory.build({ id: 'task-2', channelId: 'channel-a', status: TaskStatus.APPROVED }),
    ]);
    store.countInFlight.mockResolvedValueOnce(1);
    quotaStore.get.mockResolvedValueOnce(youtubeRecord(8_400));

    await expect(claimer.claimNext(state, now)).resolves.toEqual({ type: 'none' });
    expect(store.countInFlight).toHaveBeenCalledWith({
      channelId: 'channel-a',
      executingStatuses: [TaskStatus.UPLOADING],
      claimedFromStatuses: [TaskStatus.APPROVED],
      excludeTaskId: 'task-2',
    });
    expect(store.claim).not.toHaveBeenCalled();
    expect(state.activeCount(Resource.YOUTUBE)).toBe(0);
  });

  test('moves on to the next candidate when another worker claimed first', async () => {
    const state = new WorkerState('worker-1');
    const first = taskFactory.build({ id: 'task-1', status: TaskStatus.QUEUED });
    const second = taskFactory.build({ id: 'task-2', status: TaskStatus.QUEUED });
    const claimed = { ...second, status: TaskStatus.CLAIMED, claimedFrom: TaskStatus.QUEUED, claimedAt: now };
    store.listClaimCandidates.mockResolvedValueOnce([first, second]);
    store.countInFlight.mockResolvedValue(0);
    quotaStore.get.mockResolvedValue(undefined);
    store.claim.mockResolvedValueOnce(undefined).mockResolvedValueOnce(claimed);

    const outcome = await claimer.claimNext(state, now);

    expect(outcome).toEqual({ type: 'claimed', task: claimed, resource: Resource.GEMINI });
    expect(state.activeCount(Resource.GEMINI)).toBe(1);
  });

  test('releases the claim when the quota re-check after claiming fails', async () => {
    const state = new WorkerState('worker-1');
    const candidate = taskFactory.build({ id: 'task-2', channelId: 'channel-a', status: TaskStatus.APPROVED });
    const claimed = {
      ...candidate,
      status: TaskStatus.CLAIMED,
      claimedFrom: TaskStatus.APPROVED,
      claimedBy: 'worker-1',
      claimedAt: now,
    };
    store.listClaimCandidates.mockResolvedValueOnce([candidate]);
    store.countInFlight.mockResolvedValueOnce(0).mockResolvedValueOnce(1);
    quotaStore.get.mockResolvedValue(youtubeRecord(8_400));
    store.claim.mockResolvedValueOnce(claimed);
    store.release.mockResolvedValueOnce(candidate);

    const outcome = await claimer.claimNext(state, now);

    expect(outcome).toEqual({ type: 'released', task: candidate, resource: Resource.YOUTUBE });
    expect(store.countInFlight).toHaveBeenLastCalledWith({
      channelId: 'channel-a',
      executingStatuses: [TaskStatus.UPLOADING],
      claimedFromStatuses: [TaskStatus.APPROVED],
      excludeTaskId: 'task-2',
      claimedBefore: { claimedAt: now, taskId: 'task-2' },
    });
    expect(store.release).toHaveBeenCalledWith({
      taskId: 'task-2',
      workerId: 'worker-1',
      from: TaskStatus.CLAIMED,
      restore: { status: TaskStatus.APPROVED, claimedFrom: undefined, claimedBy: undefined, claimedAt: undefined },
    });
    expect(state.activeCount(Resource.YOUTUBE)).toBe(0);
  });

  test('takes over a stale lease without changing its status', async () => {
    const state = new WorkerState('worker-2');
    const candidate = taskFactory.build({
      id: 'task-3',
      status: TaskStatus.GENERATING_VIDEO,
      claimedFrom: TaskStatus.ASSETS_APPROVED,
      claimedBy: 'worker-1',
      claimedAt: new Date('2025-03-10T09:00:00.000Z'),
      updatedAt: new Date('2025-03-10T10:00:00.000Z'),
    });
    const reclaimed = { ...candidate, claimedBy: 'worker-2', claimedAt: now, updatedAt: now };
    store.listClaimCandidates.mockResolvedValueOnce([candidate]);
    store.countInFlight.mockResolvedValue(0);
    quotaStore.get.mockResolvedValue(undefined);
    store.claim.mockResolvedValueOnce(reclaimed);

    const outcome = await claimer.claimNext(state, now);

    expect(outcome).toEqual({ type: 'claimed', task: reclaimed, resource: Resource.KLING });
    expect(store.claim).toHaveBeenCalledWith({
      taskId: 'task-3',
      expectedStatus: TaskStatus.GENERATING_VIDEO,
      nextStatus: TaskStatus.GENERATING_VIDEO,
      claimedFrom: TaskStatus.ASSETS_APPROVED,
      workerId: 'worker-2',
      staleBefore: new Date('2025-03-10T11:00:00.000Z'),
    });
  });

  test('claims steps without a metered resource without consulting the ledger', async () => {
    const state = new WorkerState('worker-2');
    const candidate = taskFactory.build({ status: TaskStatus.ASSEMBLING, claimedBy: 'worker-1' });
    store.listClaimCandidates.mockResolvedValueOnce([candidate]);
    store.claim.mockResolvedValueOnce({ ...candidate, claimedBy: 'worker-2' });

    const outcome = await claimer.claimNext(state, now);

    expect(outcome.type).toBe('claimed');
    expect(store.countInFlight).not.toHaveBeenCalled();
    expect(quotaStore.get).not.toHaveBeenCalled();
  });

  test('gives the slot back when the claim itself throws', async () => {
    const state = new WorkerState('worker-1');
    store.listClaimCandidates.mockResolvedValueOnce([taskFactory.build({ status: TaskStatus.QUEUED })]);
    store.countInFlight.mockResolvedValue(0);
    quotaStore.get.mockResolvedValue(undefined);
    store.claim.mockRejectedValueOnce(new Error('connection terminated'));

    await expect(claimer.claimNext(state, now)).rejects.toThrow('connection terminated');
    expect(state.activeCount(Resource.GEMINI)).toBe(0);
  });

  describe('when the work after a won claim throws', () => {
    const candidate = taskFactory.build({ id: 'task-2', channelId: 'channel-a', status: TaskStatus.APPROVED });
    const claimed = {
      ...candidate,
      status: TaskStatus.CLAIMED,
      claimedFrom: TaskStatus.APPROVED,
      claimedBy: 'worker-1',
      claimedAt: now,
    };

    beforeEach(() => {
      store.listClaimCandidates.mockResolvedValueOnce([candidate]);
      quotaStore.get.mockResolvedValue(youtubeRecord(1_000));
      store.claim.mockResolvedValueOnce(claimed);
    });

    test('undoes the claim and frees the slot when the quota re-check throws', async () => {
      const state = new WorkerState('worker-1');
      store.countInFlight.mockResolvedValueOnce(0).mockRejectedValueOnce(new Error('canceling statement'));
      store.release.mockResolvedValueOnce(candidate);

      await expect(claimer.claimNext(state, now)).rejects.toThrow('canceling statement');
      expect(store.release).toHaveBeenCalledWith({
        taskId: 'task-2',
        workerId: 'worker-1',
        from: TaskStatus.CLAIMED,
        restore: { status: TaskStatus.APPROVED, claimedFrom: undefined, claimedBy: undefined, claimedAt: undefined },
      });
      expect(state.activeCount(Resource.YOUTUBE)).toBe(0);
    });

    test('frees the slot when undoing the claim throws as well', async () => {
      const state = new WorkerState('worker-1');
      store.countInFlight.mockResolvedValueOnce(0).mockRejectedValueOnce(new Error('canceling statement'));
      store.release.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(claimer.claimNext(state, now)).rejects.toThrow('connection terminated');
      expect(state.activeCount(Resource.YOUTUBE)).toBe(0);
    });

    test('frees the slot when releasing a claim that failed the re-check throws', async () => {
      const state = new WorkerState('worker-1');
      store.countInFlight.mockResolvedValueOnce(0).mockResolvedValueOnce(9);
      store.release.mockRejectedValueOnce(new Error('connection terminated'));

      await expect(claimer.claimNext(state, now)).rejects.toThrow('connection terminated');
      expect(state.activeCount(Resource.YOUTUBE)).toBe(0);
    });
  });
});
