import { leaseStatusesFor, PipelineStep, Resource, type Task, TaskPriority, TaskStatus } from '@clipline/core';
import { PGlite } from '@electric-sql/pglite';
import { afterAll, beforeAll, beforeEach, describe, expect, test } from 'vitest';

import { migrateUp } from '../../src/migration';
import { PostgresTaskStore } from '../../src/postgres-task-store';
import type { SqlClient } from '../../src/sql-client';
import { pgliteClient } from '../helpers/pglite-client';

describe('PostgresTaskStore', () => {
  const base = new Date('2025-03-10T12:00:00.000Z').getTime();
  const brief = { title: 'Night herons', topic: 'Birds that hunt after dark' };

  let pglite: PGlite;
  let client: SqlClient;
  let clock = base;
  let store: PostgresTaskStore;

  beforeAll(async () => {
    pglite = new PGlite();
    client = pgliteClient(pglite);
    await migrateUp(client);
  });

  beforeEach(async () => {
    await pglite.exec('DELETE FROM clipline_tasks');
    clock = base;
    store = new PostgresTaskStore(client, { now: () => new Date(clock++) });
  });

  afterAll(async () => {
    await pglite.close();
  });

  const add = (externalRef: string, overrides: { channelId?: string; priority?: TaskPriority; status?: TaskStatus }) =>
    store.insert({
      channelId: overrides.channelId ?? 'channel-a',
      externalRef,
      priority: overrides.priority ?? TaskPriority.NORMAL,
      data: brief,
      status: overrides.status ?? TaskStatus.QUEUED,
    });

  const lease = async (task: Task, claimedFrom: TaskStatus, workerId = 'worker-1') => {
    const claimed = await store.claim({
      taskId: task.id,
      expectedStatus: task.status,
      nextStatus: task.status === claimedFrom ? TaskStatus.CLAIMED : task.status,
      claimedFrom,
      workerId,
    });

    if (!claimed) {
      throw new Error(`could not lease ${task.externalRef}`);
    }

    return claimed;
  };

  const stampClaimedAt = async (task: Task, claimedAt: Date) => {
    await pglite.query('UPDATE clipline_tasks SET claimed_at = $2 WHERE id = $1', [task.id, claimedAt.toISOString()]);
  };

  describe('insert', () => {
    test('should store a draft by default', async () => {
      const task = await store.insert({
        channelId: 'channel-a',
        externalRef: 'page-1',
        priority: TaskPriority.HIGH,
        data: brief,
      });

      expect(task).toEqual({
        id: expect.any(String),
        channelId: 'channel-a',
        externalRef: 'page-1',
        status: TaskStatus.DRAFT,
        priority: TaskPriority.HIGH,
        data: brief,
        stepProgress: {},
        createdAt: new Date(base),
        updatedAt: new Date(base),
      });
      await expect(store.get(task.id)).resolves.toEqual(task);
      await expect(store.getByExternalRef('page-1')).resolves.toEqual(task);
    });

    test('should refuse a second task for the same work item', async () => {
      await add('page-1', {});

      await expect(add('page-1', { channelId: 'channel-b' })).rejects.toThrow(
        'Task with externalRef page-1 already exists',
      );
    });
  });

  describe('get', () => {
    test('should return undefined for an id that is not a uuid', async () => {
      await expect(store.get('42')).resolves.toBeUndefined();
    });

    test('should return undefined for an unknown id', async () => {
      await expect(store.get('7f1d2c3b-4a5e-4f60-8a7b-9c0d1e2f3a4b')).resolves.toBeUndefined();
    });
  });

  describe('claim', () => {
    test('should take the lease while the status still matches', async () => {
      const task = await add('page-1', {});
      const before = Date.now();

      const claimed = await store.claim({
        taskId: task.id,
        expectedStatus: TaskStatus.QUEUED,
        nextStatus: TaskStatus.CLAIMED,
        claimedFrom: TaskStatus.QUEUED,
        workerId: 'worker-1',
      });
      const again = await store.claim({
        taskId: task.id,
        expectedStatus: TaskStatus.QUEUED,
        nextStatus: TaskStatus.CLAIMED,
        claimedFrom: TaskStatus.QUEUED,
        workerId: 'worker-2',
      });

      expect(claimed).toMatchObject({
        id: task.id,
        status: TaskStatus.CLAIMED,
        claimedFrom: TaskStatus.QUEUED,
        claimedBy: 'worker-1',
        updatedAt: new Date(base + 1),
      });
      expect(again).toBeUndefined();
      // the claim time comes from the database clock, not the worker's
      expect(claimed?.claimedAt?.getTime()).toBeGreaterThanOrEqual(before);
      expect(claimed?.claimedAt?.getTime()).toBeLessThanOrEqual(Date.now());
    });

    test('should only take over a lease that has not been refreshed since the stale cut-off', async () => {
      const inserted = await add('page-1', { status: TaskStatus.GENERATING_VIDEO });
      const task = await lease(inserted, TaskStatus.ASSETS_APPROVED);
      const takeOver = (staleBefore: Date) =>
        store.claim({
          taskId: task.id,
          expectedStatus: TaskStatus.GENERATING_VIDEO,
          nextStatus: TaskStatus.GENERATING_VIDEO,
          claimedFrom: TaskStatus.ASSETS_APPROVED,
          workerId: 'worker-2',
          staleBefore,
        });

      await expect(takeOver(new Date(base))).resolves.toBeUndefined();
      await expect(takeOver(new Date(base + 1))).resolves.toMatchObject({
        status: TaskStatus.GENERATING_VIDEO,
        claimedBy: 'worker-2',
      });
    });
  });

  describe('release', () => {
    test('should put back the fields the claim replaced', async () => {
      const task = await add('page-1', {});
      const claimed = await lease(task, TaskStatus.QUEUED);
      const restore = { status: TaskStatus.QUEUED, claimedFrom: undefined, claimedBy: undefined, claimedAt: undefined };

      await expect(
        store.release({ taskId: task.id, workerId: 'worker-2', from: claimed.status, restore }),
      ).resolves.toBeUndefined();

      const released = await store.release({ taskId: task.id, workerId: 'worker-1', from: claimed.status, restore });

      // the refused attempt also read the clock
      expect(released).toEqual({ ...task, updatedAt: new Date(base + 3) });
    });
  });

  describe('transition', () => {
    test('should not apply when the status or the lease holder no longer match', async () => {
      const task = await lease(await add('page-1', {}), TaskStatus.QUEUED);

      await expect(
        store.transition({ taskId: task.id, from: TaskStatus.QUEUED, to: TaskStatus.GENERATING_ASSETS }),
      ).resolves.toBeUndefined();
      await expect(
        store.transition({
          taskId: task.id,
          from: TaskStatus.CLAIMED,
          to: TaskStatus.GENERATING_ASSETS,
          workerId: 'worker-2',
        }),
      ).resolves.toBeUndefined();
    });

    test('should clear step progress and the lease in the write that reaches a gate', async () => {
      const claimed = await lease(await add('page-1', {}), TaskStatus.QUEUED);
      const running = await store.transition({
        taskId: claimed.id,
        from: TaskStatus.CLAIMED,
        to: TaskStatus.GENERATING_ASSETS,
        workerId: 'worker-1',
      });
      const progressAt = new Date(base + 10);
      const saved = await store.saveStepProgress({
        taskId: claimed.id,
        workerId: 'worker-1',
        step: PipelineStep.ASSETS,
        progress: { completedUnits: 7, totalUnits: 10, updatedAt: progressAt },
      });

      expect(running?.status).toBe(TaskStatus.GENERATING_ASSETS);
      expect(saved?.stepProgress).toEqual({
        [PipelineStep.ASSETS]: { completedUnits: 7, totalUnits: 10, updatedAt: progressAt },
      });

      const reviewStartedAt = new Date(base + 20);
      const gated = await store.transition({
        taskId: claimed.id,
        from: TaskStatus.GENERATING_ASSETS,
        to: TaskStatus.ASSETS_READY,
        workerId: 'worker-1',
        patch: {
          reviewStartedAt,
          reviewCompletedAt: null,
          clearStepProgress: PipelineStep.ASSETS,
          clearLease: true,
        },
      });

      expect(gated).toMatchObject({
        status: TaskStatus.ASSETS_READY,
        reviewStartedAt,
        claimedAt: claimed.claimedAt,
      });
      expect(gated?.stepProgress).toEqual({});
      expect(gated?.claimedBy).toBeUndefined();
      expect(gated?.claimedFrom).toBeUndefined();
      expect(gated?.reviewCompletedAt).toBeUndefined();
    });

    test('should append error entries on separate lines', async () => {
      const task = await add('page-1', {});

      await store.transition({
        taskId: task.id,
        from: TaskStatus.QUEUED,
        to: TaskStatus.CANCELLED,
        patch: { appendError: 'first' },
      });
      const updated = await store.transition({
        taskId: task.id,
        from: TaskStatus.CANCELLED,
        to: TaskStatus.CANCELLED,
        patch: { appendError: 'second' },
      });

      expect(updated?.errorLog).toBe('first\nsecond');
    });
  });

  describe('saveStepProgress', () => {
    test('should refuse a worker that does not hold the lease', async () => {
      const task = await lease(await add('page-1', {}), TaskStatus.QUEUED);

      await expect(
        store.saveStepProgress({
          taskId: task.id,
          workerId: 'worker-2',
          step: PipelineStep.ASSETS,
          progress: { completedUnits: 1, totalUnits: 10, updatedAt: new Date(base) },
        }),
      ).resolves.toBeUndefined();
    });
  });

  describe('renewLease', () => {
    test('should refresh the lease for its holder while the status matches', async () => {
      const inserted = await add('page-1', { status: TaskStatus.GENERATING_VIDEO });
      const task = await lease(inserted, TaskStatus.ASSETS_APPROVED);
      const renew = (workerId: string, status: TaskStatus) => store.renewLease({ taskId: task.id, workerId, status });

      await expect(renew('worker-2', TaskStatus.GENERATING_VIDEO)).resolves.toBeUndefined();
      await expect(renew('worker-1', TaskStatus.VIDEO_READY)).resolves.toBeUndefined();
      await expect(renew('worker-1', TaskStatus.GENERATING_VIDEO)).resolves.toMatchObject({
        claimedBy: 'worker-1',
        updatedAt: new Date(base + 4),
      });
    });

    test('should return undefined for an id that is not a uuid', async () => {
      await expect(
        store.renewLease({ taskId: '42', workerId: 'worker-1', status: TaskStatus.GENERATING_VIDEO }),
      ).resolves.toBeUndefined();
    });
  });

  describe('updateDetails', () => {
    test('should change the priority and keep the rest', async () => {
      const task = await store.insert({
        channelId: 'channel-a',
        externalRef: 'page-1',
        priority: TaskPriority.NORMAL,
        data: brief,
      });

      const updated = await store.updateDetails(task.id, { priority: TaskPriority.LOW, appendError: 'missing topic' });

      expect(updated).toMatchObject({
        priority: TaskPriority.LOW,
        data: brief,
        status: TaskStatus.DRAFT,
        errorLog: 'missing topic',
      });
    });

    test('should replace the brief', async () => {
      const task = await add('page-1', {});
      const data = { title: 'Night herons', topic: 'Birds that hunt after dark', storyDirection: 'slow' };

      await expect(store.updateDetails(task.id, { data })).resolves.toMatchObject({ data });
    });
  });

  describe('listByStatus', () => {
    test('should return tasks oldest first up to the limit', async () => {
      await add('page-1', {});
      await add('page-2', { status: TaskStatus.DRAFT });
      await add('page-3', {});
      await add('page-4', {});

      const tasks = await store.listByStatus({ statuses: [TaskStatus.QUEUED], order: 'fifo', limit: 2 });

      expect(tasks.map((t) => t.externalRef)).toEqual(['page-1', 'page-3']);
    });
  });

  describe('listClaimCandidates', () => {
    const candidates = async (staleBefore: Date, limit = 10) => {
      const tasks = await store.listClaimCandidates({
        awaitingStatuses: [TaskStatus.QUEUED],
        staleStatuses: [TaskStatus.GENERATING_VIDEO],
        staleBefore,
        limit,
      });

      return tasks.map((t) => t.externalRef);
    };

    beforeEach(async () => {
      await add('a-1', {});
      await add('a-2', {});
      await add('b-1', { channelId: 'channel-b' });
      await add('c-1', { channelId: 'channel-c', priority: TaskPriority.HIGH });
      // channel-a was served last
      await lease(await add('a-video', { status: TaskStatus.GENERATING_VIDEO }), TaskStatus.ASSETS_APPROVED);
    });

    test('should order by priority, then the channel served least recently, then age', async () => {
      await expect(candidates(new Date(base + 5))).resolves.toEqual(['c-1', 'b-1', 'a-1', 'a-2', 'a-video']);
    });

    test('should leave out leases refreshed after the stale cut-off', async () => {
      await expect(candidates(new Date(base + 4))).resolves.toEqual(['c-1', 'b-1', 'a-1', 'a-2']);
    });

    test('should respect the limit', async () => {
      await expect(candidates(new Date(base + 4), 2)).resolves.toEqual(['c-1', 'b-1']);
    });
  });

  describe('countInFlight', () => {
    test('should count leases that will spend the resource', async () => {
      const first = await lease(await add('a-1', {}), TaskStatus.QUEUED);
      const second = await lease(await add('a-2', { status: TaskStatus.GENERATING_ASSETS }), TaskStatus.QUEUED);
      await lease(await add('a-3', { status: TaskStatus.ASSETS_APPROVED }), TaskStatus.ASSETS_APPROVED);
      await add('b-1', { channelId: 'channel-b', status: TaskStatus.GENERATING_ASSETS });
      await stampClaimedAt(first, new Date(base + 1));
      await stampClaimedAt(second, new Date(base + 3));

      const count = (extra: { excludeTaskId?: string; claimedBefore?: { claimedAt: Date; taskId: string } }) =>
        store.countInFlight({ channelId: 'channel-a', ...leaseStatusesFor(Resource.GEMINI), ...extra });

      await expect(count({})).resolves.toBe(2);
      await expect(count({ excludeTaskId: first.id })).resolves.toBe(1);
      await expect(
        count({ excludeTaskId: second.id, claimedBefore: { claimedAt: new Date(base + 3), taskId: second.id } }),
      ).resolves.toBe(1);
      await expect(
        count({ excludeTaskId: first.id, claimedBefore: { claimedAt: new Date(base + 1), taskId: first.id } }),
      ).resolves.toBe(0);
    });
  });
});
