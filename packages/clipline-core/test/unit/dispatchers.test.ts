import { mock } from 'vitest-mock-extended';

import { AlertDispatcher } from '../../src/dispatch/alert-dispatcher';
import { type Alert, AlertLevel, type AlertSink, type StatusMirror } from '../../src/dispatch/collaborators';
import { DispatchEvents } from '../../src/dispatch/events';
import { MirrorDispatcher } from '../../src/dispatch/mirror-dispatcher';
import { TaskStatus } from '../../src/task';
import { taskFactory } from '../factories/task.factory';

describe('MirrorDispatcher', () => {
  const mirror = mock<StatusMirror>();

  afterEach(() => {
    vi.resetAllMocks();
  });

  test('writes the planning name of the committed status', async () => {
    mirror.setStatus.mockResolvedValue(undefined);
    const dispatcher = new MirrorDispatcher(mirror);
    const task = taskFactory.build({ status: TaskStatus.ASSETS_APPROVED, externalRef: 'page-1' });

    dispatcher.statusChanged(task);
    await dispatcher.flush();

    expect(mirror.setStatus).toHaveBeenCalledWith('page-1', 'Assets Approved');
  });

  test('retries a failed write and reports the retry', async () => {
    mirror.setStatus.mockRejectedValueOnce(new Error('502 Bad Gateway')).mockResolvedValueOnce(undefined);
    const dispatcher = new MirrorDispatcher(mirror, { backoffStrategyOptions: { type: 'none' } });
    const retried = vi.fn();
    dispatcher.on(DispatchEvents.MIRROR_RETRY_SCHEDULED, retried);

    dispatcher.statusChanged(taskFactory.build({ status: TaskStatus.QUEUED }));
    await dispatcher.flush();

    expect(mirror.setStatus).toHaveBeenCalledTimes(2);
    expect(retried).toHaveBeenCalledWith(expect.objectContaining({ attempt: 1, planningStatus: 'Queued' }));
  });

  test('gives up after maxAttempts without throwing', async () => {
    const error = new Error('401 Unauthorized');
    mirror.setStatus.mockRejectedValue(error);
    const dispatcher = new MirrorDispatcher(mirror, { maxAttempts: 2, backoffStrategyOptions: { type: 'none' } });
    const failed = vi.fn();
    dispatcher.on(DispatchEvents.MIRROR_FAILED, failed);

    dispatcher.statusChanged(taskFactory.build({ status: TaskStatus.PUBLISHED }));
    await dispatcher.flush();

    expect(mirror.setStatus).toHaveBeenCalledTimes(2);
    expect(failed).toHaveBeenCalledWith(expect.objectContaining({ planningStatus: 'Upload Complete', error }));
  });

  test('does nothing without a mirror', async () => {
    const dispatcher = new MirrorDispatcher(undefined);

    dispatcher.statusChanged(taskFactory.build());

    await expect(dispatcher.flush()).resolves.toBeUndefined();
  });
});

describe('AlertDispatcher', () => {
  const sink = mock<AlertSink>();
  const alert: Alert = {
    level: AlertLevel.WARNING,
    title: 'Quota running low',
    message: 'Channel channel-a has used 80% of its daily youtube quota',
    occurredAt: new Date('2025-03-10T12:00:00.000Z'),
  };

  afterEach(() => {
    vi.resetAllMocks();
  });

  test('delivers the alert to the sink', async () => {
    sink.send.mockResolvedValue(undefined);
    const dispatcher = new AlertDispatcher(sink);

    dispatcher.notify(alert);
    await dispatcher.flush();

    expect(sink.send).toHaveBeenCalledWith(alert);
  });

  test('drops the alert after maxAttempts and emits alertDropped', async () => {
    const error = new Error('webhook unavailable');
    sink.send.mockRejectedValue(error);
    const dispatcher = new AlertDispatcher(sink, { maxAttempts: 3, backoffStrategyOptions: { type: 'none' } });
    const dropped = vi.fn();
    dispatcher.on(DispatchEvents.ALERT_DROPPED, dropped);

    dispatcher.notify(alert);
    await dispatcher.flush();

    expect(sink.send).toHaveBeenCalledTimes(3);
    expect(dropped).toHaveBeenCalledWith({ alert, error, droppedAt: expect.any(Date) });
  });
});
