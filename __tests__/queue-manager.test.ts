import { jest } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { DownloadFileParams } from '../src/controllers/download-file';
import { ExecuteJobParams } from '../src/controllers/execute-download-job';
import { QueueManager, QueueManagerOptions } from '../src/services/queue-manager';
import { ActiveDownload, ArchiveMessage, DownloadFailure, DownloadJob, StatusMessage } from '../src/types';

const USER_ID = '2000';
const OWNER_ID = '9000';
const ROOT = './downloads';

const status: StatusMessage = {
  id: 'status-1',
  edit: async () => undefined,
  postNew: async () => status,
};

function job(channelName: string, userId = USER_ID): DownloadJob {
  return {
    userId,
    channel: {
      id: `${channelName}-id`,
      name: channelName,
      async *history() {
        // no messages
      },
    },
    guildName: 'Guild',
    channelName,
    statusMessage: status,
    incremental: false,
  };
}

function jobWithFiles(channelName: string, messageId: string, filenames: string[]): DownloadJob {
  const message: ArchiveMessage = {
    id: messageId,
    authorId: USER_ID,
    url: `https://discord.test/channels/1/2/${messageId}`,
    attachments: filenames.map((filename) => ({ filename, url: `https://cdn.test/${filename}` })),
  };
  return {
    ...job(channelName),
    channel: {
      id: `${channelName}-id`,
      name: channelName,
      async *history() {
        yield message;
      },
    },
  };
}

function deferred() {
  let release: () => void = () => undefined;
  const promise = new Promise<void>((resolve) => {
    release = resolve;
  });
  return { promise, release: () => release() };
}

function failure(filename: string): DownloadFailure {
  return { filename, messageUrl: `https://discord.test/m/${filename}` };
}

describe('QueueManager', () => {
  let logSpy: jest.Spied<typeof console.log>;
  let warnSpy: jest.Spied<typeof console.warn>;
  let errorSpy: jest.Spied<typeof console.error>;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    logSpy.mockRestore();
    warnSpy.mockRestore();
    errorSpy.mockRestore();
  });

  function createManager(overrides: Partial<QueueManagerOptions> = {}) {
    const order: string[] = [];
    const executeJob = jest.fn(async ({ job: next, context }: ExecuteJobParams): Promise<DownloadFailure[]> => {
      context.tracker.beginDownload(next.userId, next.channel.name);
      order.push(next.channel.name);
      context.tracker.endDownload(next.userId);
      return [];
    });
    const sendDirectMessage = jest.fn(async (_userId: string, _content: string): Promise<void> => undefined);
    const manager = new QueueManager({
      downloadRoot: ROOT,
      botUserId: '1000',
      delayMs: 0,
      sendDirectMessage,
      executeJob,
      ...overrides,
    });
    return { manager, executeJob, sendDirectMessage, order };
  }

  test('enqueue reports whether the queue was empty', () => {
    const { manager } = createManager();
    expect(manager.enqueue(job('a'))).toBe(true);
    expect(manager.enqueue(job('b'))).toBe(false);
    expect(manager.pendingCount(USER_ID)).toBe(2);
  });

  test('three jobs enqueued while idle run in FIFO order under a single drain', async () => {
    const { manager, executeJob, order } = createManager();
    let running = 0;
    let maxRunning = 0;
    executeJob.mockImplementation(async ({ job: next }) => {
      running++;
      maxRunning = Math.max(maxRunning, running);
      await Promise.resolve();
      order.push(next.channel.name);
      running--;
      return [];
    });

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    manager.enqueue(job('third'));
    const drain = manager.startDrainIfIdle(USER_ID);
    const again = manager.startDrainIfIdle(USER_ID);

    expect(again).toBe(drain);
    expect(manager.isDraining(USER_ID)).toBe(true);
    await drain;

    expect(order).toEqual(['first', 'second', 'third']);
    expect(maxRunning).toBe(1);
    expect(manager.isDraining(USER_ID)).toBe(false);
    expect(manager.pendingCount(USER_ID)).toBe(0);
  });

  test('failures from every job in a run land in one notification', async () => {
    const { manager, executeJob, sendDirectMessage } = createManager();
    executeJob.mockResolvedValueOnce([failure('a.png')]).mockResolvedValueOnce([]);

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    await manager.startDrainIfIdle(USER_ID);

    expect(sendDirectMessage).toHaveBeenCalledTimes(1);
    expect(sendDirectMessage).toHaveBeenCalledWith(
      USER_ID,
      '✅ **All queued downloads complete!**\n📂 Archive ready in: `./downloads`\n\n' +
        '❌ **1 Failed Downloads:**\n• [a.png](https://discord.test/m/a.png)',
    );
  });

  test('notifies the owner first and the user second', async () => {
    const { manager, sendDirectMessage } = createManager({ ownerId: OWNER_ID });

    manager.enqueue(job('first'));
    await manager.startDrainIfIdle(USER_ID);

    expect(sendDirectMessage.mock.calls.map(([id]) => id)).toEqual([OWNER_ID, USER_ID]);
  });

  test('the owner running their own queue is notified once', async () => {
    const { manager, sendDirectMessage } = createManager({ ownerId: OWNER_ID });

    manager.enqueue(job('first', OWNER_ID));
    await manager.startDrainIfIdle(OWNER_ID);

    expect(sendDirectMessage).toHaveBeenCalledTimes(1);
    expect(sendDirectMessage.mock.calls[0][0]).toBe(OWNER_ID);
  });

  test('a failed DM is logged and the remaining recipients still get theirs', async () => {
    const { manager, sendDirectMessage } = createManager({ ownerId: OWNER_ID });
    sendDirectMessage.mockRejectedValueOnce(new Error('Cannot send messages to this user'));

    manager.enqueue(job('first'));
    await expect(manager.startDrainIfIdle(USER_ID)).resolves.toBeUndefined();

    expect(sendDirectMessage).toHaveBeenCalledTimes(2);
    expect(warnSpy).toHaveBeenCalledWith(
      `[Notify] Failed to notify user ${OWNER_ID}: Cannot send messages to this user`,
    );
    expect(manager.isDraining(USER_ID)).toBe(false);
  });

  test('clearQueueOnly drops pending jobs and leaves the active one running', async () => {
    const { manager, executeJob } = createManager();
    const gate = deferred();
    executeJob.mockImplementationOnce(async ({ job: next, context }) => {
      context.tracker.beginDownload(next.userId, next.channel.name);
      await gate.promise;
      context.tracker.endDownload(next.userId);
      return [];
    });

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    manager.enqueue(job('third'));
    const drain = manager.startDrainIfIdle(USER_ID);

    expect(manager.peek(USER_ID)).toEqual({ activeChannel: 'first', queued: ['second', 'third'] });
    expect(manager.clearQueueOnly(USER_ID)).toBe(2);
    expect(manager.peek(USER_ID)).toEqual({ activeChannel: 'first', queued: [] });

    gate.release();
    await drain;
    expect(executeJob).toHaveBeenCalledTimes(1);
  });

  test('cancel flags the active job and clears the queue', async () => {
    const { manager, executeJob, sendDirectMessage } = createManager();
    const gate = deferred();
    let cancelledSeen = false;
    executeJob.mockImplementationOnce(async ({ job: next, context }) => {
      const record = context.tracker.beginDownload(next.userId, next.channel.name);
      await gate.promise;
      cancelledSeen = record.cancelled;
      context.tracker.endDownload(next.userId);
      return [];
    });

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    const drain = manager.startDrainIfIdle(USER_ID);

    expect(manager.hasWork(USER_ID)).toBe(true);
    expect(manager.cancel(USER_ID)).toEqual({ cancelledActive: true, clearedCount: 1 });

    gate.release();
    await drain;

    expect(cancelledSeen).toBe(true);
    expect(executeJob).toHaveBeenCalledTimes(1);
    expect(sendDirectMessage).toHaveBeenCalledTimes(1);
    expect(manager.hasWork(USER_ID)).toBe(false);
  });

  test('a cancelled job stops alone; jobs still queued run in the same run', async () => {
    const { manager, executeJob, sendDirectMessage, order } = createManager();
    const gate = deferred();
    const running: { record?: ActiveDownload } = {};
    executeJob.mockImplementationOnce(async ({ job: next, context }) => {
      running.record = context.tracker.beginDownload(next.userId, next.channel.name);
      await gate.promise;
      context.tracker.endDownload(next.userId);
      return [];
    });

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    const drain = manager.startDrainIfIdle(USER_ID);

    expect(running.record).toEqual({ cancelled: false, channelName: 'first' });
    if (running.record) running.record.cancelled = true;
    gate.release();
    await drain;

    expect(executeJob).toHaveBeenCalledTimes(2);
    expect(order).toEqual(['second']);
    expect(sendDirectMessage).toHaveBeenCalledTimes(1);
    expect(manager.hasWork(USER_ID)).toBe(false);
  });

  test('cancel with nothing running reports nothing', () => {
    const { manager } = createManager();
    expect(manager.cancel(USER_ID)).toEqual({ cancelledActive: false, clearedCount: 0 });
    expect(manager.peek(USER_ID)).toEqual({ activeChannel: undefined, queued: [] });
  });

  test('jobs added while a job runs join the same run', async () => {
    const { manager, executeJob, sendDirectMessage, order } = createManager();
    const gate = deferred();
    executeJob.mockImplementationOnce(async ({ job: next }) => {
      order.push(next.channel.name);
      await gate.promise;
      return [];
    });

    manager.enqueue(job('first'));
    const drain = manager.startDrainIfIdle(USER_ID);
    expect(manager.enqueue(job('late'))).toBe(true);
    expect(manager.startDrainIfIdle(USER_ID)).toBe(drain);

    gate.release();
    await drain;

    expect(order).toEqual(['first', 'late']);
    expect(sendDirectMessage).toHaveBeenCalledTimes(1);
  });

  test('a job enqueued during the completion DM starts a new run', async () => {
    const { manager, sendDirectMessage, order } = createManager();
    sendDirectMessage.mockImplementationOnce(async () => {
      manager.enqueue(job('late'));
    });

    manager.enqueue(job('first'));
    await manager.startDrainIfIdle(USER_ID);

    expect(order).toEqual(['first', 'late']);
    expect(sendDirectMessage).toHaveBeenCalledTimes(2);
    expect(manager.isDraining(USER_ID)).toBe(false);
  });

  test('an unexpected job error is logged and the next job still runs', async () => {
    const { manager, executeJob, order } = createManager();
    executeJob.mockRejectedValueOnce(new Error('boom'));

    manager.enqueue(job('first'));
    manager.enqueue(job('second'));
    await manager.startDrainIfIdle(USER_ID);

    expect(order).toEqual(['second']);
    expect(errorSpy).toHaveBeenCalledWith(
      '[QueueManager] Job for #first failed unexpectedly:',
      expect.any(Error),
    );
  });

  test('no notification when every job was cleared before the drain started', async () => {
    const { manager, executeJob, sendDirectMessage } = createManager();

    manager.enqueue(job('first'));
    manager.clearQueueOnly(USER_ID);
    await manager.startDrainIfIdle(USER_ID);

    expect(executeJob).not.toHaveBeenCalled();
    expect(sendDirectMessage).not.toHaveBeenCalled();
  });

  test('users drain independently', async () => {
    const { manager, executeJob, order } = createManager();
    const gate = deferred();
    executeJob.mockImplementationOnce(async ({ job: next }) => {
      await gate.promise;
      order.push(next.channel.name);
      return [];
    });

    manager.enqueue(job('slow', 'user-a'));
    manager.enqueue(job('fast', 'user-b'));
    const slow = manager.startDrainIfIdle('user-a');
    await manager.startDrainIfIdle('user-b');

    expect(order).toEqual(['fast']);
    gate.release();
    await slow;
    expect(order).toEqual(['fast', 'slow']);
  });

  describe('with the real job executor', () => {
    let root: string;

    beforeEach(() => {
      root = fs.mkdtempSync(path.join(os.tmpdir(), 'archiver-queue-'));
    });

    afterEach(() => {
      fs.rmSync(root, { recursive: true, force: true });
    });

    test('a partly failed job and a clean job produce one DM listing the failed file', async () => {
      const downloadFile = jest.fn(async (_params: DownloadFileParams) => true).mockResolvedValueOnce(false);
      const sendDirectMessage = jest.fn(async (_userId: string, _content: string): Promise<void> => undefined);
      const manager = new QueueManager({
        downloadRoot: root,
        botUserId: '1000',
        delayMs: 0,
        sendDirectMessage,
        downloadFile,
        sleep: async () => undefined,
      });

      manager.enqueue(jobWithFiles('first', '101', ['a.png', 'b.png', 'c.png']));
      manager.enqueue(jobWithFiles('second', '201', ['d.png']));
      await manager.startDrainIfIdle(USER_ID);

      expect(downloadFile).toHaveBeenCalledTimes(4);
      expect(downloadFile.mock.calls[0][0]).toMatchObject({
        url: 'https://cdn.test/a.png',
        destination: path.join(root, 'Guild', 'first', 'a.png'),
      });
      expect(sendDirectMessage).toHaveBeenCalledTimes(1);
      expect(sendDirectMessage).toHaveBeenCalledWith(
        USER_ID,
        `✅ **All queued downloads complete!**\n📂 Archive ready in: \`${root}\`\n\n` +
          '❌ **1 Failed Downloads:**\n• [a.png](https://discord.test/channels/1/2/101)',
      );
      expect(manager.hasWork(USER_ID)).toBe(false);
    });
  });
});
