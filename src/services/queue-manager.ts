// src/services/queue-manager.ts

import type { Dispatcher } from 'undici';
import {
  DownloadTracker,
  ExecuteJobParams,
  ExecutionContext,
  executeDownloadJobFx,
} from 'controllers/execute-download-job';
import { DownloadFileParams } from 'controllers/download-file';
import { buildCompletionMessage, notifyRunCompleteFx } from 'controllers/send-message';
import {
  ActiveDownload,
  CancelResult,
  DirectMessageSender,
  DownloadFailure,
  DownloadJob,
  QueueSnapshot,
} from 'types';

export interface QueueManagerOptions {
  downloadRoot: string;
  botUserId: string;
  ownerId?: string;
  delayMs: number;
  sendDirectMessage: DirectMessageSender;
  executeJob?: (params: ExecuteJobParams) => Promise<DownloadFailure[]>;
  downloadFile?: (params: DownloadFileParams) => Promise<boolean>;
  sleep?: (ms: number) => Promise<unknown>;
  dispatcher?: Dispatcher;
}

/**
 * One FIFO queue and one drain task per user. A user's jobs run strictly one
 * after another; different users drain independently.
 *
 * Lifecycle per user: ABSENT -> (enqueue) QUEUED -> (drain) DRAINING -> ABSENT.
 * The drain lock is held from the moment the drain starts until the last
 * completion notification is sent, so enqueues that arrive meanwhile are
 * appended to the live queue instead of starting a second drain.
 */
export class QueueManager implements DownloadTracker {
  private readonly queues = new Map<string, DownloadJob[]>();
  private readonly activeDownloads = new Map<string, ActiveDownload>();
  private readonly drainLocks = new Set<string>();
  private readonly drainTasks = new Map<string, Promise<void>>();

  constructor(private readonly options: QueueManagerOptions) {}

  /**
   * Append a job to its user's queue. Returns true when the queue was empty
   * before the call; the caller must then call `startDrainIfIdle`.
   */
  enqueue(job: DownloadJob): boolean {
    let queue = this.queues.get(job.userId);
    if (!queue) {
      queue = [];
      this.queues.set(job.userId, queue);
    }
    const wasEmpty = queue.length === 0;
    queue.push(job);
    console.log(
      `[QueueManager] Queued #${job.channel.name} for user ${job.userId} (position ${queue.length}).`,
    );
    return wasEmpty;
  }

  /** Start the user's drain task, or return the one already running. */
  startDrainIfIdle(userId: string): Promise<void> {
    if (this.drainLocks.has(userId)) {
      return this.drainTasks.get(userId) ?? Promise.resolve();
    }
    this.drainLocks.add(userId);
    const task = this.drainQueue(userId);
    // drainQueue may already have released the lock synchronously
    if (this.drainLocks.has(userId)) {
      this.drainTasks.set(userId, task);
    }
    return task;
  }

  isDraining(userId: string): boolean {
    return this.drainLocks.has(userId);
  }

  /** Flag the in-flight job as cancelled and drop everything still queued. */
  cancel(userId: string): CancelResult {
    const active = this.activeDownloads.get(userId);
    if (active) {
      active.cancelled = true;
    }
    const clearedCount = this.clearQueueOnly(userId);
    console.log(
      `[QueueManager] Cancel for user ${userId}: active=${Boolean(active)}, cleared=${clearedCount}.`,
    );
    return { cancelledActive: Boolean(active), clearedCount };
  }

  /** Remove pending jobs; the in-flight job keeps running. */
  clearQueueOnly(userId: string): number {
    const queue = this.queues.get(userId);
    if (!queue) return 0;
    // mutate in place: a running drain holds a reference to this array
    return queue.splice(0, queue.length).length;
  }

  peek(userId: string): QueueSnapshot {
    return {
      activeChannel: this.activeDownloads.get(userId)?.channelName,
      queued: (this.queues.get(userId) ?? []).map((job) => job.channel.name),
    };
  }

  hasWork(userId: string): boolean {
    return this.activeDownloads.has(userId) || this.pendingCount(userId) > 0;
  }

  // DownloadTracker

  pendingCount(userId: string): number {
    return this.queues.get(userId)?.length ?? 0;
  }

  beginDownload(userId: string, channelName: string): ActiveDownload {
    const record: ActiveDownload = { cancelled: false, channelName };
    this.activeDownloads.set(userId, record);
    return record;
  }

  endDownload(userId: string): void {
    this.activeDownloads.delete(userId);
  }

  private executionContext(): ExecutionContext {
    const { downloadRoot, botUserId, delayMs, downloadFile, sleep, dispatcher } = this.options;
    return { tracker: this, downloadRoot, botUserId, delayMs, downloadFile, sleep, dispatcher };
  }

  private async drainQueue(userId: string): Promise<void> {
    const execute = this.options.executeJob ?? executeDownloadJobFx;
    try {
      let queue = this.queues.get(userId);
      while (queue) {
        const failures: DownloadFailure[] = [];
        let executed = 0;
        let locale: string | undefined;

        let job = queue.shift();
        while (job) {
          executed++;
          locale = job.locale;
          try {
            failures.push(...(await execute({ job, context: this.executionContext() })));
          } catch (err) {
            console.error(`[QueueManager] Job for #${job.channel.name} failed unexpectedly:`, err);
          }
          job = queue.shift();
        }

        if (this.queues.get(userId) === queue) {
          this.queues.delete(userId);
        }

        if (executed > 0) {
          console.log(
            `[QueueManager] Run finished for user ${userId}: ${executed} job(s), ${failures.length} failure(s).`,
          );
          await notifyRunCompleteFx({
            userId,
            ownerId: this.options.ownerId,
            content: buildCompletionMessage(this.options.downloadRoot, failures, locale),
            send: this.options.sendDirectMessage,
          });
        }

        // jobs enqueued while the notification was in flight start a new run
        queue = this.queues.get(userId);
      }
    } finally {
      this.drainLocks.delete(userId);
      this.drainTasks.delete(userId);
    }
  }
}
