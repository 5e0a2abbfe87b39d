// src/controllers/execute-download-job.ts

import path from 'path';
import { createEffect } from 'effector';
import type { Dispatcher } from 'undici';
import { buildArchivePath } from 'lib/archive-paths';
import { HistoryPermissionError, FilesystemError, errorMessage } from 'lib/errors';
import { sanitizeFilename, resolveUniquePath } from 'lib/filenames';
import { timeout } from 'lib/helpers';
import { t } from 'lib/i18n';
import { updateStatus } from 'lib/status-message';
import { downloadFileFx, DownloadFileParams } from 'controllers/download-file';
import {
  ActiveDownload,
  ArchiveMessage,
  DownloadFailure,
  DownloadJob,
  JobOutcome,
  StatusMessage,
} from 'types';

// Refresh the status message after this many successful downloads
export const PROGRESS_EVERY = 10;

/**
 * The queue manager's side of a running job: it owns the active-download
 * record and knows how many jobs are still waiting behind this one.
 */
export interface DownloadTracker {
  beginDownload(userId: string, channelName: string): ActiveDownload;
  endDownload(userId: string): void;
  pendingCount(userId: string): number;
}

export interface ExecutionContext {
  tracker: DownloadTracker;
  downloadRoot: string;
  botUserId: string;
  delayMs: number;
  downloadFile?: (params: DownloadFileParams) => Promise<boolean>;
  sleep?: (ms: number) => Promise<unknown>;
  dispatcher?: Dispatcher;
}

export interface ExecuteJobParams {
  job: DownloadJob;
  context: ExecutionContext;
}

interface ScanResult {
  messages: ArchiveMessage[];
  scanned: number;
}

// Walk history newest-first; incremental jobs stop at the bot's previous message
async function scanHistory(job: DownloadJob, botUserId: string, statusId: string): Promise<ScanResult> {
  const messages: ArchiveMessage[] = [];
  let scanned = 0;

  for await (const message of job.channel.history()) {
    if (job.incremental && message.authorId === botUserId && message.id !== statusId) {
      console.log(`[DownloadJob] Reached bot message (ID: ${message.id}), stopping scan.`);
      break;
    }
    scanned++;
    if (message.attachments.length > 0) {
      messages.push(message);
    }
  }
  return { messages, scanned };
}

function summaryText(
  locale: string | undefined,
  downloaded: number,
  failed: number,
  location: string,
  remaining: number,
): string {
  const lines = [
    t(locale, 'job.complete'),
    '',
    t(locale, 'job.summary'),
    t(locale, 'job.downloaded', { count: downloaded }),
  ];
  if (failed > 0) {
    lines.push(t(locale, 'job.failed', { count: failed }));
  }
  lines.push(t(locale, 'job.location', { path: location }));
  if (remaining > 0) {
    lines.push('', t(locale, 'job.next', { count: remaining }));
  }
  return lines.join('\n');
}

/**
 * Run one job end to end: scan, download every attachment, keep the status
 * message current. Resolves with the attachments that failed to download;
 * the early-exit paths (errors, nothing found) resolve with an empty list.
 */
export async function executeDownloadJob({ job, context }: ExecuteJobParams): Promise<DownloadFailure[]> {
  const { userId, channel, locale } = job;
  const { tracker } = context;
  const fetchFile = context.downloadFile ?? downloadFileFx;
  const sleep = context.sleep ?? timeout;

  const active = tracker.beginDownload(userId, channel.name);
  let status: StatusMessage = job.statusMessage;
  let outcome: JobOutcome = 'errored';

  try {
    status = await updateStatus(
      status,
      t(locale, 'job.processing', { position: tracker.pendingCount(userId) + 1, channel: channel.name }),
    );
    console.log(`[DownloadJob] Starting download from channel: #${channel.name}`);

    let downloadDir: string;
    try {
      downloadDir = buildArchivePath(context.downloadRoot, job.guildName, job.channelName, job.threadName);
    } catch (err) {
      if (!(err instanceof FilesystemError)) throw err;
      console.error(`[DownloadJob] ${err.message}`);
      await updateStatus(status, t(locale, 'job.directoryError', { reason: err.message }));
      return [];
    }

    status = await updateStatus(status, t(locale, 'job.scanning', { channel: channel.name }));

    let scan: ScanResult;
    try {
      scan = await scanHistory(job, context.botUserId, status.id);
    } catch (err) {
      if (err instanceof HistoryPermissionError) {
        console.warn(`[DownloadJob] ${err.message}`);
        await updateStatus(status, t(locale, 'job.permissionDenied'));
      } else {
        console.error(`[DownloadJob] Error reading messages in #${channel.name}:`, err);
        await updateStatus(status, t(locale, 'job.scanError', { reason: errorMessage(err) }));
      }
      return [];
    }

    const total = scan.messages.reduce((sum, message) => sum + message.attachments.length, 0);
    if (total === 0) {
      outcome = 'completed';
      await updateStatus(status, t(locale, 'job.noAttachments', { channel: channel.name, count: scan.scanned }));
      return [];
    }

    status = await updateStatus(
      status,
      t(locale, 'job.found', { attachments: total, messages: scan.messages.length, path: downloadDir }),
    );

    const location = path.resolve(downloadDir);
    const failures: DownloadFailure[] = [];
    let downloaded = 0;

    for (const message of scan.messages) {
      for (const attachment of message.attachments) {
        if (active.cancelled) {
          outcome = 'cancelled';
          await updateStatus(status, t(locale, 'job.cancelled', { downloaded, total, path: location }));
          return failures;
        }

        const savePath = resolveUniquePath(downloadDir, sanitizeFilename(attachment.filename));
        const ok = await fetchFile({ url: attachment.url, destination: savePath, dispatcher: context.dispatcher });

        if (ok) {
          downloaded++;
          console.log(`[DownloadJob] Downloaded: ${path.basename(savePath)}`);
        } else {
          failures.push({ filename: attachment.filename, messageUrl: message.url });
        }

        await sleep(context.delayMs);

        if (ok && downloaded % PROGRESS_EVERY === 0) {
          const pending = tracker.pendingCount(userId);
          const queueText = pending > 0 ? t(locale, 'job.progressQueue', { count: pending }) : '';
          status = await updateStatus(
            status,
            t(locale, 'job.progress', { downloaded, total, queue: queueText }),
          );
        }
      }
    }

    outcome = 'completed';
    await updateStatus(
      status,
      summaryText(locale, downloaded, failures.length, location, tracker.pendingCount(userId)),
    );
    return failures;
  } finally {
    tracker.endDownload(userId);
    console.log(`[DownloadJob] Job for #${channel.name} (user ${userId}) finished: ${outcome}`);
  }
}

export const executeDownloadJobFx = createEffect<ExecuteJobParams, DownloadFailure[], Error>(executeDownloadJob);
