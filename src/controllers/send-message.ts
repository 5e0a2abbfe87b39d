// src/controllers/send-message.ts

import { createEffect } from 'effector';
import { errorMessage } from 'lib/errors';
import { t } from 'lib/i18n';
import { DirectMessageSender, DownloadFailure } from 'types';

// Discord rejects messages over 2000 characters; keep a margin
export const MESSAGE_BUDGET = 1900;

/**
 * Completion banner plus one link per failed file. Lines that would push the
 * message past MESSAGE_BUDGET are collapsed into a single "...and N more",
 * where N counts the failures that were not listed.
 */
export function buildCompletionMessage(
  downloadRoot: string,
  failures: DownloadFailure[],
  locale?: string,
): string {
  const message = t(locale, 'run.complete', { path: downloadRoot });
  if (failures.length === 0) {
    return message;
  }

  const header = `${message}\n\n${t(locale, 'run.failedHeader', { count: failures.length })}`;
  let failureText = '';
  for (let listed = 0; listed < failures.length; listed++) {
    const { filename, messageUrl } = failures[listed];
    const line = `\n${t(locale, 'run.failedItem', { filename, url: messageUrl })}`;
    if (header.length + failureText.length + line.length < MESSAGE_BUDGET) {
      failureText += line;
    } else {
      failureText += `\n${t(locale, 'run.failedMore', { count: failures.length - listed })}`;
      break;
    }
  }
  return header + failureText;
}

export interface NotifyRunCompleteParams {
  userId: string;
  ownerId?: string;
  content: string;
  send: DirectMessageSender;
}

/**
 * DM the requesting user and the owner (once when they are the same person).
 * Delivery failures, such as closed DMs, are logged and never thrown.
 */
export async function notifyRunComplete({ userId, ownerId, content, send }: NotifyRunCompleteParams): Promise<void> {
  const targets = new Set<string>();
  if (ownerId) targets.add(ownerId);
  targets.add(userId);

  for (const targetId of targets) {
    try {
      await send(targetId, content);
    } catch (err) {
      console.warn(`[Notify] Failed to notify user ${targetId}: ${errorMessage(err)}`);
    }
  }
}

export const notifyRunCompleteFx = createEffect<NotifyRunCompleteParams, void, Error>(notifyRunComplete);
