// src/lib/status-message.ts

import { StatusMessage } from 'types';
import { StaleMessageError } from 'lib/errors';

/**
 * Show `content` on the status surface. Edits in place; when the message is
 * gone or its token expired, posts a fresh one and returns that handle
 * instead. Never throws: on any other failure the old handle is kept.
 */
export async function updateStatus(message: StatusMessage, content: string): Promise<StatusMessage> {
  try {
    await message.edit(content);
    return message;
  } catch (err) {
    if (!(err instanceof StaleMessageError)) {
      console.warn(`[Status] Error editing status message ${message.id}:`, err);
      return message;
    }
  }

  try {
    return await message.postNew(content);
  } catch (sendErr) {
    console.error('[Status] Failed to send new status message:', sendErr);
    return message;
  }
}
