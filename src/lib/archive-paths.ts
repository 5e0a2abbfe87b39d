// src/lib/archive-paths.ts

import fs from 'fs';
import path from 'path';
import { FilesystemError } from 'lib/errors';
import { sanitizeFilename } from 'lib/filenames';

/**
 * Build `root/guild/channel[/thread]` with every segment sanitized and make
 * sure the directory exists. Throws `FilesystemError` when it cannot be made.
 */
export function buildArchivePath(
  root: string,
  guildName: string,
  channelName: string,
  threadName?: string,
): string {
  const segments = [sanitizeFilename(guildName), sanitizeFilename(channelName)];
  if (threadName) {
    segments.push(sanitizeFilename(threadName));
  }
  const fullPath = path.join(root, ...segments);

  try {
    fs.mkdirSync(fullPath, { recursive: true });
  } catch (err) {
    throw new FilesystemError(fullPath, { cause: err });
  }
  return fullPath;
}
