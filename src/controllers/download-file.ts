// src/controllers/download-file.ts

import fs from 'fs';
import { pipeline } from 'stream/promises';
import { createEffect } from 'effector';
import { request, type Dispatcher } from 'undici';
import { errorMessage } from 'lib/errors';

// Bytes buffered between the socket and the file at any one time
export const DOWNLOAD_CHUNK_SIZE = 8 * 1024;

export interface DownloadFileParams {
  url: string;
  destination: string;
  dispatcher?: Dispatcher;
}

/**
 * Stream `url` into `destination`. Resolves `true` on HTTP 200 once the file
 * is fully written; any other status or error resolves `false` and is logged.
 */
export async function downloadFile({ url, destination, dispatcher }: DownloadFileParams): Promise<boolean> {
  try {
    const { statusCode, body } = await request(url, {
      method: 'GET',
      dispatcher,
      highWaterMark: DOWNLOAD_CHUNK_SIZE,
    });

    if (statusCode !== 200) {
      console.error(`[DownloadFile] Failed to download ${url}: HTTP ${statusCode}`);
      await body.dump();
      return false;
    }

    await pipeline(body, fs.createWriteStream(destination, { highWaterMark: DOWNLOAD_CHUNK_SIZE }));
    return true;
  } catch (err) {
    console.error(`[DownloadFile] Error downloading ${url}: ${errorMessage(err)}`);
    return false;
  }
}

export const downloadFileFx = createEffect<DownloadFileParams, boolean, Error>(downloadFile);
