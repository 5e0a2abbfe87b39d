// src/lib/errors.ts

export type ArchiverErrorCode = 'PERMISSION_DENIED' | 'FILESYSTEM_ERROR' | 'STALE_MESSAGE';

export class ArchiverError extends Error {
  readonly code: ArchiverErrorCode;

  constructor(code: ArchiverErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Raised by a transport when the bot may not read a channel's history
export class HistoryPermissionError extends ArchiverError {
  constructor(channelName: string, options?: { cause?: unknown }) {
    super('PERMISSION_DENIED', `Missing permission to read history of #${channelName}`, options);
  }
}

// Raised when an archive directory cannot be created
export class FilesystemError extends ArchiverError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    const reason = options?.cause instanceof Error ? `: ${options.cause.message}` : '';
    super('FILESYSTEM_ERROR', `Could not create directory ${path}${reason}`, options);
    this.path = path;
  }
}

// The status message was deleted or its interaction token expired; post a new one
export class StaleMessageError extends ArchiverError {
  constructor(messageId: string, options?: { cause?: unknown }) {
    super('STALE_MESSAGE', `Status message ${messageId} can no longer be edited`, options);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
