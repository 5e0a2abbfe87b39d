// src/types.ts

// ArchiveAttachment: a single file attached to a message
export interface ArchiveAttachment {
  filename: string;
  url: string;
}

// ArchiveMessage: the transport-neutral view of one history entry
export interface ArchiveMessage {
  id: string;
  authorId: string;
  url: string; // jump link back to the message
  attachments: ArchiveAttachment[];
}

// ArchiveChannel: a channel or thread whose history can be walked newest-first
export interface ArchiveChannel {
  id: string;
  name: string;
  history(): AsyncIterable<ArchiveMessage>;
}

/**
 * User-visible progress surface. `edit` replaces the content in place,
 * `postNew` sends a fresh message to the same channel and returns its handle.
 */
export interface StatusMessage {
  id: string;
  edit(content: string): Promise<void>;
  postNew(content: string): Promise<StatusMessage>;
}

// DownloadJob: one queued download of a single channel or thread
export interface DownloadJob {
  readonly userId: string;
  readonly channel: ArchiveChannel;
  readonly guildName: string;
  readonly channelName: string;
  readonly threadName?: string;
  readonly statusMessage: StatusMessage;
  readonly incremental: boolean;
  readonly locale?: string;
}

// ActiveDownload: transient per-user state of the job currently executing
export interface ActiveDownload {
  cancelled: boolean;
  channelName: string;
}

export interface DownloadFailure {
  filename: string; // original attachment name, before sanitizing
  messageUrl: string;
}

export interface CancelResult {
  cancelledActive: boolean;
  clearedCount: number;
}

export interface QueueSnapshot {
  activeChannel?: string;
  queued: string[];
}

// Sends a direct message to a user id; rejects when delivery fails
export type DirectMessageSender = (userId: string, content: string) => Promise<void>;

export type JobOutcome = 'completed' | 'cancelled' | 'errored';
