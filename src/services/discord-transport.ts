// src/services/discord-transport.ts

import {
  ChannelType,
  DiscordAPIError,
  RESTJSONErrorCodes,
  type AnyThreadChannel,
  type ChatInputCommandInteraction,
  type Client,
  type GuildTextBasedChannel,
  type Message,
  type NewsChannel,
  type TextBasedChannel,
  type TextChannel,
} from 'discord.js';
import { HistoryPermissionError, StaleMessageError } from 'lib/errors';
import { ArchiveChannel, ArchiveMessage, DirectMessageSender, StatusMessage } from 'types';

// Discord caps a history page at 100 messages
const HISTORY_PAGE_SIZE = 100;
const ARCHIVED_THREADS_PAGE_SIZE = 100;
// How far back /download looks for the bot's previous message
export const CUTOFF_SEARCH_LIMIT = 100;

function isMissingAccessError(err: unknown): boolean {
  return (
    err instanceof DiscordAPIError &&
    (err.code === RESTJSONErrorCodes.MissingAccess || err.code === RESTJSONErrorCodes.MissingPermissions)
  );
}

// Expired interaction token (50027), unauthorized, or the message is gone
export function isStaleMessageError(err: unknown): boolean {
  return (
    err instanceof DiscordAPIError &&
    (err.code === RESTJSONErrorCodes.InvalidWebhookToken || err.status === 401 || err.status === 404)
  );
}

export function toArchiveMessage(message: Message): ArchiveMessage {
  return {
    id: message.id,
    authorId: message.author.id,
    url: message.url,
    attachments: message.attachments.map((attachment) => ({
      filename: attachment.name,
      url: attachment.url,
    })),
  };
}

/** Page through a channel's full history, newest message first. */
export function toArchiveChannel(channel: GuildTextBasedChannel): ArchiveChannel {
  return {
    id: channel.id,
    name: channel.name,
    async *history() {
      let before: string | undefined;
      for (;;) {
        let page;
        try {
          page = await channel.messages.fetch({ limit: HISTORY_PAGE_SIZE, before });
        } catch (err) {
          if (isMissingAccessError(err)) {
            throw new HistoryPermissionError(channel.name, { cause: err });
          }
          throw err;
        }

        for (const message of page.values()) {
          yield toArchiveMessage(message);
        }
        if (page.size < HISTORY_PAGE_SIZE) return;
        before = page.lastKey();
      }
    },
  };
}

export function canHaveThreads(channel: GuildTextBasedChannel): channel is TextChannel | NewsChannel {
  return channel.type === ChannelType.GuildText || channel.type === ChannelType.GuildAnnouncement;
}

/** Active threads first, then every public archived thread. */
export async function collectThreads(channel: TextChannel | NewsChannel): Promise<AnyThreadChannel[]> {
  const active = await channel.threads.fetchActive();
  const threads: AnyThreadChannel[] = [...active.threads.values()];

  let before: AnyThreadChannel | undefined;
  for (;;) {
    const page = await channel.threads.fetchArchived({
      type: 'public',
      before,
      limit: ARCHIVED_THREADS_PAGE_SIZE,
    });
    threads.push(...page.threads.values());
    before = page.threads.last();
    if (!page.hasMore || !before) break;
  }
  return threads;
}

export async function findLastBotMessage(
  channel: GuildTextBasedChannel,
  botUserId: string,
  excludeId: string,
): Promise<Message | undefined> {
  const recent = await channel.messages.fetch({ limit: CUTOFF_SEARCH_LIMIT });
  return recent.find((message) => message.author.id === botUserId && message.id !== excludeId);
}

async function sendToChannel(channel: TextBasedChannel | null, content: string): Promise<StatusMessage> {
  if (!channel || !('send' in channel)) {
    throw new Error('Status channel does not accept messages');
  }
  const sent = await channel.send(content);
  return channelStatusMessage(sent);
}

/** Status surface backed by a regular channel message, edited with the bot token. */
export function channelStatusMessage(message: Message): StatusMessage {
  return {
    id: message.id,
    async edit(content: string) {
      try {
        await message.edit({ content });
      } catch (err) {
        throw isStaleMessageError(err) ? new StaleMessageError(message.id, { cause: err }) : err;
      }
    },
    postNew: (content: string) => sendToChannel(message.channel, content),
  };
}

/**
 * Status surface backed by the interaction's own reply. Edits go through the
 * interaction token, which Discord expires after 15 minutes; long runs then
 * fall back to `postNew`.
 */
export function interactionStatusMessage(
  interaction: ChatInputCommandInteraction,
  reply: Message,
): StatusMessage {
  return {
    id: reply.id,
    async edit(content: string) {
      try {
        await interaction.editReply({ content });
      } catch (err) {
        throw isStaleMessageError(err) ? new StaleMessageError(reply.id, { cause: err }) : err;
      }
    },
    postNew: (content: string) => sendToChannel(interaction.channel, content),
  };
}

export function createDirectMessageSender(client: Client): DirectMessageSender {
  return async (userId, content) => {
    const user = await client.users.fetch(userId);
    await user.send(content);
  };
}
