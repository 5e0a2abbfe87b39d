// src/controllers/commands.ts

import {
  SlashCommandBuilder,
  type ChatInputCommandInteraction,
  type GuildTextBasedChannel,
} from 'discord.js';
import { compareSnowflakes, errorMessage, t, updateStatus } from 'lib';
import { AccessPolicy, isAuthorized } from 'services/access-control';
import {
  canHaveThreads,
  collectThreads,
  findLastBotMessage,
  interactionStatusMessage,
  toArchiveChannel,
} from 'services/discord-transport';
import { QueueManager } from 'services/queue-manager';
import { DownloadJob, StatusMessage } from 'types';

const UNKNOWN_CHANNEL = 'unknown-channel';

export interface CommandContext {
  queue: QueueManager;
  access: AccessPolicy;
  botUserId: string;
}

export interface SlashCommandDef {
  data: SlashCommandBuilder;
  execute(interaction: ChatInputCommandInteraction<'cached'>, ctx: CommandContext): Promise<void>;
}

type CachedInteraction = ChatInputCommandInteraction<'cached'>;

function guildCommand(name: string, descriptionKey: string): SlashCommandBuilder {
  return new SlashCommandBuilder()
    .setName(name)
    .setDescription(t(undefined, descriptionKey))
    .setDMPermission(false);
}

async function replyEphemeral(interaction: ChatInputCommandInteraction, content: string): Promise<void> {
  await interaction.reply({ content, ephemeral: true });
}

// Newest bot message other than our own reply marks where the last archive run ended
async function findCutoff(
  channel: GuildTextBasedChannel,
  botUserId: string,
  statusId: string,
): Promise<{ id: string; url: string } | undefined> {
  try {
    const message = await findLastBotMessage(channel, botUserId, statusId);
    return message ? { id: message.id, url: message.url } : undefined;
  } catch (err) {
    console.warn(`[Commands] Could not look up previous bot message in #${channel.name}: ${errorMessage(err)}`);
    return undefined;
  }
}

/**
 * Queue the invoking channel (and, for a text channel, all of its threads)
 * for the calling user, then start draining if the queue was idle. Jobs are
 * enqueued only after the final status edit, in one synchronous batch.
 */
async function queueChannelDownload(
  interaction: CachedInteraction,
  ctx: CommandContext,
  incremental: boolean,
): Promise<void> {
  const { channel, guild, locale } = interaction;
  const userId = interaction.user.id;

  if (!channel) {
    await replyEphemeral(interaction, t(locale, 'cmd.guildOnly'));
    return;
  }

  await interaction.deferReply();

  const channelName = channel.isThread() ? channel.parent?.name ?? UNKNOWN_CHANNEL : channel.name;
  const threadName = channel.isThread() ? channel.name : undefined;

  const position = ctx.queue.pendingCount(userId) + 1;
  const startsNow = position === 1;
  const vars = { channel: channel.name, position };

  const initialKey = incremental
    ? startsNow ? 'queue.incrementalStartingNow' : 'queue.incrementalWaiting'
    : startsNow ? 'queue.startingNow' : 'queue.waiting';
  const reply = await interaction.editReply(t(locale, initialKey, vars));
  let status: StatusMessage = interactionStatusMessage(interaction, reply);

  let cutoff: { id: string; url: string } | undefined;
  if (incremental) {
    cutoff = await findCutoff(channel, ctx.botUserId, reply.id);
    status = await updateStatus(
      status,
      cutoff ? t(locale, 'queue.cutoffFound', { url: cutoff.url }) : t(locale, 'queue.cutoffMissing'),
    );
  }

  const baseJob: Omit<DownloadJob, 'channel' | 'threadName'> = {
    userId,
    guildName: guild.name,
    channelName,
    statusMessage: status,
    incremental,
    locale,
  };
  const jobs: DownloadJob[] = [{ ...baseJob, channel: toArchiveChannel(channel), threadName }];

  let skippedThreads = 0;
  if (canHaveThreads(channel)) {
    try {
      for (const thread of await collectThreads(channel)) {
        if (cutoff && compareSnowflakes(thread.id, cutoff.id) <= 0) {
          skippedThreads++;
          continue;
        }
        jobs.push({ ...baseJob, channel: toArchiveChannel(thread), threadName: thread.name });
      }
    } catch (err) {
      console.warn(`[Commands] Failed to scan threads for #${channel.name}: ${errorMessage(err)}`);
    }
  }
  const threadCount = jobs.length - 1;

  const headerKey = incremental
    ? startsNow ? 'queue.incrementalHeader' : 'queue.incrementalPositionHeader'
    : startsNow ? 'queue.queuedHeader' : 'queue.queuedPositionHeader';
  const lines = [t(locale, headerKey, vars)];
  if (threadCount > 0) {
    lines.push(t(locale, incremental ? 'queue.newThreadsAdded' : 'queue.threadsAdded', { count: threadCount }));
  }
  if (skippedThreads > 0) {
    lines.push(t(locale, 'queue.threadsSkipped', { count: skippedThreads }));
  }
  lines.push(t(locale, startsNow ? 'queue.startsNow' : 'queue.startsLater'));
  await updateStatus(status, lines.join('\n'));

  // one synchronous batch: no await between these enqueues
  let startDrain = false;
  for (const job of jobs) {
    if (ctx.queue.enqueue(job)) startDrain = true;
  }
  if (startDrain) {
    ctx.queue
      .startDrainIfIdle(userId)
      .catch((err: unknown) => console.error(`[Commands] Queue processing failed for user ${userId}:`, err));
  }
}

export const downloadAllCommand: SlashCommandDef = {
  data: guildCommand('downloadall', 'cmd.downloadall'),
  execute: (interaction, ctx) => queueChannelDownload(interaction, ctx, false),
};

export const downloadCommand: SlashCommandDef = {
  data: guildCommand('download', 'cmd.download'),
  execute: (interaction, ctx) => queueChannelDownload(interaction, ctx, true),
};

export const stopCommand: SlashCommandDef = {
  data: guildCommand('stop', 'cmd.stop'),
  async execute(interaction, ctx) {
    const { locale } = interaction;
    const userId = interaction.user.id;

    if (!ctx.queue.hasWork(userId)) {
      await replyEphemeral(interaction, t(locale, 'stop.nothing'));
      return;
    }

    const { cancelledActive, clearedCount } = ctx.queue.cancel(userId);
    const parts: string[] = [];
    if (cancelledActive) parts.push(t(locale, 'stop.stopping'));
    if (clearedCount > 0) parts.push(t(locale, 'stop.cleared', { count: clearedCount }));
    await replyEphemeral(interaction, parts.join('\n'));
  },
};

export const queueCommand: SlashCommandDef = {
  data: guildCommand('queue', 'cmd.queue'),
  async execute(interaction, ctx) {
    const { locale } = interaction;
    const userId = interaction.user.id;

    if (!ctx.queue.hasWork(userId)) {
      await replyEphemeral(interaction, t(locale, 'status.empty'));
      return;
    }

    const { activeChannel, queued } = ctx.queue.peek(userId);
    const lines = [t(locale, 'status.header'), ''];
    if (activeChannel) {
      lines.push(t(locale, 'status.active', { channel: activeChannel }));
    }
    if (queued.length > 0) {
      lines.push('', t(locale, 'status.queued', { count: queued.length }));
      queued.forEach((channel, i) => lines.push(t(locale, 'status.queuedItem', { index: i + 1, channel })));
    }
    lines.push('', t(locale, 'status.hint'));
    await replyEphemeral(interaction, lines.join('\n'));
  },
};

export const clearQueueCommand: SlashCommandDef = {
  data: guildCommand('clearqueue', 'cmd.clearqueue'),
  async execute(interaction, ctx) {
    const { locale } = interaction;
    const cleared = ctx.queue.clearQueueOnly(interaction.user.id);
    if (cleared === 0) {
      await replyEphemeral(interaction, t(locale, 'clear.empty'));
      return;
    }
    await replyEphemeral(interaction, t(locale, 'clear.done', { count: cleared }));
  },
};

export const commands: SlashCommandDef[] = [
  downloadAllCommand,
  downloadCommand,
  stopCommand,
  queueCommand,
  clearQueueCommand,
];

const commandsByName = new Map(commands.map((command) => [command.data.name, command]));

/** Route a slash command, enforcing authorisation and guild-only use. */
export async function handleCommand(interaction: ChatInputCommandInteraction, ctx: CommandContext): Promise<void> {
  const command = commandsByName.get(interaction.commandName);
  if (!command) {
    console.warn(`[Commands] Unknown command: /${interaction.commandName}`);
    return;
  }

  if (!isAuthorized(interaction.user.id, ctx.access)) {
    console.log(`[Commands] Denied /${interaction.commandName} for user ${interaction.user.id}`);
    await replyEphemeral(interaction, t(interaction.locale, 'auth.denied'));
    return;
  }

  if (!interaction.inCachedGuild()) {
    await replyEphemeral(interaction, t(interaction.locale, 'cmd.guildOnly'));
    return;
  }

  console.log(`[Commands] /${interaction.commandName} from user ${interaction.user.id}`);
  await command.execute(interaction, ctx);
}
