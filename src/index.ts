// src/index.ts

// Global error handlers must be at the absolute top.
process.on('unhandledRejection', (reason, promise) => {
  console.error('CRITICAL_ERROR: Unhandled Rejection at:', promise, 'reason:', reason);
});

process.on('uncaughtException', (error, origin) => {
  console.error('CRITICAL_ERROR: Uncaught Exception:', error, 'origin:', origin);
});

import path from 'path';
import { Client, Events, GatewayIntentBits } from 'discord.js';
import { loadEnvConfig, EnvConfig } from 'config/env-config';
import { setupLogMirror } from 'config/setup-logs';
import { commands, handleCommand, CommandContext } from 'controllers/commands';
import { createDirectMessageSender } from 'services/discord-transport';
import { QueueManager } from 'services/queue-manager';

function createBot(config: EnvConfig): Client {
  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent],
  });

  let ctx: CommandContext | undefined;

  client.once(Events.ClientReady, (readyClient) => {
    const botUserId = readyClient.user.id;
    ctx = {
      botUserId,
      access: { ownerId: config.ownerId, approvedUsers: config.approvedUsers },
      queue: new QueueManager({
        downloadRoot: config.downloadDirectory,
        botUserId,
        ownerId: config.ownerId,
        delayMs: config.downloadDelayMs,
        sendDirectMessage: createDirectMessageSender(readyClient),
      }),
    };

    readyClient.application.commands
      .set(commands.map((command) => command.data.toJSON()))
      .then((registered) => console.log(`[App] Registered ${registered.size} slash command(s).`))
      .catch((err: unknown) => console.error('[App] Failed to register slash commands:', err));

    console.log(`✅ Logged in as ${readyClient.user.tag}`);
    console.log(`[App] Archiving to ${path.resolve(config.downloadDirectory)}`);
  });

  client.on(Events.InteractionCreate, (interaction) => {
    if (!interaction.isChatInputCommand()) return;
    if (!ctx) {
      console.warn(`[App] Ignoring /${interaction.commandName}: bot is not ready yet.`);
      return;
    }
    handleCommand(interaction, ctx).catch((err: unknown) =>
      console.error(`[App] /${interaction.commandName} failed:`, err),
    );
  });

  return client;
}

async function startApp(): Promise<Client> {
  const config = loadEnvConfig();
  if (config.debugLog) {
    setupLogMirror(config.logFile);
  }

  console.log('[App] Initializing...');
  const client = createBot(config);
  await client.login(config.discordToken);
  return client;
}

if (process.env.NODE_ENV !== 'test') {
  startApp()
    .then((client) => {
      const shutdown = (signal: string) => {
        console.log(`[App] ${signal} received, shutting down.`);
        client
          .destroy()
          .catch((err: unknown) => console.error('[App] Error during shutdown:', err))
          .finally(() => process.exit(0));
      };
      process.once('SIGINT', () => shutdown('SIGINT'));
      process.once('SIGTERM', () => shutdown('SIGTERM'));
    })
    .catch((err: unknown) => {
      console.error('[App] Failed to start:', err);
      process.exit(1);
    });
}
