import { config } from 'dotenv';
import path from 'path';
import { parseIdList } from 'lib/helpers';

const TOKEN_PLACEHOLDER = 'your_bot_token_here';
const DEFAULT_DOWNLOAD_DIRECTORY = './downloads';
const DEFAULT_LOG_FILE = path.join('logs', 'debug.log');
/** Seconds to wait between two file downloads */
const DEFAULT_DOWNLOAD_DELAY = 0.25;

export interface EnvConfig {
  /** Discord bot token */
  discordToken: string;
  /** Discord id of the bot owner; always authorised and copied on every completion DM */
  ownerId: string;
  approvedUsers: string[];
  downloadDirectory: string;
  /** Delay between files, in milliseconds */
  downloadDelayMs: number;
  /** Mirror console output to `logFile` */
  debugLog: boolean;
  logFile: string;
}

type Env = Record<string, string | undefined>;

const getEnvVar = (env: Env, key: string): string => {
  const value = env[key]?.trim();
  if (!value) {
    throw new Error(`Env variable ${key} is required`);
  }
  return value;
};

const isTruthy = (flag: string | undefined): boolean =>
  ['1', 'true', 'yes'].includes((flag ?? '').trim().toLowerCase());

function parseApprovedUsers(raw: string | undefined): string[] {
  if (!raw?.trim()) return [];
  const ids = parseIdList(raw);
  if (!ids) {
    console.warn('[Config] APPROVED_USERS must be a comma-separated list of user ids; ignoring it.');
    return [];
  }
  return ids;
}

function parseDelay(raw: string | undefined): number {
  if (!raw?.trim()) return DEFAULT_DOWNLOAD_DELAY * 1000;
  const seconds = Number(raw);
  if (!Number.isFinite(seconds) || seconds < 0) {
    console.warn(`[Config] Invalid DOWNLOAD_DELAY "${raw}", using ${DEFAULT_DOWNLOAD_DELAY}s.`);
    return DEFAULT_DOWNLOAD_DELAY * 1000;
  }
  return seconds * 1000;
}

/** Build the runtime config from an environment map. Throws on missing required values. */
export function parseEnvConfig(env: Env): EnvConfig {
  const discordToken = getEnvVar(env, 'DISCORD_TOKEN');
  if (discordToken === TOKEN_PLACEHOLDER) {
    throw new Error('Env variable DISCORD_TOKEN is required (replace the placeholder in .env)');
  }

  const ownerId = getEnvVar(env, 'OWNER_ID');
  if (!/^\d+$/.test(ownerId)) {
    throw new Error(`Env variable OWNER_ID must be a numeric user id, got "${ownerId}"`);
  }

  const downloadDirectory = env.DOWNLOAD_DIRECTORY?.trim() || DEFAULT_DOWNLOAD_DIRECTORY;

  return {
    discordToken,
    ownerId,
    approvedUsers: parseApprovedUsers(env.APPROVED_USERS),
    downloadDirectory,
    downloadDelayMs: parseDelay(env.DOWNLOAD_DELAY),
    debugLog: isTruthy(env.DEBUG_LOG),
    logFile: env.LOG_FILE?.trim() || DEFAULT_LOG_FILE,
  };
}

/** Load `.env` (values already in `process.env` win) and parse it. */
export function loadEnvConfig(): EnvConfig {
  config();
  return parseEnvConfig(process.env);
}
