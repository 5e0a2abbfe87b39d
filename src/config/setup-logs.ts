import fs from 'fs';
import path from 'path';
import util from 'util';

const RETENTION_MS = 7 * 24 * 60 * 60 * 1000;
const ROTATED_LOG = /^debug-\d{4}-\d{2}-\d{2}\.log$/;

/**
 * Move yesterday's log aside as `debug-YYYY-MM-DD.log` and delete rotated
 * files older than a week.
 */
export function rotateLogs(logFile: string, now = Date.now()): void {
  const logDir = path.dirname(logFile);

  if (fs.existsSync(logFile)) {
    const dateStr = fs.statSync(logFile).mtime.toISOString().slice(0, 10);
    const rotated = path.join(logDir, `debug-${dateStr}.log`);
    if (dateStr !== new Date(now).toISOString().slice(0, 10) && !fs.existsSync(rotated)) {
      fs.renameSync(logFile, rotated);
    }
  }

  const cutoff = now - RETENTION_MS;
  for (const name of fs.readdirSync(logDir)) {
    if (!ROTATED_LOG.test(name)) continue;
    const file = path.join(logDir, name);
    try {
      if (fs.statSync(file).mtime.getTime() < cutoff) {
        fs.unlinkSync(file);
      }
    } catch (err) {
      console.warn(`[Logs] Could not remove old log ${file}:`, err);
    }
  }
}

type ConsoleMethod = 'log' | 'warn' | 'error';

/** Mirror every console.log/warn/error call, timestamped, into `logFile`. */
export function setupLogMirror(logFile: string): void {
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  rotateLogs(logFile);

  const originalConsole = {
    log: console.log.bind(console),
    warn: console.warn.bind(console),
    error: console.error.bind(console),
  } as const;

  function writeLog(message: string): void {
    const entry = `[${new Date().toISOString()}] ${message}\n`;
    try {
      fs.appendFileSync(logFile, entry);
    } catch (err) {
      originalConsole.error('Failed to write debug log', err);
    }
  }

  const methods: ConsoleMethod[] = ['log', 'warn', 'error'];
  for (const method of methods) {
    const original = originalConsole[method];
    console[method] = (...args: unknown[]) => {
      writeLog(util.format(...args));
      original(...args);
    };
  }
}
