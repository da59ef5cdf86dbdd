import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
  level?: string;
  logDir?: string;
}

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
}

const managedLoggers = new Map<string, ManagedLogger>();

function resolveLevel(explicit: string | undefined): string {
  const candidate = (explicit ?? process.env.LOG_LEVEL ?? 'info').trim().toLowerCase();
  return candidate.length > 0 ? candidate : 'info';
}

function resolveLogDir(explicit: string | undefined): string | null {
  const configured = (explicit ?? process.env.LOG_DIR)?.trim();
  if (!configured) {
    return null;
  }
  return path.resolve(configured);
}

function createRunFileName(): string {
  const iso = new Date().toISOString().replace(/[:.]/g, '-');
  return `run-${iso}-${process.pid}.log`;
}

function openRunFile(logDir: string, name: string): { filePath: string; stream: fs.WriteStream } {
  const targetDir = path.join(logDir, name);
  fs.mkdirSync(targetDir, { recursive: true });
  const filePath = path.join(targetDir, createRunFileName());
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

/**
 * Returns the shared logger for `name`, creating it on first use. Output goes
 * to stdout and, when a log directory is configured, to a per-run file.
 */
export function makeLogger(name: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(name);
  if (existing) {
    return existing.logger;
  }

  // Stream entries pass everything through; the logger level does the filtering.
  const streams: StreamEntry[] = [{ level: 'trace', stream: process.stdout }];
  const logDir = resolveLogDir(options.logDir);
  let fileStream: fs.WriteStream | null = null;
  let filePath: string | null = null;
  if (logDir) {
    const run = openRunFile(logDir, name);
    fileStream = run.stream;
    filePath = run.filePath;
    streams.push({ level: 'trace', stream: run.stream });
  }

  const logger = pino(
    {
      level: resolveLevel(options.level),
      base: {
        service: name,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  managedLoggers.set(name, { logger, fileStream, filePath });
  return logger;
}

/** A disabled logger for library code that was not handed one. */
export function createSilentLogger(): Logger {
  return pino({ level: 'silent' });
}

export function getLogFilePath(name: string): string | null {
  return managedLoggers.get(name)?.filePath ?? null;
}

export function closeLogger(name: string): Promise<void> {
  const entry = managedLoggers.get(name);
  if (!entry) {
    return Promise.resolve();
  }

  managedLoggers.delete(name);
  try {
    entry.logger.flush();
  } catch (error) {
    console.warn(`Failed to flush logger ${name}:`, error);
  }

  const { fileStream } = entry;
  if (!fileStream) {
    return Promise.resolve();
  }
  return new Promise((resolve) => {
    fileStream.end(() => resolve());
  });
}
