import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

import pino, { multistream, type Logger as PinoLogger, type StreamEntry } from 'pino';

const packageDirectory = fileURLToPath(new URL('.', import.meta.url));
const repositoryRoot = path.resolve(packageDirectory, '..', '..', '..');

export type Logger = PinoLogger;

export interface LoggerOptions {
  /** Overrides `LOG_LEVEL`. */
  level?: string;
  /** Overrides `LOG_TO_FILE`; file output is off under `NODE_ENV=test`. */
  toFile?: boolean;
}

interface ManagedLogger {
  logger: Logger;
  fileStream: fs.WriteStream | null;
  filePath: string | null;
  detach: () => void;
}

const managedLoggers = new Map<string, ManagedLogger>();

function envFlag(name: string): boolean | undefined {
  const raw = process.env[name]?.trim();
  if (raw === '1' || raw === 'true') {
    return true;
  }
  if (raw === '0' || raw === 'false') {
    return false;
  }
  return undefined;
}

function resolveLogRoot(): string {
  const configured = process.env.LOG_DIR?.trim();
  if (configured && configured.length > 0) {
    return path.resolve(configured);
  }
  return path.join(repositoryRoot, 'logs');
}

function shouldWriteFile(options: LoggerOptions): boolean {
  if (typeof options.toFile === 'boolean') {
    return options.toFile;
  }
  return envFlag('LOG_TO_FILE') ?? (process.env.NODE_ENV ?? '').toLowerCase() !== 'test';
}

function shouldCleanLogsOnStart(): boolean {
  return envFlag('CLEAN_LOGS_ON_START') ?? (process.env.NODE_ENV ?? '').toLowerCase() !== 'production';
}

function openRunFile(serviceName: string): { filePath: string; stream: fs.WriteStream } {
  const serviceDir = path.join(resolveLogRoot(), serviceName);

  if (shouldCleanLogsOnStart()) {
    try {
      fs.rmSync(serviceDir, { recursive: true, force: true });
    } catch (error) {
      console.warn(`Failed to clean logs for ${serviceName}:`, error);
    }
  }
  fs.mkdirSync(serviceDir, { recursive: true });

  const stamp = new Date().toISOString().replace(/[:.]/g, '-');
  const filePath = path.join(serviceDir, `run-${stamp}-${process.pid}.log`);
  const stream = fs.createWriteStream(filePath, { flags: 'a', encoding: 'utf8' });
  return { filePath, stream };
}

function drain(stream: fs.WriteStream): Promise<void> {
  return new Promise((resolve) => {
    if (stream.destroyed || stream.closed) {
      resolve();
      return;
    }
    stream.write('', 'utf8', () => resolve());
  });
}

function attachProcessHandlers(logger: Logger, fileStream: fs.WriteStream | null): () => void {
  let flushed = false;

  const onRejection = (reason: unknown) => {
    logger.error({ err: reason }, 'Unhandled promise rejection');
  };

  const onBeforeExit = async (code: number) => {
    if (flushed) {
      return;
    }
    flushed = true;
    logger.debug({ code }, 'Process exiting, flushing logs');
    try {
      logger.flush();
      if (fileStream) {
        await drain(fileStream);
      }
    } catch (error) {
      logger.error({ err: error }, 'Failed to flush logs on exit');
    }
  };

  process.on('unhandledRejection', onRejection);
  process.on('beforeExit', onBeforeExit);

  return () => {
    process.off('unhandledRejection', onRejection);
    process.off('beforeExit', onBeforeExit);
  };
}

/**
 * Returns the logger for `serviceName`, creating it on first use. Every service
 * logs to stdout and, unless disabled, to `logs/<service>/run-<timestamp>-<pid>.log`.
 */
export function makeLogger(serviceName: string, options: LoggerOptions = {}): Logger {
  const existing = managedLoggers.get(serviceName);
  if (existing) {
    return existing.logger;
  }

  const level = (options.level ?? process.env.LOG_LEVEL ?? 'debug').toLowerCase();
  const streams: StreamEntry[] = [{ stream: process.stdout }];

  let file: { filePath: string; stream: fs.WriteStream } | null = null;
  if (shouldWriteFile(options)) {
    file = openRunFile(serviceName);
    streams.push({ stream: file.stream });
  }

  const logger = pino(
    {
      level,
      base: {
        service: serviceName,
        pid: process.pid,
        hostname: os.hostname(),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    multistream(streams),
  );

  managedLoggers.set(serviceName, {
    logger,
    fileStream: file?.stream ?? null,
    filePath: file?.filePath ?? null,
    detach: attachProcessHandlers(logger, file?.stream ?? null),
  });

  return logger;
}

export function getLogFilePath(serviceName: string): string | null {
  return managedLoggers.get(serviceName)?.filePath ?? null;
}

export function closeLogger(serviceName: string): void {
  const entry = managedLoggers.get(serviceName);
  if (!entry) {
    return;
  }

  entry.detach();
  try {
    entry.logger.flush();
  } catch (error) {
    console.warn(`Failed to flush logger for ${serviceName}:`, error);
  }
  entry.fileStream?.end();
  managedLoggers.delete(serviceName);
}
