/**
 * Structured Logger with Pino
 *
 * Features:
 * - Fast JSON logging with Pino
 * - Pretty console output in DEV
 * - Optional daily rotated log files
 * - Automatic secret redaction
 * - Request tracking via child loggers
 */

import pino from 'pino';
import type { DestinationStream, StreamEntry } from 'pino';
import * as rfs from 'rotating-file-stream';
import pinoPretty from 'pino-pretty';
import path from 'path';
import fs from 'fs';
import { getLoggingConfig } from '../../config/logging.config.js';

const config = getLoggingConfig();

function createFileStream(): DestinationStream | undefined {
  if (!config.toFile) return undefined;

  const logsDir = path.resolve(process.cwd(), config.dir);
  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  return rfs.createStream('server.log', {
    interval: '1d',
    path: logsDir,
    maxFiles: config.rotateDays,
    compress: 'gzip',
  });
}

const fileStream = createFileStream();
const streams: StreamEntry[] = [];

if (config.console) {
  streams.push({
    level: config.level === 'silent' ? 'info' : config.level,
    stream: config.pretty
      ? pinoPretty({
          colorize: true,
          translateTime: 'SYS:HH:MM:ss',
          ignore: 'pid,hostname',
        })
      : process.stdout,
  });
}

if (fileStream) {
  streams.push({
    level: config.level === 'silent' ? 'info' : config.level,
    stream: fileStream,
  });
}

export const logger = pino(
  {
    level: config.level,
    redact: {
      paths: config.redactFields,
      censor: '[REDACTED]',
    },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.multistream(streams)
);

export type Logger = pino.Logger;
