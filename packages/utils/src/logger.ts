/**
 * Structured logging on winston.
 *
 * Every entry carries the logger's namespace and any context bound with
 * `child()` (run directory, trial index, parameter name). Console output goes
 * to stderr so stdout stays free for command results.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  runId?: string;
  parameter?: string;
  trialIndex?: number;
  stage?: string;
  [key: string]: unknown;
}

interface LogSettings {
  level: string;
  console: boolean;
  file: boolean;
  dir: string;
  maxFiles: string;
  maxSize: string;
  production: boolean;
}

function readLogSettings(env: NodeJS.ProcessEnv): LogSettings {
  const production = env.NODE_ENV === 'production';
  return {
    level: env.LOG_LEVEL || (production ? 'info' : 'debug'),
    console: env.LOG_CONSOLE !== 'false',
    // tests never write log files
    file: env.LOG_FILE !== 'false' && env.NODE_ENV !== 'test',
    dir: env.LOG_DIR || path.join(process.cwd(), 'logs'),
    maxFiles: env.LOG_MAX_FILES || '14d',
    maxSize: env.LOG_MAX_SIZE || '20m',
    production,
  };
}

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss.SSS';

const jsonFormat = winston.format.combine(
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const readableFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: TIMESTAMP }),
  winston.format.printf(({ timestamp, level, message, ...fields }) => {
    const head = `[${String(timestamp)}] ${level}: ${String(message)}`;
    return Object.keys(fields).length ? `${head}\n${JSON.stringify(fields, null, 2)}` : head;
  })
);

function rotatingFile(settings: LogSettings, name: string, level?: LogLevel): DailyRotateFile {
  return new DailyRotateFile({
    filename: path.join(settings.dir, `${name}-%DATE%.log`),
    datePattern: 'YYYY-MM-DD',
    format: jsonFormat,
    maxSize: settings.maxSize,
    maxFiles: settings.maxFiles,
    zippedArchive: true,
    ...(level ? { level } : {}),
  });
}

function buildTransports(settings: LogSettings): winston.transport[] {
  const transports: winston.transport[] = [];
  if (settings.console) {
    transports.push(
      new winston.transports.Console({
        format: settings.production ? jsonFormat : readableFormat,
        stderrLevels: ['error', 'warn', 'info', 'debug'],
      })
    );
  }
  if (settings.file) {
    try {
      fs.mkdirSync(settings.dir, { recursive: true });
      transports.push(rotatingFile(settings, 'error', 'error'), rotatingFile(settings, 'combined'));
    } catch (error) {
      // the logger is not up yet; console is the only channel left
      console.error(`Log files disabled, cannot use ${settings.dir}:`, error);
    }
  }
  return transports;
}

const settings = readLogSettings(process.env);
const transports = buildTransports(settings);

export const winstonLogger = winston.createLogger({
  level: settings.level,
  format: jsonFormat,
  defaultMeta: { service: 'cae' },
  transports,
  exitOnError: false,
  silent: transports.length === 0,
});

function describeError(error: unknown): unknown {
  return error instanceof Error ? { message: error.message, stack: error.stack, name: error.name } : error;
}

/**
 * Namespaced logger. Context is fixed at construction; `child()` returns a
 * new logger with more context and leaves this one unchanged.
 */
export class Logger {
  constructor(
    private readonly namespace: string = 'cae',
    private readonly context: LogContext = {}
  ) {}

  private write(level: LogLevel, message: string, context?: LogContext): void {
    winstonLogger.log(level, message, { namespace: this.namespace, ...this.context, ...context });
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.write('error', message, error === undefined ? context : { ...context, error: describeError(error) });
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  child(context: LogContext): Logger {
    return new Logger(this.namespace, { ...this.context, ...context });
  }
}

export function createLogger(namespace: string): Logger {
  return new Logger(namespace);
}

export const logger = new Logger();
