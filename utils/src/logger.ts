import winston from 'winston';
import chalk from 'chalk';

const { combine, timestamp, printf, colorize } = winston.format;

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';
export type LogMeta = Record<string, unknown>;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, ...meta }) => {
  const ts = new Date(String(timestamp)).toISOString().split('T')[1].split('.')[0];
  let output = `${chalk.gray(ts)} ${level}: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    output += `\n${chalk.gray(JSON.stringify(meta, null, 2))}`;
  }

  return output;
});

export class Logger {
  private winston: winston.Logger;

  constructor(options?: { level?: string; silent?: boolean }) {
    this.winston = winston.createLogger({
      level: options?.level || process.env.LOG_LEVEL || 'info',
      silent: options?.silent,
      format: combine(
        timestamp(),
        winston.format.errors({ stack: true }),
      ),
      transports: [
        new winston.transports.Console({
          // keep stdout free for report output
          stderrLevels: ['error', 'warn', 'info', 'debug'],
          format: combine(
            colorize({ all: true }),
            consoleFormat
          ),
        }),
      ],
    });

    // Add file transport in production
    if (process.env.NODE_ENV === 'production') {
      this.winston.add(new winston.transports.File({
        filename: 'attendance-monitor.log',
        format: combine(
          timestamp(),
          winston.format.json()
        ),
      }));
    }
  }

  get level(): string {
    return this.winston.level;
  }

  setLevel(level: LogLevel | string) {
    this.winston.level = level;
  }

  debug(message: string, meta?: LogMeta) {
    this.winston.debug(message, meta);
  }

  info(message: string, meta?: LogMeta) {
    this.winston.info(message, meta);
  }

  warn(message: string, meta?: LogMeta) {
    this.winston.warn(message, meta);
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    if (error instanceof Error) {
      this.winston.error(message, {
        error: error.message,
        stack: error.stack,
        ...meta,
      });
    } else if (error !== undefined) {
      this.winston.error(message, { error, ...meta });
    } else {
      this.winston.error(message, meta);
    }
  }

  success(message: string, meta?: LogMeta) {
    this.winston.info(chalk.green(message), meta);
  }
}

// Default logger instance
export const logger = new Logger();
