/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - File logging with daily rotation
 * - Console output for development
 * - JSON lines to any writable stream
 * - Telegram alerts for critical errors
 * - Structured JSON logs with bigint amounts rendered as decimal strings
 * - Context injection (service, pool, operation, caller, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import TelegramBot from 'node-telegram-bot-api';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export interface LoggerConfig {
  /** Service name (engine, pool, ops) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Enable file logging */
  file?: boolean;
  /** Drop every entry (tests, embedded use) */
  silent?: boolean;
  /** Log directory */
  logDir?: string;
  /** Also write JSON lines to this stream */
  stream?: NodeJS.WritableStream;
  /** Telegram bot token */
  telegramToken?: string;
  /** Telegram chat ID to send alerts to */
  telegramChatId?: string;
  /** Only alert on these levels */
  telegramLevels?: LogLevel[];
}

export interface LogContext {
  [key: string]: unknown;
}

export interface TelegramTarget {
  bot: TelegramBot;
  chatId: string;
  levels: Set<LogLevel>;
}

/**
 * JSON.stringify replacer that keeps scaled amounts readable
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Stringify a log context, bigint-safe
 */
export function stringifyContext(context: unknown, space?: number): string {
  return JSON.stringify(context, bigintReplacer, space);
}

// winston.format.json() throws on bigint, so amounts are converted first
const bigintToString = winston.format((info) => {
  for (const key of Object.keys(info)) {
    const value = info[key];
    if (typeof value === 'bigint') {
      info[key] = value.toString();
    } else if (value !== null && typeof value === 'object' && !(value instanceof Error)) {
      info[key] = JSON.parse(stringifyContext(value));
    }
  }
  return info;
});

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  private service: string;
  private telegram?: TelegramTarget;

  constructor(config: LoggerConfig, base?: { logger: winston.Logger; telegram?: TelegramTarget }) {
    this.service = config.service;

    if (base) {
      this.logger = base.logger;
      this.telegram = base.telegram;
      return;
    }

    // Initialize Telegram bot if provided
    if (config.telegramToken && config.telegramChatId) {
      this.telegram = {
        bot: new TelegramBot(config.telegramToken, { polling: false }),
        chatId: config.telegramChatId,
        levels: new Set(config.telegramLevels ?? ['error']),
      };
    }

    const fileEnabled = config.file !== false && config.silent !== true;

    // Create log directory
    const logDir = config.logDir || path.join(process.cwd(), 'logs', config.service);
    if (fileEnabled) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    // Define log format
    const logFormat = winston.format.combine(
      bigintToString(),
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? `\n${stringifyContext(meta, 2)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    // Create transports
    const transports: winston.transport[] = [];

    if (config.console !== false && config.silent !== true) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
        })
      );
    }

    if (config.stream && config.silent !== true) {
      transports.push(new winston.transports.Stream({ stream: config.stream, format: logFormat }));
    }

    // File transports (with daily rotation)
    if (fileEnabled) {
      // Combined logs
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      // Error logs (separate file)
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    this.logger = winston.createLogger({
      level: config.level || 'info',
      silent: config.silent === true,
      defaultMeta: { service: config.service },
      transports,
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  /**
   * Log with level and context
   */
  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);

    const telegram = this.telegram;
    if (telegram && telegram.levels.has(level)) {
      this.sendTelegramAlert(telegram, level, message, context).catch((error: unknown) => {
        // Alert delivery never fails the operation that logged
        this.logger.error('Failed to send Telegram alert', {
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }

  private async sendTelegramAlert(
    telegram: TelegramTarget,
    level: LogLevel,
    message: string,
    context?: LogContext
  ): Promise<void> {
    const timestamp = new Date().toISOString();

    let telegramMessage = `${this.getLevelEmoji(level)} <b>${level.toUpperCase()}: ${this.service}</b>\n\n`;
    telegramMessage += `<b>Message:</b>\n<code>${this.escapeHtml(message)}</code>\n\n`;

    if (context && Object.keys(context).length > 0) {
      telegramMessage += `<b>Context:</b>\n<code>${this.escapeHtml(stringifyContext(context, 2))}</code>\n\n`;
    }

    telegramMessage += `🕐 ${timestamp}`;

    await telegram.bot.sendMessage(telegram.chatId, telegramMessage, {
      parse_mode: 'HTML',
    });
  }

  private escapeHtml(text: string): string {
    return text
      .replace(/&/g, '&amp;')
      .replace(/</g, '&lt;')
      .replace(/>/g, '&gt;')
      .replace(/"/g, '&quot;');
  }

  private getLevelEmoji(level: LogLevel): string {
    switch (level) {
      case 'error':
        return '🔴';
      case 'warn':
        return '⚠️';
      case 'info':
        return 'ℹ️';
      case 'debug':
        return '🐛';
    }
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger(
      { service: this.service },
      { logger: this.logger.child(context), telegram: this.telegram }
    );
  }

  /**
   * Close logger and flush logs
   */
  async close(): Promise<void> {
    return new Promise((resolve) => {
      this.logger.close();
      // Give it a moment to flush
      setTimeout(resolve, 100);
    });
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}

/**
 * Logger that drops everything; default for pools created without one
 */
export function createSilentLogger(service = 'pool'): Logger {
  return new Logger({ service, silent: true, console: false, file: false });
}
