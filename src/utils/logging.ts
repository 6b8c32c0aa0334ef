import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../connections/config/app.config';

interface LoggingOptions {
  level: string;
  logDir: string;
  toFile: boolean;
  silent: boolean;
}

interface LogInfo {
  level: string;
  message: unknown;
  [key: string]: unknown;
}

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private toFile: boolean;
  private silent: boolean;

  constructor(options: LoggingOptions) {
    this.logLevel = options.level;
    // Rotated files: 10MB each, kept 30 days, gzipped
    this.rotation = '10MB';
    this.retention = '30d';
    this.compression = true;
    this.logDir = options.logDir;
    this.toFile = options.toFile;
    this.silent = options.silent;

    if (this.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private formatLine(info: LogInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.colorize({ all: true }),
      winston.format.printf((info) => this.formatLine(info, ''))
    );
  }

  private createFileFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.printf((info) => this.formatLine(info, 'Stack: '))
    );
  }

  private parseRotation(rotation: string): { maxSize?: string; datePattern?: string } {
    if (rotation.includes('MB') || rotation.includes('KB') || rotation.includes('GB')) {
      return { maxSize: rotation };
    } else if (rotation.includes('day') || rotation.includes('hour')) {
      return { datePattern: 'YYYY-MM-DD' };
    }
    return { maxSize: '10MB' };
  }

  private createFileTransport(prefix: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);
    return new DailyRotateFile({
      filename: path.join(this.logDir, `${prefix}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.retention,
      zippedArchive: this.compression,
      level,
      format: this.createFileFormat(),
    });
  }

  setupLogging(): winston.Logger {
    const logger = winston.createLogger({
      level: this.logLevel,
      format: this.createFileFormat(),
      transports: [],
      exitOnError: false,
      silent: this.silent,
    });

    logger.add(new winston.transports.Console({
      level: this.logLevel,
      format: this.createConsoleFormat(),
    }));

    if (this.toFile) {
      logger.add(this.createFileTransport('app'));
      logger.add(this.createFileTransport('error', 'error'));
    }

    return logger;
  }
}

const loggingConfig = new LoggingConfig({
  level: appConfig.logLevel,
  logDir: appConfig.logDir,
  toFile: appConfig.logToFile,
  silent: appConfig.nodeEnv === 'test',
});

export const logger = loggingConfig.setupLogging();
