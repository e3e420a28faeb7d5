import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig, loggingConfig } from '../connections/config/app.config';

const isCallSiteArray = (value: unknown): value is NodeJS.CallSite[] =>
  Array.isArray(value) && value.every((frame) => typeof frame === 'object' && frame !== null && 'getFileName' in frame);

class LoggingConfig {
  private logLevel: string;
  private rotation: string;
  private retention: string;
  private compression: boolean;
  private logDir: string;
  private toFile: boolean;
  private silent: boolean;

  constructor() {
    const isTest = appConfig.nodeEnv === 'test';

    this.logLevel = (loggingConfig.level || (appConfig.nodeEnv === 'production' ? 'info' : 'debug')).toLowerCase();
    this.rotation = loggingConfig.rotation;
    this.retention = loggingConfig.retention;
    this.compression = true;
    this.logDir = path.resolve(process.cwd(), loggingConfig.dir);
    // Tests stay quiet and never touch the filesystem unless LOG_LEVEL asks for output
    this.silent = isTest && !loggingConfig.level;
    this.toFile = loggingConfig.toFile && !isTest;

    if (this.toFile && !fs.existsSync(this.logDir)) {
      fs.mkdirSync(this.logDir, { recursive: true });
    }
  }

  private getCallerInfo(): { file?: string; line?: number; function?: string } {
    const originalFunc = Error.prepareStackTrace;
    let callerfile: string | undefined;
    let callerline: number | undefined;
    let callerfunction: string | undefined;

    try {
      Error.prepareStackTrace = (_err, stack) => stack;
      const stack: unknown = new Error().stack;

      if (isCallSiteArray(stack)) {
        // Skip getCallerInfo itself and the winston format function
        for (let i = 2; i < stack.length; i++) {
          const frame = stack[i];
          const file = frame.getFileName();

          if (file && !file.includes('node_modules') && !file.includes('winston') && !file.endsWith('logging.ts')) {
            callerfile = path.relative(process.cwd(), file);
            callerline = frame.getLineNumber() ?? undefined;
            callerfunction = frame.getFunctionName() || 'anonymous';
            break;
          }
        }
      }
    } finally {
      Error.prepareStackTrace = originalFunc;
    }

    return { file: callerfile, line: callerline, function: callerfunction };
  }

  private formatLine(info: winston.Logform.TransformableInfo, stackPrefix: string): string {
    const { timestamp, level, message, stack, ...meta } = info;
    const callerInfo = this.getCallerInfo();
    const location = callerInfo.file && callerInfo.line
      ? ` | ${callerInfo.file}:${callerInfo.line}${callerInfo.function ? ` (${callerInfo.function})` : ''}`
      : '';

    const stackStr = typeof stack === 'string' ? `\n${stackPrefix}${stack}` : '';
    const metaStr = Object.keys(meta).length ? ` | ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} | ${level} | ${String(message)}${location}${metaStr}${stackStr}`;
  }

  private createConsoleFormat() {
    return winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
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

  private parseRetention(retention: string): string {
    // "30 days" -> "30d"
    const match = retention.match(/(\d+)\s*(day|days|d|hour|hours|h)/i);
    if (match) {
      const num = match[1];
      const unit = match[2].toLowerCase();
      if (unit.startsWith('d')) return `${num}d`;
      if (unit.startsWith('h')) return `${num}h`;
    }
    return '30d';
  }

  private createFileTransport(name: string, level?: string): DailyRotateFile {
    const rotationConfig = this.parseRotation(this.rotation);

    return new DailyRotateFile({
      filename: path.join(this.logDir, `${name}-%DATE%.log`),
      datePattern: rotationConfig.datePattern || 'YYYY-MM-DD',
      maxSize: rotationConfig.maxSize,
      maxFiles: this.parseRetention(this.retention),
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
      logger.add(this.createFileTransport('sys'));
      logger.add(this.createFileTransport('error', 'error'));
      logger.add(this.createFileTransport('combined', 'silly'));
    }

    return logger;
  }
}

export const logger = new LoggingConfig().setupLogging();

export { LoggingConfig };

export function auditLog(event: string, details: Record<string, unknown> = {}) {
  logger.info(`[AUDIT] ${event}`, details);
}

/**
 * Normalize anything caught into an Error so winston keeps its stack
 */
export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));
