// src/core/utils/Logger.ts

import * as util from 'util';

export enum LogLevel {
  DEBUG = 1,
  INFO = 2,
  WARN = 3,
  ERROR = 4,
  SILENT = 6
}

export type LogMetadata = Record<string, unknown>;

export interface LoggerConfig {
  level?: LogLevel;
  transports?: LogTransport[];
}

export interface LogTransport {
  name: string;
  write(info: LogInfo): void;
}

export interface LogInfo {
  level: LogLevel;
  levelName: string;
  message: string;
  timestamp: Date;
  logger: string;
  metadata: LogMetadata;
  error?: Error;
}

export class Logger {
  private static instances = new Map<string, Logger>();
  private static defaultLevel: LogLevel = Logger.parseLevel(process.env['LOG_LEVEL']);

  private level: LogLevel;
  private transports: LogTransport[];

  private constructor(private readonly name: string, config: LoggerConfig = {}) {
    this.level = config.level ?? Logger.defaultLevel;
    this.transports = config.transports ?? [new ConsoleTransport()];
  }

  public static getInstance(name: string = 'default', config?: LoggerConfig): Logger {
    let instance = Logger.instances.get(name);
    if (!instance) {
      instance = new Logger(name, config);
      Logger.instances.set(name, instance);
    }
    return instance;
  }

  /**
   * Applies a level to the defaults and to every logger created so far.
   */
  public static setGlobalLevel(level: LogLevel): void {
    Logger.defaultLevel = level;
    Logger.instances.forEach(instance => instance.setLevel(level));
  }

  public static parseLevel(value: string | undefined, fallback: LogLevel = LogLevel.INFO): LogLevel {
    if (!value) {
      return fallback;
    }
    switch (value.trim().toUpperCase()) {
      case 'DEBUG': return LogLevel.DEBUG;
      case 'INFO': return LogLevel.INFO;
      case 'WARN':
      case 'WARNING': return LogLevel.WARN;
      case 'ERROR': return LogLevel.ERROR;
      case 'SILENT':
      case 'OFF': return LogLevel.SILENT;
      default: return fallback;
    }
  }

  public debug(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, metadata);
  }

  public info(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.INFO, message, metadata);
  }

  public warn(message: string, metadata?: LogMetadata): void {
    this.log(LogLevel.WARN, message, metadata);
  }

  public error(message: string, error?: Error | LogMetadata, metadata?: LogMetadata): void {
    if (error instanceof Error) {
      this.log(LogLevel.ERROR, message, { ...metadata, error: { name: error.name, message: error.message } }, error);
    } else {
      this.log(LogLevel.ERROR, message, { ...error, ...metadata });
    }
  }

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public getLevel(): LogLevel {
    return this.level;
  }

  public addTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  public removeTransport(name: string): void {
    this.transports = this.transports.filter(t => t.name !== name);
  }

  private log(level: LogLevel, message: string, metadata: LogMetadata = {}, error?: Error): void {
    if (level < this.level) {
      return;
    }

    const info: LogInfo = {
      level,
      levelName: LogLevel[level],
      message,
      timestamp: new Date(),
      logger: this.name,
      metadata,
      ...(error && { error })
    };

    for (const transport of this.transports) {
      transport.write(info);
    }
  }
}

export class ConsoleTransport implements LogTransport {
  public name = 'console';

  public write(info: LogInfo): void {
    const line = prettyFormat(info);
    switch (info.level) {
      case LogLevel.DEBUG:
        console.debug(line);
        break;
      case LogLevel.INFO:
        console.info(line);
        break;
      case LogLevel.WARN:
        console.warn(line);
        break;
      default:
        console.error(line);
    }
  }
}

const COLORS: Record<string, string> = {
  DEBUG: '\x1b[36m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m'
};

export function prettyFormat(info: LogInfo): string {
  const reset = '\x1b[0m';
  const color = COLORS[info.levelName] ?? reset;
  const level = info.levelName.padEnd(5);

  let line = `[${info.timestamp.toISOString()}] ${color}[${level}]${reset} [${info.logger}] ${info.message}`;
  if (Object.keys(info.metadata).length > 0) {
    line += ` ${util.inspect(info.metadata, { colors: true, depth: 3, breakLength: Infinity })}`;
  }
  if (info.error?.stack) {
    line += `\n${color}${info.error.stack}${reset}`;
  }
  return line;
}

let defaultLogger: Logger | null = null;

function instance(): Logger {
  if (!defaultLogger) {
    defaultLogger = Logger.getInstance();
  }
  return defaultLogger;
}

export const logger = {
  debug(message: string, metadata?: LogMetadata): void {
    instance().debug(message, metadata);
  },

  info(message: string, metadata?: LogMetadata): void {
    instance().info(message, metadata);
  },

  warn(message: string, metadata?: LogMetadata): void {
    instance().warn(message, metadata);
  },

  error(message: string, error?: Error | LogMetadata, metadata?: LogMetadata): void {
    instance().error(message, error, metadata);
  }
};
