// src/core/logging/ActionLogger.ts

import { Logger, LogMetadata } from '../utils/Logger';

export type ActionCategory = 'general' | 'page' | 'element' | 'cache' | 'healing';

export type ActionLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ActionLogEntry {
  timestamp: Date;
  level: ActionLevel;
  category: ActionCategory;
  message: string;
  details?: LogMetadata;
}

export interface ActionHistoryFilter {
  category?: ActionCategory;
  level?: ActionLevel;
  contains?: string;
}

/**
 * Static facade for the harness's action trail. Every entry goes to the
 * `ActionLogger` named logger and into a bounded in-memory history.
 */
export class ActionLogger {
  private static instance: ActionLogger;
  private static readonly DEFAULT_MAX_HISTORY = 500;

  private readonly logger = Logger.getInstance('ActionLogger');
  private history: ActionLogEntry[] = [];
  private maxHistory = ActionLogger.DEFAULT_MAX_HISTORY;

  private constructor() {}

  static getInstance(): ActionLogger {
    if (!ActionLogger.instance) {
      ActionLogger.instance = new ActionLogger();
    }
    return ActionLogger.instance;
  }

  static logInfo(message: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('info', 'general', message, details);
  }

  static logDebug(message: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('debug', 'general', message, details);
  }

  static logWarn(message: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('warn', 'general', message, details);
  }

  static logError(message: string, error?: unknown, details?: LogMetadata): void {
    const errorDetails = error === undefined ? {} : { error: describeError(error) };
    ActionLogger.getInstance().record('error', 'general', message, { ...details, ...errorDetails });
  }

  static logPageOperation(operation: string, pageName: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('info', 'page', `Page operation: ${operation}`, {
      operation,
      pageName,
      ...details
    });
  }

  static logElementAction(action: string, elementName: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('info', 'element', `Element action: ${action} on '${elementName}'`, {
      action,
      elementName,
      ...details
    });
  }

  static logCacheOperation(operation: string, details?: LogMetadata): void {
    ActionLogger.getInstance().record('debug', 'cache', `Cache operation: ${operation}`, {
      operation,
      ...details
    });
  }

  static logHealing(elementName: string, locator: string, candidateIndex: number, details?: LogMetadata): void {
    ActionLogger.getInstance().record('warn', 'healing', `Fallback locator used for '${elementName}': ${locator}`, {
      elementName,
      locator,
      candidateIndex,
      ...details
    });
  }

  getHistory(filter: ActionHistoryFilter = {}): ActionLogEntry[] {
    return this.history.filter(entry =>
      (filter.category === undefined || entry.category === filter.category) &&
      (filter.level === undefined || entry.level === filter.level) &&
      (filter.contains === undefined || entry.message.includes(filter.contains))
    );
  }

  getLastEntry(): ActionLogEntry | undefined {
    return this.history[this.history.length - 1];
  }

  clearHistory(): void {
    this.history = [];
  }

  setMaxHistory(size: number): void {
    this.maxHistory = Math.max(1, size);
    this.trimHistory();
  }

  private record(level: ActionLevel, category: ActionCategory, message: string, details?: LogMetadata): void {
    const entry: ActionLogEntry = {
      timestamp: new Date(),
      level,
      category,
      message,
      ...(details && Object.keys(details).length > 0 && { details })
    };

    this.history.push(entry);
    this.trimHistory();

    const metadata = { category, ...details };
    switch (level) {
      case 'debug':
        this.logger.debug(message, metadata);
        break;
      case 'info':
        this.logger.info(message, metadata);
        break;
      case 'warn':
        this.logger.warn(message, metadata);
        break;
      case 'error':
        this.logger.error(message, metadata);
        break;
    }
  }

  private trimHistory(): void {
    if (this.history.length > this.maxHistory) {
      this.history = this.history.slice(-this.maxHistory);
    }
  }
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
