/**
 * Structured logger with configurable verbosity
 * Supports lazy evaluation and batched writes for minimal performance impact
 */

import type { RecommendedLeg } from '../types/candidate';
import type { DataQualityError } from './errors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogEntry = {
  timestamp: string;
  level: LogLevel;
  module: string;
  message: string;
  data?: unknown;
};

// Global log store for in-process viewing
const logStore: LogEntry[] = [];
const MAX_LOG_ENTRIES = 1000;

// Log level hierarchy
const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

// Loggers holding unflushed entries, drained before the process exits
const unflushed = new Set<Logger>();

function drainUnflushed() {
  for (const logger of unflushed) logger.flush();
}

// Default log level from environment
const DEFAULT_LOG_LEVEL: LogLevel = isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info';

export class Logger {
  private pendingLogs: LogEntry[] = [];
  private flushTimer: NodeJS.Timeout | null = null;
  private currentLevel: number;

  constructor(
    private module: string,
    private level: LogLevel = DEFAULT_LOG_LEVEL
  ) {
    this.currentLevel = LOG_LEVELS[level];
  }

  /**
   * Debug logging with lazy evaluation
   */
  debug(message: string | (() => string), data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.debug) return;

    // Lazy evaluation - only compute if needed
    const actualMessage = typeof message === 'function' ? message() : message;
    const actualData = typeof data === 'function' ? data() : data;

    this.log('debug', actualMessage, actualData);
  }

  info(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.info) return;
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    if (this.currentLevel > LOG_LEVELS.warn) return;
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  /**
   * Log a section header for better organization
   */
  section(title: string, emoji = '📌') {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const separator = '═'.repeat(35);
    this.log('info', `${emoji} ${title.toUpperCase()}\n${separator}`);
  }

  /**
   * Log a summary with formatted key-value pairs
   */
  summary(data: Record<string, unknown>) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const lines = Object.entries(data).map(([key, value]) => {
      const formattedKey = key.replace(/_/g, ' ').replace(/\b\w/g, l => l.toUpperCase());
      return `  • ${formattedKey}: ${value}`;
    });

    this.log('info', lines.join('\n'));
  }

  /**
   * One line per recommended leg
   */
  leg(leg: RecommendedLeg) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const emoji = leg.confidence_tier === 'high' ? '🟢' : leg.confidence_tier === 'medium' ? '🟡' : '🔵';
    const edge = (leg.edge * 100).toFixed(2);
    const message = `${emoji} #${leg.rank} ${leg.selection} @ ${leg.decimal_odds}\n   Edge: ${edge}% | EV: ${leg.expected_value.toFixed(4)} | Score: ${leg.composite_score.toFixed(3)}`;

    this.log('info', message);
  }

  /**
   * Log Stage-1 near misses for diagnostics
   */
  nearMiss(selection: string, edge: number, threshold: number, reason: string) {
    if (this.currentLevel > LOG_LEVELS.info) return;

    const edgePercent = (edge * 100).toFixed(2);
    const thresholdPercent = (threshold * 100).toFixed(2);
    const missPercent = ((edge / threshold) * 100).toFixed(0);

    const message = `  ⚠️ Near miss: ${selection} (${edgePercent}% edge, needs ${thresholdPercent}% - ${missPercent}% of threshold)\n     Reason: ${reason}`;

    this.log('info', message);
  }

  /**
   * Estimator fell back or imputed a feature
   */
  dataQuality(issue: DataQualityError) {
    this.warn(`Data quality: ${issue.message}`, {
      code: issue.code,
      candidate: issue.candidateKey,
      feature: issue.feature,
    });
  }

  /**
   * Performance timing helper
   */
  time(label: string): () => void {
    if (this.currentLevel > LOG_LEVELS.debug) return () => {};

    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.debug(`${label} took ${duration.toFixed(2)}ms`);
    };
  }

  /**
   * Core logging function with batching
   */
  private log(level: LogLevel, message: string, data?: unknown) {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      module: this.module,
      message,
      data,
    };

    // Add to in-memory store (circular buffer)
    logStore.push(entry);
    if (logStore.length > MAX_LOG_ENTRIES) {
      logStore.shift();
    }

    this.pendingLogs.push(entry);

    // Warnings and errors go out straight away
    if (LOG_LEVELS[level] >= LOG_LEVELS.warn) {
      this.flush();
      return;
    }

    if (!this.flushTimer) {
      if (unflushed.size === 0) process.on('beforeExit', drainUnflushed);
      unflushed.add(this);
      this.flushTimer = setTimeout(() => this.flush(), 10);
      this.flushTimer.unref();
    }
  }

  /**
   * Flush pending logs to console
   */
  flush() {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    if (unflushed.delete(this) && unflushed.size === 0) {
      process.off('beforeExit', drainUnflushed);
    }
    if (this.pendingLogs.length === 0) return;

    for (const log of this.pendingLogs) {
      const prefix = `[${log.timestamp}] [${log.level.toUpperCase()}] [${log.module}]`;
      const color = this.getColor(log.level);

      console.log(`${color}${prefix}${this.resetColor()} ${log.message}`);

      if (log.data) {
        console.log(JSON.stringify(log.data, null, 2));
      }
    }

    this.pendingLogs = [];
  }

  private getColor(level: LogLevel): string {
    // Only use colors in development
    if (process.env.NODE_ENV === 'production') return '';

    switch (level) {
      case 'debug': return '\x1b[90m'; // Gray
      case 'info': return '\x1b[36m';  // Cyan
      case 'warn': return '\x1b[33m';  // Yellow
      case 'error': return '\x1b[31m'; // Red
    }
  }

  private resetColor(): string {
    return process.env.NODE_ENV === 'production' ? '' : '\x1b[0m';
  }
}

/**
 * Get all stored logs
 */
export function getStoredLogs(
  filter?: {
    level?: LogLevel;
    module?: string;
    startTime?: string;
    endTime?: string;
    search?: string;
  }
): LogEntry[] {
  let logs = [...logStore];

  if (filter) {
    if (filter.level) {
      const minLevel = LOG_LEVELS[filter.level];
      logs = logs.filter(log => LOG_LEVELS[log.level] >= minLevel);
    }

    if (filter.module) {
      const moduleFilter = filter.module;
      logs = logs.filter(log => log.module.includes(moduleFilter));
    }

    if (filter.startTime) {
      const startTimeFilter = filter.startTime;
      logs = logs.filter(log => log.timestamp >= startTimeFilter);
    }

    if (filter.endTime) {
      const endTimeFilter = filter.endTime;
      logs = logs.filter(log => log.timestamp <= endTimeFilter);
    }

    if (filter.search) {
      const searchLower = filter.search.toLowerCase();
      logs = logs.filter(log =>
        log.message.toLowerCase().includes(searchLower) ||
        (log.data !== undefined && JSON.stringify(log.data).toLowerCase().includes(searchLower))
      );
    }
  }

  return logs;
}

/**
 * Clear stored logs
 */
export function clearStoredLogs() {
  logStore.length = 0;
}
