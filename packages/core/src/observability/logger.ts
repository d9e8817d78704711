/**
 * Query engine diagnostics.
 *
 * The engine reports operator and getter registrations and timed `orderBy`
 * passes. Nothing is emitted unless the logger was created with `debug: true`
 * or global debug mode is on. Entries go to the configured handler, or to
 * `console.debug` as JSON lines.
 *
 * @module observability/logger
 */

/** Structured log entry */
export interface LogEntry {
  readonly message: string;
  readonly timestamp: number;
  readonly module: string;
  readonly context?: Record<string, unknown>;
}

/** Logger configuration */
export interface QueryListLoggerConfig {
  /** Emit diagnostics (default: false, unless global debug mode is on) */
  readonly debug?: boolean;
  /** Module name attached to every entry */
  readonly module?: string;
  /** Custom log handler */
  readonly handler?: (entry: LogEntry) => void;
}

let globalDebug = false;

/** Enable/disable global debug mode for all loggers */
export function setDebugMode(enabled: boolean): void {
  globalDebug = enabled;
}

/** Check if global debug mode is enabled */
export function isDebugMode(): boolean {
  return globalDebug;
}

/**
 * Diagnostics logger for query lists.
 *
 * @example
 * ```typescript
 * import { QueryList, createLogger } from '@querylist/core';
 *
 * const log = createLogger({ module: 'reports', debug: true });
 *
 * const dogs = new QueryList(records, { logger: log });
 * dogs.orderBy('-number'); // logs "orderBy completed" with durationMs
 * ```
 */
export class QueryListLogger {
  private readonly enabled: boolean;
  private readonly handler: ((entry: LogEntry) => void) | undefined;

  /** Module name attached to every entry */
  readonly module: string;

  constructor(config: QueryListLoggerConfig = {}) {
    this.enabled = config.debug ?? false;
    this.module = config.module ?? 'querylist';
    this.handler = config.handler;
  }

  /** Whether entries are currently emitted */
  get isEnabled(): boolean {
    return this.enabled || globalDebug;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled) return;

    const entry: LogEntry = {
      message,
      timestamp: Date.now(),
      module: this.module,
      ...(context ? { context } : {}),
    };

    if (this.handler) {
      this.handler(entry);
      return;
    }
    console.debug(JSON.stringify(entry));
  }

  /**
   * Start a timer. Returns a function that logs `<operation> completed` with
   * `durationMs` merged into the given context.
   */
  time(operation: string): (context?: Record<string, unknown>) => void {
    const start = performance.now();
    return (context?: Record<string, unknown>) => {
      const durationMs = Math.round((performance.now() - start) * 100) / 100;
      this.debug(`${operation} completed`, { ...context, durationMs });
    };
  }
}

/** Factory function to create a QueryListLogger */
export function createLogger(config?: QueryListLoggerConfig): QueryListLogger {
  return new QueryListLogger(config);
}
