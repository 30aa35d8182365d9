/**
 * Logging utility for the search cluster operator
 * Provides configurable logging for the operator's components
 */

export interface LoggingConfig {
  enableOperatorLogs?: boolean;
  enableReconcilerLogs?: boolean;
  enableBackendLogs?: boolean;
  enableTestMode?: boolean;
}

/**
 * Logging surface the operator components depend on
 */
export interface Logger {
  operator(message: string, ...args: unknown[]): void;
  reconciler(message: string, ...args: unknown[]): void;
  backend(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export class OperatorLogger implements Logger {
  constructor(private config: LoggingConfig = {}) {
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log operator lifecycle messages
   */
  operator(message: string, ...args: unknown[]): void {
    if (this.config.enableOperatorLogs && !this.config.enableTestMode) {
      console.log(`[OPERATOR] ${message}`, ...args);
    }
  }

  /**
   * Log reconciliation pass messages
   */
  reconciler(message: string, ...args: unknown[]): void {
    if (this.config.enableReconcilerLogs && !this.config.enableTestMode) {
      console.log(`[RECONCILER] ${message}`, ...args);
    }
  }

  /**
   * Log backend request messages
   */
  backend(message: string, ...args: unknown[]): void {
    if (this.config.enableBackendLogs && !this.config.enableTestMode) {
      console.log(`[BACKEND] ${message}`, ...args);
    }
  }

  /**
   * Log error messages (always shown unless in test mode)
   */
  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] ${message}`, ...args);
    }
  }

  /**
   * Log warning messages (always shown unless in test mode)
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] ${message}`, ...args);
    }
  }

  /**
   * Log debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): OperatorLogger {
  return new OperatorLogger(config);
}
