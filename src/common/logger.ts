/**
 * Logging utility for etcd-bootstrapper
 * Provides categorised logging for the admin client, reconciler, inventory and emitter
 */

export interface LoggingConfig {
  enableAdminLogs?: boolean;
  enableReconcilerLogs?: boolean;
  enableInventoryLogs?: boolean;
  enableBootstrapLogs?: boolean;
  enableDebugLogs?: boolean;
  enableTestMode?: boolean;
}

export class BootstrapLogger {
  private readonly config: LoggingConfig;

  constructor(config: LoggingConfig = {}) {
    this.config = { ...config };
    // Auto-detect test mode if not explicitly set
    if (this.config.enableTestMode === undefined) {
      this.config.enableTestMode = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
    }
  }

  /**
   * Log member-management API traffic
   */
  admin(message: string, ...args: unknown[]): void {
    if (this.config.enableAdminLogs !== false && !this.config.enableTestMode) {
      console.log(`[ADMIN] ${message}`, ...args);
    }
  }

  /**
   * Log reconciliation state transitions
   */
  reconciler(message: string, ...args: unknown[]): void {
    if (this.config.enableReconcilerLogs !== false && !this.config.enableTestMode) {
      console.log(`[RECONCILER] ${message}`, ...args);
    }
  }

  /**
   * Log inventory and identity discovery
   */
  inventory(message: string, ...args: unknown[]): void {
    if (this.config.enableInventoryLogs !== false && !this.config.enableTestMode) {
      console.log(`[INVENTORY] ${message}`, ...args);
    }
  }

  /**
   * Log directive emission and startup configuration
   */
  bootstrap(message: string, ...args: unknown[]): void {
    if (this.config.enableBootstrapLogs !== false && !this.config.enableTestMode) {
      console.log(`[BOOTSTRAP] ${message}`, ...args);
    }
  }

  /**
   * Log run outcomes and other uncategorised messages
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.log(`[INFO] ${message}`, ...args);
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
   * Log debug messages (development or --verbose only)
   */
  debug(message: string, ...args: unknown[]): void {
    const enabled = this.config.enableDebugLogs ?? process.env.NODE_ENV === 'development';
    if (enabled && !this.config.enableTestMode) {
      console.debug(`[DEBUG] ${message}`, ...args);
    }
  }
}

/**
 * Create a logger instance with the given configuration
 */
export function createLogger(config: LoggingConfig = {}): BootstrapLogger {
  return new BootstrapLogger(config);
}
