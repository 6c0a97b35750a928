/**
 * Error taxonomy for a bootstrap run.
 *
 * Unreachable members are expected and drive fallback; everything past the
 * health-probing stage is surfaced to the caller.
 */

export type BootstrapErrorCode =
  | 'UNREACHABLE'
  | 'NO_HEALTHY_MEMBER'
  | 'ADMIN_REQUEST_FAILED'
  | 'CONFIGURATION_ERROR'
  | 'INVENTORY_ERROR';

export class BootstrapError extends Error {
  constructor(
    message: string,
    public readonly code: BootstrapErrorCode,
    cause?: unknown
  ) {
    super(message);
    this.name = 'BootstrapError';
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/**
 * A health probe could not reach the member (socket error, timeout, TLS).
 */
export class UnreachableMemberError extends BootstrapError {
  constructor(public readonly url: string, cause?: unknown) {
    super(`Member at ${url} is unreachable: ${describeCause(cause)}`, 'UNREACHABLE', cause);
    this.name = 'UnreachableMemberError';
  }
}

export class NoHealthyMemberError extends BootstrapError {
  constructor(public readonly candidates: number) {
    super(`No healthy member found among ${candidates} candidate(s)`, 'NO_HEALTHY_MEMBER');
    this.name = 'NoHealthyMemberError';
  }
}

/**
 * A list/add/remove call against a confirmed-healthy member failed.
 */
export class AdminRequestFailedError extends BootstrapError {
  constructor(
    message: string,
    public readonly method: string,
    public readonly url: string,
    public readonly statusCode?: number,
    cause?: unknown
  ) {
    super(message, 'ADMIN_REQUEST_FAILED', cause);
    this.name = 'AdminRequestFailedError';
  }
}

export class ConfigurationError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIGURATION_ERROR', cause);
    this.name = 'ConfigurationError';
  }
}

export class InventoryError extends BootstrapError {
  constructor(message: string, cause?: unknown) {
    super(message, 'INVENTORY_ERROR', cause);
    this.name = 'InventoryError';
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}
