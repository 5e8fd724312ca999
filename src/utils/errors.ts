/**
 * Error types and codes for overlayconf.
 * All errors thrown by the resolver extend OverlayConfigError.
 */

/**
 * Base error class for all resolver errors.
 */
export class OverlayConfigError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'OverlayConfigError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Settings and resolver-option errors.
 */
export class ConfigError extends OverlayConfigError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (inaccessible directories, parse and read errors).
 */
export class SystemError extends OverlayConfigError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // System errors
  PARSE_ERROR: 'S001',
  ROOT_INACCESSIBLE: 'S002',
  FILE_UNREADABLE: 'S003',

  // Configuration errors
  CONFIG_LOAD_ERROR: 'C001',
  NO_PACKAGE_SOURCE: 'C002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
