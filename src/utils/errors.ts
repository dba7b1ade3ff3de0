/**
 * Error types and codes for layerguard.
 * Every error raised by the tool extends LayerguardError.
 */

/**
 * Base error class for all layerguard errors.
 */
export class LayerguardError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'LayerguardError';
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
 * Configuration-related errors (loading, parsing, validation).
 */
export class ConfigError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * Module registry errors (duplicate identities, malformed records).
 */
export class RegistryError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'RegistryError';
  }
}

/**
 * System errors (file not found, parse errors, etc.).
 */
export class SystemError extends LayerguardError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Registry errors
  DUPLICATE_MODULE_IDENTITY: 'R001',
  MALFORMED_RECORD: 'R002',

  // Config errors
  CONFIG_LOAD_ERROR: 'C001',
  INVALID_OUTPUT_FORMAT: 'C002',

  // System errors
  PARSE_ERROR: 'S001',
  FILE_READ_ERROR: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
