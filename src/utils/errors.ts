/**
 * Error types and codes for waf-checklist.
 * Every fatal error raised by the tool extends WafError.
 */

/**
 * Base error class for all waf-checklist errors.
 */
export class WafError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WafError';
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
 * Configuration errors: missing or malformed template, allow-list or config
 * files, and an empty document directory. These abort the whole run.
 */
export class ConfigError extends WafError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors (unreadable files, YAML parse failures).
 */
export class SystemError extends WafError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

export const ErrorCodes = {
  // Configuration
  CONFIG_LOAD_ERROR: 'C001',
  TEMPLATE_NOT_FOUND: 'C002',
  LABELS_NOT_FOUND: 'C003',
  LABELS_INVALID: 'C004',
  RESOURCES_NOT_FOUND: 'C005',
  RESOURCES_INVALID: 'C006',
  VALIDATIONS_NOT_FOUND: 'C007',
  VALIDATIONS_INVALID: 'C008',
  NO_DOCUMENTS: 'C009',
  WAF_DIR_NOT_FOUND: 'C010',
  NO_ACTIVE_DOCUMENTS: 'C011',
  INVALID_DOCUMENT: 'C012',

  // System
  PARSE_ERROR: 'S001',
  READ_ERROR: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

