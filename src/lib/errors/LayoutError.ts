/**
 * Error codes raised by the layout library.
 */
export enum LayoutErrorCode {
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  METRICS_UNAVAILABLE = 'METRICS_UNAVAILABLE',
  INVALID_CONTENT = 'INVALID_CONTENT'
}

/**
 * Base error for everything the library throws on purpose.
 */
export class LayoutError extends Error {
  constructor(
    message: string,
    public readonly code: LayoutErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'LayoutError';
  }
}

/**
 * Raised while building a LayoutConfig. Never raised mid-layout.
 */
export class ConfigurationError extends LayoutError {
  constructor(message: string, details?: unknown) {
    super(message, LayoutErrorCode.INVALID_CONFIGURATION, details);
    this.name = 'ConfigurationError';
  }
}

/**
 * A font resource could not be loaded or parsed. Raised before any page exists.
 */
export class MetricsUnavailableError extends LayoutError {
  constructor(message: string, details?: unknown) {
    super(message, LayoutErrorCode.METRICS_UNAVAILABLE, details);
    this.name = 'MetricsUnavailableError';
  }
}

/**
 * A content file could not be read or did not match the spell schema.
 */
export class ContentError extends LayoutError {
  constructor(message: string, details?: unknown) {
    super(message, LayoutErrorCode.INVALID_CONTENT, details);
    this.name = 'ContentError';
  }
}
