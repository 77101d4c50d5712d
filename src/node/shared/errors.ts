/**
 * Custom error classes for the graph engine.
 * Provides typed errors for the different failure scenarios.
 */

/**
 * Base error class for all application errors.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'AppError'
  }
}

/**
 * Error thrown when a git subprocess fails.
 */
export class GitError extends AppError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'GitError'
  }
}

/**
 * Error thrown when a referenced commit or object cannot be resolved.
 * Always fatal: graph construction is aborted.
 */
export class StructuralAccessError extends AppError {
  constructor(
    message: string,
    public readonly objectId?: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'StructuralAccessError'
  }
}

/**
 * Error raised for a ref name without the expected namespace prefix.
 * The reference is skipped.
 */
export class MalformedReferenceError extends AppError {
  constructor(
    message: string,
    public readonly ref: string
  ) {
    super(message)
    this.name = 'MalformedReferenceError'
  }
}

/**
 * Error raised for a branch or tag name that is not valid text.
 * The reference is skipped.
 */
export class EncodingError extends AppError {
  constructor(
    message: string,
    public readonly ref: string
  ) {
    super(message)
    this.name = 'EncodingError'
  }
}

/**
 * Error thrown when a settings file or preset fails validation.
 */
export class SettingsError extends AppError {
  constructor(
    message: string,
    public readonly source: string,
    cause?: unknown
  ) {
    super(message, cause)
    this.name = 'SettingsError'
  }
}

/**
 * Error thrown when the environment configuration is invalid.
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly field?: string
  ) {
    super(message)
    this.name = 'ConfigurationError'
  }
}
