/**
 * Custom Error Classes
 * ====================
 * Standardized error classes shared by every ontocache package, plus the
 * registry error taxonomy surfaced by `register` and `unregister`.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string = 'APP_ERROR',
    statusCode: number = 500,
    context?: Record<string, unknown>,
    isOperational: boolean = true,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
    this.isOperational = isOperational;

    // Maintains proper stack trace for where our error was thrown
    Error.captureStackTrace(this, this.constructor);
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
      isOperational: this.isOperational,
      cause: this.cause instanceof Error ? this.cause.message : this.cause,
      stack: this.stack,
    };
  }
}

/**
 * Configuration error - for configuration issues
 */
export class ConfigurationError extends AppError {
  constructor(message: string, configKey?: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', 500, { configKey, ...context });
  }
}

/**
 * API error - for external API call failures
 */
export class ApiError extends AppError {
  public readonly apiName?: string;
  public readonly apiStatusCode?: number;
  public readonly apiResponse?: unknown;

  constructor(
    message: string,
    apiName?: string,
    apiStatusCode?: number,
    apiResponse?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'API_ERROR', 502, { apiName, apiStatusCode, ...context });
    this.apiName = apiName;
    this.apiStatusCode = apiStatusCode;
    this.apiResponse = apiResponse;
  }
}

/**
 * Timeout error - for operation timeouts
 */
export class TimeoutError extends AppError {
  public readonly timeoutMs?: number;

  constructor(
    message: string = 'Operation timed out',
    timeoutMs?: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'TIMEOUT_ERROR', 504, { timeoutMs, ...context });
    this.timeoutMs = timeoutMs;
  }
}

// ---------------------------------------------------------------------------
// Ontology registry errors
// ---------------------------------------------------------------------------

/**
 * Base class for every failure `register` / `unregister` can surface.
 */
export class OntologyRegistryError extends AppError {
  constructor(
    message: string,
    code: string,
    statusCode: number,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, code, statusCode, context, true, cause);
  }
}

/**
 * The metadata provider could not resolve a version (only raised for `latest`).
 */
export class MetadataResolutionError extends OntologyRegistryError {
  public readonly ontologyId: string;

  constructor(ontologyId: string, reason: string, cause?: unknown) {
    super(`Unable to provide metadata: ${reason}`, 'METADATA_RESOLUTION', 502, { ontologyId }, cause);
    this.ontologyId = ontologyId;
  }
}

/**
 * The content provider could not deliver the artifact.
 */
export class ContentFetchError extends OntologyRegistryError {
  public readonly ontologyId: string;

  constructor(
    ontologyId: string,
    reason: string,
    context?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(`Unable to provide ontology: ${reason}`, 'CONTENT_FETCH', 502, { ontologyId, ...context }, cause);
    this.ontologyId = ontologyId;
  }
}

/**
 * The registry root directory could not be created.
 */
export class RegistryUnavailableError extends OntologyRegistryError {
  constructor(registryPath: string, cause?: unknown) {
    super(`Unable to create registry at '${registryPath}'`, 'REGISTRY_UNAVAILABLE', 503, { registryPath }, cause);
  }
}

/**
 * The temporary file could not be created or written.
 */
export class RegistryWriteError extends OntologyRegistryError {
  constructor(tempPath: string, cause?: unknown) {
    super(`Unable to write to temporary file '${tempPath}'`, 'REGISTRY_WRITE', 500, { tempPath }, cause);
  }
}

/**
 * The atomic publish (temp -> final name) failed.
 */
export class RegistryRenameError extends OntologyRegistryError {
  constructor(tempPath: string, targetPath: string, cause?: unknown) {
    super(
      `Unable to rename temporary file '${tempPath}'`,
      'REGISTRY_RENAME',
      500,
      { tempPath, targetPath },
      cause
    );
  }
}

/**
 * Deleting an entry during `unregister` failed.
 */
export class RegistryRemovalError extends OntologyRegistryError {
  constructor(targetPath: string, cause?: unknown) {
    super(`Unable to unregister '${targetPath}'`, 'REGISTRY_REMOVAL', 500, { targetPath }, cause);
  }
}
