/**
 * Raised for setup defects (missing credentials, unknown country code, bad API URL).
 * Always thrown before any network access and never retried.
 */
export class ConfigurationError extends Error {
  readonly statusCode = 500;

  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.name = "ConfigurationError";
    if (details !== undefined) this.details = details;
  }
}

export function isConfigurationError(error: unknown): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
