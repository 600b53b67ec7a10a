/**
 * Raised when the roster or another configuration input is missing or invalid.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Raised when an HTTP request completes with a non-success status code.
 */
export class HttpRequestError extends Error {
  constructor(
    message: string,
    public readonly code: number,
  ) {
    super(message);
    this.name = 'HttpRequestError';
  }
}

/**
 * Raised when an external command exits with a failure status, is killed, or times out.
 */
export class CommandFailedError extends Error {
  constructor(
    message: string,
    public readonly command: string,
    public readonly exitCode: number | null,
    public readonly stderr: string = '',
  ) {
    super(message);
    this.name = 'CommandFailedError';
  }
}

/**
 * Raised when two collaborator signals that must agree do not, e.g. a change report was
 * produced but no pull request was (or the other way round).
 */
export class ConsistencyFaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConsistencyFaultError';
  }
}

/**
 * Raised when an authenticated session for an organisation cannot be established.
 */
export class SessionError extends Error {
  constructor(
    message: string,
    public readonly org: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'SessionError';
  }
}

/**
 * Raised when the report storage settings are incomplete.
 */
export class StorageConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageConfigurationError';
  }
}

/** Get a printable message from anything thrown. */
export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
