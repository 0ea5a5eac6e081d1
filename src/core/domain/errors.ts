/**
 * Signature header missing, malformed, or not matching the body
 */
export class SignatureVerificationError extends Error {
  constructor(
    message: string,
    public readonly reason: 'missing_header' | 'malformed_header' | 'mismatch',
  ) {
    super(message);
    this.name = 'SignatureVerificationError';
  }
}

/**
 * Required server configuration is absent.
 * Never downgraded to a bypass: the request fails with a server error.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly setting: string,
  ) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Webhook body could not be parsed as a JSON object
 */
export class MalformedPayloadError extends Error {
  constructor(
    message: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'MalformedPayloadError';
  }
}

/**
 * Any failure of the persistence substrate; the transaction was rolled back
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'StorageError';
  }

  static wrap(operation: string, error: unknown): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    const cause = error instanceof Error ? error : new Error(String(error));
    return new StorageError(
      `Storage operation '${operation}' failed: ${cause.message}`,
      operation,
      cause,
    );
  }
}
