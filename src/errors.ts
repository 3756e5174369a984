export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Base class for every failure the relay answers with a JSON error body.
 */
export abstract class RelayError extends Error {
  abstract readonly statusCode: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The body is not JSON, or not shaped like a chat request. */
export class InvalidRequestError extends RelayError {
  readonly statusCode = 400;
}

export class ImageProcessingError extends RelayError {
  readonly statusCode = 400;

  constructor(cause: unknown) {
    super(`Error processing image: ${errorMessage(cause)}`, { cause });
  }
}

export class ProviderTimeoutError extends RelayError {
  readonly statusCode = 504;

  constructor(options?: ErrorOptions) {
    super("Request to AI model timed out. Please try again.", options);
  }
}

/** The provider answered with a non-success status. */
export class ProviderError extends RelayError {
  readonly statusCode = 500;
  readonly providerStatus: number;

  constructor(providerStatus: number, options?: ErrorOptions) {
    super(`Failed to get response from the model. Status code: ${providerStatus}`, options);
    this.providerStatus = providerStatus;
  }
}

// Surfaces the underlying message to the client; acceptable for an internal tool.
export class InternalError extends RelayError {
  readonly statusCode = 500;

  constructor(cause: unknown) {
    super(`An unexpected error occurred: ${errorMessage(cause)}`, { cause });
  }
}

export function toRelayError(error: unknown): RelayError {
  if (error instanceof RelayError) {
    return error;
  }
  return new InternalError(error);
}
