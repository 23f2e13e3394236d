/**
 * Base class for every error this service raises on purpose.
 * The code classifies failures in logs and status messages;
 * retryable tells callers whether backing off and trying again can help.
 */
export class ServiceError extends Error {
  public readonly code: string;
  public readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean = false) {
    super(message);
    this.name = "ServiceError";
    this.code = code;
    this.retryable = retryable;
  }
}

/** Extracts a message from anything thrown. */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
