import type { PostStatus } from "../scheduledPost/scheduledPost.model";

export class HttpError extends Error {
  public statusCode: number;
  public isOperational: boolean;

  constructor(message: string, statusCode = 400, isOperational = true) {
    super(message);
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends HttpError {
  public readonly details: Record<string, string>;

  constructor(message: string, details: Record<string, string> = {}) {
    super(message, 422);
    this.details = details;
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
  }
}

export class InvalidStateError extends HttpError {
  public readonly currentStatus: PostStatus;

  constructor(message: string, currentStatus: PostStatus) {
    super(message, 409);
    this.currentStatus = currentStatus;
  }
}

/** Another pending or processing post of the account already holds the instant. */
export class SlotTakenError extends HttpError {
  constructor(
    public readonly accountRef: string,
    public readonly scheduledTime: Date
  ) {
    super(
      `Account ${accountRef} already has a post scheduled at ${scheduledTime.toISOString()}`,
      409
    );
  }
}

/**
 * The schedule store could not be reached at all. Unlike every other failure
 * this one aborts the whole publishing run.
 */
export class StoreUnavailableError extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "StoreUnavailableError";
  }
}
