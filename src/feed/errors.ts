// pattern: Functional Core

export type FeedErrorCode =
  | "no_auth"
  | "empty_filter"
  | "already_started"
  | "auth_failed"
  | "subscription_failed";

export class FeedError extends Error {
  constructor(
    public code: FeedErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FeedError";
  }
}

export function isFeedError(error: unknown, code?: FeedErrorCode): error is FeedError {
  return error instanceof FeedError && (code === undefined || error.code === code);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
