/** Where a failure happened: before the call, or in it */
export type ImageTaskErrorKind = 'validation' | 'remote';

export class ImageTaskError extends Error {
  readonly kind: ImageTaskErrorKind;

  constructor(kind: ImageTaskErrorKind, message: string) {
    super(message);
    this.name = 'ImageTaskError';
    this.kind = kind;
  }
}

/** Input rejected locally; the endpoint was never contacted */
export class ValidationError extends ImageTaskError {
  constructor(message: string) {
    super('validation', message);
    this.name = 'ValidationError';
  }
}

/** The endpoint call failed or returned something unusable */
export class RemoteError extends ImageTaskError {
  readonly status?: number;

  constructor(message: string, status?: number) {
    super('remote', message);
    this.name = 'RemoteError';
    this.status = status;
  }
}

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred. Please try again later.';

/**
 * Single user-facing message for any thrown value.
 */
export function toUserMessage(error: unknown): string {
  if (error instanceof ImageTaskError) {
    return error.message;
  }
  if (error instanceof Error && error.message) {
    return `${UNEXPECTED_ERROR_MESSAGE} (${error.message})`;
  }
  return UNEXPECTED_ERROR_MESSAGE;
}
