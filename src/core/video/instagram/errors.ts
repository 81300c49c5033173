// Instagram fallback resolver errors

export type InstagramErrorCode = 'LOGIN_REQUIRED' | 'RATE_LIMITED' | 'MEDIA_NOT_FOUND' | 'PARSE_FAILED';

export class InstagramSessionError extends Error {
  constructor(
    message: string,
    public readonly code: InstagramErrorCode,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'InstagramSessionError';
    Object.setPrototypeOf(this, InstagramSessionError.prototype);
  }

  /** Rate limits clear up on their own; the others need a person */
  get retryable(): boolean {
    return this.code === 'RATE_LIMITED';
  }
}
