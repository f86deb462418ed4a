export type OtpErrorCode =
  | 'rate_limited'
  | 'delivery_failed'
  | 'invalid_or_expired'
  | 'max_attempts_exceeded'
  | 'storage_unavailable';

const MESSAGES: Record<OtpErrorCode, string> = {
  rate_limited: 'Too many code requests. Try again later.',
  delivery_failed: 'The verification code could not be sent. Try again.',
  invalid_or_expired: 'Invalid or expired code.',
  max_attempts_exceeded: 'Too many attempts. Request a new code.',
  storage_unavailable: 'Service temporarily unavailable.'
};

export class OtpError extends Error {
  readonly code: OtpErrorCode;
  readonly retryAfterSeconds?: number;

  constructor(code: OtpErrorCode, options: { retryAfterSeconds?: number; cause?: unknown } = {}) {
    super(MESSAGES[code], { cause: options.cause });
    this.name = 'OtpError';
    this.code = code;
    this.retryAfterSeconds = options.retryAfterSeconds;
  }
}

export function rateLimited(retryAfterSeconds: number): OtpError {
  return new OtpError('rate_limited', { retryAfterSeconds });
}

export function invalidOrExpired(): OtpError {
  return new OtpError('invalid_or_expired');
}

export function maxAttemptsExceeded(): OtpError {
  return new OtpError('max_attempts_exceeded');
}

export function deliveryFailed(cause: unknown): OtpError {
  return new OtpError('delivery_failed', { cause });
}

export function storageUnavailable(cause: unknown): OtpError {
  return new OtpError('storage_unavailable', { cause });
}

export function isOtpError(error: unknown): error is OtpError {
  return error instanceof OtpError;
}
