/**
 * Failures a check can end with. Per-record date problems are not errors;
 * they show up in `CheckResult.unparseable`.
 */
export class CheckerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The portal rejected the login. Not retried. */
export class AuthenticationError extends CheckerError {}

/** No username or password in any credential source. */
export class MissingCredentialsError extends AuthenticationError {
  constructor() {
    super('Credentials not stored. Run "lms-deadline-watch configure" or set LMS_USERNAME and LMS_PASSWORD.');
  }
}

/** Browser or network failure reaching the portal. Safe to retry on the next cycle. */
export class TransportError extends CheckerError {}

/** The listing container is missing, i.e. the portal layout changed. */
export class ParseError extends CheckerError {}

export class NotificationError extends CheckerError {}

/** The local secrets file exists but cannot be used. */
export class SecretStoreError extends CheckerError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
