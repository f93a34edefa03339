export type PurgeErrorKind = 'configuration' | 'authentication' | 'stream';

export abstract class PurgeError extends Error {
  abstract readonly kind: PurgeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PurgeError {
  readonly kind = 'configuration';
}

export class AuthenticationError extends PurgeError {
  readonly kind = 'authentication';
}

/** Fatal failure while paginating the comment listing. */
export class StreamError extends PurgeError {
  readonly kind = 'stream';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
