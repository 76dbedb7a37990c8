/**
 * Setup problem that must abort a command before any network work
 * (missing credentials, invalid options, unreadable template).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Non-2xx response from the OpenReview API
 */
export class OpenReviewRequestError extends Error {
  constructor(
    message: string,
    public status: number,
    public endpoint: string
  ) {
    super(message);
    this.name = 'OpenReviewRequestError';
  }
}

/**
 * Login rejected by OpenReview. Fatal for the download command.
 */
export class OpenReviewAuthError extends OpenReviewRequestError {
  constructor(message: string, status: number) {
    super(message, status, '/login');
    this.name = 'OpenReviewAuthError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
