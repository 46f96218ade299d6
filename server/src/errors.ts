/**
 * Error raised from request handlers; the global error handler turns `status`
 * into the response code.
 */
export class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

/** Non-OK or malformed response from the routing/geocoding provider. */
export class UpstreamServiceError extends Error {
  constructor(
    message: string,
    readonly upstreamStatus?: number,
    readonly upstreamCode?: number,
  ) {
    super(message);
    this.name = 'UpstreamServiceError';
  }
}

export class InvalidOptimizerConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidOptimizerConfigError';
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}
