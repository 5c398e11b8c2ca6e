/**
 * Errors that carry an HTTP status. The global error handler and the route
 * handlers read `status` to pick the response code.
 */
export class HttpError extends Error {
  readonly status: number;

  constructor(message: string, status: number) {
    super(message);
    this.name = new.target.name;
    this.status = status;
  }
}

export class ValidationError extends HttpError {
  readonly details: Record<string, string>;

  constructor(details: Record<string, string>) {
    super('Validation failed', 400);
    this.details = details;
  }
}

// Address could not be resolved to coordinates
export class GeocodingError extends HttpError {
  readonly address: string;

  constructor(address: string, message?: string) {
    super(message ?? `Could not geocode: "${address}"`, 400);
    this.address = address;
  }
}

// Routing provider returned no usable route, failed, or timed out
export class RoutingError extends HttpError {
  constructor(message: string) {
    super(message, 400);
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return 'Unknown error';
}
