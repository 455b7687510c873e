/**
 * Error raised when a locator request fails: network failure (status 0),
 * non-2xx response, or a body that is not a list of buildings.
 */
export class LocatorRequestError extends Error {
  statusCode: number;
  url: string;

  constructor(message: string, statusCode: number, url: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LocatorRequestError';
    this.statusCode = statusCode;
    this.url = url;
  }
}

/**
 * Error raised when a snapshot file cannot be read, parsed or validated
 */
export class SnapshotError extends Error {
  path: string;

  constructor(message: string, path: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SnapshotError';
    this.path = path;
  }
}

/**
 * Render a thrown value as a single line for console output
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
