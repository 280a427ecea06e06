/**
 * How a failed remote call should be handled.
 *
 * - `permanent`: bad request, forbidden or not found; never retried
 * - `transient`: rate limited, server error, or no status at all; retried
 * - `fatal`: any other status (e.g. 401); propagated without retry
 */
export type FailureClass = 'permanent' | 'transient' | 'fatal';

const PERMANENT_STATUSES = new Set([400, 403, 404]);
const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

/**
 * Classify an HTTP status (or its absence) into a {@link FailureClass}.
 */
export function classifyStatus(status: number | undefined): FailureClass {
  if (status === undefined) {
    return 'transient';
  }
  if (PERMANENT_STATUSES.has(status)) {
    return 'permanent';
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return 'transient';
  }
  return 'fatal';
}

/**
 * Error thrown when a Notion API call fails.
 */
export class RemoteError extends Error {
  constructor(
    message: string,
    public readonly resourceId: string,
    public readonly status?: number,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'RemoteError';
  }

  get failureClass(): FailureClass {
    return classifyStatus(this.status);
  }

  get isTransient(): boolean {
    return this.failureClass === 'transient';
  }

  /** Bad request, forbidden or not found: retrying cannot help. */
  get isPermanent(): boolean {
    return this.failureClass === 'permanent';
  }
}

/**
 * Error thrown when the root id is neither an accessible page nor an
 * accessible database.
 */
export class RootNotFoundError extends Error {
  constructor(
    public readonly rootId: string,
    cause?: Error,
  ) {
    super(
      `Could not identify ${rootId} as a page or database. ` +
        "Make sure it's shared with your integration.",
      { cause },
    );
    this.name = 'RootNotFoundError';
  }
}

/**
 * True if the error means this one resource cannot be read (it is
 * malformed, forbidden or missing) while the rest of the run can go on.
 */
export function isPermanentFailure(error: unknown): error is RemoteError {
  return error instanceof RemoteError && error.isPermanent;
}
