/**
 * Error taxonomy of the deal pipeline. Every error carries a stable `code` that ends up in
 * logs and cycle failure reasons.
 */

/** Price-data transport/protocol failure. Retried at the next scheduled cycle only. */
export class UpstreamError extends Error {
  readonly code = 'upstream_error';
  readonly status: number | null;

  constructor(message: string, opts: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'UpstreamError';
    this.status = opts.status ?? null;
  }
}

/** Publisher transport/auth/quota failure. Counted; the publish loop moves on. */
export class PublishError extends Error {
  readonly code = 'publish_error';
  readonly status: number | null;

  constructor(message: string, opts: { status?: number | null; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'PublishError';
    this.status = opts.status ?? null;
  }
}

/** A raw upstream record that cannot become a Candidate. Returned, never thrown. */
export class ValidationError extends Error {
  readonly code = 'validation_error';

  constructor(
    readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** The persistence layer cannot be reached at all. Aborts the rest of a cycle. */
export class PersistenceUnavailableError extends Error {
  readonly code = 'persistence_unavailable';

  constructor(message: string, opts: { cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'PersistenceUnavailableError';
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
