/**
 * Base class for repost errors surfaced to callers.
 *
 * `message` is short enough to show in a toast; `code` and `statusCode`
 * follow the `ErrorSchema` response shape.
 */
export abstract class RepostError extends Error {
  abstract readonly code: string
  abstract readonly statusCode: number

  constructor(message: string) {
    super(message)
    this.name = new.target.name

    // Fix prototype chain – important after TS → JS down-emit
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export class AlreadyRepostedError extends RepostError {
  readonly code = 'ALREADY_REPOSTED'
  readonly statusCode = 409

  constructor(readonly addressableId: string) {
    super(`Already reposted: ${addressableId}`)
  }
}

export class NotRepostedError extends RepostError {
  readonly code = 'NOT_REPOSTED'
  readonly statusCode = 404

  constructor(readonly addressableId: string) {
    super(`Not reposted: ${addressableId}`)
  }
}

export class RepostFailedError extends RepostError {
  readonly code = 'REPOST_FAILED'
  readonly statusCode = 502
}

export class UnrepostFailedError extends RepostError {
  readonly code = 'UNREPOST_FAILED'
  readonly statusCode = 502
}

export class SyncFailedError extends RepostError {
  readonly code = 'SYNC_FAILED'
  readonly statusCode = 502
}

export class FetchRepostsFailedError extends RepostError {
  readonly code = 'FETCH_REPOSTS_FAILED'
  readonly statusCode = 502

  constructor(
    readonly pubkey: string,
    reason: string,
  ) {
    super(`Failed to fetch reposts for user ${pubkey}: ${reason}`)
  }
}

export class MissingReferenceError extends RepostError {
  readonly code = 'MISSING_REFERENCE'
  readonly statusCode = 400

  constructor(readonly reference: string) {
    super(`Content is missing an addressable reference: ${reference}`)
  }
}

export class NotAuthenticatedError extends RepostError {
  readonly code = 'NOT_AUTHENTICATED'
  readonly statusCode = 401

  constructor() {
    super('Sign in to repost')
  }
}

/**
 * Short diagnostic string for an unknown thrown value.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message
  return String(error)
}
