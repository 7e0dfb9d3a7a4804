/**
 * Recoverable index errors
 *
 * Every failure is local to one command and leaves the view untouched.
 */

export type IndexErrorCode = 'NO_MATCHES' | 'NOT_NARROWED' | 'INVALID_CONTEXT';

export abstract class IndexError extends Error {
  abstract readonly code: IndexErrorCode;
}

/** A focus/search produced an empty set */
export class NoMatchesError extends IndexError {
  readonly code = 'NO_MATCHES' as const;

  constructor(readonly term: string) {
    super(`No matches for "${term}"`);
    this.name = 'NoMatchesError';
  }
}

/** query-refresh was asked for without an active narrowing */
export class NotNarrowedError extends IndexError {
  readonly code = 'NOT_NARROWED' as const;

  constructor() {
    super('Index is not narrowed');
    this.name = 'NotNarrowedError';
  }
}

/** A view command arrived while no view is open */
export class InvalidContextError extends IndexError {
  readonly code = 'INVALID_CONTEXT' as const;

  constructor(readonly command: string) {
    super(`No index view is open (${command})`);
    this.name = 'InvalidContextError';
  }
}

export function isIndexError(err: unknown): err is IndexError {
  return err instanceof IndexError;
}
