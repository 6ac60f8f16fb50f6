/**
 * Harvester error taxonomy
 *
 * Nothing in the core retries. Every error is raised at the point of failure
 * and surfaces mid-stream to whoever is iterating a connector.
 */

export class HarvestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network or API failure. Carries the HTTP status and the server's
 * structured error body when there was a response at all.
 */
export class RetrievalError extends HarvestError {
  readonly status?: number;
  readonly body?: unknown;

  constructor(message: string, options: { status?: number; body?: unknown; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.body = options.body;
  }
}

/** Local working copy is invalid or a git command exited non-zero. */
export class RepositoryError extends HarvestError {}

/** Malformed `git blame --porcelain` output. */
export class ParseError extends HarvestError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(line === undefined ? message : `${message} (line ${line})`);
    this.line = line;
  }
}

export class CacheError extends HarvestError {}

export class CacheBackupError extends CacheError {}

export class CacheRecoveryError extends CacheError {}

/** Timestamp extraction failed on a record. */
export class MalformedRecordError extends HarvestError {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
