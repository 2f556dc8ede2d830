/**
 * Error taxonomy for ingestion, matching and reconciliation.
 *
 * Only TransientSourceError and JobTimeoutError fail a sync job. The others are
 * handled per record: a ConflictError becomes a re-fetch, a ValidationError is
 * counted as a failed record, a MergeIntegrityError skips one merge.
 */

export type SyncErrorKind =
  | "transient_source"
  | "validation"
  | "conflict"
  | "foreign_key"
  | "merge_integrity"
  | "review_state"
  | "job_timeout";

export abstract class SyncError extends Error {
  abstract readonly kind: SyncErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransientSourceError extends SyncError {
  readonly kind = "transient_source";

  constructor(
    readonly source: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(`[${source}] ${message}`, options);
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends SyncError {
  readonly kind = "validation";

  constructor(message: string, readonly issues: ValidationIssue[] = []) {
    super(message);
  }
}

/** A unique constraint rejected an insert: another writer got there first. */
export class ConflictError extends SyncError {
  readonly kind = "conflict";

  constructor(readonly constraint: string, options?: { cause?: unknown }) {
    super(`Unique constraint violated: ${constraint}`, options);
  }
}

/** A delete or update would leave a row pointing at nothing. */
export class ForeignKeyError extends SyncError {
  readonly kind = "foreign_key";

  constructor(readonly constraint: string, options?: { cause?: unknown }) {
    super(`Foreign key violated: ${constraint}`, options);
  }
}

export class MergeIntegrityError extends SyncError {
  readonly kind = "merge_integrity";

  constructor(readonly survivorId: number, readonly duplicateId: number, reason: string) {
    super(`Cannot merge ${duplicateId} into ${survivorId}: ${reason}`);
  }
}

export class ReviewStateError extends SyncError {
  readonly kind = "review_state";

  constructor(readonly itemId: number, readonly actualStatus: string | null) {
    super(
      actualStatus === null
        ? `Review item ${itemId} does not exist`
        : `Review item ${itemId} is already ${actualStatus}`,
    );
  }
}

export class JobTimeoutError extends SyncError {
  readonly kind = "job_timeout";

  constructor(readonly job: string, readonly timeoutMs: number) {
    super(`Job ${job} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
