import { ReviewStateError } from "../_core/errors";
import type { IdentityStore, IdentityStoreOps, NewReviewItem } from "../store/types";
import type { AuditLogger } from "./audit-logger";
import type { RecordKind, ReviewQueueItem } from "./types";

/**
 * Put an ambiguous record in front of a human. Runs inside the caller's
 * transaction; a record already waiting in the queue is not queued twice.
 */
export async function enqueueForReview(
  tx: IdentityStoreOps,
  audit: AuditLogger,
  input: NewReviewItem,
): Promise<ReviewQueueItem> {
  const existing = await tx.findPendingReviewItem(input.kind, input.sport, input.source, input.sourceId);
  if (existing) return existing;

  const item = await tx.insertReviewItem(input);
  await audit.record(tx, {
    entityType: "review",
    entityId: String(item.id),
    action: "queued",
    newState: { kind: item.kind, source: item.source, sourceId: item.sourceId, status: item.status },
    matchDetails: { reason: input.reason, candidates: input.candidates },
  });
  console.log(
    `[review-queue] Queued ${input.kind} ${input.source}/${input.sourceId} (${input.reason}, ${input.candidates.length} candidates)`,
  );
  return item;
}

export interface ApprovalOutcome {
  canonicalId: number;
  created: boolean;
}

/** The write path an approval runs through: the same one an auto-accepted match uses. */
export interface ReviewTarget {
  approveInTransaction(
    tx: IdentityStoreOps,
    item: ReviewQueueItem,
    canonicalId: number | null,
    confidence: number,
    reviewer: string,
  ): Promise<ApprovalOutcome>;
}

export interface ApproveOptions {
  /** Defaults to the top-scored candidate; with no candidates a new entity is created. */
  canonicalId?: number;
  reviewer?: string;
}

export interface RejectOptions {
  reviewer?: string;
  note?: string;
}

export class ReviewQueue {
  constructor(
    private readonly store: IdentityStore,
    private readonly audit: AuditLogger,
    private readonly targets: Record<RecordKind, ReviewTarget>,
  ) {}

  listPending(limit = 50): Promise<ReviewQueueItem[]> {
    return this.store.listReviewItems("pending", limit);
  }

  countPending(): Promise<number> {
    return this.store.countReviewItems("pending");
  }

  get(itemId: number): Promise<ReviewQueueItem | null> {
    return this.store.getReviewItem(itemId);
  }

  /**
   * Approve a pending item. The approval writes and the status swap share one
   * transaction; when the swap loses to another reviewer the whole
   * transaction rolls back and nothing is written.
   */
  approve(itemId: number, options: ApproveOptions = {}): Promise<ReviewQueueItem> {
    const reviewer = options.reviewer ?? "reviewer";

    return this.store.transaction(async (tx) => {
      const current = await tx.getReviewItem(itemId);
      if (!current || current.status !== "pending") {
        throw new ReviewStateError(itemId, current?.status ?? null);
      }

      const chosen =
        options.canonicalId !== undefined
          ? current.candidates.find((c) => c.canonicalId === options.canonicalId)
          : current.candidates[0];
      const canonicalId = options.canonicalId ?? chosen?.canonicalId ?? null;
      const confidence = chosen?.confidence ?? 1;

      const outcome = await this.targets[current.kind].approveInTransaction(tx, current, canonicalId, confidence, reviewer);

      const swapped = await tx.resolveReviewItem(itemId, {
        status: "approved",
        resolvedBy: reviewer,
        resolvedCanonicalId: outcome.canonicalId,
        resolvedAt: new Date(),
      });
      if (!swapped) {
        const latest = await tx.getReviewItem(itemId);
        throw new ReviewStateError(itemId, latest?.status ?? null);
      }

      await this.audit.record(tx, {
        entityType: "review",
        entityId: String(itemId),
        action: "approved",
        previousState: { status: "pending" },
        newState: { status: "approved", canonicalId: outcome.canonicalId, created: outcome.created },
        matchDetails: { method: "manual", confidence, candidates: current.candidates },
        performedBy: reviewer,
      });
      console.log(`[review-queue] Item ${itemId} approved by ${reviewer} -> ${current.kind} ${outcome.canonicalId}`);
      return swapped;
    });
  }

  /** Mark the record as explicitly unmatched. */
  reject(itemId: number, options: RejectOptions = {}): Promise<ReviewQueueItem> {
    const reviewer = options.reviewer ?? "reviewer";

    return this.store.transaction(async (tx) => {
      const swapped = await tx.resolveReviewItem(itemId, {
        status: "rejected",
        resolvedBy: reviewer,
        resolvedCanonicalId: null,
        resolvedAt: new Date(),
      });
      if (!swapped) {
        const current = await tx.getReviewItem(itemId);
        throw new ReviewStateError(itemId, current?.status ?? null);
      }

      await tx.upsertMapping({
        kind: swapped.kind,
        sport: swapped.sport,
        source: swapped.source,
        sourceId: swapped.sourceId,
        canonicalId: null,
        confidence: 0,
        method: "manual",
        status: "failed",
        sourceRecordId: swapped.sourceRecordId,
      });
      await this.audit.record(tx, {
        entityType: "review",
        entityId: String(itemId),
        action: "rejected",
        previousState: { status: "pending" },
        newState: { status: "rejected" },
        matchDetails: { note: options.note ?? null, candidates: swapped.candidates },
        performedBy: reviewer,
      });
      console.log(`[review-queue] Item ${itemId} rejected by ${reviewer}`);
      return swapped;
    });
  }
}
