import type { IdentityStoreOps, NewAuditEntry } from "../store/types";
import type {
  AuditEntityType,
  AuditLogEntry,
  MatchMethod,
  MatchSignals,
  ScoredCandidate,
  SourceName,
} from "./types";

export interface MatchDetails {
  source: SourceName;
  sourceId: string;
  method: MatchMethod;
  confidence: number;
  signals?: MatchSignals;
  candidates?: ScoredCandidate[];
  reason?: string;
}

/**
 * Append-only decision log. Every call writes through the caller's
 * transaction so the entry commits (or rolls back) with the change it
 * describes. There is no update or delete.
 */
export class AuditLogger {
  constructor(private readonly performedBy = "system") {}

  record(tx: IdentityStoreOps, entry: NewAuditEntry): Promise<AuditLogEntry> {
    return tx.appendAudit({ ...entry, performedBy: entry.performedBy ?? this.performedBy });
  }

  updated(
    tx: IdentityStoreOps,
    entityType: AuditEntityType,
    entityId: number,
    previousState: unknown,
    newState: unknown,
    details: MatchDetails,
  ) {
    return this.record(tx, {
      entityType,
      entityId: String(entityId),
      action: "updated",
      previousState,
      newState,
      matchDetails: details,
    });
  }

  matched(tx: IdentityStoreOps, entityType: AuditEntityType, entityId: number, details: MatchDetails, performedBy?: string) {
    return this.record(tx, {
      entityType,
      entityId: String(entityId),
      action: "matched",
      newState: { canonicalId: entityId },
      matchDetails: details,
      performedBy,
    });
  }
}
