import type { IdentityStoreOps } from "../store/types";
import type { Mapping, ResolutionResult } from "./types";

/**
 * Short-circuit for a source id that already has a decision on file.
 * A matched mapping is an exact-id hit; a pending review or a rejection is
 * reported as such instead of being matched again. Null means "keep going".
 */
export async function resultFromMapping(
  store: IdentityStoreOps,
  mapping: Mapping | null,
  sourceRecordId: number,
): Promise<ResolutionResult | null> {
  if (!mapping) return null;

  switch (mapping.status) {
    case "matched": {
      if (mapping.canonicalId === null) return null;
      if (mapping.sourceRecordId !== sourceRecordId) {
        // Keep the mapping traceable to the latest payload seen for this id
        await store.upsertMapping({
          kind: mapping.kind,
          sport: mapping.sport,
          source: mapping.source,
          sourceId: mapping.sourceId,
          canonicalId: mapping.canonicalId,
          confidence: mapping.confidence,
          method: mapping.method,
          status: mapping.status,
          sourceRecordId,
        });
      }
      return { canonicalId: mapping.canonicalId, confidence: 1, status: "matched", created: false, method: "exact_id" };
    }
    case "manual_review": {
      const item = await store.findPendingReviewItem(mapping.kind, mapping.sport, mapping.source, mapping.sourceId);
      return {
        canonicalId: null,
        confidence: mapping.confidence,
        status: "manual_review",
        created: false,
        method: "none",
        ...(item ? { reviewItemId: item.id } : {}),
      };
    }
    case "failed":
      return { canonicalId: null, confidence: mapping.confidence, status: "failed", created: false, method: mapping.method };
    case "pending":
      return null;
  }
}
