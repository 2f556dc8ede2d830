import type { RawSourceRecord } from "../../sync/record-schema";
import type { RecordKind, SourceName, Sport, SyncDataType } from "../../sync/types";

export interface FetchRequest {
  sport: Sport;
  /** Day to fetch for date-scoped endpoints; defaults to today (UTC) */
  date?: Date;
  signal?: AbortSignal;
}

/**
 * One upstream provider. Adapters only translate the provider's payload into
 * loosely-typed records; validation and team translation happen downstream.
 */
export interface SourceAdapter {
  readonly source: SourceName;
  readonly dataTypes: readonly SyncDataType[];
  fetch(dataType: SyncDataType, request: FetchRequest): Promise<RawSourceRecord[]>;
  /** A single record by the provider's id, or null when the provider does not know it */
  fetchOne(kind: RecordKind, sport: Sport, sourceId: string, signal?: AbortSignal): Promise<RawSourceRecord | null>;
}
