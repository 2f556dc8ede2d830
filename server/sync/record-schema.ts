import { createHash } from "node:crypto";
import { z } from "zod";
import { ValidationError } from "../_core/errors";
import { SOURCES, SPORTS, type SourceRecord } from "./types";

/**
 * Ingest boundary. Adapters hand over loosely-shaped objects; everything
 * past this point works with a validated SourceRecord.
 */

const trimmed = z.string().trim().min(1);

const baseRecord = {
  source: z.enum(SOURCES),
  sourceId: z.union([trimmed, z.number().int().transform(String)]),
  sport: z.enum(SPORTS),
  raw: z.unknown().optional(),
};

const gameRecordSchema = z.object({
  ...baseRecord,
  kind: z.literal("game"),
  fields: z
    .object({
      scheduledAt: z.coerce.date().refine((d) => !Number.isNaN(d.getTime()), "Invalid date"),
      homeTeam: trimmed,
      awayTeam: trimmed,
    })
    .refine((f) => f.homeTeam.toLowerCase() !== f.awayTeam.toLowerCase(), {
      message: "homeTeam and awayTeam must differ",
      path: ["awayTeam"],
    }),
});

const playerRecordSchema = z.object({
  ...baseRecord,
  kind: z.literal("player"),
  fields: z.object({
    name: trimmed,
    team: trimmed.nullish().transform((v) => v ?? null),
    position: trimmed.nullish().transform((v) => v ?? null),
  }),
});

export const sourceRecordSchema = z.discriminatedUnion("kind", [gameRecordSchema, playerRecordSchema]);

export type RawSourceRecord = z.input<typeof sourceRecordSchema>;

export function parseSourceRecord(raw: unknown): SourceRecord {
  const parsed = sourceRecordSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));
    const summary = issues.map((i) => `${i.path || "(root)"}: ${i.message}`).join("; ");
    throw new ValidationError(`Invalid source record: ${summary}`, issues);
  }
  return parsed.data;
}

/** Stable JSON for hashing: keys sorted, dates as ISO strings. */
function recordPayload(record: SourceRecord): Record<string, unknown> {
  if (record.kind === "game") {
    return {
      awayTeam: record.fields.awayTeam,
      homeTeam: record.fields.homeTeam,
      scheduledAt: record.fields.scheduledAt.toISOString(),
    };
  }
  return {
    name: record.fields.name,
    position: record.fields.position,
    team: record.fields.team,
  };
}

/** What source_records keeps: the validated fields plus the provider item they came from. */
export function storedPayload(record: SourceRecord): { fields: Record<string, unknown>; raw: unknown } {
  return { fields: recordPayload(record), raw: record.raw ?? null };
}

/** Hash of the validated fields only, so a re-fetch that changes nothing we read is not a new row. */
export function hashPayload(record: SourceRecord): string {
  const body = JSON.stringify({
    kind: record.kind,
    sport: record.sport,
    source: record.source,
    sourceId: record.sourceId,
    fields: recordPayload(record),
  });
  return createHash("sha256").update(body).digest("hex");
}
