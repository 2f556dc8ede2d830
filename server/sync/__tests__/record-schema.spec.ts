import { describe, expect, it } from "vitest";
import { ValidationError } from "../../_core/errors";
import { hashPayload, parseSourceRecord } from "../record-schema";
import { gameRecord } from "./fixtures";

describe("parseSourceRecord", () => {
  it("coerces a game record from loose input", () => {
    const record = parseSourceRecord({
      kind: "game",
      source: "stats_api",
      sourceId: 401,
      sport: "nba",
      fields: { scheduledAt: "2026-01-28T03:30:00Z", homeTeam: " LAL ", awayTeam: "CHI" },
    });

    expect(record).toEqual(gameRecord("stats_api", "401", "2026-01-28T03:30:00Z", "LAL", "CHI"));
  });

  it("defaults missing player team and position to null", () => {
    const record = parseSourceRecord({
      kind: "player",
      source: "injury_news",
      sourceId: "n-1",
      sport: "nba",
      fields: { name: "Nikola Jokic" },
    });

    expect(record.fields).toEqual({ name: "Nikola Jokic", team: null, position: null });
  });

  it("reports the failing field path", () => {
    const parse = (fields: Record<string, string>) => () =>
      parseSourceRecord({ kind: "game", source: "stats_api", sourceId: "401", sport: "nba", fields });

    expect(parse({ scheduledAt: "not a date", homeTeam: "LAL", awayTeam: "CHI" })).toThrow(/^Invalid source record: fields\.scheduledAt: /);
    expect(parse({ scheduledAt: "2026-01-28T03:30:00Z", homeTeam: "LAL", awayTeam: "lal" })).toThrow(
      "Invalid source record: fields.awayTeam: homeTeam and awayTeam must differ",
    );
  });

  it("rejects unknown sources", () => {
    expect(() =>
      parseSourceRecord({ kind: "player", source: "twitter", sourceId: "1", sport: "nba", fields: { name: "X" } }),
    ).toThrow(ValidationError);
  });
});

describe("hashPayload", () => {
  it("changes when a field changes and not otherwise", () => {
    const a = gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls");
    const b = gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "Los Angeles Lakers", "Chicago Bulls");
    const c = gameRecord("odds_api", "evt-1", "2026-01-27T19:04:00Z", "LA Lakers", "Chicago Bulls");

    expect(hashPayload(a)).toBe(hashPayload(b));
    expect(hashPayload(a)).not.toBe(hashPayload(c));
  });
});
