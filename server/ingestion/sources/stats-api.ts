import type { AxiosInstance } from "axios";
import { z } from "zod";
import { ENV } from "../../_core/env";
import type { RawSourceRecord } from "../../sync/record-schema";
import type { RecordKind, Sport, SyncDataType } from "../../sync/types";
import { createSourceClient, getJson } from "./http";
import type { FetchRequest, SourceAdapter } from "./types";

/**
 * Stats provider (ESPN site API): scoreboard for games, team rosters for
 * players. Teams are reported by the provider's abbreviation ("GS", "NY").
 */

export const ESPN_SPORT_PATHS: Record<Sport, string> = {
  nba: "basketball/nba",
  nfl: "football/nfl",
  mlb: "baseball/mlb",
  nhl: "hockey/nhl",
};

const competitorSchema = z.object({
  homeAway: z.enum(["home", "away"]),
  team: z.object({
    id: z.string().optional(),
    abbreviation: z.string(),
    displayName: z.string().optional(),
  }),
});

const competitionSchema = z.object({
  date: z.string().optional(),
  competitors: z.array(competitorSchema),
});

const eventSchema = z
  .object({
    id: z.string(),
    date: z.string(),
    competitions: z.array(competitionSchema),
  })
  .passthrough();

const scoreboardSchema = z.object({
  events: z.array(eventSchema).default([]),
});

const summarySchema = z.object({
  header: z
    .object({
      id: z.string(),
      competitions: z.array(competitionSchema),
    })
    .passthrough(),
});

const teamsSchema = z.object({
  sports: z.array(
    z.object({
      leagues: z.array(
        z.object({
          teams: z.array(z.object({ team: z.object({ id: z.string(), abbreviation: z.string() }) })),
        }),
      ),
    }),
  ),
});

const athleteSchema = z
  .object({
    id: z.string(),
    fullName: z.string(),
    position: z.object({ abbreviation: z.string() }).optional(),
    team: z.object({ abbreviation: z.string() }).optional(),
  })
  .passthrough();

const rosterSchema = z.object({
  athletes: z.array(athleteSchema).default([]),
});

const athleteResponseSchema = z.object({
  athlete: athleteSchema,
});

type Competition = z.infer<typeof competitionSchema>;
type Athlete = z.infer<typeof athleteSchema>;

function espnDate(date: Date): string {
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

function competitionToRecord(
  sport: Sport,
  id: string,
  date: string,
  competition: Competition | undefined,
  raw: unknown,
): RawSourceRecord | null {
  const home = competition?.competitors.find((c) => c.homeAway === "home");
  const away = competition?.competitors.find((c) => c.homeAway === "away");
  if (!home || !away) return null;
  return {
    source: "stats_api",
    kind: "game",
    sport,
    sourceId: id,
    fields: {
      scheduledAt: new Date(date),
      homeTeam: home.team.abbreviation,
      awayTeam: away.team.abbreviation,
    },
    raw,
  };
}

function athleteToRecord(sport: Sport, athlete: Athlete, team: string | null): RawSourceRecord {
  return {
    source: "stats_api",
    kind: "player",
    sport,
    sourceId: athlete.id,
    fields: {
      name: athlete.fullName,
      team: athlete.team?.abbreviation ?? team,
      position: athlete.position?.abbreviation ?? null,
    },
    raw: athlete,
  };
}

export class StatsApiAdapter implements SourceAdapter {
  readonly source = "stats_api";
  readonly dataTypes: readonly SyncDataType[] = ["games", "players"];
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance) {
    this.client = client ?? createSourceClient({ baseURL: ENV.STATS_API_BASE_URL });
  }

  async fetch(dataType: SyncDataType, request: FetchRequest): Promise<RawSourceRecord[]> {
    return dataType === "games" ? this.fetchGames(request) : this.fetchPlayers(request);
  }

  async fetchGames({ sport, date = new Date(), signal }: FetchRequest): Promise<RawSourceRecord[]> {
    const path = ESPN_SPORT_PATHS[sport];
    const scoreboard = await getJson(this.client, this.source, `/${path}/scoreboard`, scoreboardSchema, {
      params: { dates: espnDate(date) },
      signal,
    });

    const records: RawSourceRecord[] = [];
    for (const event of scoreboard.events) {
      const record = competitionToRecord(sport, event.id, event.date, event.competitions[0], event);
      if (record) records.push(record);
      else console.warn(`[stats-api] Event ${event.id} has no home/away competitors, skipping`);
    }
    console.log(`[stats-api] ${records.length} ${sport} games for ${espnDate(date)}`);
    return records;
  }

  async fetchPlayers({ sport, signal }: FetchRequest): Promise<RawSourceRecord[]> {
    const path = ESPN_SPORT_PATHS[sport];
    const listing = await getJson(this.client, this.source, `/${path}/teams`, teamsSchema, { signal });
    const teams = listing.sports.flatMap((s) => s.leagues.flatMap((l) => l.teams.map((t) => t.team)));

    const records: RawSourceRecord[] = [];
    for (const team of teams) {
      const roster = await getJson(this.client, this.source, `/${path}/teams/${team.id}/roster`, rosterSchema, { signal });
      for (const athlete of roster.athletes) {
        records.push(athleteToRecord(sport, athlete, team.abbreviation));
      }
    }
    console.log(`[stats-api] ${records.length} ${sport} players across ${teams.length} rosters`);
    return records;
  }

  async fetchOne(kind: RecordKind, sport: Sport, sourceId: string, signal?: AbortSignal): Promise<RawSourceRecord | null> {
    const path = ESPN_SPORT_PATHS[sport];
    if (kind === "game") {
      const summary = await getJson(this.client, this.source, `/${path}/summary`, summarySchema, {
        params: { event: sourceId },
        signal,
      });
      const competition = summary.header.competitions[0];
      return competition?.date ? competitionToRecord(sport, summary.header.id, competition.date, competition, summary.header) : null;
    }

    const response = await getJson(this.client, this.source, `/${path}/athletes/${sourceId}`, athleteResponseSchema, { signal });
    return athleteToRecord(sport, response.athlete, null);
  }
}
