import type { AxiosInstance } from "axios";
import { z } from "zod";
import { ENV } from "../../_core/env";
import type { RawSourceRecord } from "../../sync/record-schema";
import type { RecordKind, Sport, SyncDataType } from "../../sync/types";
import { createSourceClient, getJson } from "./http";
import type { FetchRequest, SourceAdapter } from "./types";

export const ODDS_SPORT_KEYS: Record<Sport, string> = {
  nba: "basketball_nba",
  nfl: "americanfootball_nfl",
  mlb: "baseball_mlb",
  nhl: "icehockey_nhl",
};

const oddsEventSchema = z.object({
  id: z.string(),
  sport_key: z.string(),
  commence_time: z.string(),
  home_team: z.string(),
  away_team: z.string(),
}).passthrough();

const eventsSchema = z.array(oddsEventSchema);

type OddsEvent = z.infer<typeof oddsEventSchema>;

function eventToRecord(sport: Sport, event: OddsEvent): RawSourceRecord {
  return {
    source: "odds_api",
    kind: "game",
    sport,
    sourceId: event.id,
    fields: {
      scheduledAt: new Date(event.commence_time),
      homeTeam: event.home_team,
      awayTeam: event.away_team,
    },
    raw: event,
  };
}

/**
 * Odds provider (The Odds API). Only publishes events; teams come as full
 * display names ("Los Angeles Lakers").
 */
export class OddsApiAdapter implements SourceAdapter {
  readonly source = "odds_api";
  readonly dataTypes: readonly SyncDataType[] = ["games"];
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance, private readonly apiKey: string | undefined = ENV.ODDS_API_KEY) {
    this.client = client ?? createSourceClient({ baseURL: ENV.ODDS_API_BASE_URL });
  }

  private params(extra: Record<string, string> = {}): Record<string, string> {
    if (!this.apiKey) {
      throw new Error("[odds-api] ODDS_API_KEY is not configured");
    }
    return { apiKey: this.apiKey, dateFormat: "iso", ...extra };
  }

  async fetch(dataType: SyncDataType, request: FetchRequest): Promise<RawSourceRecord[]> {
    if (dataType !== "games") {
      console.warn(`[odds-api] ${dataType} is not published by this source`);
      return [];
    }
    const events = await getJson(this.client, this.source, `/sports/${ODDS_SPORT_KEYS[request.sport]}/events`, eventsSchema, {
      params: this.params(),
      signal: request.signal,
    });
    console.log(`[odds-api] ${events.length} ${request.sport} events`);
    return events.map((event) => eventToRecord(request.sport, event));
  }

  async fetchOne(kind: RecordKind, sport: Sport, sourceId: string, signal?: AbortSignal): Promise<RawSourceRecord | null> {
    if (kind !== "game") return null;
    const events = await getJson(this.client, this.source, `/sports/${ODDS_SPORT_KEYS[sport]}/events`, eventsSchema, {
      params: this.params({ eventIds: sourceId }),
      signal,
    });
    const event = events.find((e) => e.id === sourceId);
    return event ? eventToRecord(sport, event) : null;
  }
}
