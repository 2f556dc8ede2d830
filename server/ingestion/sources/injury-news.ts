import type { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { ENV } from "../../_core/env";
import { normalizeName, normalizeTeamName } from "../../_core/normalizers";
import type { RawSourceRecord } from "../../sync/record-schema";
import type { RecordKind, Sport, SyncDataType } from "../../sync/types";
import { createSourceClient, getText } from "./http";
import type { FetchRequest, SourceAdapter } from "./types";

export interface InjuryReportRow {
  playerId: string | null;
  name: string;
  team: string;
  position: string | null;
  status: string | null;
  comment: string | null;
}

const PLAYER_ID_PATTERN = /\/id\/(\d+)/;

/**
 * Parse an injury report page: one table per team, titled with the team's
 * display name, one row per listed player.
 */
export function parseInjuryReport(html: string): InjuryReportRow[] {
  const $ = cheerio.load(html);
  const rows: InjuryReportRow[] = [];

  $(".ResponsiveTable").each((_, table) => {
    const team = $(table).find(".injuries__teamName, .Table__Title").first().text().trim();
    if (!team) return;

    $(table)
      .find("tbody tr")
      .each((_, row) => {
        const cell = (cls: string) => $(row).find(`td.${cls}`).first().text().trim() || null;
        const link = $(row).find("td.col-name a").first();
        const name = (link.text() || $(row).find("td.col-name").text()).trim();
        if (!name) return;

        const href = link.attr("href") ?? "";
        rows.push({
          playerId: PLAYER_ID_PATTERN.exec(href)?.[1] ?? null,
          name,
          team,
          position: cell("col-pos"),
          status: cell("col-stat"),
          comment: cell("col-desc"),
        });
      });
  });

  return rows;
}

/** Rows without a provider id get a stable one from name and team. */
export function injurySourceId(row: InjuryReportRow): string {
  if (row.playerId) return row.playerId;
  return `${normalizeTeamName(row.team)}:${normalizeName(row.name).key}`.replace(/\s+/g, "-");
}

/**
 * Injury/news provider, scraped from HTML. Publishes players only, with
 * teams as display names.
 */
export class InjuryNewsAdapter implements SourceAdapter {
  readonly source = "injury_news";
  readonly dataTypes: readonly SyncDataType[] = ["players"];
  private readonly client: AxiosInstance;

  constructor(client?: AxiosInstance, private readonly urlTemplate: string = ENV.INJURY_NEWS_URL) {
    this.client = client ?? createSourceClient({});
  }

  urlFor(sport: Sport): string {
    return this.urlTemplate.replace("{sport}", sport);
  }

  private async report(sport: Sport, signal?: AbortSignal): Promise<InjuryReportRow[]> {
    const html = await getText(this.client, this.source, this.urlFor(sport), { signal });
    return parseInjuryReport(html);
  }

  private toRecord(sport: Sport, row: InjuryReportRow): RawSourceRecord {
    return {
      source: "injury_news",
      kind: "player",
      sport,
      sourceId: injurySourceId(row),
      fields: { name: row.name, team: row.team, position: row.position },
      raw: row,
    };
  }

  async fetch(dataType: SyncDataType, request: FetchRequest): Promise<RawSourceRecord[]> {
    if (dataType !== "players") {
      console.warn(`[injury-news] ${dataType} is not published by this source`);
      return [];
    }
    const rows = await this.report(request.sport, request.signal);
    console.log(`[injury-news] ${rows.length} ${request.sport} injury rows`);
    return rows.map((row) => this.toRecord(request.sport, row));
  }

  async fetchOne(kind: RecordKind, sport: Sport, sourceId: string, signal?: AbortSignal): Promise<RawSourceRecord | null> {
    if (kind !== "player") return null;
    const row = (await this.report(sport, signal)).find((r) => injurySourceId(r) === sourceId);
    return row ? this.toRecord(sport, row) : null;
  }
}
