import { AxiosError } from "axios";
import { describe, expect, it } from "vitest";
import { TransientSourceError, ValidationError } from "../../_core/errors";
import { injurySourceId, InjuryNewsAdapter, parseInjuryReport } from "../sources/injury-news";
import { OddsApiAdapter } from "../sources/odds-api";
import { StatsApiAdapter } from "../sources/stats-api";
import { networkDown, stubClient } from "./stub-client";

const scoreboard = {
  events: [
    {
      id: "401",
      date: "2026-01-28T03:30:00Z",
      competitions: [
        {
          competitors: [
            { homeAway: "home", team: { id: "13", abbreviation: "LAL" } },
            { homeAway: "away", team: { id: "4", abbreviation: "CHI" } },
          ],
        },
      ],
    },
    { id: "402", date: "2026-01-28T03:30:00Z", competitions: [] },
  ],
};

const INJURY_HTML = `
<div class="ResponsiveTable">
  <div class="Table__Title">Denver Nuggets</div>
  <table>
    <tbody>
      <tr>
        <td class="col-name"><a href="https://www.espn.com/nba/player/_/id/3112335/nikola-jokic">Nikola Jokic</a></td>
        <td class="col-pos">C</td>
        <td class="col-stat">Day-To-Day</td>
        <td class="col-desc">Knee soreness.</td>
      </tr>
      <tr>
        <td class="col-name">Jamal Murray</td>
        <td class="col-pos">G</td>
        <td class="col-stat">Out</td>
        <td class="col-desc"></td>
      </tr>
    </tbody>
  </table>
</div>`;

describe("StatsApiAdapter", () => {
  it("maps scoreboard events to game records and skips incomplete ones", async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: scoreboard }));
    const adapter = new StatsApiAdapter(client);

    const records = await adapter.fetch("games", { sport: "nba", date: new Date("2026-01-27T12:00:00Z") });

    expect(requests[0].url).toBe("/basketball/nba/scoreboard");
    expect(requests[0].params).toEqual({ dates: "20260127" });
    expect(records).toEqual([
      {
        source: "stats_api",
        kind: "game",
        sport: "nba",
        sourceId: "401",
        fields: { scheduledAt: new Date("2026-01-28T03:30:00Z"), homeTeam: "LAL", awayTeam: "CHI" },
        raw: scoreboard.events[0],
      },
    ]);
  });

  it("walks every roster for players", async () => {
    const { client, requests } = stubClient((config) =>
      config.url === "/basketball/nba/teams"
        ? { status: 200, data: { sports: [{ leagues: [{ teams: [{ team: { id: "7", abbreviation: "DEN" } }] }] }] } }
        : { status: 200, data: { athletes: [{ id: "3112335", fullName: "Nikola Jokic", position: { abbreviation: "C" } }] } },
    );
    const adapter = new StatsApiAdapter(client);

    const records = await adapter.fetch("players", { sport: "nba" });

    expect(requests.map((r) => r.url)).toEqual(["/basketball/nba/teams", "/basketball/nba/teams/7/roster"]);
    expect(records).toEqual([
      {
        source: "stats_api",
        kind: "player",
        sport: "nba",
        sourceId: "3112335",
        fields: { name: "Nikola Jokic", team: "DEN", position: "C" },
        raw: { id: "3112335", fullName: "Nikola Jokic", position: { abbreviation: "C" } },
      },
    ]);
  });

  it("re-fetches a single game from the summary endpoint", async () => {
    const { client, requests } = stubClient(() => ({
      status: 200,
      data: { header: { id: "401", competitions: [{ date: "2026-01-28T03:30:00Z", ...scoreboard.events[0].competitions[0] }] } },
    }));
    const adapter = new StatsApiAdapter(client);

    const record = await adapter.fetchOne("game", "nba", "401");

    expect(requests[0].params).toEqual({ event: "401" });
    expect(record?.sourceId).toBe("401");
    expect(record?.kind).toBe("game");
  });

  it("treats 5xx responses as transient", async () => {
    const { client } = stubClient(() => ({ status: 503, data: "unavailable" }));
    const adapter = new StatsApiAdapter(client);

    const error = await adapter.fetch("games", { sport: "nba" }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TransientSourceError);
    expect(error).toMatchObject({ status: 503 });
  });

  it("treats a dropped connection as transient", async () => {
    const { client } = stubClient(networkDown);
    const adapter = new StatsApiAdapter(client);

    await expect(adapter.fetch("games", { sport: "nba" })).rejects.toThrow("[stats_api] Network error: ECONNRESET");
  });

  it("passes other client errors through", async () => {
    const { client } = stubClient(() => ({ status: 404, data: {} }));
    const adapter = new StatsApiAdapter(client);

    await expect(adapter.fetchOne("player", "nba", "999")).rejects.toBeInstanceOf(AxiosError);
  });
});

describe("OddsApiAdapter", () => {
  const event = {
    id: "evt-1",
    sport_key: "basketball_nba",
    commence_time: "2026-01-27T19:04:00Z",
    home_team: "Los Angeles Lakers",
    away_team: "Chicago Bulls",
  };

  it("maps events with the api key attached", async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: [event] }));
    const adapter = new OddsApiAdapter(client, "test-key");

    const records = await adapter.fetch("games", { sport: "nba" });

    expect(requests[0].url).toBe("/sports/basketball_nba/events");
    expect(requests[0].params).toEqual({ apiKey: "test-key", dateFormat: "iso" });
    expect(records).toEqual([
      {
        source: "odds_api",
        kind: "game",
        sport: "nba",
        sourceId: "evt-1",
        fields: { scheduledAt: new Date("2026-01-27T19:04:00Z"), homeTeam: "Los Angeles Lakers", awayTeam: "Chicago Bulls" },
        raw: event,
      },
    ]);
  });

  it("publishes no players", async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: [] }));
    const adapter = new OddsApiAdapter(client, "test-key");

    expect(await adapter.fetch("players", { sport: "nba" })).toEqual([]);
    expect(await adapter.fetchOne("player", "nba", "p-1")).toBeNull();
    expect(requests).toHaveLength(0);
  });

  it("filters a single event by id", async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: [event] }));
    const adapter = new OddsApiAdapter(client, "test-key");

    expect((await adapter.fetchOne("game", "nba", "evt-1"))?.sourceId).toBe("evt-1");
    expect(requests[0].params).toEqual({ apiKey: "test-key", dateFormat: "iso", eventIds: "evt-1" });
    expect(await adapter.fetchOne("game", "nba", "evt-2")).toBeNull();
  });

  it("rejects a response of the wrong shape", async () => {
    const { client } = stubClient(() => ({ status: 200, data: { message: "quota exceeded" } }));
    const adapter = new OddsApiAdapter(client, "test-key");

    await expect(adapter.fetch("games", { sport: "nba" })).rejects.toThrow(
      new ValidationError("[odds_api] Unexpected response shape from /sports/basketball_nba/events"),
    );
  });

  it("refuses to run without an api key", async () => {
    const { client } = stubClient(() => ({ status: 200, data: [] }));
    const adapter = new OddsApiAdapter(client, "");

    await expect(adapter.fetch("games", { sport: "nba" })).rejects.toThrow("[odds-api] ODDS_API_KEY is not configured");
  });
});

describe("injury news", () => {
  it("parses one row per listed player", () => {
    expect(parseInjuryReport(INJURY_HTML)).toEqual([
      {
        playerId: "3112335",
        name: "Nikola Jokic",
        team: "Denver Nuggets",
        position: "C",
        status: "Day-To-Day",
        comment: "Knee soreness.",
      },
      { playerId: null, name: "Jamal Murray", team: "Denver Nuggets", position: "G", status: "Out", comment: null },
    ]);
  });

  it("derives a stable id for rows without a link", () => {
    const [, murray] = parseInjuryReport(INJURY_HTML);
    expect(injurySourceId(murray)).toBe("denver-nuggets:jamal-murray");
  });

  it("fetches the sport's page and emits player records", async () => {
    const { client, requests } = stubClient(() => ({ status: 200, data: INJURY_HTML }));
    const adapter = new InjuryNewsAdapter(client, "https://news.example.test/{sport}/injuries");

    const records = await adapter.fetch("players", { sport: "nba" });

    expect(requests[0].url).toBe("https://news.example.test/nba/injuries");
    expect(records.map((r) => r.sourceId)).toEqual(["3112335", "denver-nuggets:jamal-murray"]);
    expect(records[0].fields).toEqual({ name: "Nikola Jokic", team: "Denver Nuggets", position: "C" });
    expect(records[1].raw).toEqual({
      playerId: null,
      name: "Jamal Murray",
      team: "Denver Nuggets",
      position: "G",
      status: "Out",
      comment: null,
    });
  });

  it("finds one player again by source id", async () => {
    const { client } = stubClient(() => ({ status: 200, data: INJURY_HTML }));
    const adapter = new InjuryNewsAdapter(client, "https://news.example.test/{sport}/injuries");

    expect((await adapter.fetchOne("player", "nba", "denver-nuggets:jamal-murray"))?.fields).toEqual({
      name: "Jamal Murray",
      team: "Denver Nuggets",
      position: "G",
    });
    expect(await adapter.fetchOne("game", "nba", "401")).toBeNull();
  });
});
