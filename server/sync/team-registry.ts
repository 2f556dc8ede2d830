import { readFileSync } from "node:fs";
import { z } from "zod";
import { normalizeTeamName } from "../_core/normalizers";
import { levenshteinDistance, levenshteinSimilarity } from "../_core/similarity";
import type { IdentityStoreOps } from "../store/types";
import { SOURCES, SPORTS, type SourceName, type Sport, type TeamDefinition } from "./types";

export const DEFAULT_TEAM_MAPPINGS_PATH = new URL("../../data/team-mappings.json", import.meta.url);

const teamDefinitionSchema = z.object({
  sport: z.enum(SPORTS),
  teamCode: z.string().min(2).max(10),
  fullName: z.string().min(1),
  city: z.string().min(1),
  sourceKeys: z.record(z.enum(SOURCES), z.array(z.string().min(1))),
  alternateNames: z.array(z.string()).default([]),
});

/** Validate seed data (from JSON or the team_mappings table). */
export function parseTeamDefinitions(raw: unknown): TeamDefinition[] {
  return z.array(teamDefinitionSchema).parse(raw);
}

export function loadTeamDefinitions(path: URL | string = DEFAULT_TEAM_MAPPINGS_PATH): TeamDefinition[] {
  return parseTeamDefinitions(JSON.parse(readFileSync(path, "utf-8")));
}

// Marks a generic name claimed by more than one team ("los angeles")
const AMBIGUOUS = "";

function nicknameOf(team: TeamDefinition): string {
  const full = normalizeTeamName(team.fullName);
  const city = normalizeTeamName(team.city);
  if (city && full.startsWith(`${city} `)) return full.slice(city.length + 1);
  const tokens = full.split(" ");
  return tokens[tokens.length - 1] ?? full;
}

/**
 * Read-only lookup from a provider's team identifier to the canonical team
 * code. Source-specific keys win over names shared across providers; a name
 * that two teams could claim resolves to nothing.
 */
export class TeamMappingRegistry {
  private readonly bySourceKey = new Map<string, string>();
  private readonly byName = new Map<string, string>();
  private readonly namesByCode = new Map<string, string[]>();

  constructor(teams: TeamDefinition[]) {
    for (const team of teams) {
      const code = team.teamCode.toUpperCase();
      const names = new Set<string>();

      for (const source of SOURCES) {
        for (const key of team.sourceKeys[source] ?? []) {
          const normalized = normalizeTeamName(key);
          this.bySourceKey.set(`${team.sport}:${source}:${normalized}`, code);
          names.add(normalized);
        }
      }

      for (const name of [team.fullName, ...team.alternateNames]) {
        names.add(normalizeTeamName(name));
      }
      names.add(nicknameOf(team));
      names.delete("");

      for (const name of names) this.claim(team.sport, name, code);
      this.claim(team.sport, normalizeTeamName(team.city), code);
      this.namesByCode.set(`${team.sport}:${code}`, [...names]);
    }
  }

  private claim(sport: Sport, name: string, code: string): void {
    if (!name) return;
    const key = `${sport}:${name}`;
    const existing = this.byName.get(key);
    this.byName.set(key, existing === undefined || existing === code ? code : AMBIGUOUS);
  }

  get size(): number {
    return this.namesByCode.size;
  }

  /** Canonical team code for a provider's identifier, or null when unknown or ambiguous. */
  resolve(sport: Sport, source: SourceName, raw: string): string | null {
    const normalized = normalizeTeamName(raw);
    if (!normalized) return null;

    const sourceHit = this.bySourceKey.get(`${sport}:${source}:${normalized}`);
    if (sourceHit) return sourceHit;

    const code = raw.trim().toUpperCase();
    if (this.namesByCode.has(`${sport}:${code}`)) return code;

    const nameHit = this.byName.get(`${sport}:${normalized}`);
    return nameHit ? nameHit : null;
  }

  namesFor(sport: Sport, code: string): string[] {
    return this.namesByCode.get(`${sport}:${code}`) ?? [];
  }

  /**
   * True when the raw name is within maxDistance edits of a known name of the
   * team. The distance must also stay under half the name's length, so short
   * abbreviations ("ny", "sa") never match arbitrary two-letter strings.
   */
  withinEditDistance(sport: Sport, code: string, raw: string, maxDistance: number): boolean {
    const normalized = normalizeTeamName(raw);
    if (!normalized) return false;
    const names = this.namesFor(sport, code);
    const targets = names.length > 0 ? names : [code.toLowerCase()];
    return targets.some((name) => {
      const distance = levenshteinDistance(normalized, name);
      return distance <= maxDistance && distance * 2 < name.length;
    });
  }

  similarityTo(sport: Sport, code: string, raw: string): number {
    const normalized = normalizeTeamName(raw);
    const names = this.namesFor(sport, code);
    if (names.length === 0) {
      return levenshteinSimilarity(normalized, code.toLowerCase());
    }
    return Math.max(...names.map((name) => levenshteinSimilarity(normalized, name)));
  }
}

/**
 * Build the registry from the team_mappings table, falling back to the
 * bundled seed file when the table is empty.
 */
export async function loadTeamRegistry(store: Pick<IdentityStoreOps, "listTeamMappings">): Promise<TeamMappingRegistry> {
  const rows = await store.listTeamMappings();
  if (rows.length > 0) {
    console.log(`[team-registry] Loaded ${rows.length} teams from team_mappings`);
    return new TeamMappingRegistry(rows);
  }

  const seeded = loadTeamDefinitions();
  console.warn(`[team-registry] team_mappings is empty, using ${seeded.length} bundled teams`);
  return new TeamMappingRegistry(seeded);
}
