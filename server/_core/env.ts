import "dotenv/config";
import { z } from "zod";

const toInt = (fallback: number) =>
  z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? fallback : Number(v)))
    .pipe(z.number().int().nonnegative());

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ODDS_API_KEY: z.string().optional(),
  ODDS_API_BASE_URL: z.string().url().default("https://api.the-odds-api.com/v4"),
  STATS_API_BASE_URL: z.string().url().default("https://site.api.espn.com/apis/site/v2/sports"),
  // "{sport}" is replaced with the league slug
  INJURY_NEWS_URL: z.string().default("https://www.espn.com/{sport}/injuries"),
  SYNC_TIMEOUT_MS: toInt(120_000),
  SYNC_MAX_RETRIES: toInt(3),
  SYNC_RETRY_BASE_MS: toInt(500),
  // Cross-source kickoff tolerance. 120 keeps back-to-back games apart;
  // 360 absorbs sources that publish local times without an offset.
  GAME_TIME_TOLERANCE_MINUTES: toInt(120),
  GAME_CROSS_TZ_TOLERANCE_MINUTES: toInt(360),
  RECONCILIATION_CRON: z.string().default("30 4 * * *"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration: ${issues}`);
  }
  return parsed.data;
}

export const ENV = parseEnv(process.env);

export function isDebug(): boolean {
  return ENV.LOG_LEVEL === "debug";
}
