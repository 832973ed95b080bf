import { z } from "zod";
import { ConfigError } from "./errors";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const envSchema = z.object({
  DATABASE_URL: z.string().min(1),
  APPFOLIO_AUTH_HEADER: z.string().min(1),
  APPFOLIO_DEVELOPER_ID: z.string().min(1),
  APPFOLIO_BASE_URL: z.string().url().default("https://api.appfolio.com"),
  SEARCH_SERVICE_URL: z.string().url(),
  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  OPENAI_REQUESTS_PER_MINUTE: z.coerce.number().positive().default(10),
  OPENAI_BURST: z.coerce.number().int().positive().default(3),
  SHOWING_TIMEZONE: z.string().min(1).default("America/Los_Angeles"),
  LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  ZONE_AGENTS_JSON: optionalString
});

export type AppConfig = {
  databaseUrl: string;
  appfolio: { baseUrl: string; authHeader: string; developerId: string };
  searchServiceUrl: string;
  openai: { apiKey: string | null; model: string; requestsPerMinute: number; burst: number };
  timezone: string;
  logLevel: "error" | "warn" | "info" | "debug";
  zoneAgentsJson: string | null;
};

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const keys = Array.from(new Set(parsed.error.issues.map((issue) => issue.path.join("."))));
    throw new ConfigError(keys);
  }

  const e = parsed.data;
  return {
    databaseUrl: e.DATABASE_URL,
    appfolio: {
      baseUrl: e.APPFOLIO_BASE_URL.replace(/\/+$/, ""),
      authHeader: e.APPFOLIO_AUTH_HEADER,
      developerId: e.APPFOLIO_DEVELOPER_ID
    },
    searchServiceUrl: e.SEARCH_SERVICE_URL,
    openai: {
      apiKey: e.OPENAI_API_KEY ?? null,
      model: e.OPENAI_MODEL,
      requestsPerMinute: e.OPENAI_REQUESTS_PER_MINUTE,
      burst: e.OPENAI_BURST
    },
    timezone: e.SHOWING_TIMEZONE,
    logLevel: e.LOG_LEVEL,
    zoneAgentsJson: e.ZONE_AGENTS_JSON ?? null
  };
}
