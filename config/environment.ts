import * as dotenv from "dotenv";
import { resolve } from "node:path";
import { z } from "zod";

const DEFAULT_CITIES = "Delhi,Mumbai,Kolkata,Bengaluru,Hyderabad";
const DEFAULT_CORS_ORIGINS = "https://aqiindia.live,https://www.aqiindia.live";

const commaList = (fallback: string) =>
  z
    .string()
    .default(fallback)
    .transform((value) =>
      value
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    );

const environmentSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  DB_FILE: z.string().min(1).default("aqi.db"),
  CITIES: commaList(DEFAULT_CITIES),
  INGEST_MINUTES: z.coerce.number().positive().default(10),
  OPENAQ_URL: z.string().url().default("https://api.openaq.org/v2/latest"),
  OPENAQ_COUNTRY: z.string().length(2).default("IN"),
  OPENAQ_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  CORS_ORIGINS: commaList(DEFAULT_CORS_ORIGINS),
});

export interface AppConfig {
  port: number;
  dbFile: string;
  cities: string[];
  ingestMinutes: number;
  openaq: {
    url: string;
    country: string;
    timeoutMs: number;
  };
  corsOrigins: string[];
}

// Try to load environment variables from different paths to ensure they're found
export function loadEnvFiles(): string | null {
  const envPaths = [".env", "../.env", resolve(process.cwd(), ".env")];

  for (const path of envPaths) {
    const result = dotenv.config({ path });
    if (result.parsed) {
      console.log(`Environment variables loaded from: ${path}`);
      return path;
    }
  }

  console.warn("No .env file found! Using environment variables from process.");
  return null;
}

export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
  const result = environmentSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const parsed = result.data;
  return {
    port: parsed.PORT,
    dbFile: parsed.DB_FILE,
    cities: parsed.CITIES,
    ingestMinutes: parsed.INGEST_MINUTES,
    openaq: {
      url: parsed.OPENAQ_URL,
      country: parsed.OPENAQ_COUNTRY,
      timeoutMs: parsed.OPENAQ_TIMEOUT_MS,
    },
    corsOrigins: parsed.CORS_ORIGINS,
  };
}
