import { z } from "zod";
import { ConfigError } from "./errors";
import { DEFAULT_USER_AGENT } from "./constants";

const numberFrom = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const EnvSchema = z.object({
  GEMINI_API_KEY: z.string().trim().min(1),
  BRIGHTDATA_SERP_API_KEY: z.string().trim().min(1),
  GEMINI_MODEL: z.string().default("gemini-2.0-flash-exp"),
  BRIGHTDATA_ZONE: z.string().default("serp"),
  DATA_DIR: z.string().default("data"),
  PROJECTS_CSV: z.string().default("data/projects.csv"),
  REQUEST_TIMEOUT_MS: numberFrom(30_000),
  FETCH_DELAY_MS: numberFrom(2_000),
  SEARCH_DELAY_MS: numberFrom(1_000),
  BATCH_CONCURRENCY: z.coerce.number().int().positive().default(1),
  RESUME: z.string().optional(),
  USER_AGENT: z.string().default(DEFAULT_USER_AGENT),
  PORT: numberFrom(3333),
});

export type PipelineConfig = {
  geminiApiKey: string;
  serpApiKey: string;
  geminiModel: string;
  serpZone: string;
  dataDir: string;
  projectsCsv: string;
  timeoutMs: number;
  fetchDelayMs: number;
  searchDelayMs: number;
  batchConcurrency: number;
  resume: boolean;
  userAgent: string;
  port: number;
};

/**
 * Reads the pipeline configuration from the environment. Missing credentials
 * are the only fatal startup condition and surface as a {@link ConfigError}.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
  const blanksRemoved = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = EnvSchema.safeParse(blanksRemoved);
  if (!parsed.success) {
    const missing = parsed.error.issues.map((i) => i.path.join("."));
    const credentials = missing.filter((k) => k === "GEMINI_API_KEY" || k === "BRIGHTDATA_SERP_API_KEY");
    if (credentials.length) throw new ConfigError(credentials);
    throw new ConfigError(missing, `Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ")}`);
  }

  const e = parsed.data;
  return {
    geminiApiKey: e.GEMINI_API_KEY,
    serpApiKey: e.BRIGHTDATA_SERP_API_KEY,
    geminiModel: e.GEMINI_MODEL,
    serpZone: e.BRIGHTDATA_ZONE,
    dataDir: e.DATA_DIR,
    projectsCsv: e.PROJECTS_CSV,
    timeoutMs: e.REQUEST_TIMEOUT_MS,
    fetchDelayMs: e.FETCH_DELAY_MS,
    searchDelayMs: e.SEARCH_DELAY_MS,
    batchConcurrency: e.BATCH_CONCURRENCY,
    resume: e.RESUME === "1" || e.RESUME === "true",
    userAgent: e.USER_AGENT,
    port: e.PORT,
  };
}
