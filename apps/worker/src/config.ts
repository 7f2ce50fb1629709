import { z } from "zod";

const booleanFlag = z
  .preprocess(
    (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
    z.enum(["true", "false"]).default("false"),
  )
  .transform((value) => value === "true");

const WORKER_ENV_SCHEMA = z.object({
  SPREADSHEET_ID: z.string().min(1),
  SHEET_NAME: z.string().min(1),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().min(1),
  CHECK_SCHEDULE_CRON: z.string().min(1).default("*/5 * * * *"),
  WORKER_RUN_ON_BOOT: booleanFlag,
  ROW_TIME_SLEEP: z.coerce.number().nonnegative().default(3),
  ROW_CONCURRENCY: z.coerce.number().int().min(1).max(8).default(1),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().min(1000).default(20000),
  CHALLENGE_TIMEOUT_MS: z.coerce.number().int().min(0).default(15000),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(10).default(4),
  FETCH_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(15000),
});

export type WorkerConfig = {
  spreadsheetId: string;
  sheetName: string;
  credentialsPath: string;
  schedule: string;
  runOnBoot: boolean;
  rowDelayMs: number;
  rowConcurrency: number;
  timeoutMs: number;
  challengeTimeoutMs: number;
  fetchRetries: number;
  fetchRetryDelayMs: number;
};

export function loadWorkerConfig(env: NodeJS.ProcessEnv = process.env): WorkerConfig {
  // Blank values in a .env file mean "use the default", same as leaving the key out.
  const present = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ""));
  const parsed = WORKER_ENV_SCHEMA.parse(present);

  return {
    spreadsheetId: parsed.SPREADSHEET_ID,
    sheetName: parsed.SHEET_NAME,
    credentialsPath: parsed.GOOGLE_APPLICATION_CREDENTIALS,
    schedule: parsed.CHECK_SCHEDULE_CRON,
    runOnBoot: parsed.WORKER_RUN_ON_BOOT,
    rowDelayMs: Math.round(parsed.ROW_TIME_SLEEP * 1000),
    rowConcurrency: parsed.ROW_CONCURRENCY,
    timeoutMs: parsed.SCRAPE_TIMEOUT_MS,
    challengeTimeoutMs: parsed.CHALLENGE_TIMEOUT_MS,
    fetchRetries: parsed.FETCH_RETRIES,
    fetchRetryDelayMs: parsed.FETCH_RETRY_DELAY_MS,
  };
}
