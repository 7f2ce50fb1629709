import { fetchWithRetry, FloorPriceService } from "@floor-scout/extraction";
import type { CheckResult } from "@floor-scout/extraction";
import { createGoogleSheetsClient, GoogleSheetGateway } from "@floor-scout/sheets";

import type { WorkerConfig } from "./config";

export function createService(config: WorkerConfig): FloorPriceService {
  const sheet = new GoogleSheetGateway({
    client: createGoogleSheetsClient({
      spreadsheetId: config.spreadsheetId,
      keyFile: config.credentialsPath,
    }),
    sheetName: config.sheetName,
  });

  return new FloorPriceService({
    sheet,
    fetchPage: (url) =>
      fetchWithRetry(url, {
        timeoutMs: config.timeoutMs,
        challengeTimeoutMs: config.challengeTimeoutMs,
        retries: config.fetchRetries,
        retryDelayMs: config.fetchRetryDelayMs,
      }),
    rowDelayMs: config.rowDelayMs,
    concurrency: config.rowConcurrency,
  });
}

export function summarizePass(results: CheckResult[]): string {
  const found = results.filter((result) => result.rowStatus === "FOUND").length;
  const notFound = results.filter((result) => result.rowStatus === "NOT FOUND").length;
  const failed = results.filter((result) => result.status === "FAILED").length;
  return `${results.length} rows: ${found} found, ${notFound} not found, ${failed} failed`;
}
