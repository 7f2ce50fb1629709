import { describe, expect, it } from "vitest";

import { loadWorkerConfig } from "../config";
import { summarizePass } from "../service";

const REQUIRED_ENV = {
  SPREADSHEET_ID: "sheet-id-1",
  SHEET_NAME: "Prices",
  GOOGLE_APPLICATION_CREDENTIALS: "./service-account.json",
};

describe("loadWorkerConfig", () => {
  it("applies defaults", () => {
    expect(loadWorkerConfig(REQUIRED_ENV)).toEqual({
      spreadsheetId: "sheet-id-1",
      sheetName: "Prices",
      credentialsPath: "./service-account.json",
      schedule: "*/5 * * * *",
      runOnBoot: false,
      rowDelayMs: 3000,
      rowConcurrency: 1,
      timeoutMs: 20000,
      challengeTimeoutMs: 15000,
      fetchRetries: 4,
      fetchRetryDelayMs: 15000,
    });
  });

  it("reads overrides and converts the row sleep to milliseconds", () => {
    const config = loadWorkerConfig({
      ...REQUIRED_ENV,
      ROW_TIME_SLEEP: "1.5",
      WORKER_RUN_ON_BOOT: "true",
      CHECK_SCHEDULE_CRON: "0 * * * *",
    });

    expect(config.rowDelayMs).toBe(1500);
    expect(config.runOnBoot).toBe(true);
    expect(config.schedule).toBe("0 * * * *");
  });

  it("reads the boot flag regardless of case", () => {
    expect(loadWorkerConfig({ ...REQUIRED_ENV, WORKER_RUN_ON_BOOT: "TRUE" }).runOnBoot).toBe(true);
    expect(loadWorkerConfig({ ...REQUIRED_ENV, WORKER_RUN_ON_BOOT: " False " }).runOnBoot).toBe(false);
  });

  it("treats blank values as unset", () => {
    expect(loadWorkerConfig({ ...REQUIRED_ENV, ROW_CONCURRENCY: "  " }).rowConcurrency).toBe(1);
  });

  it("requires the spreadsheet id", () => {
    expect(() => loadWorkerConfig({ SHEET_NAME: "Prices", GOOGLE_APPLICATION_CREDENTIALS: "./key.json" })).toThrow();
  });

  it("rejects a non-numeric row sleep", () => {
    expect(() => loadWorkerConfig({ ...REQUIRED_ENV, ROW_TIME_SLEEP: "soon" })).toThrow();
  });
});

describe("summarizePass", () => {
  it("counts row outcomes", () => {
    expect(
      summarizePass([
        { rowIndex: 2, status: "SUCCESS", rowStatus: "FOUND" },
        { rowIndex: 3, status: "SUCCESS", rowStatus: "NOT FOUND" },
        { rowIndex: 4, status: "FAILED", reason: "timeout" },
      ]),
    ).toBe("3 rows: 1 found, 1 not found, 1 failed");
  });
});
