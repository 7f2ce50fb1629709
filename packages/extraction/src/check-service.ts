import pLimit from "p-limit";

import { collectListings } from "./extract";
import { fetchWithRetry } from "./fetch";
import { formatUnitPrice } from "./price";
import { selectBest } from "./rank";
import { deriveBaseUrl } from "./url";
import type { BestOffer, CheckResult, ListingPage, RowConfig, RowStatus, SheetColumn, SheetGateway } from "./types";

type ServiceDependencies = {
  sheet: SheetGateway;
  fetchPage?: (url: string) => Promise<ListingPage>;
  sleep?: (ms: number) => Promise<void>;
  now?: () => Date;
  rowDelayMs?: number;
  listBackoffMs?: number;
  concurrency?: number;
};

export class FloorPriceService {
  private sheet: SheetGateway;
  private fetchPage: (url: string) => Promise<ListingPage>;
  private sleep: (ms: number) => Promise<void>;
  private now: () => Date;
  private rowDelayMs: number;
  private listBackoffMs: number;
  private concurrency: number;

  constructor(deps: ServiceDependencies) {
    this.sheet = deps.sheet;
    this.fetchPage = deps.fetchPage ?? ((url) => fetchWithRetry(url));
    this.sleep = deps.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.now = deps.now ?? (() => new Date());
    this.rowDelayMs = deps.rowDelayMs ?? 3000;
    this.listBackoffMs = deps.listBackoffMs ?? 60_000;
    this.concurrency = Math.max(1, deps.concurrency ?? 1);
  }

  async runSheetPass(): Promise<CheckResult[]> {
    let rows: number[];
    try {
      rows = await this.sheet.listRunnableRows();
    } catch (error) {
      // Usually the Sheets read quota; hold the pass so the next tick does not hit it again at once.
      console.error(`[check] Could not list runnable rows, backing off ${this.listBackoffMs}ms`, error);
      await this.sleep(this.listBackoffMs);
      throw error;
    }
    const limit = pLimit(this.concurrency);

    return Promise.all(rows.map((rowIndex) => limit(() => this.runCheckForRow(rowIndex))));
  }

  async runCheckForRow(rowIndex: number): Promise<CheckResult> {
    let config: RowConfig;
    try {
      config = await this.sheet.readRowConfig(rowIndex);
    } catch (error) {
      console.error(`[check] Row ${rowIndex}: could not read row config`, error);
      await this.writeCell(rowIndex, "time", `Error: ${formatTimestamp(this.now())}`);
      return {
        rowIndex,
        status: "FAILED",
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    let rowStatus: RowStatus = "NOT FOUND";
    let offer: BestOffer | null = null;
    let listingCount = 0;
    try {
      const page = await this.fetchPage(config.productLink);
      const listings = collectListings(page.html, deriveBaseUrl(config.productLink));
      listingCount = listings.length;
      offer = selectBest(listings, config.criteria);

      if (offer) {
        rowStatus = "FOUND";
        console.log(
          `[check] Row ${rowIndex}: best of ${listings.length} listings is ${formatUnitPrice(offer.price)} (${offer.title}), stock ${offer.stock}`,
        );
        await this.writeCell(rowIndex, "price", offer.price);
        await this.writeCell(rowIndex, "title", offer.title);
        await this.writeCell(rowIndex, "stock", offer.stock);
      } else {
        console.log(`[check] Row ${rowIndex}: no eligible offer among ${listings.length} listings`);
      }

      await this.sleep(this.rowDelayMs);
    } catch (error) {
      console.error(`[check] Row ${rowIndex}: check failed for ${config.productLink}`, error);
      return {
        rowIndex,
        status: "FAILED",
        reason: error instanceof Error ? error.message : String(error),
      };
    }

    await this.writeCell(rowIndex, "status", rowStatus);
    await this.writeCell(rowIndex, "time", formatTimestamp(this.now()));

    return {
      rowIndex,
      status: "SUCCESS",
      rowStatus,
      offer,
      listingCount,
    };
  }

  private async writeCell(rowIndex: number, column: SheetColumn, value: string | number): Promise<void> {
    try {
      await this.sheet.writeCell(rowIndex, column, value);
    } catch (error) {
      console.error(`[check] Row ${rowIndex}: failed to write ${column}`, error);
    }
  }
}

export function formatTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return (
    `${pad(date.getDate())}/${pad(date.getMonth() + 1)}/${date.getFullYear()} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
