import { google } from "googleapis";
import { z } from "zod";

import type { RowConfig, SheetColumn, SheetGateway } from "@floor-scout/extraction";

import { columnIndex, DEFAULT_COLUMNS, lastColumn, quoteSheetName } from "./columns";
import type { ColumnMap } from "./columns";

const FIRST_DATA_ROW = 2;
const RUN_FLAG_VALUES = new Set(["true", "1", "x", "yes", "y"]);

const THRESHOLD_SCHEMA = z.preprocess(
  (value) => (value === undefined || value === null || (typeof value === "string" && value.trim() === "") ? 0 : value),
  z.coerce.number().int().nonnegative(),
);

const ROW_CONFIG_SCHEMA = z.object({
  productLink: z
    .string()
    .trim()
    .url()
    .refine((value) => /^https?:\/\//i.test(value), { message: "Product link must be an http(s) URL" }),
  stockMin: THRESHOLD_SCHEMA,
  levelMin: THRESHOLD_SCHEMA,
});

export interface SheetValuesClient {
  read(range: string): Promise<unknown[][]>;
  write(range: string, value: string | number): Promise<void>;
}

type GatewayOptions = {
  client: SheetValuesClient;
  sheetName: string;
  columns?: Partial<ColumnMap>;
};

export class GoogleSheetGateway implements SheetGateway {
  private client: SheetValuesClient;
  private sheetName: string;
  private columns: ColumnMap;

  constructor(options: GatewayOptions) {
    this.client = options.client;
    this.sheetName = options.sheetName;
    this.columns = { ...DEFAULT_COLUMNS, ...options.columns };
  }

  async listRunnableRows(): Promise<number[]> {
    const rows = await this.client.read(this.range(`A${FIRST_DATA_ROW}:${lastColumn(this.columns)}`));
    const runnable: number[] = [];

    rows.forEach((row, offset) => {
      const flag = cellText(row, columnIndex(this.columns.run)).toLowerCase();
      const link = cellText(row, columnIndex(this.columns.productLink));
      if (RUN_FLAG_VALUES.has(flag) && link) {
        runnable.push(FIRST_DATA_ROW + offset);
      }
    });

    return runnable;
  }

  async readRowConfig(rowIndex: number): Promise<RowConfig> {
    const rows = await this.client.read(this.range(`A${rowIndex}:${lastColumn(this.columns)}${rowIndex}`));
    const row = rows[0] ?? [];
    const parsed = ROW_CONFIG_SCHEMA.parse({
      productLink: cellText(row, columnIndex(this.columns.productLink)),
      stockMin: cellText(row, columnIndex(this.columns.stockMin)),
      levelMin: cellText(row, columnIndex(this.columns.levelMin)),
    });

    return {
      rowIndex,
      productLink: parsed.productLink,
      criteria: {
        stockMin: parsed.stockMin,
        levelMin: parsed.levelMin,
      },
    };
  }

  async writeCell(rowIndex: number, column: SheetColumn, value: string | number): Promise<void> {
    await this.client.write(this.range(`${this.columns[column]}${rowIndex}`), value);
  }

  private range(cells: string): string {
    return `${quoteSheetName(this.sheetName)}!${cells}`;
  }
}

export function createGoogleSheetsClient(input: { spreadsheetId: string; keyFile: string }): SheetValuesClient {
  const auth = new google.auth.GoogleAuth({
    keyFile: input.keyFile,
    scopes: ["https://www.googleapis.com/auth/spreadsheets"],
  });
  const api = google.sheets({ version: "v4", auth });

  return {
    async read(range) {
      const response = await api.spreadsheets.values.get({
        spreadsheetId: input.spreadsheetId,
        range,
      });
      return response.data.values ?? [];
    },
    async write(range, value) {
      await api.spreadsheets.values.update({
        spreadsheetId: input.spreadsheetId,
        range,
        valueInputOption: "USER_ENTERED",
        requestBody: {
          values: [[value]],
        },
      });
    },
  };
}

function cellText(row: unknown[], index: number): string {
  const value = row[index];
  if (value === undefined || value === null) {
    return "";
  }
  return String(value).trim();
}
