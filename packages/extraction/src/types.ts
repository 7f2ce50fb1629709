import type { CheerioAPI } from "cheerio";

export type ProductRecord = Readonly<{
  title: string;
  url: string;
  productId: string;
  serverInfo: string;
  price: number;
  stock: number;
  exchangeRateBuy: string;
  exchangeRateSell: string;
  creditRating: number;
  purchaseUrl: string;
}>;

export type FilterCriteria = {
  stockMin: number;
  levelMin: number;
};

export type BestOffer = {
  price: number;
  title: string;
  stock: number;
};

export type ExtractContext = {
  baseUrl: string;
};

export type FieldResolver<T> = {
  name: string;
  resolve: ($: CheerioAPI, context: ExtractContext) => T | null;
};

export type ListingPage = {
  html: string;
  finalUrl: string;
};

export type ListingFetchErrorCode = "HTTP_STATUS" | "REDIRECT_BLOCKED" | "CHALLENGE_TIMEOUT";

export type SheetColumn = "status" | "time" | "price" | "title" | "stock";

export type RowConfig = {
  rowIndex: number;
  productLink: string;
  criteria: FilterCriteria;
};

export interface SheetGateway {
  listRunnableRows(): Promise<number[]>;
  readRowConfig(rowIndex: number): Promise<RowConfig>;
  writeCell(rowIndex: number, column: SheetColumn, value: string | number): Promise<void>;
}

export type RowStatus = "FOUND" | "NOT FOUND";

export type CheckResult = {
  rowIndex: number;
  status: "SUCCESS" | "FAILED";
  rowStatus?: RowStatus;
  offer?: BestOffer | null;
  listingCount?: number;
  reason?: string;
};
