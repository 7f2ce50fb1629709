import { z } from "zod";

import type { ProductRecord } from "./types";

export const EMPTY_RECORD: ProductRecord = Object.freeze({
  title: "",
  url: "",
  productId: "",
  serverInfo: "",
  price: 0,
  stock: 0,
  exchangeRateBuy: "",
  exchangeRateSell: "",
  creditRating: 0,
  purchaseUrl: "",
});

const PRODUCT_RECORD_SCHEMA = z.object({
  title: z.string(),
  url: z.string(),
  productId: z.string(),
  serverInfo: z.string(),
  price: z.number().nonnegative(),
  stock: z.number().int().nonnegative(),
  exchangeRateBuy: z.string(),
  exchangeRateSell: z.string(),
  creditRating: z.number().int().min(0).max(15),
  purchaseUrl: z.string(),
});

export type SerializedProductRecord = z.infer<typeof PRODUCT_RECORD_SCHEMA>;

/**
 * Accumulates resolved fields without mutating anything shared: every `with` call
 * returns a new builder, and `build` hands out a frozen record.
 */
export class ProductRecordBuilder {
  private constructor(private readonly fields: ProductRecord) {}

  static create(): ProductRecordBuilder {
    return new ProductRecordBuilder(EMPTY_RECORD);
  }

  get current(): ProductRecord {
    return this.fields;
  }

  with(patch: Partial<ProductRecord>): ProductRecordBuilder {
    return new ProductRecordBuilder({ ...this.fields, ...patch });
  }

  build(): ProductRecord {
    return Object.freeze({ ...this.fields });
  }
}

export function serializeRecord(record: ProductRecord): SerializedProductRecord {
  return {
    title: record.title,
    url: record.url,
    productId: record.productId,
    serverInfo: record.serverInfo,
    price: record.price,
    stock: record.stock,
    exchangeRateBuy: record.exchangeRateBuy,
    exchangeRateSell: record.exchangeRateSell,
    creditRating: record.creditRating,
    purchaseUrl: record.purchaseUrl,
  };
}

export function parseRecord(input: unknown): ProductRecord {
  return Object.freeze(PRODUCT_RECORD_SCHEMA.parse(input));
}
