export { FloorPriceService, formatTimestamp } from "./check-service";
export { isEligible, NO_CRITERIA } from "./eligibility";
export {
  collectListings,
  CREDIT_RATING_RESOLVERS,
  extractRecord,
  PRICE_RESOLVERS,
  PURCHASE_URL_RESOLVERS,
  RATE_RESOLVERS,
  resolveField,
  SERVER_INFO_RESOLVERS,
  STOCK_RESOLVERS,
  TITLE_RESOLVERS,
} from "./extract";
export { CHALLENGE_MARKER, fetchListingPage, fetchWithRetry, isRetryableFetchError, ListingFetchError } from "./fetch";
export type { FetchListingOptions, RetryOptions } from "./fetch";
export { formatUnitPrice, parseDecimal, parsePriceText, parseSellRateValue } from "./price";
export { normalizeBundle, parseBundleQuantity, parseLabeledStock, parseWholeNumber } from "./quantity";
export { exchangeRateSortKey, rankEligibleOffers, selectBest } from "./rank";
export { EMPTY_RECORD, parseRecord, ProductRecordBuilder, serializeRecord } from "./record";
export type { SerializedProductRecord } from "./record";
export { DEFAULT_BASE_URL, deriveBaseUrl, extractProductId, resolveHref } from "./url";
export type * from "./types";
