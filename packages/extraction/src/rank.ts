import { isEligible } from "./eligibility";
import { parseSellRateValue } from "./price";
import type { BestOffer, FilterCriteria, ProductRecord } from "./types";

export function exchangeRateSortKey(record: ProductRecord): number {
  return parseSellRateValue(record.exchangeRateSell) ?? Number.POSITIVE_INFINITY;
}

/**
 * Orders a copy of the records by sell rate, cheapest first, and drops the ineligible
 * ones. Records with an unreadable rate go last, in their original order.
 */
export function rankEligibleOffers(records: readonly ProductRecord[], criteria: FilterCriteria): ProductRecord[] {
  return records
    .map((record) => ({ record, key: exchangeRateSortKey(record) }))
    .sort((a, b) => compareKeys(a.key, b.key))
    .map(({ record }) => record)
    .filter((record) => isEligible(record, criteria));
}

/**
 * Picks the eligible offer with the lowest unit price.
 *
 * Note that the winner is chosen by `price`, not by the sell-rate order produced by
 * `rankEligibleOffers`; that order only decides which record wins a price tie.
 */
export function selectBest(records: readonly ProductRecord[], criteria: FilterCriteria): BestOffer | null {
  if (records.length === 0) {
    return null;
  }

  const ranked = rankEligibleOffers(records, criteria);
  let winner: ProductRecord | null = null;
  for (const record of ranked) {
    if (winner === null || record.price < winner.price) {
      winner = record;
    }
  }

  if (!winner) {
    return null;
  }

  return {
    price: winner.price,
    title: winner.title,
    stock: winner.stock,
  };
}

function compareKeys(a: number, b: number): number {
  if (a === b) {
    return 0;
  }
  return a < b ? -1 : 1;
}
