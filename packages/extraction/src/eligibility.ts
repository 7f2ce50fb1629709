import type { FilterCriteria, ProductRecord } from "./types";

export const NO_CRITERIA: FilterCriteria = { stockMin: 0, levelMin: 0 };

// Both thresholds are inclusive; a zero threshold disables that check.
export function isEligible(record: ProductRecord, criteria: FilterCriteria): boolean {
  return record.creditRating >= criteria.levelMin && record.stock >= criteria.stockMin;
}
