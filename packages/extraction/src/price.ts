const DECIMAL_PATTERN = /^(?:\d+\.?\d*|\.\d+)$/;
const LEADING_DECIMAL_PATTERN = /^\s*(\d+(?:\.\d*)?|\.\d+)/;

/**
 * Parses a listed price such as `￥103.10` or `单价: 1,200.5` by dropping everything but
 * ASCII digits and `.`. Returns null when what is left is not a single decimal number.
 */
export function parsePriceText(input: string): number | null {
  const digits = input.replace(/[^\d.]/g, "");
  return parseDecimal(digits);
}

/**
 * Reads the rate value out of a sell-rate string like `1金=0.0570元`: the number that
 * opens the segment after the first `=`. Trailing unit text is ignored.
 */
export function parseSellRateValue(input: string): number | null {
  const separator = input.indexOf("=");
  if (separator === -1) {
    return null;
  }

  const rest = input.slice(separator + 1).split("=")[0];
  const match = rest.match(LEADING_DECIMAL_PATTERN);
  if (!match) {
    return null;
  }

  const value = Number.parseFloat(match[1]);
  return Number.isFinite(value) ? value : null;
}

export function parseDecimal(input: string): number | null {
  if (!DECIMAL_PATTERN.test(input)) {
    return null;
  }

  const value = Number.parseFloat(input);
  return Number.isFinite(value) && value >= 0 ? value : null;
}

export function formatUnitPrice(price: number): string {
  if (price === 0) {
    return "0";
  }
  // Unit prices of bulk currency listings often sit far below one cent.
  return price >= 0.01 ? price.toFixed(2) : price.toPrecision(4);
}
