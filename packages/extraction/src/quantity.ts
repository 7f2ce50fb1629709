const LABELED_STOCK_PATTERN = /库存\s*[：:]\s*(\d+)/;
const BUNDLE_MARKER = "=";

export function parseLabeledStock(text: string): number | null {
  const match = text.match(LABELED_STOCK_PATTERN);
  return match ? Number.parseInt(match[1], 10) : null;
}

export function parseWholeNumber(text: string): number | null {
  const trimmed = text.trim();
  return /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Bundle size encoded in a title such as `1000个神圣石=100元`: the first integer before
 * the first `=`. Null when the title carries no marker, no digits before it, or a zero.
 */
export function parseBundleQuantity(title: string): number | null {
  const separator = title.indexOf(BUNDLE_MARKER);
  if (separator === -1) {
    return null;
  }

  const match = title.slice(0, separator).match(/\d+/);
  if (!match) {
    return null;
  }

  const quantity = Number.parseInt(match[0], 10);
  return quantity >= 1 ? quantity : null;
}

export function normalizeBundle(
  raw: { title: string; price: number; stock: number },
): { price: number; stock: number; quantity: number } {
  const quantity = parseBundleQuantity(raw.title) ?? 1;
  return {
    quantity,
    stock: raw.stock * quantity,
    price: raw.price / quantity,
  };
}
