import type { SheetColumn } from "@floor-scout/extraction";

export type ColumnMap = Record<SheetColumn, string> & {
  run: string;
  productLink: string;
  stockMin: string;
  levelMin: string;
};

export const DEFAULT_COLUMNS: ColumnMap = {
  run: "B",
  productLink: "C",
  stockMin: "G",
  levelMin: "H",
  status: "E",
  time: "F",
  price: "I",
  title: "J",
  stock: "K",
};

/** Zero-based index of an A1 column letter: `A` → 0, `Z` → 25, `AA` → 26. */
export function columnIndex(letter: string): number {
  const normalized = letter.trim().toUpperCase();
  if (!/^[A-Z]+$/.test(normalized)) {
    throw new Error(`Invalid column letter: ${letter}`);
  }

  let index = 0;
  for (const char of normalized) {
    index = index * 26 + (char.charCodeAt(0) - 64);
  }
  return index - 1;
}

export function lastColumn(columns: ColumnMap): string {
  return Object.values(columns).reduce((widest, letter) => (columnIndex(letter) > columnIndex(widest) ? letter : widest));
}

export function quoteSheetName(name: string): string {
  return `'${name.replace(/'/g, "''")}'`;
}
