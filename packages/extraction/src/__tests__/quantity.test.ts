import { describe, expect, it } from "vitest";

import { normalizeBundle, parseBundleQuantity, parseLabeledStock, parseWholeNumber } from "../quantity";

describe("parseLabeledStock", () => {
  it("reads a full-width colon label", () => {
    expect(parseLabeledStock("信誉 库存： 7 件")).toBe(7);
  });

  it("reads a half-width colon label without spaces", () => {
    expect(parseLabeledStock("库存:15件")).toBe(15);
  });

  it("allows whitespace before the colon", () => {
    expect(parseLabeledStock("库存 ：\n  3")).toBe(3);
  });

  it("returns null without the label", () => {
    expect(parseLabeledStock("stock: 5")).toBeNull();
  });
});

describe("parseWholeNumber", () => {
  it("trims surrounding whitespace", () => {
    expect(parseWholeNumber(" 12 ")).toBe(12);
  });

  it("rejects numbers with trailing text", () => {
    expect(parseWholeNumber("12件")).toBeNull();
  });
});

describe("parseBundleQuantity", () => {
  it("takes the first integer before the marker", () => {
    expect(parseBundleQuantity("1000个神圣石=100元")).toBe(1000);
  });

  it("ignores digits after the marker", () => {
    expect(parseBundleQuantity("5x10=3")).toBe(5);
  });

  it("returns null when there are no digits before the marker", () => {
    expect(parseBundleQuantity("神圣石=100元")).toBeNull();
  });

  it("returns null without a marker", () => {
    expect(parseBundleQuantity("神圣石 1000")).toBeNull();
  });

  it("treats a zero bundle as no bundle", () => {
    expect(parseBundleQuantity("0个=1元")).toBeNull();
  });
});

describe("normalizeBundle", () => {
  it("scales stock up and price down by the bundle size", () => {
    expect(normalizeBundle({ title: "100金=10元", price: 10, stock: 3 })).toEqual({
      quantity: 100,
      stock: 300,
      price: 0.1,
    });
  });

  it("passes values through when the title has no bundle", () => {
    expect(normalizeBundle({ title: "金币", price: 12.5, stock: 4 })).toEqual({
      quantity: 1,
      stock: 4,
      price: 12.5,
    });
  });
});
