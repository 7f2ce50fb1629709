import { describe, expect, it } from "vitest";

import { extractRecord } from "../extract";
import { EMPTY_RECORD, parseRecord, ProductRecordBuilder, serializeRecord } from "../record";

const LISTING = `
  <div class="goods-list-item">
    <a class="goods-list-title" href="/detail-7QX.html">500金=30元</a>
    <div class="game-qufu-attr"><a>一区</a></div>
    <div class="goods-price">￥30.00</div>
    <div class="game-reputation"><i class="icon-bluediamond"></i> 库存：3</div>
    <div class="kucun"><p>1元=16.67金</p><p>1金=0.06元</p></div>
  </div>
`;

describe("record serialization", () => {
  it("survives a JSON round trip unchanged", () => {
    const record = extractRecord(LISTING, "https://www.dd373.com");
    const restored = parseRecord(JSON.parse(JSON.stringify(serializeRecord(record))));

    expect(restored).toEqual(record);
    expect(restored.price).toBe(record.price);
  });

  it("round trips a record with an over-full icon row", () => {
    const record = extractRecord(
      `<div class="goods-list-item"><div class="game-reputation">${'<i class="icon-crown"></i>'.repeat(6)}</div></div>`,
      "https://www.dd373.com",
    );

    expect(record.creditRating).toBe(15);
    expect(parseRecord(serializeRecord(record))).toEqual(record);
  });

  it("rejects a negative price", () => {
    expect(() => parseRecord({ ...serializeRecord(EMPTY_RECORD), price: -1 })).toThrow();
  });

  it("rejects a fractional stock", () => {
    expect(() => parseRecord({ ...serializeRecord(EMPTY_RECORD), stock: 1.5 })).toThrow();
  });

  it("rejects missing fields", () => {
    expect(() => parseRecord({ title: "金币" })).toThrow();
  });
});

describe("ProductRecordBuilder", () => {
  it("leaves earlier builders untouched", () => {
    const empty = ProductRecordBuilder.create();
    const titled = empty.with({ title: "金币" });

    expect(empty.current.title).toBe("");
    expect(titled.current.title).toBe("金币");
  });

  it("builds a frozen record", () => {
    const record = ProductRecordBuilder.create().with({ stock: 2 }).build();

    expect(record.stock).toBe(2);
    expect(Object.isFrozen(record)).toBe(true);
  });
});
