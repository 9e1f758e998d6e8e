import { describe, expect, it } from "vitest";
import { MAX_BATCH_IDS, batchIds, chunkArray } from "../../src/utils/batch";

function ids(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `vid${index}`);
}

describe("batchIds", () => {
  it("returns no batches for an empty list", () => {
    expect(batchIds([])).toEqual([]);
  });

  it("keeps a short list in a single batch", () => {
    expect(batchIds(["a", "b", "c"])).toEqual(["a,b,c"]);
  });

  it("splits exactly at the batch size", () => {
    const batches = batchIds(ids(100));

    expect(batches).toHaveLength(2);
    expect(batches[0]?.split(",")).toEqual(ids(50));
    expect(batches[1]?.split(",")).toEqual(ids(100).slice(50));
  });

  it("leaves a short final batch for uneven lists", () => {
    const source = ids(123);
    const batches = batchIds(source);

    expect(batches).toHaveLength(3);
    expect(batches.map((batch) => batch.split(",").length)).toEqual([50, 50, 23]);
    expect(batches.flatMap((batch) => batch.split(","))).toEqual(source);
  });

  it("never exceeds the batch size and loses nothing", () => {
    for (const length of [1, 49, 50, 51, 99, 150, 151]) {
      const source = ids(length);
      const batches = batchIds(source);

      expect(batches).toHaveLength(Math.ceil(length / MAX_BATCH_IDS));
      for (const batch of batches) {
        expect(batch.split(",").length).toBeLessThanOrEqual(MAX_BATCH_IDS);
      }
      expect(batches.join(",").split(",")).toEqual(source);
    }
  });

  it("honours a custom batch size", () => {
    expect(batchIds(["a", "b", "c", "d", "e"], 2)).toEqual(["a,b", "c,d", "e"]);
  });
});

describe("chunkArray", () => {
  it("rejects a non-positive chunk size", () => {
    expect(() => chunkArray([1, 2], 0)).toThrow(RangeError);
  });

  it("does not modify the source", () => {
    const source = [1, 2, 3];
    chunkArray(source, 2);
    expect(source).toEqual([1, 2, 3]);
  });
});
