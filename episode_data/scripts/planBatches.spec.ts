import { describe, it, expect } from "vitest";
import { batchFileName, planBatches } from "./planBatches.js";

function urlList(count: number): string[] {
  return Array.from({ length: count }, (_, i) => `https://example.com/wiki/ep${i + 1}`);
}

describe("planBatches", () => {
  it("should split 25 URLs into a batch of 20 and a batch of 5", () => {
    const batches = [...planBatches(urlList(25), 20, "1997")];

    expect(batches.map((batch) => batch.index)).toEqual([1, 2]);
    expect(batches.map((batch) => batch.fileName)).toEqual([
      "1997_episodes_part1.pdf",
      "1997_episodes_part2.pdf",
    ]);
    expect(batches[0].urls).toEqual(urlList(20));
    expect(batches[1].urls).toEqual(urlList(25).slice(20));
  });

  it("should produce ceil(L / batchSize) batches that concatenate back to the input", () => {
    for (const length of [1, 7, 20, 21, 40, 59]) {
      for (const batchSize of [1, 3, 20]) {
        const urls = urlList(length);
        const batches = [...planBatches(urls, batchSize, "s")];

        expect(batches).toHaveLength(Math.ceil(length / batchSize));
        batches.slice(0, -1).forEach((batch) => expect(batch.urls).toHaveLength(batchSize));
        const lastSize = batches[batches.length - 1].urls.length;
        expect(lastSize).toBeGreaterThanOrEqual(1);
        expect(lastSize).toBeLessThanOrEqual(batchSize);
        expect(batches.flatMap((batch) => batch.urls)).toEqual(urls);
      }
    }
  });

  it("should yield nothing for an empty list", () => {
    expect([...planBatches([], 20, "1997")]).toEqual([]);
  });

  it("should give the same boundaries and names on every run", () => {
    const urls = urlList(45);
    const first = [...planBatches(urls, 20, "advanced_generation")];
    const second = [...planBatches(urls, 20, "advanced_generation")];
    expect(second).toEqual(first);
  });

  it("should produce batches lazily", () => {
    const iterator = planBatches(urlList(60), 20, "s");
    expect(iterator.next().value?.index).toBe(1);
    expect(iterator.next().value?.index).toBe(2);
  });

  it("should reject a batch size that is not a positive integer", () => {
    expect(() => [...planBatches(urlList(3), 0, "s")]).toThrow(RangeError);
    expect(() => [...planBatches(urlList(3), 2.5, "s")]).toThrow(RangeError);
  });
});

describe("batchFileName", () => {
  it("should include the season and 1-based part number", () => {
    expect(batchFileName("advanced_generation", 3)).toBe(
      "advanced_generation_episodes_part3.pdf"
    );
  });
});
