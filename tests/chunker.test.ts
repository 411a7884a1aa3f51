import { describe, expect, it } from "vitest";
import { buildFrame, chunkCount, planChunks } from "../src/pipeline/chunker";

describe("chunkCount", () => {
  it("uses ceiling division", () => {
    expect(chunkCount(0, 3)).toBe(0);
    expect(chunkCount(1, 3)).toBe(1);
    expect(chunkCount(6, 3)).toBe(2);
    expect(chunkCount(7, 3)).toBe(3);
  });

  it("rejects non-positive or fractional sizes", () => {
    expect(() => chunkCount(5, 0)).toThrow("Chunk size must be a positive integer, got 0");
    expect(() => chunkCount(5, -2)).toThrow("got -2");
    expect(() => chunkCount(5, 1.5)).toThrow("got 1.5");
  });
});

describe("planChunks", () => {
  it("produces no trailing empty chunk on an exact multiple", () => {
    expect(planChunks(4, 2)).toEqual([
      { index: 0, start: 0, end: 2, writeDisposition: "WRITE_TRUNCATE" },
      { index: 1, start: 2, end: 4, writeDisposition: "WRITE_APPEND" },
    ]);
  });

  it("ends the last chunk at the row count", () => {
    const chunks = planChunks(5, 2);
    expect(chunks.map((c) => [c.start, c.end])).toEqual([
      [0, 2],
      [2, 4],
      [4, 5],
    ]);
  });

  it("plans nothing for zero rows", () => {
    expect(planChunks(0, 10)).toEqual([]);
  });
});

describe("buildFrame", () => {
  it("slices rows and keeps the header order", () => {
    const payload = {
      headers: ["b", "a"],
      rows: [
        ["1", "2"],
        ["3", "4"],
        ["5", "6"],
      ],
    };
    const [, second] = planChunks(3, 2);

    expect(buildFrame(payload, second)).toEqual({ columns: ["b", "a"], rows: [["5", "6"]] });
  });

  it("copies rows rather than sharing them", () => {
    const payload = { headers: ["x"], rows: [["1"]] };
    const frame = buildFrame(payload, planChunks(1, 1)[0]);

    frame.rows[0][0] = "changed";
    expect(payload.rows[0][0]).toBe("1");
  });
});
