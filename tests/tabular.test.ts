import Big from "big.js";
import { describe, expect, it } from "vitest";
import {
  assertRectangular,
  cellToString,
  sameHeaders,
  toTabularPayload,
} from "../src/pipeline/tabular";

describe("cellToString", () => {
  it.each([
    ["text", "text"],
    [12, "12"],
    [1.5, "1.5"],
    [false, "false"],
    [null, ""],
    [undefined, ""],
    [9007199254740993n, "9007199254740993"],
  ])("converts %s", (input, expected) => {
    expect(cellToString(input)).toBe(expected);
  });

  it("unwraps BigQuery value wrappers", () => {
    expect(cellToString({ value: "2024-03-01T10:00:00.000Z" })).toBe("2024-03-01T10:00:00.000Z");
  });

  it("writes NUMERIC values as plain decimal text", () => {
    expect(cellToString(new Big("123.45"))).toBe("123.45");
    expect(cellToString(new Big("-0.000000012"))).toBe("-0.000000012");
    expect(cellToString(new Big("123456789012345678901234567890.5"))).toBe(
      "123456789012345678901234567890.5"
    );
  });

  it("encodes bytes as base64", () => {
    expect(cellToString(Buffer.from("hi"))).toBe("aGk=");
  });

  it("formats dates as ISO strings", () => {
    expect(cellToString(new Date(Date.UTC(2024, 0, 2)))).toBe("2024-01-02T00:00:00.000Z");
  });

  it("serializes repeated and record fields as JSON", () => {
    expect(cellToString(["a", "b"])).toBe('["a","b"]');
    expect(cellToString({ city: "Oslo", zip: 150 })).toBe('{"city":"Oslo","zip":150}');
  });
});

describe("toTabularPayload", () => {
  it("produces H headers and R rows of H strings in schema order", () => {
    const payload = toTabularPayload({
      columns: ["id", "name", "score"],
      rows: [
        { name: "Ann", id: 1, score: 9.5 },
        { score: null, id: 2, name: "Bo" },
      ],
    });

    expect(payload).toEqual({
      headers: ["id", "name", "score"],
      rows: [
        ["1", "Ann", "9.5"],
        ["2", "Bo", ""],
      ],
    });
  });

  it("fills missing keys with empty strings", () => {
    expect(toTabularPayload({ columns: ["a", "b"], rows: [{ a: "x" }] }).rows).toEqual([["x", ""]]);
  });
});

describe("assertRectangular", () => {
  it("accepts rows that match the header count", () => {
    expect(() => assertRectangular({ headers: ["a"], rows: [["1"], ["2"]] }, "t")).not.toThrow();
  });

  it("names the first offending row", () => {
    expect(() =>
      assertRectangular({ headers: ["a", "b"], rows: [["1", "2"], ["3"]] }, "Payload")
    ).toThrow("Payload: row 1 has 1 values, expected 2");
  });
});

describe("sameHeaders", () => {
  it("compares by position", () => {
    expect(sameHeaders(["a", "b"], ["a", "b"])).toBe(true);
    expect(sameHeaders(["a", "b"], ["b", "a"])).toBe(false);
    expect(sameHeaders(["a"], ["a", "b"])).toBe(false);
  });
});
