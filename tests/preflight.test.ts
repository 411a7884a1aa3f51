import { describe, expect, it } from "vitest";
import { findUnknownFields, preflightValidate } from "../src/validators/preflight";
import { tableRef } from "../src/warehouse/table-ref";

const base = {
  source: tableRef("p", "d", "src"),
  destination: tableRef("p", "d", "dst"),
  staging: tableRef("p", "d", "src_staging"),
  chunkSize: 100,
  detectorCategories: ["EMAIL_ADDRESS"],
};

describe("preflightValidate", () => {
  it("accepts a well-formed run", () => {
    expect(() => preflightValidate(base)).not.toThrow();
  });

  it("allows redacting in place", () => {
    expect(() => preflightValidate({ ...base, destination: base.source })).not.toThrow();
  });

  it("requires a positive integer chunk size", () => {
    expect(() => preflightValidate({ ...base, chunkSize: -1 })).toThrow(
      "Chunk size must be a positive integer, got -1"
    );
  });

  it("requires detector categories", () => {
    expect(() => preflightValidate({ ...base, detectorCategories: [] })).toThrow(
      "At least one detector category is required"
    );
  });

  it("keeps the staging table apart from source and destination", () => {
    expect(() => preflightValidate({ ...base, staging: base.source })).toThrow(
      "Staging table p.d.src must differ from the source table"
    );
    expect(() => preflightValidate({ ...base, staging: base.destination })).toThrow(
      "Staging table p.d.dst must differ from the destination table"
    );
  });
});

describe("findUnknownFields", () => {
  it("lists fields missing from the headers in order", () => {
    expect(findUnknownFields(["name", "email"], ["column_1", "email", "column_2"])).toEqual([
      "column_1",
      "column_2",
    ]);
  });

  it("returns nothing when every field exists", () => {
    expect(findUnknownFields(["name"], ["name"])).toEqual([]);
  });
});
