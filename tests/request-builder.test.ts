import { describe, expect, it } from "vitest";
import {
  buildDeidentifyRequest,
  dlpParent,
  fromDlpTable,
  toDlpTable,
} from "../src/redaction/request-builder";

const payload = {
  headers: ["name", "email"],
  rows: [["Ann", "a@x.com"]],
};

describe("buildDeidentifyRequest", () => {
  const req = buildDeidentifyRequest(
    {
      project: "demo-project",
      payload,
      detectorCategories: ["PERSON_NAME", "PASSPORT"],
      fieldsToRedact: ["name"],
      placeholder: "[REDACTED]",
    },
    "europe-west2"
  );

  it("targets the project and location", () => {
    expect(req.parent).toBe("projects/demo-project/locations/europe-west2");
  });

  it("lists info types in order", () => {
    expect(req.inspectConfig).toEqual({
      infoTypes: [{ name: "PERSON_NAME" }, { name: "PASSPORT" }],
    });
  });

  it("uses an inline replace transformation and no template", () => {
    expect(req.deidentifyTemplateName).toBeUndefined();
    expect(req.deidentifyConfig).toEqual({
      recordTransformations: {
        fieldTransformations: [
          {
            fields: [{ name: "name" }],
            infoTypeTransformations: {
              transformations: [
                {
                  primitiveTransformation: {
                    replaceConfig: { newValue: { stringValue: "[REDACTED]" } },
                  },
                },
              ],
            },
          },
        ],
      },
    });
  });

  it("carries the table item", () => {
    expect(req.item).toEqual({
      table: {
        headers: [{ name: "name" }, { name: "email" }],
        rows: [{ values: [{ stringValue: "Ann" }, { stringValue: "a@x.com" }] }],
      },
    });
  });
});

describe("dlpParent", () => {
  it("formats a location-scoped parent", () => {
    expect(dlpParent("p1", "global")).toBe("projects/p1/locations/global");
  });
});

describe("fromDlpTable", () => {
  it("reads string values by position", () => {
    expect(fromDlpTable(toDlpTable(payload))).toEqual(payload);
  });

  it("treats missing names and values as empty strings", () => {
    expect(
      fromDlpTable({
        headers: [{ name: "a" }, {}],
        rows: [{ values: [{ stringValue: null }, { stringValue: "x" }] }, {}],
      })
    ).toEqual({ headers: ["a", ""], rows: [["", "x"], []] });
  });

  it("fails when the response has no table", () => {
    expect(() => fromDlpTable(undefined)).toThrow(
      "De-identify response did not contain a table item"
    );
  });
});
