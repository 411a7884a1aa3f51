import type { protos } from "@google-cloud/dlp";
import type { TabularPayload } from "../pipeline/tabular";
import type { RedactionRequest } from "./redaction.types";

export type DlpTable = protos.google.privacy.dlp.v2.ITable;
export type DeidentifyContentRequest =
  protos.google.privacy.dlp.v2.IDeidentifyContentRequest;
export type DeidentifyConfig = protos.google.privacy.dlp.v2.IDeidentifyConfig;

export function dlpParent(project: string, location: string): string {
  return `projects/${project}/locations/${location}`;
}

export function toDlpTable(payload: TabularPayload): DlpTable {
  return {
    headers: payload.headers.map((name) => ({ name })),
    rows: payload.rows.map((row) => ({
      values: row.map((stringValue) => ({ stringValue })),
    })),
  };
}

export function fromDlpTable(table: DlpTable | null | undefined): TabularPayload {
  if (!table) {
    throw new Error("De-identify response did not contain a table item");
  }
  return {
    headers: (table.headers ?? []).map((h) => h.name ?? ""),
    rows: (table.rows ?? []).map((r) =>
      (r.values ?? []).map((v) => v.stringValue ?? "")
    ),
  };
}

/**
 * Inline record transformation: every info type finding inside the selected
 * fields is replaced with the placeholder string.
 */
export function buildDeidentifyConfig(
  fieldsToRedact: string[],
  placeholder: string
): DeidentifyConfig {
  return {
    recordTransformations: {
      fieldTransformations: [
        {
          fields: fieldsToRedact.map((name) => ({ name })),
          infoTypeTransformations: {
            transformations: [
              {
                primitiveTransformation: {
                  replaceConfig: {
                    newValue: { stringValue: placeholder },
                  },
                },
              },
            ],
          },
        },
      ],
    },
  };
}

export function buildDeidentifyRequest(
  request: RedactionRequest,
  location: string
): DeidentifyContentRequest {
  return {
    parent: dlpParent(request.project, location),
    inspectConfig: {
      infoTypes: request.detectorCategories.map((name) => ({ name })),
    },
    deidentifyConfig: buildDeidentifyConfig(
      request.fieldsToRedact,
      request.placeholder
    ),
    item: { table: toDlpTable(request.payload) },
  };
}
