import { STAGING_SUFFIX } from "../config/constants";
import { RedactionConfig } from "../config/redaction-config.types";
import { tableRef } from "../warehouse/table-ref";
import type { RedactionRunParams } from "./pipeline";

/** Table names and chunk size as supplied on the command line or over HTTP. */
export type RunRequest = {
  project: string;
  dataset: string;
  inputTable: string;
  outputTable: string;
  chunkSize: number;
  stagingTable?: string;
  dryrun?: boolean;
};

export function resolveRunParams(
  req: RunRequest,
  config: RedactionConfig
): RedactionRunParams {
  const { project, dataset } = req;
  return {
    source: tableRef(project, dataset, req.inputTable),
    destination: tableRef(project, dataset, req.outputTable),
    staging: tableRef(
      project,
      dataset,
      req.stagingTable ?? `${req.inputTable}${STAGING_SUFFIX}`
    ),
    chunkSize: req.chunkSize,
    detectorCategories: [...config.detectorCategories],
    fieldsToRedact: [...config.fieldsToRedact],
    placeholder: config.placeholder,
    dryrun: req.dryrun ?? false,
  };
}
