export const DRYRUN_REPORT = "redaction.dryrun.report.json";
export const APPLY_REPORT = "redaction.apply.report.json";

export const DEFAULT_PLACEHOLDER = "################";
export const DEFAULT_FIELDS_TO_REDACT = [
  "column_1",
  "column_2",
  "column_3",
  "column_4",
];

export const STAGING_SUFFIX = "_staging";

// deidentifyContent rejects requests above 0.5 MB
export const DLP_REQUEST_LIMIT_BYTES = 524_288;
