export type RedactionConfig = {
  version: 1;
  /** DLP info type names to search for. */
  detectorCategories: string[];
  /** Columns whose findings are replaced. */
  fieldsToRedact: string[];
  placeholder: string;
};
