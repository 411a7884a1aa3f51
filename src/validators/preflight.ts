import { logger } from "../utils/logger";
import { formatTableRef, TableRef } from "../warehouse/table-ref";

export function preflightValidate(args: {
  source: TableRef;
  destination: TableRef;
  staging: TableRef;
  chunkSize: number;
  detectorCategories: string[];
}) {
  const { source, destination, staging, chunkSize, detectorCategories } = args;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
  if (detectorCategories.length === 0) {
    throw new Error("At least one detector category is required");
  }

  const stage = formatTableRef(staging);
  if (stage === formatTableRef(source)) {
    throw new Error(`Staging table ${stage} must differ from the source table`);
  }
  if (stage === formatTableRef(destination)) {
    throw new Error(`Staging table ${stage} must differ from the destination table`);
  }
}

/** Fields that are not headers are passed through to DLP, which ignores them. */
export function findUnknownFields(headers: string[], fieldsToRedact: string[]): string[] {
  const known = new Set(headers);
  const unknown = fieldsToRedact.filter((f) => !known.has(f));
  if (unknown.length > 0) {
    logger.warn(
      `[preflight] fields not present in source headers: ${unknown.join(", ")}`
    );
  }
  return unknown;
}
