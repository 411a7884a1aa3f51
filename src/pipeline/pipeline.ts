import type { RedactionService } from "../redaction/redaction.types";
import { logger } from "../utils/logger";
import { findUnknownFields, preflightValidate } from "../validators/preflight";
import { buildSelectAllSql, formatTableRef, TableRef } from "../warehouse/table-ref";
import type { Warehouse } from "../warehouse/warehouse.types";
import { buildFrame, ChunkSpec, planChunks } from "./chunker";
import {
  assertRectangular,
  sameHeaders,
  TabularPayload,
  toTabularPayload,
} from "./tabular";

export type PipelineStage =
  | "querying"
  | "staged"
  | "redacting"
  | "reassembling"
  | "done";

export type RedactionRunParams = {
  source: TableRef;
  destination: TableRef;
  staging: TableRef;
  chunkSize: number;
  detectorCategories: string[];
  fieldsToRedact: string[];
  placeholder: string;
  dryrun?: boolean;
};

export type ChunkResult = ChunkSpec & { rows: number };

export type RedactionRunResult = {
  mode: "dryrun" | "apply";
  source: string;
  staging: string;
  destination: string;
  rowsRead: number;
  rowsLoaded: number;
  chunks: ChunkResult[];
};

function enterStage(stage: PipelineStage, detail: string) {
  logger.info(`[${stage}] ${detail}`);
}

/**
 * Source table -> staging table -> de-identify -> destination table.
 *
 * Runs strictly in sequence. Nothing is written to the destination until the
 * redaction call has returned and its table has been checked; after that a
 * failure leaves whatever chunks were already loaded in place.
 */
export async function runRedactionPipeline({
  warehouse,
  redaction,
  params,
}: {
  warehouse: Warehouse;
  redaction: RedactionService;
  params: RedactionRunParams;
}): Promise<RedactionRunResult> {
  const { source, destination, staging, chunkSize, dryrun = false } = params;
  preflightValidate(params);

  const result: RedactionRunResult = {
    mode: dryrun ? "dryrun" : "apply",
    source: formatTableRef(source),
    staging: formatTableRef(staging),
    destination: formatTableRef(destination),
    rowsRead: 0,
    rowsLoaded: 0,
    chunks: [],
  };

  // -----------------------------
  // EXTRACT
  // -----------------------------
  enterStage("querying", `${result.source} -> ${result.staging}`);
  await warehouse.stageQuery({ sql: buildSelectAllSql(source), destination: staging });

  const payload = toTabularPayload(await warehouse.readRows(staging));
  result.rowsRead = payload.rows.length;
  enterStage(
    "staged",
    `${payload.rows.length} rows, columns: ${payload.headers.join(", ")}`
  );

  if (payload.rows.length === 0) {
    logger.warn(`Source ${result.source} is empty; ${result.destination} left unchanged`);
    enterStage("done", "nothing to load");
    return result;
  }

  findUnknownFields(payload.headers, params.fieldsToRedact);

  // -----------------------------
  // REDACT
  // -----------------------------
  enterStage(
    "redacting",
    `${params.detectorCategories.length} info types over fields: ${params.fieldsToRedact.join(", ")}`
  );
  const redacted: TabularPayload = await redaction.deidentify({
    project: source.project,
    payload,
    detectorCategories: params.detectorCategories,
    fieldsToRedact: params.fieldsToRedact,
    placeholder: params.placeholder,
  });

  if (!sameHeaders(payload.headers, redacted.headers)) {
    throw new Error(
      `Redacted headers [${redacted.headers.join(", ")}] do not match source headers [${payload.headers.join(", ")}]`
    );
  }
  if (redacted.rows.length !== payload.rows.length) {
    throw new Error(
      `Redaction returned ${redacted.rows.length} rows, expected ${payload.rows.length}`
    );
  }
  assertRectangular(redacted, "Redacted table");

  // -----------------------------
  // REASSEMBLE + LOAD
  // -----------------------------
  const chunks = planChunks(redacted.rows.length, chunkSize);
  enterStage(
    "reassembling",
    `${chunks.length} chunk(s) of up to ${chunkSize} rows into ${result.destination}`
  );

  for (const chunk of chunks) {
    const frame = buildFrame(redacted, chunk);

    if (!dryrun) {
      await warehouse.loadFrame({
        table: destination,
        frame,
        writeDisposition: chunk.writeDisposition,
      });
      result.rowsLoaded += frame.rows.length;
      logger.info(
        `[apply] chunk ${chunk.index + 1}/${chunks.length}: ${frame.rows.length} rows (${chunk.writeDisposition})`
      );
    } else {
      logger.info(
        `[dryrun] chunk ${chunk.index + 1}/${chunks.length}: ${frame.rows.length} rows (${chunk.writeDisposition})`
      );
    }

    result.chunks.push({ ...chunk, rows: frame.rows.length });
  }

  enterStage(
    "done",
    dryrun
      ? `dry run planned ${redacted.rows.length} rows for ${result.destination}`
      : `loaded ${result.rowsLoaded} rows into ${result.destination}`
  );
  return result;
}
