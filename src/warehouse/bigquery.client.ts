import type { Table } from "@google-cloud/bigquery";
import type { Writable } from "stream";
import { z } from "zod";
import type { Frame, WriteDisposition } from "../pipeline/chunker";
import type { RawRowSet } from "../pipeline/tabular";
import { logger } from "../utils/logger";
import { formatTableRef, TableRef } from "./table-ref";
import type { Warehouse } from "./warehouse.types";

const TableMetadataZ = z.object({
  schema: z
    .object({
      fields: z.array(z.object({ name: z.string() })).default([]),
    })
    .default({ fields: [] }),
});

const RowZ = z.record(z.string(), z.unknown());

export type LoadMetadata = {
  sourceFormat: "NEWLINE_DELIMITED_JSON";
  writeDisposition: WriteDisposition;
  createDisposition: "CREATE_IF_NEEDED";
  schema: { fields: { name: string; type: "STRING"; mode: "NULLABLE" }[] };
  location?: string;
};

/** The calls this adapter makes on a BigQuery `Table`. */
export type TableHandle = {
  getMetadata(): Promise<[unknown, ...unknown[]]>;
  getRows(options: {
    autoPaginate: boolean;
    wrapIntegers: boolean;
  }): Promise<[unknown[], ...unknown[]]>;
  createWriteStream(metadata: LoadMetadata): Writable;
};

export type StagingQuery<T> = {
  query: string;
  destination: T;
  writeDisposition: "WRITE_TRUNCATE";
  allowLargeResults: boolean;
  location?: string;
};

/** The calls this adapter makes on a `BigQuery` client. */
export type BigQueryHandle<T extends TableHandle> = {
  dataset(id: string, options: { projectId: string }): { table(id: string): T };
  createQueryJob(options: StagingQuery<T>): Promise<
    [
      {
        id?: string;
        getQueryResults(options: { maxResults: number }): Promise<unknown>;
      },
      ...unknown[],
    ]
  >;
};

/**
 * Newline-delimited JSON body for a load job. Records are keyed by the
 * frame's column names taken by position.
 */
export function frameToNdjson(frame: Frame): string {
  return frame.rows
    .map((row) => {
      const record: Record<string, string> = {};
      frame.columns.forEach((c, i) => {
        record[c] = row[i];
      });
      return JSON.stringify(record);
    })
    .join("\n");
}

export class BigQueryWarehouse<T extends TableHandle = Table> implements Warehouse {
  constructor(
    private readonly bigquery: BigQueryHandle<T>,
    private readonly location?: string
  ) {}

  private table(ref: TableRef): T {
    return this.bigquery
      .dataset(ref.dataset, { projectId: ref.project })
      .table(ref.table);
  }

  async stageQuery({
    sql,
    destination,
  }: {
    sql: string;
    destination: TableRef;
  }): Promise<void> {
    const [job] = await this.bigquery.createQueryJob({
      query: sql,
      destination: this.table(destination),
      writeDisposition: "WRITE_TRUNCATE",
      allowLargeResults: true,
      location: this.location,
    });
    logger.debug(`Query job ${job.id} started`);

    // waits for the job without pulling result rows
    await job.getQueryResults({ maxResults: 0 });
  }

  async readRows(ref: TableRef): Promise<RawRowSet> {
    const table = this.table(ref);

    const [metadata] = await table.getMetadata();
    const columns = TableMetadataZ.parse(metadata).schema.fields.map(
      (f) => f.name
    );

    const [rows] = await table.getRows({ autoPaginate: true, wrapIntegers: true });
    const parsed = z.array(RowZ).parse(rows);

    logger.debug(
      `Read ${parsed.length} rows (${columns.length} columns) from ${formatTableRef(ref)}`
    );
    return { columns, rows: parsed };
  }

  async loadFrame({
    table,
    frame,
    writeDisposition,
  }: {
    table: TableRef;
    frame: Frame;
    writeDisposition: WriteDisposition;
  }): Promise<void> {
    const body = frameToNdjson(frame);

    await new Promise<void>((resolve, reject) => {
      const stream = this.table(table).createWriteStream({
        sourceFormat: "NEWLINE_DELIMITED_JSON",
        writeDisposition,
        createDisposition: "CREATE_IF_NEEDED",
        schema: {
          fields: frame.columns.map((name) => ({
            name,
            type: "STRING",
            mode: "NULLABLE",
          })),
        },
        location: this.location,
      });

      stream.on("error", reject);
      stream.on("complete", () => resolve());
      stream.end(body);
    });
  }
}
