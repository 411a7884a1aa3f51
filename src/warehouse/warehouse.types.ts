import type { Frame, WriteDisposition } from "../pipeline/chunker";
import type { RawRowSet } from "../pipeline/tabular";
import type { TableRef } from "./table-ref";

export interface Warehouse {
  /** Run `sql` and materialize its result into `destination`, replacing it. */
  stageQuery(args: { sql: string; destination: TableRef }): Promise<void>;

  /** Ordered column names and every row of `table`. */
  readRows(table: TableRef): Promise<RawRowSet>;

  /** Load one frame into `table`; resolves when the load job is done. */
  loadFrame(args: {
    table: TableRef;
    frame: Frame;
    writeDisposition: WriteDisposition;
  }): Promise<void>;
}
