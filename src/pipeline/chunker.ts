import { TabularPayload } from "./tabular";

export type WriteDisposition = "WRITE_TRUNCATE" | "WRITE_APPEND";

export type ChunkSpec = {
  index: number;
  start: number;
  end: number;
  writeDisposition: WriteDisposition;
};

/** Positional frame handed to the warehouse for one load. */
export type Frame = {
  columns: string[];
  rows: string[][];
};

export function chunkCount(totalRows: number, chunkSize: number): number {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new Error(`Chunk size must be a positive integer, got ${chunkSize}`);
  }
  return Math.ceil(totalRows / chunkSize);
}

/**
 * The first chunk replaces the destination, every later chunk appends, so a
 * complete run leaves exactly `totalRows` rows behind.
 */
export function planChunks(totalRows: number, chunkSize: number): ChunkSpec[] {
  const count = chunkCount(totalRows, chunkSize);
  const chunks: ChunkSpec[] = [];
  for (let index = 0; index < count; index++) {
    const start = index * chunkSize;
    chunks.push({
      index,
      start,
      end: Math.min(start + chunkSize, totalRows),
      writeDisposition: index === 0 ? "WRITE_TRUNCATE" : "WRITE_APPEND",
    });
  }
  return chunks;
}

export function buildFrame(payload: TabularPayload, chunk: ChunkSpec): Frame {
  return {
    columns: [...payload.headers],
    rows: payload.rows.slice(chunk.start, chunk.end).map((r) => [...r]),
  };
}
