import { z } from "zod";

export const TableRefZ = z.object({
  project: z
    .string()
    .regex(/^[A-Za-z0-9][A-Za-z0-9.:-]*$/, "Invalid project id"),
  dataset: z.string().regex(/^[A-Za-z0-9_]+$/, "Invalid dataset id"),
  table: z.string().regex(/^[^`.]+$/, "Invalid table name"),
});

export type TableRef = Readonly<z.infer<typeof TableRefZ>>;

export function tableRef(project: string, dataset: string, table: string): TableRef {
  return Object.freeze(TableRefZ.parse({ project, dataset, table }));
}

export function formatTableRef(ref: TableRef): string {
  return `${ref.project}.${ref.dataset}.${ref.table}`;
}

export function buildSelectAllSql(source: TableRef): string {
  return `SELECT * FROM \`${formatTableRef(source)}\``;
}
