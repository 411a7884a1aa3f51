import { BigQuery, Table } from "@google-cloud/bigquery";
import { DlpServiceClient } from "@google-cloud/dlp";
import { GcpConfig } from "../config/tool.config";
import { DlpRedactionService } from "../redaction/dlp.client";
import type { RedactionService } from "../redaction/redaction.types";
import { BigQueryWarehouse } from "../warehouse/bigquery.client";
import type { Warehouse } from "../warehouse/warehouse.types";

export type GcpClients = {
  warehouse: Warehouse;
  redaction: RedactionService;
};

export function createGcpClients(gcp: GcpConfig, projectId?: string) {
  const bigquery = new BigQuery({
    projectId,
    keyFilename: gcp.keyFilename,
    location: gcp.bigqueryLocation,
  });
  const dlp = new DlpServiceClient({
    projectId,
    keyFilename: gcp.keyFilename,
  });

  return {
    clients: {
      warehouse: new BigQueryWarehouse<Table>(bigquery, gcp.bigqueryLocation),
      redaction: new DlpRedactionService(dlp, gcp.dlpLocation),
    } satisfies GcpClients,
    close: () => dlp.close(),
  };
}

export async function withGcpClients<T>(
  gcp: GcpConfig,
  projectId: string | undefined,
  fn: (clients: GcpClients) => Promise<T>
): Promise<T> {
  const { clients, close } = createGcpClients(gcp, projectId);
  try {
    return await fn(clients);
  } finally {
    await close();
  }
}
