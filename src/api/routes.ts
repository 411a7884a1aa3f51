import type { Express } from "express";
import { z, ZodError } from "zod";
import { validate } from "./validators";
import { preflightValidate } from "../validators/preflight";
import { formatTableRef } from "../warehouse/table-ref";
import { RedactionConfig } from "../config/redaction-config.types";
import { RedactionRunParams, runRedactionPipeline } from "../pipeline/pipeline";
import { resolveRunParams } from "../pipeline/run-params";
import type { RedactionService } from "../redaction/redaction.types";
import type { Warehouse } from "../warehouse/warehouse.types";
import { logger } from "../utils/logger";

export type RouteDeps = {
  warehouse: Warehouse;
  redaction: RedactionService;
  redactionConfig: RedactionConfig;
};

const RunBodyZ = z.object({
  body: z.object({
    project: z.string().min(1),
    dataset: z.string().min(1),
    inputTable: z.string().min(1),
    outputTable: z.string().min(1),
    chunkSize: z.number().int().positive(),
    stagingTable: z.string().min(1).optional(),
    dryrun: z.boolean().optional(),
  }),
});

function messageOf(err: unknown): string {
  if (err instanceof ZodError) return err.issues.map((i) => i.message).join("; ");
  return err instanceof Error ? err.message : String(err);
}

export function registerRoutes(app: Express, deps: RouteDeps) {
  // staging and destination tables written by runs still in flight
  const busyTables = new Set<string>();

  app.get("/health", (_req, res) => {
    res.json({ ok: true });
  });

  app.post("/runs", validate(RunBodyZ), async (_req, res) => {
    const { body } = RunBodyZ.parse(res.locals.validated);

    let params: RedactionRunParams;
    try {
      params = resolveRunParams(body, deps.redactionConfig);
      preflightValidate(params);
    } catch (err) {
      res.status(400).json({ error: messageOf(err) });
      return;
    }

    const claimed = [formatTableRef(params.staging), formatTableRef(params.destination)];
    const busy = claimed.filter((t) => busyTables.has(t));
    if (busy.length > 0) {
      res.status(409).json({ error: `A run is already writing ${busy.join(", ")}` });
      return;
    }
    claimed.forEach((t) => busyTables.add(t));

    try {
      const result = await runRedactionPipeline({
        warehouse: deps.warehouse,
        redaction: deps.redaction,
        params,
      });
      res.json(result);
    } catch (err) {
      const message = messageOf(err);
      logger.error(`Run failed: ${message}`);
      res.status(500).json({ error: message });
    } finally {
      claimed.forEach((t) => busyTables.delete(t));
    }
  });
}
