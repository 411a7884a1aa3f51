import "dotenv/config";
import { parseArgs } from "./cli/args";
import { loadToolConfig } from "./config/tool.config";
import { loadRedactionConfig } from "./config/config-io";
import { createGcpClients, withGcpClients } from "./gcp/gcp.clients";
import { runRedactionPipeline } from "./pipeline/pipeline";
import { resolveRunParams } from "./pipeline/run-params";
import { buildRunReport, writeJsonReport } from "./reporting/report-writer";
import { startServer } from "./api/server";
import { logger } from "./utils/logger";

import { APPLY_REPORT, DRYRUN_REPORT } from "./config/constants";

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const toolConfig = loadToolConfig();

  const { config: redactionConfig, source: configSource } = loadRedactionConfig({
    explicitPath: args.configPath,
    defaultPath: toolConfig.redactionConfigPath,
  });
  logger.info(
    `Redaction config from ${configSource}: ${redactionConfig.detectorCategories.length} info types, fields ${redactionConfig.fieldsToRedact.join(", ")}`
  );

  // -----------------------------
  // SERVE
  // -----------------------------
  if (args.mode === "serve") {
    const { clients, close } = createGcpClients(toolConfig.gcp);
    const server = startServer({ ...clients, redactionConfig }, toolConfig.port);

    process.once("SIGTERM", () => {
      logger.info("SIGTERM received, shutting down");
      server.close();
      close().catch((err) => logger.warn(`DLP client close failed: ${String(err)}`));
    });
    return;
  }

  // -----------------------------
  // DRYRUN / APPLY
  // -----------------------------
  logger.info(`Running redaction in "${args.mode}" mode`);
  const params = resolveRunParams(args.run, redactionConfig);

  const result = await withGcpClients(
    toolConfig.gcp,
    args.run.project,
    ({ warehouse, redaction }) =>
      runRedactionPipeline({ warehouse, redaction, params })
  );

  const reportPath = args.mode === "dryrun" ? DRYRUN_REPORT : APPLY_REPORT;
  writeJsonReport(reportPath, buildRunReport(result, configSource));
  logger.info(`Report written to ${reportPath}`);

  if (args.mode === "apply") {
    logger.info(`Full load completed for ${result.destination} ✅`);
  }
}

main().catch((err: unknown) => {
  logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
  process.exit(1);
});
