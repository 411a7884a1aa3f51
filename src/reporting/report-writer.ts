import fs from "fs";
import type { RedactionRunResult } from "../pipeline/pipeline";

export type RunReport = RedactionRunResult & {
  generatedAt: string;
  configSource: string;
};

export function buildRunReport(
  result: RedactionRunResult,
  configSource: string,
  now: Date = new Date()
): RunReport {
  return { generatedAt: now.toISOString(), configSource, ...result };
}

export function writeJsonReport(filePath: string, report: RunReport) {
  fs.writeFileSync(filePath, JSON.stringify(report, null, 2), "utf8");
}
