import { z } from "zod";
import type { RunRequest } from "../pipeline/run-params";

export type CliMode = "apply" | "dryrun" | "serve";

export type CliArgs =
  | { mode: "serve"; configPath?: string }
  | { mode: "apply" | "dryrun"; configPath?: string; run: RunRequest };

const VALUE_FLAGS = new Set([
  "--project",
  "--dataset",
  "--input_table",
  "--output_table",
  "--chunksize",
  "--staging_table",
  "--config",
]);

const BOOLEAN_FLAGS = new Set(["--dryrun", "--serve"]);

function required(flag: string) {
  return z
    .string({ required_error: `${flag} is required` })
    .min(1, `${flag} is required`);
}

const RunFlagsZ = z.object({
  "--project": required("--project"),
  "--dataset": required("--dataset"),
  "--input_table": required("--input_table"),
  "--output_table": required("--output_table"),
  "--chunksize": required("--chunksize")
    .regex(/^\d+$/, "--chunksize must be a positive integer")
    .transform(Number)
    .refine((n) => n > 0, "--chunksize must be a positive integer"),
  "--staging_table": z.string().min(1).optional(),
});

function collectFlags(argv: string[]) {
  const values: Record<string, string> = {};
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const eq = arg.indexOf("=");
    const name = eq === -1 ? arg : arg.slice(0, eq);

    if (BOOLEAN_FLAGS.has(name)) {
      flags.add(name);
      continue;
    }
    if (!VALUE_FLAGS.has(name)) {
      throw new Error(`Unknown argument: ${arg}`);
    }

    let value: string | undefined;
    if (eq !== -1) {
      value = arg.slice(eq + 1);
    } else {
      value = argv[i + 1];
      i++;
    }
    if (value === undefined || value.startsWith("--")) {
      throw new Error(`Missing value for ${name}`);
    }
    values[name] = value;
  }

  return { values, flags };
}

export function parseArgs(argv: string[]): CliArgs {
  const { values, flags } = collectFlags(argv);
  const configPath = values["--config"];

  if (flags.has("--serve")) {
    if (flags.has("--dryrun")) {
      throw new Error("--serve and --dryrun cannot be combined");
    }
    return { mode: "serve", configPath };
  }

  const parsed = RunFlagsZ.safeParse(values);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((i) => i.message).join("; "));
  }
  const f = parsed.data;
  const mode = flags.has("--dryrun") ? "dryrun" : "apply";

  return {
    mode,
    configPath,
    run: {
      project: f["--project"],
      dataset: f["--dataset"],
      inputTable: f["--input_table"],
      outputTable: f["--output_table"],
      chunkSize: f["--chunksize"],
      stagingTable: f["--staging_table"],
      dryrun: mode === "dryrun",
    },
  };
}
