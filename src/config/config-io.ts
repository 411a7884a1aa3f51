import fs from "fs";
import YAML from "yaml";
import { z } from "zod";
import { RedactionConfig } from "./redaction-config.types";
import { DEFAULT_FIELDS_TO_REDACT, DEFAULT_PLACEHOLDER } from "./constants";
import defaultInfoTypes from "./info-types.json";

const DEFAULT_DETECTOR_CATEGORIES = z.array(z.string()).parse(defaultInfoTypes);

const RedactionConfigZ = z
  .object({
    version: z.literal(1).default(1),
    detectorCategories: z
      .array(z.string().regex(/^[A-Z0-9_]+$/, "Invalid info type name"))
      .min(1)
      .default(() => [...DEFAULT_DETECTOR_CATEGORIES]),
    fieldsToRedact: z
      .array(z.string().min(1))
      .min(1)
      .default(() => [...DEFAULT_FIELDS_TO_REDACT]),
    placeholder: z.string().default(DEFAULT_PLACEHOLDER),
  })
  .strict();

export function defaultRedactionConfig(): RedactionConfig {
  return RedactionConfigZ.parse({});
}

export function parseRedactionConfigFromYamlString(text: string): RedactionConfig {
  const parsed: unknown = YAML.parse(text) ?? {};
  return RedactionConfigZ.parse(parsed);
}

export function readRedactionConfig(filePath: string): RedactionConfig {
  const raw = fs.readFileSync(filePath, "utf8");
  return parseRedactionConfigFromYamlString(raw);
}

/**
 * An explicit path must exist; the default path is optional and falls back
 * to the built-in detector list and fields.
 */
export function loadRedactionConfig(args: {
  explicitPath?: string;
  defaultPath: string;
}): { config: RedactionConfig; source: string } {
  const { explicitPath, defaultPath } = args;

  if (explicitPath) {
    return { config: readRedactionConfig(explicitPath), source: explicitPath };
  }
  if (fs.existsSync(defaultPath)) {
    return { config: readRedactionConfig(defaultPath), source: defaultPath };
  }
  return { config: defaultRedactionConfig(), source: "built-in defaults" };
}
