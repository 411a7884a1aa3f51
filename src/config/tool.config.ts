export type GcpConfig = {
  keyFilename?: string;
  dlpLocation: string;
  bigqueryLocation?: string;
};

export type ToolConfig = {
  gcp: GcpConfig;
  redactionConfigPath: string;
  port: number;
};

function env(name: string, fallback?: string): string {
  const v = process.env[name] ?? fallback;
  if (v === undefined) throw new Error(`Missing env var: ${name}`);
  return v;
}

function optionalEnv(name: string): string | undefined {
  const v = process.env[name];
  return v === undefined || v === "" ? undefined : v;
}

export function loadToolConfig(): ToolConfig {
  const port = Number(env("PLATFORM_PORT", "5050"));
  if (!Number.isInteger(port) || port < 0) {
    throw new Error(`Invalid PLATFORM_PORT: ${process.env.PLATFORM_PORT}`);
  }

  return {
    gcp: {
      keyFilename: optionalEnv("GCP_KEY_FILE"),
      dlpLocation: env("DLP_LOCATION", "global"),
      bigqueryLocation: optionalEnv("BQ_LOCATION"),
    },
    redactionConfigPath: env("REDACTION_CONFIG", "redaction.config.yaml"),
    port,
  };
}
