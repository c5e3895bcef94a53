import { z } from "zod";
import { DEFAULT_GATEWAY_PORT } from "@sigenbridge/local-gateway";
import { DEFAULT_REGION } from "@sigenbridge/cloud-api";
import { ConfigError } from "./errors";

export const DEFAULT_SCAN_INTERVAL_S = 30;
export const MIN_SCAN_INTERVAL_S = 5;

// Integration entry: local gateway connection plus optional cloud account
export const IntegrationConfigSchema = z.object({
  host: z.string().trim().min(1, "Gateway host is required"),
  port: z.coerce.number().int().min(1).max(65_535).default(DEFAULT_GATEWAY_PORT),
  username: z.string().default(""),
  password: z.string().default(""),
  serial: z.string().trim().default(""),

  // Cloud account; falls back to the gateway credentials when left out
  cloudUsername: z.string().trim().optional(),
  cloudPassword: z.string().trim().optional(),
  cloudRegion: z.string().trim().min(1).default(DEFAULT_REGION),

  scanIntervalSeconds: z.coerce
    .number()
    .int()
    .min(MIN_SCAN_INTERVAL_S, `Scan interval must be at least ${MIN_SCAN_INTERVAL_S} seconds`)
    .default(DEFAULT_SCAN_INTERVAL_S),
});

export type IntegrationConfig = z.infer<typeof IntegrationConfigSchema>;
export type IntegrationConfigInput = z.input<typeof IntegrationConfigSchema>;

export function validateIntegrationConfig(data: unknown): IntegrationConfig {
  return IntegrationConfigSchema.parse(data);
}

const ENV_KEYS: Record<string, keyof IntegrationConfigInput> = {
  SIGEN_HOST: "host",
  SIGEN_PORT: "port",
  SIGEN_USERNAME: "username",
  SIGEN_PASSWORD: "password",
  SIGEN_SERIAL: "serial",
  SIGEN_CLOUD_USERNAME: "cloudUsername",
  SIGEN_CLOUD_PASSWORD: "cloudPassword",
  SIGEN_CLOUD_REGION: "cloudRegion",
  SIGEN_SCAN_INTERVAL: "scanIntervalSeconds",
};

/**
 * Build a config from `SIGEN_*` variables. Unset and empty variables take the
 * schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): IntegrationConfig {
  const raw: Record<string, string> = {};
  for (const [variable, key] of Object.entries(ENV_KEYS)) {
    const value = env[variable];
    if (value !== undefined && value !== "") {
      raw[key] = value;
    }
  }

  const result = IntegrationConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  return result.data;
}

// ---- Cloud capability -------------------------------------------------------

export type CloudCapability =
  | { state: "absent" }
  | { state: "invalid"; reason: string }
  | { state: "configured"; username: string; password: string; region: string };

/**
 * Decide whether the cloud poller can run. Each cloud credential falls back
 * to its gateway counterpart; with neither set the integration is local-only.
 */
export function resolveCloudCapability(config: IntegrationConfig): CloudCapability {
  const username = config.cloudUsername || config.username.trim();
  const password = config.cloudPassword || config.password.trim();

  if (!username && !password) {
    return { state: "absent" };
  }
  if (!username) {
    return { state: "invalid", reason: "cloud password given without a username" };
  }
  if (!password) {
    return { state: "invalid", reason: "cloud username given without a password" };
  }
  return { state: "configured", username, password, region: config.cloudRegion };
}
