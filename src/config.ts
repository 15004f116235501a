import { z } from "zod";
import { DEFAULT_RETRY_POLICY, DEFAULT_TIMEOUT_MS } from "./constants.js";
import { API_VERSIONS, type ApiVersion } from "./endpoints/types.js";
import { GatewayError, GatewayErrorKind } from "./errors.js";
import type { RetryPolicyConfig } from "./retry/types.js";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const envSchema = z.object({
  GATEWAY_URL: z.string().url(),
  GATEWAY_API_VERSION: z.enum(["v1", "v2"]).default("v1"),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  GATEWAY_RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).default(DEFAULT_RETRY_POLICY.maxAttempts),
  GATEWAY_RETRY_BASE_DELAY_MS: z.coerce.number().nonnegative().default(DEFAULT_RETRY_POLICY.baseDelayMs),
  GATEWAY_RETRY_MULTIPLIER: z.coerce.number().min(1).default(DEFAULT_RETRY_POLICY.backoffMultiplier),
  GATEWAY_RETRY_MAX_DELAY_MS: z.coerce.number().nonnegative().default(DEFAULT_RETRY_POLICY.maxDelayMs),
  GATEWAY_RETRY_JITTER: z.coerce.number().min(0).max(1).default(DEFAULT_RETRY_POLICY.jitter),
  GATEWAY_SIMULATOR: booleanFlag.default("false"),
});

/** Configuration surface read from the environment */
export interface GatewayEnvConfig {
  url: string;
  apiVersion: ApiVersion;
  timeoutMs: number;
  retry: RetryPolicyConfig;
  simulator: boolean;
}

/**
 * Parse gateway settings from environment variables. Empty strings count as unset.
 * @throws {GatewayError} FATAL listing every invalid variable.
 */
export function loadConfigFromEnv(env: Record<string, string | undefined> = process.env): GatewayEnvConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([key, value]) => key.startsWith("GATEWAY_") && value !== undefined && value !== ""),
  );
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new GatewayError(GatewayErrorKind.FATAL, `Invalid gateway configuration: ${issues.join("; ")}`, {
      context: { issues, supportedVersions: API_VERSIONS },
    });
  }

  const values = parsed.data;
  return {
    url: values.GATEWAY_URL,
    apiVersion: values.GATEWAY_API_VERSION,
    timeoutMs: values.GATEWAY_TIMEOUT_MS,
    retry: {
      maxAttempts: values.GATEWAY_RETRY_MAX_ATTEMPTS,
      baseDelayMs: values.GATEWAY_RETRY_BASE_DELAY_MS,
      backoffMultiplier: values.GATEWAY_RETRY_MULTIPLIER,
      maxDelayMs: values.GATEWAY_RETRY_MAX_DELAY_MS,
      jitter: values.GATEWAY_RETRY_JITTER,
    },
    simulator: values.GATEWAY_SIMULATOR,
  };
}
