/**
 * SDK Configuration
 *
 * Default configuration, validation and environment loading for the TTKIA client.
 */

import { config as loadEnvFile } from "dotenv";
import { z } from "zod";
import type { TTKIAConfig, CreateClientOptions } from "../types";
import { ValidationError } from "./errors";
import { parseLogLevel } from "./logger";

/** Default client configuration */
export const DEFAULT_CLIENT_CONFIG: Omit<TTKIAConfig, "baseUrl" | "appToken"> = {
  logLevel: "INFO",
  loggerName: "ttkia-sdk",
  timeoutMs: 30_000,
};

/**
 * Create a full client configuration from options.
 */
export function createConfig(options: CreateClientOptions): TTKIAConfig {
  return {
    baseUrl: options.baseUrl.trim().replace(/\/+$/, ""),
    appToken: options.appToken.trim(),
    logLevel: options.logLevel
      ? parseLogLevel(options.logLevel)
      : DEFAULT_CLIENT_CONFIG.logLevel,
    loggerName: options.loggerName ?? DEFAULT_CLIENT_CONFIG.loggerName,
    timeoutMs: options.timeoutMs ?? DEFAULT_CLIENT_CONFIG.timeoutMs,
  };
}

/**
 * Validate client configuration.
 */
export function validateConfig(config: TTKIAConfig): void {
  if (!config.baseUrl) {
    throw new ValidationError("TTKIA configuration requires a baseUrl", "baseUrl");
  }

  if (!/^https?:\/\/\S+$/i.test(config.baseUrl)) {
    throw new ValidationError(
      `baseUrl must be an http(s) URL, got "${config.baseUrl}"`,
      "baseUrl"
    );
  }

  if (!config.appToken) {
    throw new ValidationError("TTKIA configuration requires an appToken", "appToken");
  }

  if (!config.loggerName) {
    throw new ValidationError("loggerName must not be empty", "loggerName");
  }

  if (!Number.isFinite(config.timeoutMs) || config.timeoutMs <= 0) {
    throw new ValidationError("timeoutMs must be positive", "timeoutMs");
  }
}

const emptyToUndefined = (value: unknown) => (value === "" ? undefined : value);

const EnvSchema = z.object({
  TTKIA_BASE_URL: z.preprocess(emptyToUndefined, z.string()),
  TTKIA_APP_TOKEN: z.preprocess(emptyToUndefined, z.string()),
  TTKIA_LOG_LEVEL: z.preprocess(emptyToUndefined, z.string().optional()),
  TTKIA_TIMEOUT_MS: z.preprocess(
    emptyToUndefined,
    z.coerce.number().int().positive().optional()
  ),
});

/**
 * Read client options from TTKIA_* environment variables.
 *
 * TTKIA_BASE_URL and TTKIA_APP_TOKEN are required; TTKIA_LOG_LEVEL and
 * TTKIA_TIMEOUT_MS are optional.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env
): CreateClientOptions {
  const parsed = EnvSchema.safeParse(env);

  if (!parsed.success) {
    const reasons = parsed.error.issues.map((issue) => {
      const name = issue.path.join(".");
      if (issue.code === z.ZodIssueCode.invalid_type && issue.received === "undefined") {
        return `${name} is not set`;
      }
      return `${name}: ${issue.message}`;
    });
    throw new ValidationError(
      `Invalid TTKIA environment: ${reasons.join("; ")}`,
      "env"
    );
  }

  const { TTKIA_BASE_URL, TTKIA_APP_TOKEN, TTKIA_LOG_LEVEL, TTKIA_TIMEOUT_MS } = parsed.data;

  return {
    baseUrl: TTKIA_BASE_URL,
    appToken: TTKIA_APP_TOKEN,
    logLevel: TTKIA_LOG_LEVEL ?? DEFAULT_CLIENT_CONFIG.logLevel,
    timeoutMs: TTKIA_TIMEOUT_MS,
  };
}

/**
 * Load a dotenv file into process.env. Variables already set are kept.
 *
 * @returns false when the file could not be read
 */
export function loadDotenv(path: string = ".env"): boolean {
  const result = loadEnvFile({ path });
  return result.error === undefined;
}
