import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { LogLevel } from "../observability/types";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  apiBaseUrl: "https://api.vk.com/method",
  apiVersion: "5.131",
  accessToken: undefined,
  userAgent: "vk-group-archiver/1.0",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  downloadTimeoutMs: 120_000,
  apiRequestIntervalMs: 350,
  maxRateLimitRetries: 3,
  downloadConcurrency: 0,
  dataRoot: ".",
  logLevel: "info",
};

const logLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const configFileSchema = z
  .object({
    apiBaseUrl: z.string(),
    apiVersion: z.string(),
    accessToken: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    downloadTimeoutMs: z.number().int().positive(),
    apiRequestIntervalMs: z.number().int().nonnegative(),
    maxRateLimitRetries: z.number().int().nonnegative(),
    downloadConcurrency: z.number().int().nonnegative(),
    dataRoot: z.string(),
    logLevel: logLevelSchema,
  })
  .partial();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = configFileSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    throw new Error(`Invalid config file ${absolutePath}: ${parsed.error.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: LogLevel): LogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...readConfigFile(configPath),
  };

  return {
    ...merged,
    apiBaseUrl: env.VK_API_BASE_URL ?? merged.apiBaseUrl,
    apiVersion: env.VK_API_VERSION ?? merged.apiVersion,
    accessToken: env.VK_ACCESS_TOKEN ?? merged.accessToken,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    downloadTimeoutMs: toInt(env.DOWNLOAD_TIMEOUT_MS, merged.downloadTimeoutMs),
    apiRequestIntervalMs: toInt(env.API_REQUEST_INTERVAL_MS, merged.apiRequestIntervalMs),
    maxRateLimitRetries: toInt(env.MAX_RATE_LIMIT_RETRIES, merged.maxRateLimitRetries),
    downloadConcurrency: toInt(env.DOWNLOAD_CONCURRENCY, merged.downloadConcurrency),
    dataRoot: env.DATA_ROOT ?? merged.dataRoot,
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
  };
}

export { DEFAULT_CONFIG };
