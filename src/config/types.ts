import type { LogLevel } from "../observability/types";

export interface AppConfig {
  apiBaseUrl: string;
  apiVersion: string;
  accessToken?: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  apiRequestIntervalMs: number;
  maxRateLimitRetries: number;
  // 0 starts every task of a batch at once
  downloadConcurrency: number;
  dataRoot: string;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
