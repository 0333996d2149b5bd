import type { LogLevel } from "../observability/types";

export interface AppConfig {
  baseUrl: string;
  listingPath: string;
  allowedDomains: readonly string[];
  userAgent: string;
  requestTimeoutMs: number;
  maxConnections: number;
  defaultDays: number;
  logLevel: LogLevel;
}

export type ConfigOverrides = Partial<AppConfig>;
