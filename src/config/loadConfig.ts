import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://www.drasov.cz",
  listingPath: "/uredni-deska",
  allowedDomains: ["drasov.cz", "www.drasov.cz"],
  userAgent: "notice-board-scraper/1.0",
  requestTimeoutMs: 20_000,
  maxConnections: 6,
  defaultDays: 30,
  logLevel: "info",
};

function positiveInt(value: number, fallback: number): number {
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function loadConfig(overrides: ConfigOverrides = {}): AppConfig {
  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...overrides,
  };

  return {
    ...merged,
    allowedDomains: merged.allowedDomains.map((domain) => domain.trim().toLowerCase()),
    requestTimeoutMs: positiveInt(merged.requestTimeoutMs, DEFAULT_CONFIG.requestTimeoutMs),
    maxConnections: positiveInt(merged.maxConnections, DEFAULT_CONFIG.maxConnections),
  };
}

export function listingUrl(config: AppConfig): string {
  return new URL(config.listingPath, config.baseUrl).toString();
}

export { DEFAULT_CONFIG };
