export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  url?: string;
  pageUrl?: string;
  entryUrl?: string;
  [key: string]: unknown;
}

export type MetricCounterName = "pages_fetched" | "entries_discovered" | "attachments_found" | "requests_rejected";

export type MetricTimerName = "page_fetch_ms";
