import type { Dispatcher } from "undici";
import type { AppConfig } from "../config";
import { scrapeNoticeBoard } from "../crawl";
import type { Logger, MetricsRegistry } from "../observability";
import type { EntryStore } from "../store";
import { cutoffForDays, formatDate } from "./dates";
import { sinceIncluding } from "./filter";
import { formatEntries } from "./format";

export interface CommandContext {
  config: AppConfig;
  store: EntryStore;
  logger: Logger;
  metrics: MetricsRegistry;
  dispatcher?: Dispatcher;
  now?: Date;
}

/** Scrapes the board and renders every entry published in the last `days` days. */
export async function runListing(ctx: CommandContext, days: number): Promise<string> {
  const cutoff = cutoffForDays(days, ctx.now ?? new Date());
  ctx.logger.info("listing_start", { days, cutoff: formatDate(cutoff) });

  const entries = await scrapeNoticeBoard({
    config: ctx.config,
    logger: ctx.logger.child("crawl"),
    metrics: ctx.metrics,
    store: ctx.store,
    dispatcher: ctx.dispatcher,
  });
  const recent = sinceIncluding(entries, cutoff);

  ctx.logger.info("listing_complete", { scraped: entries.length, shown: recent.length });
  return formatEntries(recent);
}
