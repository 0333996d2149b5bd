import type { Dispatcher } from "undici";
import { listingUrl } from "../config";
import type { AppConfig } from "../config";
import { ForbiddenDomainError, InconsistentStateError, ScrapeError, errorMessage } from "../core/errors";
import type { ScrapeStage } from "../core/errors";
import { fetchHtml } from "../core/fetch";
import type { FetchedPage } from "../core/fetch";
import type { Logger, MetricsRegistry } from "../observability";
import type { EntryStore } from "../store";
import type { Entry } from "../types";
import { parseDetailPage, parseListingPage } from "./htmlParser";

export interface CrawlDependencies {
  config: AppConfig;
  logger: Logger;
  metrics: MetricsRegistry;
  store: EntryStore;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

function inStage(error: unknown, stage: ScrapeStage): unknown {
  return error instanceof ScrapeError ? error.inStage(stage) : error;
}

async function visit(deps: CrawlDependencies, url: string, stage: ScrapeStage): Promise<FetchedPage> {
  const { config, logger, metrics } = deps;
  logger.info("page_visit", { url, stage });
  const stopTimer = metrics.startTimer("page_fetch_ms");

  try {
    const page = await fetchHtml(url, { config, stage, dispatcher: deps.dispatcher, signal: deps.signal });
    metrics.incrementCounter("pages_fetched", 1);
    logger.debug("page_fetched", { url, finalUrl: page.url, bytes: page.html.length, durationMs: stopTimer() });
    return page;
  } catch (error) {
    if (error instanceof ForbiddenDomainError) {
      metrics.incrementCounter("requests_rejected", 1);
    }
    logger.error("page_fetch_failed", { url, stage, error: errorMessage(error) });
    throw error;
  }
}

/**
 * Fetches the notice-board listing, registers one entry per board item and hands
 * every newly registered entry to `onEntry` as soon as it is known.
 */
export async function fetchListing(deps: CrawlDependencies, onEntry: (entry: Entry) => void): Promise<EntryStore> {
  const { config, logger, metrics, store } = deps;
  const page = await visit(deps, listingUrl(config), "listing");

  try {
    const items = parseListingPage(page.html, config.baseUrl);
    for (const item of items) {
      const entry: Entry = { ...item, attachments: [] };
      if (store.has(entry.entryUrl)) {
        logger.warn("listing_duplicate_entry", { entryUrl: entry.entryUrl });
      }
      store.register(entry);
      metrics.incrementCounter("entries_discovered", 1);
      onEntry(entry);
    }

    logger.info("listing_parsed", { pageUrl: page.url, entries: items.length, distinctEntries: store.size });
    return store;
  } catch (error) {
    throw inStage(error, "listing");
  }
}

/** Fetches one detail page and appends its attachments to the entry registered for it. */
export async function fetchDetail(deps: CrawlDependencies, entryUrl: string): Promise<void> {
  const { logger, metrics, store } = deps;
  const page = await visit(deps, entryUrl, "detail");

  try {
    if (!store.has(page.url)) {
      throw new InconsistentStateError(`news entry not found for URL ${page.url}`, "detail");
    }

    const attachments = parseDetailPage(page.html, page.url);
    for (const attachment of attachments) {
      store.appendAttachment(page.url, attachment);
    }

    metrics.incrementCounter("attachments_found", attachments.length);
    logger.debug("detail_parsed", { entryUrl: page.url, attachments: attachments.length });
  } catch (error) {
    throw inStage(error, "detail");
  }
}

/**
 * Runs the listing pass and one detail fetch per distinct entry URL, then waits
 * for every issued request. The first failure aborts whatever is still in flight
 * and is rethrown once those requests have settled.
 */
export async function scrapeNoticeBoard(deps: Omit<CrawlDependencies, "signal">): Promise<readonly Readonly<Entry>[]> {
  const run = new AbortController();

  const runDeps: CrawlDependencies = { ...deps, signal: run.signal };
  const requested = new Set<string>();
  const pending: Promise<void>[] = [];
  let failure: { error: unknown } | undefined;

  const fail = (error: unknown): void => {
    failure = failure ?? { error };
    run.abort();
  };

  try {
    await fetchListing(runDeps, (entry) => {
      if (requested.has(entry.entryUrl)) {
        return;
      }
      requested.add(entry.entryUrl);
      pending.push(fetchDetail(runDeps, entry.entryUrl).catch(fail));
    });
  } catch (error) {
    fail(error);
  }

  await Promise.all(pending);

  if (failure) {
    throw failure.error;
  }

  deps.logger.info("scrape_complete", { entries: deps.store.size, detailPages: requested.size });
  return deps.store.freeze();
}
