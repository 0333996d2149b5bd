import { Agent, fetch } from "undici";
import type { Dispatcher } from "undici";
import type { AppConfig } from "../config";
import { ForbiddenDomainError, TransportError, errorMessage } from "./errors";
import type { ScrapeStage } from "./errors";

let sharedAgent: Agent | undefined;
let sharedAgentConnections: number | undefined;

export function getFetchDispatcher(config: AppConfig): Agent {
  if (!sharedAgent || sharedAgentConnections !== config.maxConnections) {
    sharedAgent = new Agent({ connections: config.maxConnections });
    sharedAgentConnections = config.maxConnections;
  }
  return sharedAgent;
}

export function isAllowedUrl(url: string, allowedDomains: readonly string[]): boolean {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return false;
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return false;
  }
  return allowedDomains.includes(parsed.hostname.toLowerCase());
}

export function assertAllowedUrl(url: string, config: AppConfig, stage: ScrapeStage): void {
  if (!isAllowedUrl(url, config.allowedDomains)) {
    throw new ForbiddenDomainError(url, stage);
  }
}

export interface FetchHtmlOptions {
  config: AppConfig;
  stage: ScrapeStage;
  dispatcher?: Dispatcher;
  signal?: AbortSignal;
}

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  html: string;
}

const MAX_REDIRECTS = 5;

// an unparseable location is returned as is and then fails the domain check
function resolveLocation(location: string, base: string): string {
  try {
    return new URL(location, base).toString();
  } catch {
    return location;
  }
}

function isRedirect(status: number): boolean {
  return status === 301 || status === 302 || status === 303 || status === 307 || status === 308;
}

/**
 * GETs an HTML page. Redirects are followed by hand so that every hop is checked
 * against the allowed domains before it is requested.
 */
export async function fetchHtml(url: string, options: FetchHtmlOptions): Promise<FetchedPage> {
  const { config, stage } = options;
  assertAllowedUrl(url, config, stage);

  if (options.signal?.aborted) {
    throw new TransportError(url, `request to ${url} cancelled`, { stage });
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.requestTimeoutMs);
  const cancel = (): void => controller.abort();
  options.signal?.addEventListener("abort", cancel, { once: true });

  let currentUrl = url;
  try {
    for (let hop = 0; ; hop += 1) {
      const response = await fetch(currentUrl, {
        method: "GET",
        headers: {
          "user-agent": config.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        redirect: "manual",
        dispatcher: options.dispatcher ?? getFetchDispatcher(config),
        signal: controller.signal,
      });

      if (isRedirect(response.status)) {
        await response.body?.cancel();
        const location = response.headers.get("location");
        if (!location) {
          throw new TransportError(url, `HTTP ${response.status} without a location while fetching ${currentUrl}`, {
            stage,
            status: response.status,
          });
        }
        if (hop >= MAX_REDIRECTS) {
          throw new TransportError(url, `too many redirects while fetching ${url}`, { stage, status: response.status });
        }
        const target = resolveLocation(location, currentUrl);
        assertAllowedUrl(target, config, stage);
        currentUrl = target;
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new TransportError(url, `HTTP ${response.status} while fetching ${currentUrl}`, {
          stage,
          status: response.status,
        });
      }

      return {
        url: currentUrl,
        html: await response.text(),
      };
    }
  } catch (error) {
    if (error instanceof TransportError || error instanceof ForbiddenDomainError) {
      throw error;
    }
    const reason = controller.signal.aborted && !options.signal?.aborted ? "timed out" : errorMessage(error);
    throw new TransportError(url, `error while fetching ${currentUrl}: ${reason}`, { stage, cause: error });
  } finally {
    clearTimeout(timeout);
    options.signal?.removeEventListener("abort", cancel);
  }
}
