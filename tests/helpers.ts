import { readFileSync } from "fs";
import path from "path";
import { MockAgent } from "undici";
import { loadConfig } from "../src/config";
import type { CrawlDependencies } from "../src/crawl";
import { Logger, MetricsRegistry } from "../src/observability";
import { createStore } from "../src/store";

export const ORIGIN = "https://www.drasov.cz";

export function readFixture(name: string): string {
  return readFileSync(path.join(process.cwd(), "fixtures", name), "utf8");
}

export function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

export function replyHtml(agent: MockAgent, pathname: string, html: string, status = 200): void {
  agent
    .get(ORIGIN)
    .intercept({ path: pathname, method: "GET" })
    .reply(status, html, { headers: { "content-type": "text/html; charset=utf-8" } });
}

export function listingItem(title: string, href: string, publishedOn: string, publishedUntil: string): string {
  return `
    <div class="c-office-board__content-item">
      <div class="c-office-board__col-date"><span>Vyvěšeno</span><span>${publishedOn}</span></div>
      <div class="c-office-board__col-date"><span>Sejmuto</span><span>${publishedUntil}</span></div>
      <div class="c-office-board__col-name-content"><a href="${href}">${title}</a></div>
    </div>`;
}

export function listingPage(...items: string[]): string {
  return `<html><body><section class="c-office-board">${items.join("")}</section></body></html>`;
}

export interface TestDeps extends CrawlDependencies {
  logLines: string[];
}

export function createDeps(agent: MockAgent): TestDeps {
  const logLines: string[] = [];
  return {
    config: loadConfig(),
    logger: new Logger({ component: "test", runId: "run_test" }, { level: "debug", write: (line) => logLines.push(line) }),
    metrics: new MetricsRegistry(),
    store: createStore(),
    dispatcher: agent,
    logLines,
  };
}

export interface LoggedMessage {
  msg: string;
  [key: string]: unknown;
}

export function loggedMessages(lines: string[]): LoggedMessage[] {
  return lines.map((line): LoggedMessage => JSON.parse(line));
}

export function replyRedirect(agent: MockAgent, pathname: string, location: string, status = 302): void {
  agent
    .get(ORIGIN)
    .intercept({ path: pathname, method: "GET" })
    .reply(status, "", { headers: { location } });
}

export function replySlowly(agent: MockAgent, pathname: string, html: string, delayMs: number): void {
  agent
    .get(ORIGIN)
    .intercept({ path: pathname, method: "GET" })
    .reply(200, html, { headers: { "content-type": "text/html; charset=utf-8" } })
    .delay(delayMs);
}
