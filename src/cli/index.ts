import type { Dispatcher } from "undici";
import { loadConfig } from "../config";
import type { ConfigOverrides } from "../config";
import { runListing } from "../core/commands";
import { ScrapeError, describeError } from "../core/errors";
import { createRunId, Logger, MetricsRegistry } from "../observability";
import type { LoggerOptions } from "../observability";
import { createStore } from "../store";

export interface ParsedCliArgs {
  days?: number;
}

export interface CliOverrides {
  config?: ConfigOverrides;
  dispatcher?: Dispatcher;
  now?: Date;
  stdout?: (text: string) => void;
  stderr?: (text: string) => void;
  log?: LoggerOptions["write"];
}

export class CliUsageError extends Error {}

const HELP_TEXT = `
Usage:
  notice-board-scraper [options]

Prints the notices of https://www.drasov.cz/uredni-deska published in the last N days.

Options:
  --days <n>   Include entries published on or after today minus n days (default 30)
  -h, --help   Show this help
`;

function parseDays(raw: string | undefined): number {
  if (raw === undefined || !/^\d+$/.test(raw.trim())) {
    throw new CliUsageError(`--days expects a non-negative integer, got ${raw === undefined ? "nothing" : `"${raw}"`}`);
  }
  return Number.parseInt(raw.trim(), 10);
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const parsed: ParsedCliArgs = {};
  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--days" || arg === "-days") {
      parsed.days = parseDays(argv[index + 1]);
      index += 1;
    } else if (arg.startsWith("--days=") || arg.startsWith("-days=")) {
      parsed.days = parseDays(arg.slice(arg.indexOf("=") + 1));
    } else {
      throw new CliUsageError(`unknown argument: ${arg}`);
    }
  }

  return parsed;
}

export async function runCli(argv: string[], overrides: CliOverrides = {}): Promise<number> {
  const stdout = overrides.stdout ?? ((text: string) => process.stdout.write(text));
  const stderr = overrides.stderr ?? ((text: string) => process.stderr.write(text));

  let parsed: ParsedCliArgs | "help";
  try {
    parsed = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof CliUsageError) {
      stderr(`${error.message}\n\n${HELP_TEXT.trim()}\n`);
      return 2;
    }
    throw error;
  }

  if (parsed === "help") {
    stdout(`${HELP_TEXT.trim()}\n`);
    return 0;
  }

  const config = loadConfig(overrides.config);
  const days = parsed.days ?? config.defaultDays;
  const runId = createRunId();
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId }, { level: config.logLevel, write: overrides.log });
  const context = {
    config,
    store: createStore(),
    logger: logger.child("listing"),
    metrics,
    dispatcher: overrides.dispatcher,
    now: overrides.now,
  };

  logger.info("command_start", { days });

  try {
    const output = await runListing(context, days);
    stdout(output);
    logger.info("command_complete", { days });
    return 0;
  } catch (error) {
    if (error instanceof ScrapeError) {
      stderr(`${describeError(error)}\n`);
      return 1;
    }
    throw error;
  } finally {
    logger.info("metrics_summary", { ...metrics.summary() });
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
