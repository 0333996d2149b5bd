import type { LogFields, LogLevel } from "./types";

export interface LoggerContext {
  component: string;
  runId: string;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

// stdout is reserved for the listing itself
function writeToStderr(line: string): void {
  process.stderr.write(`${line}\n`);
}

export class Logger {
  private readonly context: LoggerContext;
  private readonly level: LogLevel;
  private readonly writeLine: (line: string) => void;

  constructor(context: LoggerContext, options: LoggerOptions = {}) {
    this.context = context;
    this.level = options.level ?? "info";
    this.writeLine = options.write ?? writeToStderr;
  }

  child(component: string): Logger {
    return new Logger({ component, runId: this.context.runId }, { level: this.level, write: this.writeLine });
  }

  debug(msg: string, fields?: LogFields): void {
    this.write("debug", msg, fields);
  }

  info(msg: string, fields?: LogFields): void {
    this.write("info", msg, fields);
  }

  warn(msg: string, fields?: LogFields): void {
    this.write("warn", msg, fields);
  }

  error(msg: string, fields?: LogFields): void {
    this.write("error", msg, fields);
  }

  private write(level: LogLevel, msg: string, fields?: LogFields): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) {
      return;
    }

    const payload = {
      ts: new Date().toISOString(),
      level,
      msg,
      component: this.context.component,
      runId: this.context.runId,
      ...(fields ?? {}),
    };

    this.writeLine(JSON.stringify(payload));
  }
}
