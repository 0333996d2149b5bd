export type ScrapeStage = "listing" | "detail";

export type ScrapeErrorKind = "format" | "markup" | "inconsistent_state" | "transport" | "forbidden_domain";

export class ScrapeError extends Error {
  readonly kind: ScrapeErrorKind;
  stage?: ScrapeStage;

  constructor(kind: ScrapeErrorKind, message: string, options: { stage?: ScrapeStage; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.kind = kind;
    this.stage = options.stage;
  }

  /** Tags the error with the stage it surfaced in, unless a deeper layer already did. */
  inStage(stage: ScrapeStage): this {
    this.stage = this.stage ?? stage;
    return this;
  }
}

export class DateFormatError extends ScrapeError {
  constructor(message: string) {
    super("format", message);
  }
}

export class MarkupError extends ScrapeError {
  constructor(message: string, stage?: ScrapeStage) {
    super("markup", message, { stage });
  }
}

export class InconsistentStateError extends ScrapeError {
  constructor(message: string, stage?: ScrapeStage) {
    super("inconsistent_state", message, { stage });
  }
}

export class TransportError extends ScrapeError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, options: { stage?: ScrapeStage; status?: number; cause?: unknown } = {}) {
    super("transport", message, options);
    this.url = url;
    this.status = options.status;
  }
}

export class ForbiddenDomainError extends ScrapeError {
  readonly url: string;

  constructor(url: string, stage?: ScrapeStage) {
    super("forbidden_domain", `refusing to fetch ${url}: domain is not allowed`, { stage });
    this.url = url;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): string {
  if (error instanceof ScrapeError) {
    return `fatal [${error.stage ?? "unknown"}] ${error.kind}: ${error.message}`;
  }
  return `fatal: ${errorMessage(error)}`;
}
