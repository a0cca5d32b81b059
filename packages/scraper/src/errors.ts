export class ScrapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScrapeError";
  }
}

/** Timeout, refused connection, DNS failure. Always recorded per URL, never fatal. */
export class TransportError extends ScrapeError {
  constructor(
    readonly url: string,
    message: string
  ) {
    super(message);
    this.name = "TransportError";
  }
}

/** Malformed XML or HTML for a single document. */
export class ParseError extends ScrapeError {
  constructor(
    readonly url: string,
    message: string
  ) {
    super(message);
    this.name = "ParseError";
  }
}

/** Rejected before a session starts. */
export class ConfigurationError extends ScrapeError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class AlreadyRunningError extends ScrapeError {
  constructor(readonly activeSessionId: string) {
    super("Scraper is already running");
    this.name = "AlreadyRunningError";
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return String(error);
}
