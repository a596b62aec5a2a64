export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

// Raised when a single repository fetch fails. Aborts the whole run.
export class SourceUnavailableError extends Error {
  readonly rateLimited: boolean;

  constructor(
    message: string,
    readonly repo: string,
    readonly status?: number,
    options: { cause?: unknown; rateLimited?: boolean } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "SourceUnavailableError";
    this.rateLimited = options.rateLimited ?? false;
  }
}

export class SummarizerError extends Error {
  constructor(
    message: string,
    readonly digest: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "SummarizerError";
  }
}
