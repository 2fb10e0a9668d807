/**
 * Error classes raised by the harness. Each sets a fixed `name` so the
 * driver can report it as an `unexpected_error: <name>` category.
 */

/** Invalid environment configuration */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** A RunConfig (or the prompts handed with it) is unusable */
export class RunConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RunConfigError";
  }
}

/** Non-2xx status on a non-streaming completion */
export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    body: string,
  ) {
    super(`HTTP ${status}: ${body.slice(0, 300)}`);
    this.name = "HttpStatusError";
  }
}

/** Response body parsed but lacks the fields the driver needs */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

/** Abort reason used when a request exceeds its budget */
export class RequestTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Request exceeded ${timeoutMs} ms`);
    this.name = "RequestTimeoutError";
  }
}

export class PortForwardError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PortForwardError";
  }
}
