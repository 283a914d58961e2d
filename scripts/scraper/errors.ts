export class ScraperError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** No usable browser runtime could be launched. Not retried. */
export class SessionCreationError extends ScraperError {}

export class NavigationError extends ScraperError {
  constructor(
    readonly url: string,
    readonly attempts: number,
    options?: ErrorOptions
  ) {
    super(`Failed to load ${url} after ${attempts} attempts`, options);
  }
}

export class LoginTimeoutError extends ScraperError {
  constructor(readonly waitedMs: number) {
    super('Login not detected within the allotted time. Please sign in and retry.');
  }
}

export class ConfigError extends ScraperError {}

export const errorMessage = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
