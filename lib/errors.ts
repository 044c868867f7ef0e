export class ConfigError extends Error {
  constructor(readonly missing: string[]) {
    super(`Missing required environment variables: ${missing.join(', ')}`);
    this.name = 'ConfigError';
  }
}

/** Thrown when a postal code cannot be resolved to coordinates; never retried. */
export class LocationNotFoundError extends Error {
  constructor(readonly zipcode: string) {
    super(`Could not find location for zip code ${zipcode}`);
    this.name = 'LocationNotFoundError';
  }
}

export class HttpError extends Error {
  constructor(readonly status: number, readonly url: string) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = 'HttpError';
  }
}

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
};

export class ToolTimeoutError extends Error {
  constructor(readonly tool: string, readonly timeoutMs: number) {
    super(`${tool} timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}
