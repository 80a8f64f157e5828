export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly url: string,
  ) {
    super(`HTTP ${status} from ${url}`);
    this.name = "HttpError";
  }
}

export class UserNotFoundError extends Error {
  constructor(public readonly username: string) {
    super(`Username Not Found: ${username}`);
    this.name = "UserNotFoundError";
  }
}

export class MissingFieldError extends Error {
  constructor(public readonly field: string) {
    super(`Missing Key: '${field}'`);
    this.name = "MissingFieldError";
  }
}

/**
 * Whether a failed lookup may succeed on retry. Empty results and 4xx
 * responses (other than 429) are real misses; anything else is transient.
 */
export function isTransient(error: unknown): boolean {
  if (error instanceof MissingFieldError) return false;
  if (error instanceof HttpError) return error.status >= 500 || error.status === 429;
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
