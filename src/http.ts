import { APP_NAME, APP_URL, APP_VERSION } from "./constants";
import { HttpError } from "./errors";

// MusicBrainz asks for "app/version ( contact )"
export const USER_AGENT = `${APP_NAME}/${APP_VERSION} ( ${APP_URL} )`;

const DEFAULT_TIMEOUT_MS = 10_000;

/** A lookup result; `transient` is set when it fell back after a failure worth retrying. */
export interface Lookup<T> {
  value: T;
  transient: boolean;
}

export interface RequestOptions {
  headers?: Record<string, string>;
  query?: Record<string, string | number | undefined>;
  timeoutMs?: number;
}

export function buildUrl(url: string, query: RequestOptions["query"] = {}): URL {
  const target = new URL(url);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      target.searchParams.set(key, String(value));
    }
  }
  return target;
}

/**
 * GET a JSON document. Non-2xx responses throw an HttpError; its url never
 * includes the query string.
 */
export async function getJson<T>(url: string, options: RequestOptions = {}): Promise<T> {
  const target = buildUrl(url, options.query);
  const response = await fetch(target, {
    headers: {
      Accept: "application/json",
      "User-Agent": USER_AGENT,
      ...options.headers,
    },
    signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TIMEOUT_MS),
  });

  if (!response.ok) {
    throw new HttpError(response.status, `${target.origin}${target.pathname}`);
  }
  return (await response.json()) as T;
}
