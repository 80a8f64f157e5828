import { LARGE_IMAGE_ASSET } from "./constants";
import { isTransient, MissingFieldError } from "./errors";
import { getJson, type Lookup } from "./http";
import { createLogger } from "./logger";

const log = createLogger("RPC");

const TMDB_API_BASE_URL = "https://api.themoviedb.org/3";
const TMDB_IMAGE_BASE_URL = "https://image.tmdb.org/t/p/w185/";
export const TMDB_SITE_URL = "https://www.themoviedb.org";

export interface TmdbPoster {
  file_path?: string;
  iso_639_1?: string | null;
}

interface TmdbImagesResult {
  id?: number;
  posters?: TmdbPoster[];
}

interface TmdbSearchResult {
  page?: number;
  results?: Array<{ id?: number; name?: string; title?: string }>;
}

/**
 * Picks the first poster in the first preferred language that has one,
 * falling back to TMDB's own ordering.
 */
export function selectPoster(posters: TmdbPoster[], languages: string[]): TmdbPoster | undefined {
  for (const language of languages) {
    const poster = posters.find((candidate) => candidate.iso_639_1 === language);
    if (poster) return poster;
  }
  return posters[0];
}

export class TmdbClient {
  constructor(
    private readonly apiKey: string,
    private readonly languages: string[] = [],
  ) {}

  private request<T>(path: string, query: Record<string, string> = {}): Promise<T> {
    return getJson<T>(`${TMDB_API_BASE_URL}${path}`, { query: { api_key: this.apiKey, ...query } });
  }

  public async checkConnection(): Promise<boolean> {
    try {
      await this.request("/configuration");
      log.info("Connected to TMDB API");
      return true;
    } catch (error) {
      log.debug(error);
      log.warn("TMDB API Connection Failed. Skipping...");
      return false;
    }
  }

  public searchSeriesId(title: string): Promise<Lookup<string | null>> {
    return this.search("tv", title);
  }

  public searchMovieId(title: string): Promise<Lookup<string | null>> {
    return this.search("movie", title);
  }

  private async search(kind: "tv" | "movie", title: string): Promise<Lookup<string | null>> {
    try {
      const data = await this.request<TmdbSearchResult>(`/search/${kind}`, { query: title });
      const id = data.results?.[0]?.id;
      if (id === undefined) {
        throw new MissingFieldError("results[0].id");
      }
      return { value: String(id), transient: false };
    } catch (error) {
      log.debug(error);
      log.warn("TMDB API Connection Failed. Skipping...");
      return { value: null, transient: isTransient(error) };
    }
  }

  private async posterUrl(path: string): Promise<string> {
    const data = await this.request<TmdbImagesResult>(path);
    const poster = selectPoster(data.posters ?? [], this.languages);
    if (!poster?.file_path) {
      throw new MissingFieldError("posters[0].file_path");
    }
    return TMDB_IMAGE_BASE_URL + poster.file_path.replace(/^\//, "");
  }

  private async poster(path: string): Promise<Lookup<string>> {
    try {
      return { value: await this.posterUrl(path), transient: false };
    } catch (error) {
      log.debug(error);
      log.warn("No Poster Available on TMDB. Skipping...");
      return { value: LARGE_IMAGE_ASSET, transient: isTransient(error) };
    }
  }

  public seriesPoster(tmdbId: string): Promise<Lookup<string>> {
    return this.poster(`/tv/${tmdbId}/images`);
  }

  /** Season poster, or the series poster when the season has none. */
  public async seasonPoster(tmdbId: string, season?: number): Promise<Lookup<string>> {
    if (season === undefined) {
      return this.seriesPoster(tmdbId);
    }
    try {
      return { value: await this.posterUrl(`/tv/${tmdbId}/season/${season}/images`), transient: false };
    } catch (error) {
      log.debug(error);
      const series = await this.seriesPoster(tmdbId);
      return { value: series.value, transient: series.transient || isTransient(error) };
    }
  }

  public moviePoster(tmdbId: string): Promise<Lookup<string>> {
    return this.poster(`/movie/${tmdbId}/images`);
  }
}
