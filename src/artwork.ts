import { LARGE_IMAGE_ASSET } from "./constants";
import { isTransient } from "./errors";
import type { Lookup } from "./http";
import type { JellyfinItem, JellyfinProviderIds, MediaServer } from "./jellyfin";
import { createLogger } from "./logger";
import { MUSICBRAINZ_SITE_URL, type MusicBrainzClient } from "./musicbrainz";
import type { Artwork, SupportedItemType } from "./presence";
import { TMDB_SITE_URL, type TmdbClient } from "./tmdb";

const log = createLogger("RPC");

export interface ArtworkOptions {
  seasonOverSeries: boolean;
  releaseOverGroup: boolean;
  findBestMatch: boolean;
}

export interface ArtworkSources {
  /** Null when no TMDB API key is configured. */
  tmdb: TmdbClient | null;
  musicBrainz: MusicBrainzClient;
}

const MAX_CACHE_ENTRIES = 200;

// Fallback returned when a lookup cannot identify the item
const DEFAULT_ARTWORK: Lookup<Artwork> = { value: { largeImage: LARGE_IMAGE_ASSET }, transient: false };

function tmdbIdOf(providerIds: JellyfinProviderIds | undefined): string | undefined {
  return providerIds?.Tmdb || providerIds?.TheMovieDb || undefined;
}

/**
 * Resolves poster or cover art plus the links shown on the activity. Results
 * are cached per item so a replayed or resumed item does not hit the remote
 * APIs again. A result that fell back after a transient failure is not
 * cached, so the next activity change retries it.
 */
export class ArtworkResolver {
  private readonly cache = new Map<string, Artwork>();

  constructor(
    private readonly sources: ArtworkSources,
    private readonly options: ArtworkOptions,
  ) {}

  public get cacheSize(): number {
    return this.cache.size;
  }

  public async resolve(itemType: SupportedItemType, item: JellyfinItem, server: MediaServer): Promise<Artwork> {
    const cacheKey = `${itemType}:${item.Id ?? item.Name ?? ""}`;
    const cached = this.cache.get(cacheKey);
    if (cached) {
      return cached;
    }

    const { value: artwork, transient } = await this.lookup(itemType, item, server);
    if (item.Id && !transient) {
      if (this.cache.size >= MAX_CACHE_ENTRIES) {
        const oldest = this.cache.keys().next();
        if (!oldest.done) this.cache.delete(oldest.value);
      }
      this.cache.set(cacheKey, artwork);
    }
    return artwork;
  }

  private lookup(itemType: SupportedItemType, item: JellyfinItem, server: MediaServer): Promise<Lookup<Artwork>> {
    switch (itemType) {
      case "Episode":
        return this.resolveEpisode(item, server);
      case "Movie":
        return this.resolveMovie(item);
      case "Audio":
        return this.resolveAudio(item);
    }
  }

  private async episodeTmdbId(
    tmdb: TmdbClient,
    item: JellyfinItem,
    server: MediaServer,
  ): Promise<Lookup<string | null>> {
    if (!item.SeriesId) {
      log.warn("No TMDB ID Found. Skipping...");
      return { value: null, transient: false };
    }

    let series: JellyfinItem;
    try {
      series = await server.getItem(item.SeriesId);
    } catch (error) {
      log.debug(error);
      log.warn("No TMDB ID Found. Skipping...");
      return { value: null, transient: isTransient(error) };
    }

    const known = tmdbIdOf(series.ProviderIds);
    if (known) return { value: known, transient: false };
    if (!this.options.findBestMatch || !item.SeriesName) {
      log.warn("No TMDB ID Found. Skipping...");
      return { value: null, transient: false };
    }

    log.warn("No TMDB ID Found. Searching...");
    const found = await tmdb.searchSeriesId(item.SeriesName);
    if (found.value === null) {
      log.warn("TMDB ID Search Failed. Skipping...");
    }
    return found;
  }

  private async resolveEpisode(item: JellyfinItem, server: MediaServer): Promise<Lookup<Artwork>> {
    const { tmdb } = this.sources;
    if (!tmdb) return DEFAULT_ARTWORK;

    const tmdbId = await this.episodeTmdbId(tmdb, item, server);
    if (tmdbId.value === null) {
      return { value: DEFAULT_ARTWORK.value, transient: tmdbId.transient };
    }

    const season = item.ParentIndexNumber;
    const episode = item.IndexNumber;
    const poster = this.options.seasonOverSeries
      ? await tmdb.seasonPoster(tmdbId.value, season)
      : await tmdb.seriesPoster(tmdbId.value);
    const transient = tmdbId.transient || poster.transient;

    const detailsUrl = `${TMDB_SITE_URL}/tv/${tmdbId.value}`;
    if (season === undefined) {
      return { value: { largeImage: poster.value, detailsUrl, largeUrl: detailsUrl }, transient };
    }
    const largeUrl = `${detailsUrl}/season/${season}`;
    return {
      value: {
        largeImage: poster.value,
        detailsUrl,
        largeUrl,
        stateUrl: episode === undefined ? undefined : `${largeUrl}/episode/${episode}`,
      },
      transient,
    };
  }

  private async resolveMovie(item: JellyfinItem): Promise<Lookup<Artwork>> {
    const { tmdb } = this.sources;
    if (!tmdb) return DEFAULT_ARTWORK;

    let tmdbId: string | null = tmdbIdOf(item.ProviderIds) ?? null;
    let searchTransient = false;
    if (tmdbId === null) {
      if (!this.options.findBestMatch || !item.Name) {
        log.warn("No TMDB ID Found. Skipping...");
        return DEFAULT_ARTWORK;
      }
      log.warn("No TMDB ID Found. Searching...");
      const found = await tmdb.searchMovieId(item.Name);
      if (found.value === null) {
        log.warn("TMDB ID Search Failed. Skipping...");
        return { value: DEFAULT_ARTWORK.value, transient: found.transient };
      }
      tmdbId = found.value;
      searchTransient = found.transient;
    }

    const poster = await tmdb.moviePoster(tmdbId);
    const detailsUrl = `${TMDB_SITE_URL}/movie/${tmdbId}`;
    return {
      value: { largeImage: poster.value, detailsUrl, largeUrl: detailsUrl },
      transient: searchTransient || poster.transient,
    };
  }

  private async resolveAudio(item: JellyfinItem): Promise<Lookup<Artwork>> {
    const { musicBrainz } = this.sources;
    const providerIds: JellyfinProviderIds = item.ProviderIds ?? {};

    let groupId = providerIds.MusicBrainzReleaseGroup || null;
    if (groupId === null) {
      if (!this.options.findBestMatch || !item.AlbumArtist || !item.Album) {
        log.warn("No MusicBrainz ID Found. Skipping...");
        return DEFAULT_ARTWORK;
      }
      log.warn("No MusicBrainz ID Found. Searching...");
      const found = await musicBrainz.searchReleaseGroup(item.AlbumArtist, item.Album);
      if (found.value === null) {
        log.warn("MusicBrainz ID Search Failed. Skipping...");
        return { value: DEFAULT_ARTWORK.value, transient: found.transient };
      }
      groupId = found.value;
    }

    const releaseId = this.options.releaseOverGroup ? providerIds.MusicBrainzAlbum || undefined : undefined;
    const groupUrl = `${MUSICBRAINZ_SITE_URL}/release-group/${groupId}`;
    const cover = await musicBrainz.releaseCover(groupId, releaseId);
    return {
      value: {
        largeImage: cover.value,
        detailsUrl: providerIds.MusicBrainzTrack
          ? `${MUSICBRAINZ_SITE_URL}/track/${providerIds.MusicBrainzTrack}`
          : undefined,
        stateUrl: groupUrl,
        largeUrl: releaseId ? `${MUSICBRAINZ_SITE_URL}/release/${releaseId}` : groupUrl,
      },
      transient: cover.transient,
    };
  }
}
