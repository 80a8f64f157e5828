import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ArtworkResolver, type ArtworkOptions } from "./artwork";
import { HttpError } from "./errors";
import type { Lookup } from "./http";
import type { JellyfinItem, MediaServer } from "./jellyfin";
import { MusicBrainzClient } from "./musicbrainz";
import { TmdbClient } from "./tmdb";

const OPTIONS: ArtworkOptions = { seasonOverSeries: true, releaseOverGroup: true, findBestMatch: true };

const SEASON_POSTER = "https://image.tmdb.org/t/p/w185/season.jpg";
const SERIES_POSTER = "https://image.tmdb.org/t/p/w185/series.jpg";
const MOVIE_POSTER = "https://image.tmdb.org/t/p/w185/movie.jpg";
const COVER = "https://coverartarchive.org/release/rel-1/front.jpg";

function clean<T>(value: T): Lookup<T> {
  return { value, transient: false };
}

let tmdb: TmdbClient;
let musicBrainz: MusicBrainzClient;
let server: MediaServer;

beforeEach(() => {
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});

  tmdb = new TmdbClient("test-secret");
  vi.spyOn(tmdb, "seasonPoster").mockResolvedValue(clean(SEASON_POSTER));
  vi.spyOn(tmdb, "seriesPoster").mockResolvedValue(clean(SERIES_POSTER));
  vi.spyOn(tmdb, "moviePoster").mockResolvedValue(clean(MOVIE_POSTER));
  vi.spyOn(tmdb, "searchMovieId").mockResolvedValue(clean("603"));
  vi.spyOn(tmdb, "searchSeriesId").mockResolvedValue(clean("1399"));

  musicBrainz = new MusicBrainzClient();
  vi.spyOn(musicBrainz, "releaseCover").mockResolvedValue(clean(COVER));
  vi.spyOn(musicBrainz, "searchReleaseGroup").mockResolvedValue(clean("rg-found"));

  server = {
    serverName: null,
    getSessions: vi.fn(async () => []),
    getItem: vi.fn(async (): Promise<JellyfinItem> => ({ Id: "series-1", ProviderIds: { Tmdb: "1399" } })),
  };
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

const episode: JellyfinItem = {
  Id: "ep-1",
  Type: "Episode",
  Name: "Pilot",
  SeriesId: "series-1",
  SeriesName: "Night Shift",
  ParentIndexNumber: 2,
  IndexNumber: 3,
};

// ---------------------------------------------------------------------------
// Episodes
// ---------------------------------------------------------------------------

describe("ArtworkResolver episodes", () => {
  it("uses the season poster and links the series, season and episode", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);

    const artwork = await resolver.resolve("Episode", episode, server);

    expect(server.getItem).toHaveBeenCalledWith("series-1");
    expect(tmdb.seasonPoster).toHaveBeenCalledWith("1399", 2);
    expect(artwork).toEqual({
      largeImage: SEASON_POSTER,
      detailsUrl: "https://www.themoviedb.org/tv/1399",
      largeUrl: "https://www.themoviedb.org/tv/1399/season/2",
      stateUrl: "https://www.themoviedb.org/tv/1399/season/2/episode/3",
    });
  });

  it("uses the series poster when seasons are turned off", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, { ...OPTIONS, seasonOverSeries: false });

    const artwork = await resolver.resolve("Episode", episode, server);

    expect(artwork.largeImage).toBe(SERIES_POSTER);
    expect(tmdb.seasonPoster).not.toHaveBeenCalled();
  });

  it("searches by series name when the series has no TMDB id", async () => {
    server.getItem = vi.fn(async (): Promise<JellyfinItem> => ({ Id: "series-1", ProviderIds: {} }));
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);

    const artwork = await resolver.resolve("Episode", episode, server);

    expect(tmdb.searchSeriesId).toHaveBeenCalledWith("Night Shift");
    expect(artwork.detailsUrl).toBe("https://www.themoviedb.org/tv/1399");
  });

  it("falls back to the default asset when the series lookup fails", async () => {
    server.getItem = vi.fn(async (): Promise<JellyfinItem> => {
      throw new Error("HTTP 500");
    });
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);

    expect(await resolver.resolve("Episode", episode, server)).toEqual({ largeImage: "large_image" });
  });
});

// ---------------------------------------------------------------------------
// Movies
// ---------------------------------------------------------------------------

describe("ArtworkResolver movies", () => {
  it("uses the TheMovieDb provider id", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-1", Type: "Movie", Name: "Harbor Lights", ProviderIds: { TheMovieDb: "77" } };

    const artwork = await resolver.resolve("Movie", item, server);

    expect(tmdb.moviePoster).toHaveBeenCalledWith("77");
    expect(tmdb.searchMovieId).not.toHaveBeenCalled();
    expect(artwork).toEqual({
      largeImage: MOVIE_POSTER,
      detailsUrl: "https://www.themoviedb.org/movie/77",
      largeUrl: "https://www.themoviedb.org/movie/77",
    });
  });

  it("searches by title without a provider id", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);

    const artwork = await resolver.resolve("Movie", { Id: "m-1", Type: "Movie", Name: "Harbor Lights" }, server);

    expect(tmdb.searchMovieId).toHaveBeenCalledWith("Harbor Lights");
    expect(artwork.detailsUrl).toBe("https://www.themoviedb.org/movie/603");
  });

  it("skips the search when best matches are turned off", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, { ...OPTIONS, findBestMatch: false });

    const artwork = await resolver.resolve("Movie", { Id: "m-1", Type: "Movie", Name: "Harbor Lights" }, server);

    expect(tmdb.searchMovieId).not.toHaveBeenCalled();
    expect(artwork).toEqual({ largeImage: "large_image" });
  });

  it("uses the default asset without a TMDB key", async () => {
    const resolver = new ArtworkResolver({ tmdb: null, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-1", Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    expect(await resolver.resolve("Movie", item, server)).toEqual({ largeImage: "large_image" });
  });
});

// ---------------------------------------------------------------------------
// Music
// ---------------------------------------------------------------------------

describe("ArtworkResolver music", () => {
  const track: JellyfinItem = {
    Id: "t-1",
    Type: "Audio",
    Name: "Static",
    Album: "Signals",
    AlbumArtist: "Ana",
    ProviderIds: { MusicBrainzReleaseGroup: "rg-1", MusicBrainzAlbum: "rel-1", MusicBrainzTrack: "trk-1" },
  };

  it("prefers the release cover and links track, group and release", async () => {
    const resolver = new ArtworkResolver({ tmdb: null, musicBrainz }, OPTIONS);

    const artwork = await resolver.resolve("Audio", track, server);

    expect(musicBrainz.releaseCover).toHaveBeenCalledWith("rg-1", "rel-1");
    expect(artwork).toEqual({
      largeImage: COVER,
      detailsUrl: "https://musicbrainz.org/track/trk-1",
      stateUrl: "https://musicbrainz.org/release-group/rg-1",
      largeUrl: "https://musicbrainz.org/release/rel-1",
    });
  });

  it("uses the release group when releases are turned off", async () => {
    const resolver = new ArtworkResolver({ tmdb: null, musicBrainz }, { ...OPTIONS, releaseOverGroup: false });

    const artwork = await resolver.resolve("Audio", track, server);

    expect(musicBrainz.releaseCover).toHaveBeenCalledWith("rg-1", undefined);
    expect(artwork.largeUrl).toBe("https://musicbrainz.org/release-group/rg-1");
  });

  it("searches by album artist and album without MusicBrainz ids", async () => {
    const resolver = new ArtworkResolver({ tmdb: null, musicBrainz }, OPTIONS);

    const artwork = await resolver.resolve("Audio", { ...track, ProviderIds: undefined }, server);

    expect(musicBrainz.searchReleaseGroup).toHaveBeenCalledWith("Ana", "Signals");
    expect(artwork.stateUrl).toBe("https://musicbrainz.org/release-group/rg-found");
    expect(artwork.detailsUrl).toBeUndefined();
  });
});

// ---------------------------------------------------------------------------
// Cache
// ---------------------------------------------------------------------------

describe("ArtworkResolver cache", () => {
  it("looks each item up once", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-1", Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    await resolver.resolve("Movie", item, server);
    await resolver.resolve("Movie", item, server);

    expect(tmdb.moviePoster).toHaveBeenCalledTimes(1);
    expect(resolver.cacheSize).toBe(1);
  });

  it("does not cache items without an id", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    await resolver.resolve("Movie", item, server);
    await resolver.resolve("Movie", item, server);

    expect(tmdb.moviePoster).toHaveBeenCalledTimes(2);
    expect(resolver.cacheSize).toBe(0);
  });

  it("evicts the oldest entry past 200 items", async () => {
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    for (let index = 0; index <= 200; index++) {
      await resolver.resolve("Movie", { Id: `m-${index}`, Name: "Film", ProviderIds: { Tmdb: "77" } }, server);
    }
    expect(resolver.cacheSize).toBe(200);

    await resolver.resolve("Movie", { Id: "m-0", Name: "Film", ProviderIds: { Tmdb: "77" } }, server);
    expect(tmdb.moviePoster).toHaveBeenCalledTimes(202);
  });

  it("retries a lookup that fell back after a transient failure", async () => {
    vi.mocked(tmdb.moviePoster)
      .mockResolvedValueOnce({ value: "large_image", transient: true })
      .mockResolvedValueOnce(clean(MOVIE_POSTER));
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-1", Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    expect((await resolver.resolve("Movie", item, server)).largeImage).toBe("large_image");
    expect(resolver.cacheSize).toBe(0);
    expect((await resolver.resolve("Movie", item, server)).largeImage).toBe(MOVIE_POSTER);
    expect(resolver.cacheSize).toBe(1);
  });

  it("caches a poster that is genuinely missing", async () => {
    vi.mocked(tmdb.moviePoster).mockResolvedValue(clean("large_image"));
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-1", Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    await resolver.resolve("Movie", item, server);
    await resolver.resolve("Movie", item, server);

    expect(tmdb.moviePoster).toHaveBeenCalledTimes(1);
  });

  it("does not cache an episode whose series lookup failed on the server", async () => {
    server.getItem = vi
      .fn<(itemId: string) => Promise<JellyfinItem>>()
      .mockRejectedValueOnce(new HttpError(503, "http://jellyfin.local/Items"))
      .mockResolvedValueOnce({ Id: "series-1", ProviderIds: { Tmdb: "1399" } });
    const resolver = new ArtworkResolver({ tmdb, musicBrainz }, OPTIONS);

    expect(await resolver.resolve("Episode", episode, server)).toEqual({ largeImage: "large_image" });
    expect((await resolver.resolve("Episode", episode, server)).largeImage).toBe(SEASON_POSTER);
  });

  it("refetches a poster after a TMDB outage", async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response("{}", { status: 503 }))
      .mockResolvedValueOnce(
        new Response(JSON.stringify({ posters: [{ file_path: "/p.jpg" }] }), {
          status: 200,
          headers: { "Content-Type": "application/json" },
        }),
      );
    vi.stubGlobal("fetch", fetchMock);
    const resolver = new ArtworkResolver({ tmdb: new TmdbClient("test-secret"), musicBrainz }, OPTIONS);
    const item: JellyfinItem = { Id: "m-9", Type: "Movie", Name: "Harbor Lights", ProviderIds: { Tmdb: "77" } };

    expect((await resolver.resolve("Movie", item, server)).largeImage).toBe("large_image");
    expect((await resolver.resolve("Movie", item, server)).largeImage).toBe("https://image.tmdb.org/t/p/w185/p.jpg");
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });
});
