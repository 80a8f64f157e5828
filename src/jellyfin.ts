import { MissingFieldError, UserNotFoundError } from "./errors";
import { getJson } from "./http";
import { createLogger } from "./logger";

const log = createLogger("RPC");

export interface JellyfinProviderIds {
  Tmdb?: string;
  TheMovieDb?: string;
  Imdb?: string;
  MusicBrainzTrack?: string;
  MusicBrainzAlbum?: string;
  MusicBrainzReleaseGroup?: string;
  [provider: string]: string | undefined;
}

export interface JellyfinItem {
  Id?: string;
  Type?: string;
  Name?: string;
  SeriesName?: string;
  SeriesId?: string;
  ParentIndexNumber?: number;
  IndexNumber?: number;
  Artists?: string[];
  Album?: string;
  AlbumArtist?: string;
  RunTimeTicks?: number;
  ProductionYear?: number;
  ProviderIds?: JellyfinProviderIds;
}

export interface JellyfinPlayState {
  IsPaused?: boolean;
  PositionTicks?: number;
}

export interface JellyfinSession {
  Id?: string;
  UserName?: string;
  Client?: string;
  DeviceName?: string;
  NowPlayingItem?: JellyfinItem;
  PlayState?: JellyfinPlayState;
}

export interface JellyfinUser {
  Id: string;
  Name: string;
}

interface JellyfinSystemInfo {
  ServerName?: string;
  Version?: string;
}

interface PagedResult<T> {
  Items?: T[];
  TotalRecordCount?: number;
}

/** What the presence loop needs from a media server. */
export interface MediaServer {
  readonly serverName: string | null;
  getSessions(): Promise<JellyfinSession[]>;
  getItem(itemId: string): Promise<JellyfinItem>;
}

/**
 * Substring match against the user list; when several users match, the last
 * one wins.
 */
export function findUserId(users: JellyfinUser[], username: string): string | null {
  let userId: string | null = null;
  for (const user of users) {
    if (user.Name.includes(username)) {
      userId = user.Id;
    }
  }
  return userId;
}

/**
 * Exact `UserName` match. When the user has several sessions open, the first
 * one that is playing something wins.
 */
export function findSession(sessions: JellyfinSession[], username: string): JellyfinSession | null {
  const owned = sessions.filter((session) => session.UserName === username);
  return owned.find((session) => session.NowPlayingItem) ?? owned[0] ?? null;
}

export default class JellyfinClient implements MediaServer {
  public userId: string | null = null;
  public serverName: string | null = null;

  constructor(
    public serverUrl: string,
    private apiKey: string,
    private username: string,
  ) {
    this.serverUrl = serverUrl.replace(/\/+$/, "");
  }

  private get authHeaders() {
    return {
      "X-Emby-Token": this.apiKey,
    };
  }

  private request<T>(path: string, query?: Record<string, string | undefined>): Promise<T> {
    return getJson<T>(`${this.serverUrl}${path}`, { headers: this.authHeaders, query });
  }

  public async connect(options: { showServerName: boolean }): Promise<this> {
    const users = await this.request<JellyfinUser[]>("/Users");
    const userId = findUserId(users, this.username);
    if (userId === null) {
      throw new UserNotFoundError(this.username);
    }
    this.userId = userId;

    if (options.showServerName) {
      const info = await this.request<JellyfinSystemInfo>("/System/Info");
      this.serverName = info.ServerName ?? null;
    }
    log.info("Connected to Jellyfin API");
    return this;
  }

  public async getSessions(): Promise<JellyfinSession[]> {
    return this.request<JellyfinSession[]>("/Sessions");
  }

  public async getItem(itemId: string): Promise<JellyfinItem> {
    const result = await this.request<PagedResult<JellyfinItem>>("/Items", {
      ids: itemId,
      userId: this.userId ?? undefined,
      fields: "ProviderIds",
    });
    const item = result.Items?.[0];
    if (!item) {
      throw new MissingFieldError("Items");
    }
    return item;
  }
}
