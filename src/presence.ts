import type { MediaType } from "./config";
import {
  ACTIVITY_TEXT_MAX_LENGTH,
  ACTIVITY_TEXT_MIN_LENGTH,
  SMALL_IMAGE_ASSET,
  TICKS_PER_MILLISECOND,
} from "./constants";
import { MissingFieldError } from "./errors";
import type { JellyfinItem, JellyfinSession } from "./jellyfin";

export type PresenceKind = "watching" | "listening";
export type SupportedItemType = "Episode" | "Movie" | "Audio";

export interface PresenceOptions {
  mediaTypes: MediaType[];
  showWhenPaused: boolean;
}

export interface MappedPresence {
  kind: PresenceKind;
  itemType: SupportedItemType;
  item: JellyfinItem;
  /** Identifies what is playing; a new value means a new activity. */
  activity: string;
  details: string;
  state?: string;
  largeText?: string;
  paused: boolean;
  startTimestamp: number;
  endTimestamp?: number;
}

export type MapResult =
  | { status: "active"; presence: MappedPresence }
  | { status: "idle" }
  | { status: "hidden" }
  | { status: "filtered"; itemType: SupportedItemType }
  | { status: "unsupported"; itemType: string }
  | { status: "missing-field"; field: string };

export interface Artwork {
  largeImage: string;
  largeUrl?: string;
  detailsUrl?: string;
  stateUrl?: string;
}

export interface DisplayOptions {
  serverName: string | null;
  showJellyfinIcon: boolean;
}

/** Everything Discord needs to render one activity. */
export interface PresencePayload {
  kind: PresenceKind;
  name?: string;
  details: string;
  detailsUrl?: string;
  state?: string;
  stateUrl?: string;
  largeImage: string;
  largeUrl?: string;
  largeText?: string;
  smallImage?: string;
  startTimestamp: number;
  endTimestamp?: number;
}

const MEDIA_TYPE_BY_ITEM: Record<SupportedItemType, MediaType> = {
  Episode: "Shows",
  Movie: "Movies",
  Audio: "Music",
};

function isSupported(type: string): type is SupportedItemType {
  return Object.hasOwn(MEDIA_TYPE_BY_ITEM, type);
}

export function fitActivityText(text: string): string {
  let result = text;
  // e.g. a single CJK character
  if (result.length < ACTIVITY_TEXT_MIN_LENGTH) result = `${result} `;
  if (result.length > ACTIVITY_TEXT_MAX_LENGTH) result = result.substring(0, ACTIVITY_TEXT_MAX_LENGTH);
  return result;
}

export function formatEpisodeCode(season: number, episode: number): string {
  return `S${season}:E${episode}`;
}

function field<T>(value: T | undefined | null, name: string): T {
  if (value === undefined || value === null) {
    throw new MissingFieldError(name);
  }
  return value;
}

interface Describe {
  kind: PresenceKind;
  activity: string;
  details: string;
  state?: string;
  largeText?: string;
}

function describe(itemType: SupportedItemType, item: JellyfinItem): Describe {
  switch (itemType) {
    case "Episode": {
      const season = field(item.ParentIndexNumber, "ParentIndexNumber");
      const episode = field(item.IndexNumber, "IndexNumber");
      const series = field(item.SeriesName, "SeriesName");
      const code = formatEpisodeCode(season, episode);
      return {
        kind: "watching",
        activity: `${series} ${code}`,
        details: series,
        state: `${code} - ${field(item.Name, "Name")}`,
        largeText: series,
      };
    }
    case "Movie": {
      const name = field(item.Name, "Name");
      return { kind: "watching", activity: name, details: name, largeText: name };
    }
    case "Audio": {
      const name = field(item.Name, "Name");
      const artists = item.Artists && item.Artists.length > 0 ? item.Artists.join(", ") : undefined;
      let state: string | undefined;
      if (artists !== undefined) {
        state = item.Album ? `${artists} - ${item.Album}` : artists;
      } else if (item.Album) {
        state = item.Album;
      }
      const by = state?.split(" - ")[0];
      return {
        kind: "listening",
        activity: by !== undefined ? `${name} by ${by}` : name,
        details: name,
        state,
        largeText: item.Album,
      };
    }
  }
}

/**
 * Timestamps in epoch milliseconds. While paused, or without a position or
 * runtime, the activity shows time since `now` and no end.
 */
export function playbackTimestamps(
  session: JellyfinSession,
  item: JellyfinItem,
  paused: boolean,
  now: number,
): { startTimestamp: number; endTimestamp?: number } {
  const position = session.PlayState?.PositionTicks;
  const runtime = item.RunTimeTicks;
  if (paused || position === undefined || runtime === undefined) {
    return { startTimestamp: now };
  }
  const startTimestamp = now - position / TICKS_PER_MILLISECOND;
  return { startTimestamp, endTimestamp: startTimestamp + runtime / TICKS_PER_MILLISECOND };
}

export function mapSession(session: JellyfinSession | null, options: PresenceOptions, now: number): MapResult {
  const item = session?.NowPlayingItem;
  if (!session || !item) {
    return { status: "idle" };
  }

  const paused = session.PlayState?.IsPaused ?? false;
  if (paused && !options.showWhenPaused) {
    return { status: "hidden" };
  }

  if (item.Type === undefined) {
    return { status: "missing-field", field: "Type" };
  }
  const itemType = item.Type;
  if (!isSupported(itemType)) {
    return { status: "unsupported", itemType };
  }
  if (!options.mediaTypes.includes(MEDIA_TYPE_BY_ITEM[itemType])) {
    return { status: "filtered", itemType };
  }

  let described: Describe;
  try {
    described = describe(itemType, item);
  } catch (error) {
    if (error instanceof MissingFieldError) {
      return { status: "missing-field", field: error.field };
    }
    throw error;
  }

  return {
    status: "active",
    presence: {
      ...described,
      details: fitActivityText(described.details),
      state: described.state === undefined ? undefined : fitActivityText(described.state),
      itemType,
      item,
      paused,
      ...playbackTimestamps(session, item, paused, now),
    },
  };
}

export function buildPayload(presence: MappedPresence, artwork: Artwork, display: DisplayOptions): PresencePayload {
  return {
    kind: presence.kind,
    name: display.serverName ?? undefined,
    details: presence.details,
    detailsUrl: artwork.detailsUrl,
    state: presence.state,
    stateUrl: artwork.stateUrl,
    largeImage: artwork.largeImage,
    largeUrl: artwork.largeUrl,
    largeText: presence.largeText === undefined ? undefined : fitActivityText(presence.largeText),
    smallImage: display.showJellyfinIcon ? SMALL_IMAGE_ASSET : undefined,
    startTimestamp: presence.startTimestamp,
    endTimestamp: presence.endTimestamp,
  };
}
