import { LARGE_IMAGE_ASSET } from "./constants";
import { isTransient, MissingFieldError } from "./errors";
import { getJson, type Lookup } from "./http";
import { createLogger } from "./logger";

const log = createLogger("RPC");

const MUSICBRAINZ_API_BASE_URL = "https://musicbrainz.org/ws/2";
const COVER_ART_ARCHIVE_BASE_URL = "https://coverartarchive.org";
export const MUSICBRAINZ_SITE_URL = "https://musicbrainz.org";

interface ReleaseGroupSearchResult {
  count?: number;
  "release-groups"?: Array<{ id?: string; title?: string; score?: number }>;
}

interface CoverArtResult {
  images?: Array<{ image?: string; front?: boolean }>;
}

// Lucene phrase queries break on unescaped quotes
function quote(value: string): string {
  return `"${value.replace(/(["\\])/g, "\\$1")}"`;
}

export function releaseGroupQuery(artist: string, album: string): string {
  return `artist:${quote(artist)} AND releasegroup:${quote(album)}`;
}

export class MusicBrainzClient {
  public async searchReleaseGroup(artist: string, album: string): Promise<Lookup<string | null>> {
    try {
      const data = await getJson<ReleaseGroupSearchResult>(`${MUSICBRAINZ_API_BASE_URL}/release-group`, {
        query: { query: releaseGroupQuery(artist, album), fmt: "json" },
      });
      const id = data["release-groups"]?.[0]?.id;
      if (!id) {
        throw new MissingFieldError("release-groups[0].id");
      }
      return { value: id, transient: false };
    } catch (error) {
      log.debug(error);
      log.warn("MusicBrainz API Connection Failed. Skipping...");
      return { value: null, transient: isTransient(error) };
    }
  }

  private async coverUrl(path: string): Promise<string> {
    const data = await getJson<CoverArtResult>(`${COVER_ART_ARCHIVE_BASE_URL}${path}`);
    const image = data.images?.[0]?.image;
    if (!image) {
      throw new MissingFieldError("images[0].image");
    }
    return image;
  }

  public async releaseGroupCover(groupId: string): Promise<Lookup<string>> {
    try {
      return { value: await this.coverUrl(`/release-group/${groupId}`), transient: false };
    } catch (error) {
      log.debug(error);
      log.warn("No Cover Art Available on MusicBrainz. Skipping...");
      return { value: LARGE_IMAGE_ASSET, transient: isTransient(error) };
    }
  }

  /** Release cover, or the release group cover when the release has none. */
  public async releaseCover(groupId: string, releaseId?: string): Promise<Lookup<string>> {
    if (!releaseId) {
      return this.releaseGroupCover(groupId);
    }
    try {
      return { value: await this.coverUrl(`/release/${releaseId}`), transient: false };
    } catch (error) {
      log.debug(error);
      const group = await this.releaseGroupCover(groupId);
      return { value: group.value, transient: group.transient || isTransient(error) };
    }
  }
}
