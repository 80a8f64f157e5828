import { ArtworkResolver } from "./artwork";
import type { RpcConfig } from "./config";
import { DiscordPresence, DryRunPresence, type PresenceSink } from "./discord";
import JellyfinClient from "./jellyfin";
import { MusicBrainzClient } from "./musicbrainz";
import { RichPresenceService } from "./rpc";
import { TmdbClient } from "./tmdb";

export interface PresenceAppOptions {
  /** Print presence updates instead of sending them to Discord. */
  dryRun?: boolean;
}

export interface PresenceApp {
  service: RichPresenceService;
  sink: PresenceSink;
  tmdb: TmdbClient | null;
}

export function createPresenceApp(config: RpcConfig, options: PresenceAppOptions = {}): PresenceApp {
  const sink: PresenceSink = options.dryRun ? new DryRunPresence() : new DiscordPresence(config.discordClientId);
  const tmdb = config.tmdbApiKey ? new TmdbClient(config.tmdbApiKey, config.posterLanguages) : null;
  const artwork = new ArtworkResolver({ tmdb, musicBrainz: new MusicBrainzClient() }, config);

  const service = new RichPresenceService({
    config,
    sink,
    artwork,
    connectServer: () =>
      new JellyfinClient(config.jellyfinHost, config.jellyfinApiKey, config.jellyfinUsername).connect({
        showServerName: config.showServerName,
      }),
  });

  return { service, sink, tmdb };
}

/**
 * Runs the presence loop until `signal` aborts, then clears the activity.
 * A failed TMDB key check is only reported.
 */
export async function runPresence(app: PresenceApp, signal: AbortSignal): Promise<void> {
  if (app.tmdb) {
    await app.tmdb.checkConnection();
  }
  try {
    await app.service.run(signal);
  } finally {
    await app.service.stop();
  }
}
