import { setTimeout as delay } from "node:timers/promises";
import type { ArtworkResolver } from "./artwork";
import type { RpcConfig } from "./config";
import type { PresenceSink } from "./discord";
import { ConfigError, UserNotFoundError } from "./errors";
import { findSession, type JellyfinSession, type MediaServer } from "./jellyfin";
import { createLogger } from "./logger";
import { buildPayload, mapSession, type MappedPresence } from "./presence";

const log = createLogger("RPC");

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves early, without throwing, when the signal aborts. */
export const sleep: Sleep = async (ms, signal) => {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) return;
    throw error;
  }
};

export type ServiceConfig = Pick<
  RpcConfig,
  "jellyfinUsername" | "mediaTypes" | "showWhenPaused" | "showJellyfinIcon" | "refreshRate"
>;

export interface RichPresenceDeps {
  config: ServiceConfig;
  connectServer: () => Promise<MediaServer>;
  sink: PresenceSink;
  artwork: ArtworkResolver;
  now?: () => number;
  sleep?: Sleep;
}

function isFatal(error: unknown): boolean {
  return error instanceof ConfigError || error instanceof UserNotFoundError;
}

/**
 * Polls the media server and mirrors the user's playback into the presence
 * sink. Discord is only written to when the activity or its paused state
 * changes.
 */
export class RichPresenceService {
  private server: MediaServer | null = null;
  private previousActivity: string | null = null;
  private previousPaused = false;
  private previousWarning = false;
  private readonly warnedTypes = new Set<string>();

  private readonly now: () => number;
  private readonly sleep: Sleep;

  constructor(private readonly deps: RichPresenceDeps) {
    this.now = deps.now ?? Date.now;
    this.sleep = deps.sleep ?? sleep;
  }

  public get currentActivity(): string | null {
    return this.previousActivity;
  }

  private get refreshMs(): number {
    return this.deps.config.refreshRate * 1000;
  }

  private async ensureDiscord(signal?: AbortSignal): Promise<boolean> {
    let initialAttempt = true;
    while (!this.deps.sink.connected) {
      if (signal?.aborted) return false;
      try {
        await this.deps.sink.connect();
        // A fresh connection shows nothing until the next push
        this.previousActivity = null;
        this.previousPaused = false;
      } catch (error) {
        if (initialAttempt) {
          log.debug(error);
          log.error("Discord Client Connection Failed. Retrying...");
        }
        initialAttempt = false;
        await this.sleep(this.refreshMs, signal);
      }
    }
    return true;
  }

  private async ensureServer(signal?: AbortSignal): Promise<MediaServer | null> {
    let initialAttempt = true;
    while (!this.server) {
      if (signal?.aborted) return null;
      try {
        this.server = await this.deps.connectServer();
      } catch (error) {
        if (isFatal(error)) throw error;
        if (initialAttempt) {
          log.debug(error);
          log.error("Jellyfin API Connection Failed. Retrying...");
        }
        initialAttempt = false;
        await this.sleep(this.refreshMs, signal);
      }
    }
    return this.server;
  }

  private async dropDiscord(error: unknown): Promise<void> {
    log.debug(error);
    await this.deps.sink.destroy();
  }

  private async clearActivity(): Promise<void> {
    if (this.previousActivity === null) return;
    try {
      await this.deps.sink.clear();
    } catch (error) {
      await this.dropDiscord(error);
      return;
    }
    log.info("Activity Cleared");
    this.previousActivity = null;
    this.previousPaused = false;
  }

  private async pushActivity(server: MediaServer, presence: MappedPresence): Promise<void> {
    if (presence.activity === this.previousActivity && presence.paused === this.previousPaused) {
      return;
    }

    const artwork = await this.deps.artwork.resolve(presence.itemType, presence.item, server);
    const payload = buildPayload(presence, artwork, {
      serverName: server.serverName,
      showJellyfinIcon: this.deps.config.showJellyfinIcon,
    });

    try {
      await this.deps.sink.update(payload);
    } catch (error) {
      await this.dropDiscord(error);
      return;
    }

    if (this.previousActivity !== presence.activity) {
      log.info(`Activity Updated "${presence.activity}"`);
      log.debug(presence.item);
    } else {
      log.debug(`PlayState Changed "${presence.activity}" (${presence.paused ? "Paused" : "Resumed"})`);
    }
    this.previousActivity = presence.activity;
    this.previousPaused = presence.paused;
  }

  /** One poll of the media server and, when needed, one write to the sink. */
  public async tick(signal?: AbortSignal): Promise<void> {
    if (!(await this.ensureDiscord(signal))) return;
    const server = await this.ensureServer(signal);
    if (!server) return;

    let sessions: JellyfinSession[];
    try {
      sessions = await server.getSessions();
    } catch (error) {
      log.debug(error);
      this.server = null;
      return;
    }

    const session = findSession(sessions, this.deps.config.jellyfinUsername);
    const result = mapSession(session, this.deps.config, this.now());

    switch (result.status) {
      case "active":
        this.previousWarning = false;
        await this.pushActivity(server, result.presence);
        break;
      case "missing-field":
        if (!this.previousWarning) {
          log.warn(`Missing Key in Session Data: '${result.field}'. Skipping...`);
          this.previousWarning = true;
        }
        break;
      case "unsupported":
        if (!this.warnedTypes.has(result.itemType)) {
          log.warn(`Unsupported Media Type "${result.itemType}". Ignoring...`);
          this.warnedTypes.add(result.itemType);
        }
        await this.clearActivity();
        break;
      case "filtered":
      case "hidden":
      case "idle":
        await this.clearActivity();
        break;
    }
  }

  public async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.tick(signal);
      await this.sleep(this.refreshMs, signal);
    }
  }

  /** Clears whatever is shown and closes the Discord connection. */
  public async stop(): Promise<void> {
    if (this.deps.sink.connected) {
      await this.clearActivity();
    }
    await this.deps.sink.destroy();
    this.previousActivity = null;
    this.previousPaused = false;
    this.server = null;
  }
}
