import { Client, StatusDisplayType } from "@xhayper/discord-rpc";
import { ActivityType } from "discord-api-types/v10";
import { createLogger } from "./logger";
import type { PresencePayload } from "./presence";

const log = createLogger("RPC");

/** Where presence updates go. */
export interface PresenceSink {
  readonly connected: boolean;
  connect(): Promise<void>;
  update(payload: PresencePayload): Promise<void>;
  clear(): Promise<void>;
  destroy(): Promise<void>;
}

export function toActivity(payload: PresencePayload) {
  return {
    name: payload.name,
    type: payload.kind === "listening" ? ActivityType.Listening : ActivityType.Watching,
    // Status line shows the details instead of the app name
    statusDisplayType: StatusDisplayType.DETAILS,
    details: payload.details,
    detailsUrl: payload.detailsUrl,
    state: payload.state,
    stateUrl: payload.stateUrl,
    startTimestamp: new Date(payload.startTimestamp),
    endTimestamp: payload.endTimestamp !== undefined ? new Date(payload.endTimestamp) : undefined,
    largeImageKey: payload.largeImage,
    largeImageText: payload.largeText,
    largeImageUrl: payload.largeUrl,
    smallImageKey: payload.smallImage,
    smallImageText: payload.smallImage ? "Jellyfin" : undefined,
  };
}

export class DiscordPresence implements PresenceSink {
  private client: Client | null = null;
  private isConnected = false;

  constructor(private readonly clientId: string) {}

  public get connected(): boolean {
    return this.isConnected;
  }

  public async connect(): Promise<void> {
    await this.destroy();

    const rpc = new Client({ clientId: this.clientId });
    rpc.on("ready", () => {
      log.debug(`Discord user: ${rpc.user?.username}`);
      this.isConnected = true;
    });
    rpc.on("disconnected", () => {
      if (this.client === rpc) {
        log.warn("Disconnected from Discord Client");
        this.isConnected = false;
      }
    });

    this.client = rpc;
    await rpc.login();
    this.isConnected = true;
    log.info("Connected to Discord Client");
  }

  public async update(payload: PresencePayload): Promise<void> {
    const activity = toActivity(payload);
    await this.client?.user?.setActivity(activity);
  }

  public async clear(): Promise<void> {
    await this.client?.user?.clearActivity();
  }

  public async destroy(): Promise<void> {
    const rpc = this.client;
    this.client = null;
    this.isConnected = false;
    if (!rpc) return;

    try {
      await rpc.destroy();
    } catch (error) {
      log.debug(error);
    }
  }
}

/** Logs what would be sent instead of talking to Discord. */
export class DryRunPresence implements PresenceSink {
  private isConnected = false;

  public get connected(): boolean {
    return this.isConnected;
  }

  public async connect(): Promise<void> {
    this.isConnected = true;
    log.info("Test mode: Discord updates are printed, not sent");
  }

  public async update(payload: PresencePayload): Promise<void> {
    log.info(`Presence ${JSON.stringify(toActivity(payload))}`);
  }

  public async clear(): Promise<void> {
    log.info("Presence cleared");
  }

  public async destroy(): Promise<void> {
    this.isConnected = false;
  }
}
