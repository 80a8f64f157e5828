// Discord application owning the "large_image" and "small_image" art assets
export const DEFAULT_DISCORD_CLIENT_ID = "1238889120672120853";

export const LARGE_IMAGE_ASSET = "large_image";
export const SMALL_IMAGE_ASSET = "small_image";

// Jellyfin reports positions and runtimes in 100ns ticks
export const TICKS_PER_MILLISECOND = 10_000;

// Discord rejects activity strings outside 2..128 characters
export const ACTIVITY_TEXT_MIN_LENGTH = 2;
export const ACTIVITY_TEXT_MAX_LENGTH = 128;

export const APP_NAME = "jellyfin-discord-presence";
export const APP_URL = "https://github.com/jellyfin-discord-presence/jellyfin-discord-presence";
export const APP_VERSION = process.env.npm_package_version || "1.0.0";
