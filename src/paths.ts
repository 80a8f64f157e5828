import { copyFileSync, existsSync, mkdirSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { createLogger } from "./logger";

const log = createLogger("PATHS");

export const INI_NAME = "jellyfin_rpc.ini";
export const LOG_NAME = "jellyfin_rpc.log";

export const BUNDLED_INI_PATH = resolve(__dirname, "..", INI_NAME);

export function resolveDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir(),
): string {
  if (platform === "win32") {
    return join(env.APPDATA || join(home, "AppData", "Roaming"), "Jellyfin RPC");
  }
  if (platform === "darwin") {
    return join(home, "Library", "Application Support", "Jellyfin RPC");
  }
  return join(env.XDG_CONFIG_HOME || join(home, ".config"), "jellyfin-rpc");
}

export interface DataFiles {
  dataDir: string;
  iniPath: string;
  logPath: string;
}

/**
 * Makes sure the data directory holds an INI file. An INI left in the working
 * directory by an older install is migrated; otherwise the bundled template is
 * copied.
 */
export function ensureDataFiles(
  dataDir: string,
  options: { cwd?: string; templatePath?: string } = {},
): DataFiles {
  mkdirSync(dataDir, { recursive: true });
  const iniPath = join(dataDir, INI_NAME);
  const logPath = join(dataDir, LOG_NAME);

  if (!existsSync(iniPath)) {
    const legacyPath = join(options.cwd ?? process.cwd(), INI_NAME);
    if (legacyPath !== iniPath && existsSync(legacyPath)) {
      log.info(`Migrating INI to ${iniPath}`);
      copyFileSync(legacyPath, iniPath);
    } else {
      log.info(`Extracting INI to ${iniPath}`);
      copyFileSync(options.templatePath ?? BUNDLED_INI_PATH, iniPath);
    }
  }

  return { dataDir, iniPath, logPath };
}
