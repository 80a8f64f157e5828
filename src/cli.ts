import { Command, InvalidArgumentError } from "commander";
import { createPresenceApp, runPresence } from "./app";
import { loadConfig, type RpcConfig } from "./config";
import { APP_NAME, APP_VERSION } from "./constants";
import { ConfigError, UserNotFoundError } from "./errors";
import { configureLogging, createLogger } from "./logger";

const log = createLogger("RPC");

export interface CliOptions {
  iniPath: string;
  logPath?: string;
  refreshRate?: number;
  test?: boolean;
}

function parseSeconds(value: string): number {
  const seconds = Number.parseInt(value, 10);
  if (!Number.isInteger(seconds) || seconds < 1) {
    throw new InvalidArgumentError("Expected a whole number of seconds, at least 1.");
  }
  return seconds;
}

export function createProgram(): Command {
  return new Command()
    .name(APP_NAME)
    .description("Mirror Jellyfin playback into Discord Rich Presence")
    .version(APP_VERSION)
    .requiredOption("--ini-path <path>", "INI configuration file")
    .option("--log-path <path>", "also append log output to this file")
    .option("--refresh-rate <seconds>", "poll interval, overrides REFRESH_RATE", parseSeconds)
    .option("--test", "poll Jellyfin and print the presence instead of sending it to Discord");
}

export function resolveConfig(options: CliOptions): RpcConfig {
  const config = loadConfig(options.iniPath);
  return options.refreshRate === undefined ? config : { ...config, refreshRate: options.refreshRate };
}

export async function runCli(argv: string[] = process.argv): Promise<number> {
  const program = createProgram();
  program.parse(argv);
  const options = program.opts<CliOptions>();

  let config: RpcConfig;
  try {
    config = resolveConfig(options);
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  }

  configureLogging({ level: config.logLevel, logPath: options.logPath ?? null });
  log.info(`${APP_NAME} ${APP_VERSION}`);

  const app = createPresenceApp(config, { dryRun: options.test });
  const controller = new AbortController();
  const shutdown = () => {
    log.info("Shutting down...");
    controller.abort();
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  try {
    await runPresence(app, controller.signal);
  } catch (error) {
    if (error instanceof UserNotFoundError || error instanceof ConfigError) {
      log.error(error.message);
      return 1;
    }
    throw error;
  } finally {
    process.off("SIGINT", shutdown);
    process.off("SIGTERM", shutdown);
  }
  return 0;
}
