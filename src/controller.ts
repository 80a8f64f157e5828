import { createPresenceApp, runPresence } from "./app";
import { loadConfig, saveConfig, type IniValue, type RpcConfig } from "./config";
import { errorMessage } from "./errors";
import { configureLogging, createLogger } from "./logger";

const log = createLogger("TRAY");

export interface PresenceControllerDeps {
  iniPath: string;
  /** Runs the presence loop for `config` until `signal` aborts. */
  runPresence?: (config: RpcConfig, signal: AbortSignal) => Promise<void>;
  saveConfig?: (iniPath: string, changes: Record<string, IniValue>) => void;
  loadConfig?: (iniPath: string) => RpcConfig;
  /** Called with `true` when the loop starts and `false` once it has stopped. */
  onRunningChange?: (running: boolean) => void;
}

/**
 * Starts and stops the presence loop on behalf of the tray menu. Every
 * connect re-reads the INI file, so edits made while disconnected apply.
 */
export class PresenceController {
  private controller: AbortController | null = null;
  private running: Promise<void> | null = null;
  private launchEnabled = true;

  private readonly runPresence: (config: RpcConfig, signal: AbortSignal) => Promise<void>;
  private readonly saveConfig: (iniPath: string, changes: Record<string, IniValue>) => void;
  private readonly loadConfig: (iniPath: string) => RpcConfig;

  constructor(private readonly deps: PresenceControllerDeps) {
    this.runPresence = deps.runPresence ?? ((config, signal) => runPresence(createPresenceApp(config), signal));
    this.saveConfig = deps.saveConfig ?? saveConfig;
    this.loadConfig = deps.loadConfig ?? loadConfig;
  }

  public get connected(): boolean {
    return this.controller !== null;
  }

  public get connectOnLaunch(): boolean {
    return this.launchEnabled;
  }

  /** Reads the INI file; a broken one is logged and gives `null`. */
  public load(): RpcConfig | null {
    try {
      const config = this.loadConfig(this.deps.iniPath);
      this.launchEnabled = config.connectOnLaunch;
      return config;
    } catch (error) {
      log.error(errorMessage(error));
      return null;
    }
  }

  /** Connects right away when the settings are complete and the launch toggle is on. */
  public async launch(): Promise<void> {
    const config = this.load();
    if (config?.connectOnLaunch) {
      await this.connect(config);
    }
  }

  public async connect(loaded?: RpcConfig): Promise<boolean> {
    if (this.controller) return true;

    const config = loaded ?? this.load();
    if (!config) return false;
    configureLogging({ level: config.logLevel });

    const current = new AbortController();
    this.controller = current;
    this.running = this.runPresence(config, current.signal)
      .catch((error: unknown) => {
        log.error(`RPC Crashed: ${errorMessage(error)}`);
        log.debug(error);
      })
      .finally(() => {
        if (this.controller === current) {
          this.controller = null;
          this.running = null;
        }
        this.deps.onRunningChange?.(false);
      });
    this.deps.onRunningChange?.(true);
    return true;
  }

  public async disconnect(): Promise<void> {
    if (!this.controller) return;
    this.controller.abort();
    await this.running;
    log.info("RPC Stopped");
  }

  /** Resolves once the current loop, if any, has stopped on its own or been aborted. */
  public async settled(): Promise<void> {
    await this.running;
  }

  /** Flips the launch toggle, writes it to the INI file and returns the new value. */
  public toggleConnectOnLaunch(): boolean {
    const enabled = !this.launchEnabled;
    this.saveConfig(this.deps.iniPath, { CONNECT_ON_LAUNCH: enabled });
    this.launchEnabled = enabled;
    return enabled;
  }
}
