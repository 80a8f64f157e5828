import SysTray, { type ClickEvent } from "systray2";
import { PresenceController } from "./controller";
import { errorMessage } from "./errors";
import { addLogListener, configureLogging, createLogger, summarizeRecord } from "./logger";
import { ensureDataFiles, resolveDataDir } from "./paths";

const log = createLogger("TRAY");

type TrayItem = ClickEvent["item"];

// Music note (44x44 PNG, template style so macOS tints it for light/dark mode)
const TRAY_ICON = "iVBORw0KGgoAAAANSUhEUgAAACwAAAAsCAYAAAAehFoBAAAAAXNSR0IArs4c6QAAAHhlWElmTU0AKgAAAAgABAEaAAUAAAABAAAAPgEbAAUAAAABAAAARgEoAAMAAAABAAIAAIdpAAQAAAABAAAATgAAAAAAAACQAAAAAQAAAJAAAAABAAOgAQADAAAAAQABAACgAgAEAAAAAQAAACygAwAEAAAAAQAAACwAAAAALuNfAgAAAAlwSFlzAAAWJQAAFiUBSVIk8AAAASVJREFUWAnt1uEKgzAMBGAde/9X3jwkEEosF63mCvbHWrXq1zODLsvb3gTmTmC9g//bWvTcdWvR+cy5T2by1blHC8k89/KKo5cxsLNpP5qwXxyzKD/fxmUJGwB9Ju2yhD04k7YEGHgWLVESPm2MeyUik7BH99KWTNjj27QlE/bgNm15sMdjLA+eriSmS7gU3H7eFtMeR/Mfr2Eg0Foce/w42GA7Ow8vA3u4jZm+HAxklPZR2UiALdkIbteslwIb6ihdXJcEGzzqpwN/o1Uw59pdFHPPiDlpcBXUFpsqiWos0DRYAUuDVbAUWAlLgTFJqdE1rIJ+wXd/CWrnP+KP19vQZBZJgfHAK+hRWDho8Fn0SGwanEWPxp4C4ya0XoncAd3fOuHvH08dWFF9sJxuAAAAAElFTkSuQmCC";

const STATUS_MAX_LENGTH = 60;

async function main() {
  const { iniPath, logPath } = ensureDataFiles(resolveDataDir());

  const presence = new PresenceController({
    iniPath,
    onRunningChange: (running) => {
      void setTitle(toggleItem, running ? "Disconnect" : "Connect");
    },
  });
  const startupConfig = presence.load();
  configureLogging({ level: startupConfig?.logLevel ?? "INFO", logPath });

  const statusItem: TrayItem = {
    title: "Disconnected",
    tooltip: "Status",
    checked: false,
    enabled: false,
  };
  const toggleItem: TrayItem = {
    title: "Connect",
    tooltip: "Start or stop presence updates",
    checked: false,
    enabled: true,
  };
  const launchItem: TrayItem = {
    title: "Connect on Launch",
    tooltip: "Start presence updates when the tray starts",
    checked: presence.connectOnLaunch,
    enabled: true,
  };
  const configItem: TrayItem = {
    title: `Settings: ${iniPath}`,
    tooltip: "Edit this file, then reconnect",
    checked: false,
    enabled: false,
  };
  const quitItem: TrayItem = {
    title: "Quit",
    tooltip: "Exit the application",
    checked: false,
    enabled: true,
  };
  const items: TrayItem[] = [
    statusItem,
    SysTray.separator,
    toggleItem,
    launchItem,
    configItem,
    SysTray.separator,
    quitItem,
  ];

  const systray = new SysTray({
    menu: {
      icon: TRAY_ICON,
      isTemplateIcon: true,
      title: "",
      tooltip: "Jellyfin Discord Presence",
      items,
    },
    debug: false,
    copyDir: true,
  });

  const refresh = async (item: TrayItem): Promise<void> => {
    try {
      await systray.sendAction({ type: "update-item", item, seq_id: items.indexOf(item) });
    } catch (error) {
      log.debug(error);
    }
  };

  const setTitle = (item: TrayItem, title: string): Promise<void> => {
    item.title = title;
    return refresh(item);
  };

  const toggleLaunch = async () => {
    launchItem.checked = presence.toggleConnectOnLaunch();
    await refresh(launchItem);
  };

  addLogListener((record) => {
    if (record.level === "DEBUG") return;
    void setTitle(statusItem, summarizeRecord(record, STATUS_MAX_LENGTH));
  });

  const quit = async () => {
    await presence.disconnect();
    await systray.kill(false);
    process.exit(0);
  };

  const handleClick = async (action: ClickEvent) => {
    if (action.item.title === quitItem.title) {
      await quit();
    } else if (action.item.title === launchItem.title) {
      await toggleLaunch();
    } else if (action.item.title === "Connect") {
      await presence.connect();
    } else if (action.item.title === "Disconnect") {
      await presence.disconnect();
    }
  };

  await systray.onClick((action: ClickEvent) => {
    handleClick(action).catch((error: unknown) => log.error(errorMessage(error)));
  });

  await systray.ready();
  log.info("System Tray Ready");

  await presence.launch();

  const shutdown = () => {
    quit().catch((error: unknown) => {
      log.error(errorMessage(error));
      process.exit(1);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  log.error(errorMessage(error));
  process.exit(1);
});
