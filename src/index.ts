import { runCli } from "./cli";
import { createLogger } from "./logger";

const log = createLogger("RPC");

runCli()
  .then((exitCode) => process.exit(exitCode))
  .catch((error: unknown) => {
    log.error("Unexpected failure. Set LOG_LEVEL = DEBUG and attach the log to a bug report.", error);
    process.exit(1);
  });
