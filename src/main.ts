// Bridge process entry point: configuration from the environment, then the
// TCP and HTTP servers until SIGINT/SIGTERM.

import { startBridge } from "./bridge.ts";
import { type BridgeConfig, loadConfig } from "./config.ts";
import { ConfigError, toError } from "./errors.ts";
import { createLogger } from "./logger.ts";

async function main(): Promise<void> {
  let config: BridgeConfig;
  try {
    config = loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      process.exitCode = 1;
      return;
    }
    throw error;
  }

  const logger = createLogger("bridge", { level: config.logLevel });
  const bridge = await startBridge(config, { logger });

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down", { signal });
    bridge.stop().then(
      () => {
        process.exitCode = 0;
      },
      (error: unknown) => {
        logger.error("Shutdown failed", { error: toError(error).message });
        process.exitCode = 1;
      },
    );
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((error: unknown) => {
  console.error("Fatal:", toError(error).message);
  process.exit(1);
});
