#!/usr/bin/env node
import { config } from "dotenv";
config();

import { Bridge } from "./bridge";
import { loggers, logError } from "./config/logger";
import { resolveConfigPaths, statusPortFromEnv } from "./config/settings";
import { setupGlobalErrorHandlers } from "./middleware/errorHandler";

async function main(): Promise<number> {
  const bridge = new Bridge(resolveConfigPaths(), {}, { statusPort: statusPortFromEnv() });

  // SIGINT/SIGTERM end the receive loop; run() then resolves with 0
  setupGlobalErrorHandlers(() => bridge.stop());

  return bridge.run();
}

// Start the bridge if this file is run directly
if (require.main === module) {
  main()
    .then((exitCode) => process.exit(exitCode))
    .catch((error: unknown) => {
      logError(error, {}, loggers.system, "Failed to start bridge");
      process.exit(1);
    });
}

export { Bridge };
