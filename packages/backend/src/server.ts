import { createApp } from "./app.js";
import { appConfig } from "./config.js";
import { closeRuntime } from "./runtime/docentRuntime.js";
import { logger } from "./utils/logger.js";

const app = createApp();

const server = app.listen(appConfig.PORT, () => {
  logger.info(`Docent backend is running on http://localhost:${appConfig.PORT}`);
});

function shutdown(signal: NodeJS.Signals): void {
  logger.info({ signal }, "Shutting down");
  server.close((error) => {
    closeRuntime();
    if (error) {
      logger.error({ err: error }, "HTTP server did not close cleanly");
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
