import { createApp } from "./app.js";
import { getQARuntimeSingleton } from "./runtime/qaRuntime.js";
import { logger } from "./utils/logger.js";

const runtime = getQARuntimeSingleton();
runtime.start();

if (!runtime.llmService.isConfigured()) {
  logger.warn({ provider: runtime.models.current().provider }, "No API key configured for the LLM provider");
}

const app = createApp(runtime);
const server = app.listen(runtime.config.PORT, () => {
  logger.info(`Docent backend is running on http://localhost:${runtime.config.PORT}`);
});

const shutdown = (signal: NodeJS.Signals): void => {
  logger.info({ signal }, "Shutting down");
  runtime.stop();
  server.close((error) => {
    if (error) {
      logger.error({ err: error }, "Failed to close HTTP server");
      process.exitCode = 1;
    }
  });
};

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
