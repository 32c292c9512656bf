import "dotenv/config";
import { buildLivePipeline } from "./bootstrap.js";
import { loadConfig } from "./config.js";
import { createApp } from "./http/app.js";
import { logger } from "./logger.js";
import { QueryService } from "./service.js";
import { configureLangfuse, tracingConfig } from "./tracing.js";

async function startServer() {
  const config = loadConfig();
  const tracing = configureLangfuse(config);
  const pipeline = await buildLivePipeline(config);
  const app = createApp(new QueryService(pipeline, tracingConfig(tracing, "http")));

  const server = app.listen(config.port, () => {
    logger.info(`Server running on http://localhost:${config.port}`);
  });

  const shutdown = () => {
    server.close(() => {
      tracing
        .shutdown()
        .catch((error) => logger.error("Failed to flush traces", error))
        .finally(() => process.exit(0));
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

startServer().catch((error) => {
  logger.fatal("Failed to start server", error);
  process.exitCode = 1;
});
