// backend/services/hypepipe/index.ts
import "./src/bootstrap"; // env cascade first
import "./src/log.init";
import { createApp } from "./src/app";
import { buildHypepipe } from "./src/composition";
import { loadConfig, SERVICE_NAME } from "./src/config";
import { errFields, logger } from "../shared/src/utils/logger";

async function start(): Promise<void> {
  const config = loadConfig();
  const hp = buildHypepipe(config);

  // Schema is also ensured lazily on first append; this just surfaces
  // a broken database at boot.
  try {
    await hp.audit.ensureSchema();
  } catch (err) {
    logger.warn(errFields(err), `[${SERVICE_NAME}] audit schema not ready`);
  }

  const app = createApp(hp);
  const server = app.listen(config.port, () => {
    logger.info(
      { port: config.port, prefix: config.apiPrefix, env: config.nodeEnv },
      `[${SERVICE_NAME}] listening`
    );
  });

  // Graceful shutdown
  process.on("SIGTERM", () => {
    logger.info(`[${SERVICE_NAME}] SIGTERM received, shutting down…`);
    server.close(() => process.exit(0));
  });
  process.on("SIGINT", () => {
    logger.info(`[${SERVICE_NAME}] SIGINT received, shutting down…`);
    server.close(() => process.exit(0));
  });

  server.on("error", (err) => {
    logger.error({ err }, `[${SERVICE_NAME}] server error`);
    process.exit(1);
  });
}

start().catch((err: unknown) => {
  logger.error(errFields(err), `[${SERVICE_NAME}] failed to start`);
  process.exit(1);
});
