import { start } from "./index.js";
import { logger } from "./logger.js";

try {
  const app = await start();

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    app.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", err);
        process.exit(1);
      },
    );
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
} catch (err) {
  logger.error("Failed to start", err);
  process.exit(1);
}
