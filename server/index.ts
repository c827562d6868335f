import http from "node:http";
import { createApp } from "./app";
import { env } from "./config/env";
import { createServices } from "./container";
import logger from "./logger";

const services = createServices(env);
await services.thumbnailIngest.ensureAssetsRoot();

const app = createApp(services, env);
const server = http.createServer(app);

const port = Number(env.PORT);
server.listen(port, "0.0.0.0", () => {
  logger.info(`Video service running on port ${port}`, { mode: env.NODE_ENV, assetsRoot: services.assetsRoot });
});

function shutdown(signal: string) {
  logger.info(`[Server] ${signal} received, shutting down gracefully...`);
  server.close((err) => {
    if (err) {
      logger.error("[Server] Error while closing HTTP server", { error: err });
    }
    services.close().then(
      () => {
        logger.info("[Server] HTTP server closed");
        process.exit(err ? 1 : 0);
      },
      (closeErr: unknown) => {
        logger.error("[Server] Failed to close database pool", { error: closeErr });
        process.exit(1);
      }
    );
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
