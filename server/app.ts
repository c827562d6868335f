/**
 * Express Application Factory
 *
 * Creates and configures the Express app with all middleware and API routes.
 * `server/index.ts` wires real services; tests pass fakes.
 */
import express from "express";
import compression from "compression";
import helmet from "helmet";
import cors from "cors";
import type { AppServices } from "./container";
import type { Env } from "./config/env";
import { BODY_PARSE_LIMIT, getAllowedOrigins } from "./config/server";
import { errorHandler } from "./middleware/errorHandler";
import { requestTracing } from "./middleware/requestTracing";
import { metricsMiddleware, registerMonitoringRoutes } from "./monitoring";
import { createVideosRouter, type VideosRouterOptions } from "./routes/videos";
import { Errors } from "./utils/apiError";
import { ForbiddenError } from "./utils/errors";

export function createApp(
  services: AppServices,
  config: Pick<Env, "ALLOWED_ORIGINS" | "NODE_ENV">,
  options: VideosRouterOptions = {}
): express.Express {
  const app = express();

  // Trust the first proxy hop so req.ip reflects the real client address.
  app.set("trust proxy", 1);

  // Request metrics collection
  app.use(metricsMiddleware());

  // Request tracing: generate/propagate request ID before anything else
  app.use(requestTracing);

  // Security middleware
  if (config.NODE_ENV === "production") {
    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
            mediaSrc: ["'self'", "https://storage.googleapis.com"],
            objectSrc: ["'none'"],
            frameSrc: ["'none'"],
          },
        },
        // Thumbnails are embedded by other origins
        crossOriginResourcePolicy: { policy: "cross-origin" },
      })
    );
  }

  // CORS configuration
  const allowedOrigins = getAllowedOrigins(config);
  app.use(
    cors({
      origin(origin: string | undefined, callback: (err: Error | null, allow?: boolean) => void) {
        // Allow requests with no origin (mobile apps, server-to-server) or matching allowed domains
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, true);
        } else {
          callback(new ForbiddenError("Not allowed by CORS"));
        }
      },
      credentials: true,
    })
  );

  // Compression
  app.use(compression());

  app.use(express.json({ limit: BODY_PARSE_LIMIT }));

  // Thumbnails
  app.use("/assets", express.static(services.assetsRoot, { index: false, fallthrough: true }));

  app.use("/api", createVideosRouter(services, options));

  // Monitoring: health checks, readiness probes
  registerMonitoringRoutes(app, services.health);

  app.use("/api", (_req, res) => {
    Errors.notFound(res, "NOT_FOUND", "Route not found.");
  });

  app.use(errorHandler);

  return app;
}
