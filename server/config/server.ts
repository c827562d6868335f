/**
 * Server Configuration
 *
 * CORS origins and body parsing limits.
 */

import type { Env } from "./env";

/** Local front-end origins allowed outside production. */
export const DEV_ORIGINS = [
  `http://localhost:${process.env.DEV_CLIENT_PORT || "3000"}`,
  "http://localhost:5173",
] as const;

/**
 * Returns the list of allowed origins for the current environment.
 */
export function getAllowedOrigins(config: Pick<Env, "ALLOWED_ORIGINS" | "NODE_ENV">): string[] {
  const envOrigins =
    config.ALLOWED_ORIGINS?.split(",")
      .map((o) => o.trim())
      .filter(Boolean) || [];
  if (config.NODE_ENV === "production") {
    return envOrigins;
  }
  return [...envOrigins, ...DEV_ORIGINS];
}

/** JSON body limit for the metadata endpoints; uploads go through multer */
export const BODY_PARSE_LIMIT = "100kb";
