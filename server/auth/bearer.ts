import jwt from "jsonwebtoken";
import { UnauthenticatedError } from "../utils/errors";

const BEARER_PREFIX = "Bearer ";

export interface BearerAuthenticator {
  /** Returns the authenticated user id, or throws UnauthenticatedError. */
  validateBearerToken(headerValue: string | undefined): string;
}

export function extractBearerToken(headerValue: string | undefined): string {
  if (!headerValue || !headerValue.startsWith(BEARER_PREFIX)) {
    throw new UnauthenticatedError("Couldn't find JWT");
  }
  const token = headerValue.slice(BEARER_PREFIX.length).trim();
  if (!token) {
    throw new UnauthenticatedError("Couldn't find JWT");
  }
  return token;
}

/** HS256 access tokens whose `sub` claim is the user id. */
export class JwtAuthenticator implements BearerAuthenticator {
  constructor(private readonly secret: string) {}

  validateBearerToken(headerValue: string | undefined): string {
    const token = extractBearerToken(headerValue);

    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, { algorithms: ["HS256"] });
    } catch (err) {
      throw new UnauthenticatedError("Couldn't validate JWT", { cause: err });
    }

    if (typeof decoded === "string" || typeof decoded.sub !== "string" || decoded.sub === "") {
      throw new UnauthenticatedError("Couldn't validate JWT");
    }
    return decoded.sub;
  }
}
