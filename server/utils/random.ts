import crypto from "node:crypto";
import { RANDOM_NAME_BYTES } from "../config/constants";

/** 32 random bytes, URL-safe base64 without padding (43 characters). */
export function randomName(): string {
  return crypto.randomBytes(RANDOM_NAME_BYTES).toString("base64url");
}
