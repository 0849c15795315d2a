import { randomBytes } from "node:crypto";

const SESSION_ID_BYTES = 32;

/**
 * 256 bits of entropy, base64url encoded (43 characters).
 */
export function newSessionId(): string {
  return randomBytes(SESSION_ID_BYTES).toString("base64url");
}
