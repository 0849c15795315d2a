import { SessionSyncError } from "@sessionsync/core";

const UNAVAILABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
  "NR_CLOSED",
]);

const UNAVAILABLE_KEYWORDS = [
  "connect",
  "connection",
  "socket",
  "closed",
  "timeout",
  "timed out",
  "read only",
  "loading",
  "clusterdown",
  "try again",
  "no connection",
  "the client is closed",
];

/**
 * Raised when a command does not answer within the configured timeout.
 */
export class RedisCommandTimeoutError extends Error {
  readonly code = "ETIMEDOUT";

  constructor(readonly command: string, readonly timeoutMs: number) {
    super(`Redis command ${command} timed out after ${timeoutMs}ms.`);
    this.name = "RedisCommandTimeoutError";
  }
}

export function classifyRedisError(error: unknown): "BACKEND_UNAVAILABLE" | "INTERNAL_ERROR" {
  if (UNAVAILABLE_CODES.has(getErrorCode(error))) {
    return "BACKEND_UNAVAILABLE";
  }

  const msg = getErrorMessage(error).toLowerCase();
  if (UNAVAILABLE_KEYWORDS.some((k) => msg.includes(k))) {
    return "BACKEND_UNAVAILABLE";
  }

  return "INTERNAL_ERROR";
}

/**
 * Wraps a driver error. Errors that are already {@link SessionSyncError} pass through.
 */
export function toBackendError(error: unknown, details: Record<string, unknown>): SessionSyncError {
  if (error instanceof SessionSyncError) {
    return error;
  }

  const code = classifyRedisError(error);
  return new SessionSyncError(
    code,
    code === "BACKEND_UNAVAILABLE" ? "Session backend is unavailable." : "Redis command failed.",
    error,
    { ...details, redisCode: getErrorCode(error) || undefined, reason: getErrorMessage(error) },
  );
}

export function isUnknownCommandError(error: unknown): boolean {
  return getErrorMessage(error).toLowerCase().includes("unknown command");
}

function getErrorCode(error: unknown): string {
  if (error && typeof error === "object" && "code" in error) {
    return String(error.code ?? "").toUpperCase();
  }
  return "";
}

function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error ?? "");
}
