export * from "./types";
export * from "./errors";
export * from "./config";
export * from "./keys";

export * from "./http/HttpContext";
export * from "./cookie/CookieOptions";

export * from "./policy/TtlPolicy";

export * from "./backend/KeyValueBackend";
export * from "./backend/MapKeyValueBackend";

export * from "./session/LockProvider";
export * from "./session/SessionSerializer";
export * from "./session/SessionManager";

export * from "./state/StateStore";

export * from "./sweep/SweepEngine";
export * from "./sweep/SweepScheduler";

export * from "./utils/time";
export { newSessionId } from "./utils/uuid";

export * from "./SessionAuth";
export * from "./createSessionSync";
