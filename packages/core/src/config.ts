import { z } from "zod";
import { SessionSyncError } from "./errors";
import { DEFAULT_KEY_PREFIX } from "./keys";
import type { TtlPolicyOptions } from "./policy/TtlPolicy";

/**
 * Immutable runtime configuration, parsed once from the environment and passed
 * into each component's constructor.
 */
export type SessionSyncConfig = Readonly<{
    backendAddress: string | null;
    backendTimeoutMs: number;
    keyPrefix: string;
    maxSessionsPerUser: number;
    sessionListLimit: number;
    ttl: Readonly<TtlPolicyOptions>;
    stateTtlSeconds: number;
    cleanup: Readonly<{
        includeExpired: boolean;
        maxAgeDays: number;
        batchSize: number;
        intervalSeconds: number;
    }>;
    cookie: Readonly<{
        name: string;
        secure: boolean;
        domain: string | undefined;
    }>;
    logLevel: LogLevel;
}>;

export type LogLevel = "error" | "warn" | "info" | "debug";

const flag = (fallback: boolean) =>
    z
        .string()
        .optional()
        .transform((v) => (v === undefined || v.trim() === "" ? fallback : ["1", "true", "yes"].includes(v.trim().toLowerCase())));

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);

const optionalString = z
    .string()
    .optional()
    .transform((v) => (v === undefined || v.trim() === "" ? undefined : v.trim()));

const EnvSchema = z.object({
    REDIS_URL: optionalString,
    REDIS_URI: optionalString,
    REDIS_PREFIX: z
        .string()
        .regex(/^[A-Za-z0-9_.-]+$/, "must not contain glob characters")
        .default(DEFAULT_KEY_PREFIX),
    BACKEND_TIMEOUT_MS: int(2000, 1),

    MAX_USER_SESSIONS: int(5),
    SESSION_LIST_LIMIT: int(20, 1),

    SESSION_SLIDING: flag(true),
    SESSION_SLIDING_SECONDS: int(3600, 1),
    SESSION_ABSOLUTE_SECONDS: int(0),
    SESSION_MIN_SECONDS: int(60),
    SESSION_TTL_DEFAULT: int(3600, 1),

    STATE_TTL_SECONDS: int(600, 1),

    CLEANUP_INCLUDE_EXPIRED: flag(false),
    CLEANUP_MAX_AGE_DAYS: int(30),
    CLEANUP_BATCH_SIZE: int(100, 1),
    CLEANUP_INTERVAL_SECONDS: int(3600, 1),

    SESSION_COOKIE_NAME: z.string().min(1).default("app_session"),
    SESSION_COOKIE_SECURE: flag(false),
    SESSION_COOKIE_DOMAIN: optionalString,
    APP_ENV: optionalString,

    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
});

/**
 * Parses SessionSync settings from environment-style key/value pairs.
 */
export function loadSessionSyncConfig(env: Record<string, string | undefined> = process.env): SessionSyncConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new SessionSyncError("INVALID_CONFIG", `Invalid configuration: ${issues.join("; ")}`, result.error, {
            issues,
        });
    }

    const parsed = result.data;
    const production = ["prod", "production"].includes((parsed.APP_ENV ?? "").toLowerCase());

    return Object.freeze({
        backendAddress: parsed.REDIS_URL ?? parsed.REDIS_URI ?? null,
        backendTimeoutMs: parsed.BACKEND_TIMEOUT_MS,
        keyPrefix: parsed.REDIS_PREFIX,
        maxSessionsPerUser: parsed.MAX_USER_SESSIONS,
        sessionListLimit: parsed.SESSION_LIST_LIMIT,
        ttl: Object.freeze({
            slidingEnabled: parsed.SESSION_SLIDING,
            slidingSeconds: parsed.SESSION_SLIDING_SECONDS,
            absoluteSeconds: parsed.SESSION_ABSOLUTE_SECONDS,
            minSeconds: parsed.SESSION_MIN_SECONDS,
            defaultTtlSeconds: parsed.SESSION_TTL_DEFAULT,
        }),
        stateTtlSeconds: parsed.STATE_TTL_SECONDS,
        cleanup: Object.freeze({
            includeExpired: parsed.CLEANUP_INCLUDE_EXPIRED,
            maxAgeDays: parsed.CLEANUP_MAX_AGE_DAYS,
            batchSize: parsed.CLEANUP_BATCH_SIZE,
            intervalSeconds: parsed.CLEANUP_INTERVAL_SECONDS,
        }),
        cookie: Object.freeze({
            name: parsed.SESSION_COOKIE_NAME,
            secure: production || parsed.SESSION_COOKIE_SECURE,
            domain: parsed.SESSION_COOKIE_DOMAIN,
        }),
        logLevel: parsed.LOG_LEVEL,
    });
}
