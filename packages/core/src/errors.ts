/**
 * Error codes raised by SessionSync packages. Adapters turn them into HTTP
 * statuses through {@link statusFromErrorCode}.
 */
export type ErrorCode =
    | "UNAUTHORIZED"
    | "INVALID_REQUEST"
    | "BACKEND_UNAVAILABLE"
    | "STATE_EXPIRED_OR_USED"
    | "LOCK_TIMEOUT"
    | "INVALID_CONFIG"
    | "INTERNAL_ERROR";

export class SessionSyncError extends Error {
    readonly details: Record<string, unknown> | undefined;

    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly cause?: unknown,
        details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "SessionSyncError";
        this.details = details;
    }
}

export type ErrorBody = {
    error: {
        code: ErrorCode;
        message: string;
    };
};

/**
 * Diagnostics sink injected into SessionSync components. Any structured
 * logger with these four methods fits.
 */
export type Logger = {
    debug(msg: string, meta?: unknown): void;
    info(msg: string, meta?: unknown): void;
    warn(msg: string, meta?: unknown): void;
    error(msg: string, meta?: unknown): void;
};

// An unreachable backend is 503 ("cannot verify session"), never 401: a cache
// outage must not read as a logout.
const ERROR_STATUS = {
    UNAUTHORIZED: 401,
    STATE_EXPIRED_OR_USED: 401,
    INVALID_REQUEST: 400,
    BACKEND_UNAVAILABLE: 503,
    LOCK_TIMEOUT: 503,
    INVALID_CONFIG: 500,
    INTERNAL_ERROR: 500,
} as const satisfies Record<ErrorCode, number>;

export function statusFromErrorCode(code: ErrorCode): number {
    return ERROR_STATUS[code];
}

/**
 * Whether the same request may succeed later unchanged. Adapters answer these
 * with `Retry-After`.
 */
export function isTransientError(code: ErrorCode): boolean {
    return code === "BACKEND_UNAVAILABLE" || code === "LOCK_TIMEOUT";
}

export function defaultErrorBody(code: ErrorCode, message: string): ErrorBody {
    return { error: { code, message } };
}

export function isSessionSyncError(error: unknown): error is SessionSyncError {
    return error instanceof SessionSyncError;
}

export function isBackendUnavailable(error: unknown): error is SessionSyncError {
    return isSessionSyncError(error) && error.code === "BACKEND_UNAVAILABLE";
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
