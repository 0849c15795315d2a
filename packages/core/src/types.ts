import type { CookieOptions } from "./cookie/CookieOptions";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import type { Logger } from "./errors";
import type { AbsentReason, SessionManager, SessionRecord } from "./session/SessionManager";

/**
 * Authentication state attached to each request context.
 */
export type AuthContext<TPayload, TPrincipal> = {
    sessionId: string | null;
    session: SessionRecord<TPayload> | null;
    principal: TPrincipal | null;
    isAuthenticated: boolean;
};

/**
 * Root configuration for creating a {@link SessionAuth} instance.
 */
export type SessionAuthOptions<TPayload, TPrincipal> = {
    sessions: SessionManager<TPayload>;

    cookie?: CookieOptions;

    principalFactory: (record: SessionRecord<TPayload>) => TPrincipal;

    hooks?: {
        onUnauthorized?: (ctx: HttpContext) => Promise<void> | void;
        onInvalidSession?: (ctx: HttpContext, reason: AbsentReason) => Promise<void> | void;
    };

    logger?: Logger;
};

/**
 * Options for {@link SessionAuth.requireAuth}.
 */
export type RequireAuthOptions = {
    onFail?: (ctx: HttpContext) => Promise<void> | void;
};

/**
 * Result returned by {@link SessionAuth.signIn}.
 */
export type SignInResult<TPrincipal> = {
    sessionId: string;
    principal: TPrincipal;
    expiresAt: number;
    /** Sessions of the same user logged out to stay within capacity. */
    evicted: string[];
};

/**
 * Options for {@link SessionAuth.signOut}.
 */
export type SignOutOptions = {
    alwaysClearCookie?: boolean; // default true
};

// Re-export commonly used types
export type {CookieOptions, HttpContext, HttpMiddleware};
