import type {
    AuthContext,
    RequireAuthOptions,
    SessionAuthOptions,
    SignInResult,
    SignOutOptions,
} from "./types";
import type { HttpContext, HttpMiddleware } from "./http/HttpContext";
import { resolveCookieOptions, type CookieOptions } from "./cookie/CookieOptions";
import { describeError, isBackendUnavailable, SessionSyncError } from "./errors";
import type { SessionManager, SessionRecord, SessionSummary } from "./session/SessionManager";

/**
 * Binds a {@link SessionManager} to a session cookie and exposes request
 * middleware plus the session self-service routes.
 */
export class SessionAuth<TPayload, TPrincipal> {
    private readonly cookie: CookieOptions & { name: string };
    private readonly sessions: SessionManager<TPayload>;

    constructor(private readonly opts: SessionAuthOptions<TPayload, TPrincipal>) {
        this.cookie = resolveCookieOptions(opts.cookie);
        this.sessions = opts.sessions;
    }

    /**
     * Resolves the session cookie into an {@link AuthContext}. An unreachable
     * backend fails the request with `BACKEND_UNAVAILABLE` instead of treating
     * the caller as logged out.
     */
    middleware(): HttpMiddleware {
        return async (ctx, next) => {
            ctx.setAuth<AuthContext<TPayload, TPrincipal>>(await this.buildAuthContext(ctx));
            await next();
        };
    }

    requireAuth(options?: RequireAuthOptions): HttpMiddleware {
        return async (ctx, next) => {
            if (!this.getAuth(ctx).isAuthenticated) {
                if (options?.onFail) {
                    await options.onFail(ctx);
                    return;
                }
                if (this.opts.hooks?.onUnauthorized) {
                    await this.opts.hooks.onUnauthorized(ctx);
                    return;
                }
                throw new SessionSyncError("UNAUTHORIZED", "Authentication required.");
            }
            await next();
        };
    }

    async signIn(ctx: HttpContext, userId: string, payload: TPayload): Promise<SignInResult<TPrincipal>> {
        const { sessionId, record, evicted } = await this.sessions.create(userId, payload);

        ctx.setCookie(this.cookie.name, sessionId, {
            ...this.cookie,
            maxAgeSeconds: remainingSeconds(record.expiresAt, record.issuedAt),
        });

        const principal = this.opts.principalFactory(record);
        ctx.setAuth<AuthContext<TPayload, TPrincipal>>({
            sessionId,
            session: record,
            principal,
            isAuthenticated: true,
        });

        return { sessionId, principal, expiresAt: record.expiresAt, evicted };
    }

    async signOut(ctx: HttpContext, options?: SignOutOptions): Promise<void> {
        const alwaysClear = options?.alwaysClearCookie ?? true;
        const sid = ctx.getCookie(this.cookie.name);

        try {
            if (sid) await this.sessions.delete(sid);
        } catch (e) {
            this.opts.logger?.warn("Failed to delete session from store.", { error: describeError(e) });
            if (!alwaysClear) throw e;
        }

        ctx.clearCookie(this.cookie.name, this.cookie);
        ctx.setAuth<AuthContext<TPayload, TPrincipal>>(unauthContext());
    }

    getAuth(ctx: HttpContext): AuthContext<TPayload, TPrincipal> {
        return ctx.getAuth<AuthContext<TPayload, TPrincipal>>() ?? unauthContext();
    }

    /**
     * `GET /api/auth/session`
     */
    sessionInfo(): HttpMiddleware {
        return async (ctx) => {
            const auth = this.getAuth(ctx);
            if (!auth.isAuthenticated || !auth.session) {
                ctx.json({ authenticated: false });
                return;
            }

            ctx.json({
                authenticated: true,
                user: auth.principal,
                session: toSessionJson(auth.session),
            });
        };
    }

    /**
     * `GET /api/auth/sessions`: the caller's live sessions, newest first.
     */
    sessionList(): HttpMiddleware {
        return async (ctx) => {
            const auth = this.getAuth(ctx);
            if (!auth.session) {
                ctx.status(401);
                ctx.json({ authenticated: false });
                return;
            }

            const sessions = await this.sessions.listSessions(auth.session.userId);
            ctx.json({
                authenticated: true,
                current: auth.sessionId,
                sessions: sessions.map(toSessionJson),
            });
        };
    }

    /**
     * `POST /api/auth/logout_session` with `{ "session_id": "..." }`: ends one
     * of the caller's own sessions.
     */
    logoutSession(): HttpMiddleware {
        return async (ctx) => {
            const auth = this.getAuth(ctx);
            if (!auth.session || !auth.sessionId) {
                ctx.status(401);
                ctx.json({ success: false, error: "not_authenticated" });
                return;
            }

            const target = readSessionId(await ctx.readJson());
            if (!target) {
                ctx.status(400);
                ctx.json({ success: false, error: "missing_session_id" });
                return;
            }

            const deleted = await this.sessions.delete(target, { userId: auth.session.userId });
            if (!deleted) {
                ctx.status(404);
                ctx.json({ success: false, error: "not_found" });
                return;
            }

            const current = target === auth.sessionId;
            if (current) {
                ctx.clearCookie(this.cookie.name, this.cookie);
            }
            ctx.json({ success: true, deleted: target, current });
        };
    }

    /**
     * `POST /api/auth/logout_all`
     */
    logoutAll(): HttpMiddleware {
        return async (ctx) => {
            const auth = this.getAuth(ctx);
            if (!auth.session) {
                ctx.status(401);
                ctx.json({ success: false, error: "not_authenticated" });
                return;
            }

            const result = await this.sessions.deleteAllForUser(auth.session.userId);
            ctx.clearCookie(this.cookie.name, this.cookie);
            ctx.setAuth<AuthContext<TPayload, TPrincipal>>(unauthContext());
            ctx.json({ success: true, cleared: result.sessionsDeleted });
        };
    }

    /**
     * `POST /api/auth/logout`
     */
    logout(): HttpMiddleware {
        return async (ctx) => {
            await this.signOut(ctx);
            ctx.json({ success: true });
        };
    }

    private async buildAuthContext(ctx: HttpContext): Promise<AuthContext<TPayload, TPrincipal>> {
        const sid = ctx.getCookie(this.cookie.name);
        if (!sid) {
            return unauthContext();
        }

        const result = await this.sessions.lookup(sid);

        if (result.status === "unavailable") {
            this.opts.logger?.warn("Cannot verify session: backend unavailable.", { error: result.error.message });
            throw new SessionSyncError("BACKEND_UNAVAILABLE", "Cannot verify session.", result.error);
        }

        if (result.status === "absent") {
            this.opts.logger?.debug("Session not found.", { reason: result.reason });
            if (this.opts.hooks?.onInvalidSession) {
                await this.opts.hooks.onInvalidSession(ctx, result.reason);
            }
            ctx.clearCookie(this.cookie.name, this.cookie);
            return unauthContext();
        }

        const session = await this.maybeRenew(ctx, sid, result.record);

        return {
            sessionId: sid,
            session,
            principal: this.opts.principalFactory(session),
            isAuthenticated: true,
        };
    }

    private async maybeRenew(
        ctx: HttpContext,
        sessionId: string,
        record: SessionRecord<TPayload>
    ): Promise<SessionRecord<TPayload>> {
        try {
            const renewal = await this.sessions.renew(sessionId, record);
            if (!renewal.renewed) {
                return record;
            }

            ctx.setCookie(this.cookie.name, sessionId, {
                ...this.cookie,
                maxAgeSeconds: remainingSeconds(renewal.expiresAt, this.sessions.clock()),
            });
            return { ...record, expiresAt: renewal.expiresAt };
        } catch (e) {
            // the session is valid as read; only the extension was lost
            if (!isBackendUnavailable(e)) throw e;
            this.opts.logger?.warn("Failed to renew session TTL.", { error: e.message });
            return record;
        }
    }
}

function unauthContext<TPayload, TPrincipal>(): AuthContext<TPayload, TPrincipal> {
    return {
        sessionId: null,
        session: null,
        principal: null,
        isAuthenticated: false,
    };
}

function remainingSeconds(expiresAt: number, now: number): number {
    return Math.max(0, Math.ceil((expiresAt - now) / 1000));
}

function readSessionId(body: unknown): string | null {
    if (!body || typeof body !== "object") {
        return null;
    }
    if (!("session_id" in body)) {
        return null;
    }
    const value = body.session_id;
    return typeof value === "string" && value !== "" ? value : null;
}

function toSessionJson<TPayload>(session: SessionSummary<TPayload>): Record<string, unknown> {
    return {
        session_id: session.sessionId,
        created_at: session.issuedAt,
        expires_at: session.expiresAt,
        renewed_at: session.renewedAt,
        details: session.payload,
    };
}
