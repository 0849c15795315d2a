import type { KeyValueBackend } from "./backend/KeyValueBackend";
import type { SessionSyncConfig } from "./config";
import type { CookieOptions } from "./cookie/CookieOptions";
import type { Logger } from "./errors";
import { KeyLayout } from "./keys";
import { TtlPolicy } from "./policy/TtlPolicy";
import type { LockProvider } from "./session/LockProvider";
import { SessionManager } from "./session/SessionManager";
import { StateStore } from "./state/StateStore";
import { SweepEngine } from "./sweep/SweepEngine";
import type { Clock } from "./utils/time";

export type SessionSyncDependencies = {
    backend: KeyValueBackend;
    lockProvider?: LockProvider;
    logger?: Logger;
    clock?: Clock;
};

export type SessionSync<TPayload> = {
    keys: KeyLayout;
    sessions: SessionManager<TPayload>;
    state: StateStore;
    engine: SweepEngine;
    /** Session cookie attributes for `SessionAuth`. */
    cookie: CookieOptions;
};

/**
 * Builds every store from one parsed configuration over a shared backend.
 */
export function createSessionSync<TPayload>(
    config: SessionSyncConfig,
    deps: SessionSyncDependencies
): SessionSync<TPayload> {
    const { backend, lockProvider, logger, clock } = deps;
    const keys = new KeyLayout(config.keyPrefix);

    const sessions = new SessionManager<TPayload>({
        backend,
        keys,
        ttl: new TtlPolicy(config.ttl),
        maxSessionsPerUser: config.maxSessionsPerUser,
        listLimit: config.sessionListLimit,
        lockProvider,
        clock,
        logger,
    });

    return {
        keys,
        sessions,
        state: new StateStore({ backend, keys, ttlSeconds: config.stateTtlSeconds, clock, logger }),
        engine: new SweepEngine({
            sessions,
            maxAgeDays: config.cleanup.maxAgeDays,
            batchSize: config.cleanup.batchSize,
            clock,
            logger,
        }),
        cookie: {
            name: config.cookie.name,
            secure: config.cookie.secure,
            domain: config.cookie.domain,
        },
    };
}
