import { secondsToMs } from "../utils/time";

/**
 * Expiration settings shared by every session of a deployment.
 */
export type TtlPolicyOptions = {
    slidingEnabled: boolean;
    slidingSeconds: number;
    /** 0 disables the absolute cap. */
    absoluteSeconds: number;
    /** Floor applied to the cache-native TTL. */
    minSeconds: number;
    /** Lifetime used when sliding expiration is disabled. */
    defaultTtlSeconds: number;
    /** Remaining lifetime at or below which a renewal is written. Defaults to half the sliding window. */
    renewBeforeSeconds?: number;
};

export type RenewalPlan = { renew: false } | { renew: true; expiresAt: number };

export const DEFAULT_TTL_POLICY: Readonly<TtlPolicyOptions> = Object.freeze({
    slidingEnabled: true,
    slidingSeconds: 3600,
    absoluteSeconds: 0,
    minSeconds: 60,
    defaultTtlSeconds: 3600,
});

const MIN_RENEWAL_GAIN_MS = 1000;

export class TtlPolicy {
    readonly options: Readonly<TtlPolicyOptions>;

    constructor(options: Partial<TtlPolicyOptions> = {}) {
        this.options = Object.freeze({ ...DEFAULT_TTL_POLICY, ...options });
    }

    absoluteDeadline(issuedAt: number): number {
        if (this.options.absoluteSeconds <= 0) {
            return Number.POSITIVE_INFINITY;
        }
        return issuedAt + secondsToMs(this.options.absoluteSeconds);
    }

    computeExpiry(issuedAt: number, now: number): number {
        const window = this.options.slidingEnabled ? this.options.slidingSeconds : this.options.defaultTtlSeconds;
        return Math.min(this.absoluteDeadline(issuedAt), now + secondsToMs(window));
    }

    storageTtlSeconds(expiresAt: number, now: number): number {
        const remaining = Math.ceil((expiresAt - now) / 1000);
        return Math.max(this.options.minSeconds, remaining, 1);
    }

    /**
     * Decides whether a sliding renewal should be written. The candidate expiry is
     * clamped to the absolute deadline, so repeated renewals can never push a
     * session past `issuedAt + absoluteSeconds`.
     */
    planRenewal(record: { issuedAt: number; expiresAt: number }, now: number): RenewalPlan {
        if (!this.options.slidingEnabled) {
            return { renew: false };
        }

        if (record.expiresAt <= now) {
            return { renew: false };
        }

        const renewBefore = this.options.renewBeforeSeconds ?? this.options.slidingSeconds / 2;
        if (record.expiresAt - now > secondsToMs(renewBefore)) {
            return { renew: false };
        }

        const candidate = Math.min(this.absoluteDeadline(record.issuedAt), now + secondsToMs(this.options.slidingSeconds));
        if (candidate - record.expiresAt < MIN_RENEWAL_GAIN_MS) {
            return { renew: false };
        }

        return { renew: true, expiresAt: candidate };
    }
}
