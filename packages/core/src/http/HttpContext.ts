import type { CookieOptions } from "../cookie/CookieOptions";

/**
 * Framework-neutral HTTP context required by SessionSync.
 */
export interface HttpContext {
    // Cookie I/O
    getCookie(name: string): string | null;
    setCookie(name: string, value: string, options: CookieOptions & { maxAgeSeconds?: number }): void;
    clearCookie(name: string, options: CookieOptions): void;

    // Auth context storage
    setAuth<T>(value: T): void;
    getAuth<T>(): T | null;

    /** Parsed JSON request body, or null when there is none. */
    readJson(): Promise<unknown>;

    // Response helpers (adapters implement these)
    status(code: number): void;
    json(body: unknown): void;
}

/**
 * Middleware function signature used by SessionSync core.
 */
export type HttpMiddleware = (ctx: HttpContext, next: () => Promise<void>) => Promise<void>;
