/**
 * Session cookie attributes shared by SessionSync core and adapters.
 */
export type CookieOptions = {
    name?: string; // default "app_session"
    path?: string; // default "/"
    domain?: string;
    httpOnly?: boolean; // default true
    secure?: boolean;
    sameSite?: "lax" | "strict" | "none"; // default "none" when secure, else "lax"
};

export const DEFAULT_COOKIE_NAME = "app_session";

/**
 * Fills defaults. Cross-site cookies need `SameSite=None`, which browsers only
 * accept together with `Secure`.
 */
export function resolveCookieOptions(options?: CookieOptions): CookieOptions & { name: string } {
    const secure = options?.secure ?? false;
    return {
        ...options,
        name: options?.name ?? DEFAULT_COOKIE_NAME,
        path: options?.path ?? "/",
        httpOnly: options?.httpOnly ?? true,
        secure,
        sameSite: options?.sameSite ?? (secure ? "none" : "lax"),
    };
}
