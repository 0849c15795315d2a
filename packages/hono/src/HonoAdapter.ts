import {
  defaultErrorBody,
  isSessionSyncError,
  isTransientError,
  statusFromErrorCode,
  type CookieOptions,
  type HttpContext,
  type HttpMiddleware,
  type SessionSyncError,
} from "@sessionsync/core";
import type { Context, MiddlewareHandler } from "hono";
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

/**
 * Context key used to store SessionSync auth data on Hono context.
 */
export const SESSIONSYNC_HONO_AUTH_KEY = "auth";

/**
 * Adapter options for Hono integration.
 */
export type SessionSyncHonoAdapterOptions = {
  onError?: (error: SessionSyncError, c: Context) => Promise<Response | void> | Response | void;
  /** `Retry-After` sent with transient failures (503). Default 5. */
  retryAfterSeconds?: number;
};

type HonoHttpContext = HttpContext & {
  _getDirectResponse: () => Response | null;
};

const DEFAULT_RETRY_AFTER_SECONDS = 5;

/**
 * Creates a framework-neutral `HttpContext` from Hono context.
 */
export function createHonoHttpContext(c: Context): HttpContext {
  return createContext(c);
}

/**
 * Converts core middleware into a Hono middleware handler.
 */
export function toHonoMiddleware(
  middleware: HttpMiddleware,
  options?: SessionSyncHonoAdapterOptions,
): MiddlewareHandler {
  return async (c, next) => {
    const ctx = createContext(c);

    let nextCalled = false;
    try {
      await middleware(ctx, async () => {
        nextCalled = true;
        await next();
      });
    } catch (error) {
      if (!isSessionSyncError(error)) {
        throw error;
      }

      if (options?.onError) {
        const handled = await options.onError(error, c);
        if (handled) {
          return handled;
        }
        if (c.finalized) {
          return;
        }
      }

      const status = statusFromErrorCode(error.code);
      if (isTransientError(error.code)) {
        c.header("Retry-After", String(options?.retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS));
      }
      return (c.json as (value: unknown, status?: number) => Response)(
        defaultErrorBody(error.code, error.message),
        status,
      );
    }

    if (c.finalized) {
      return;
    }

    if (!nextCalled) {
      const response = ctx._getDirectResponse();
      if (response) {
        return response;
      }
      return (c.body as (data: null, status?: number) => Response)(null, c.res.status || 200);
    }
  };
}

function createContext(c: Context): HonoHttpContext {
  let statusCode = 200;
  let directResponse: Response | null = null;

  return {
    getCookie(name: string): string | null {
      const raw = c.req.header("cookie");
      if (!raw) {
        return null;
      }

      const parsed = parseCookie(raw);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      c.header("Set-Cookie", serializeCookie(name, value, toSerializeOptions(options, options.maxAgeSeconds)), {
        append: true,
      });
    },

    clearCookie(name, options) {
      c.header("Set-Cookie", serializeCookie(name, "", toSerializeOptions(options, 0)), { append: true });
    },

    setAuth<T>(value: T): void {
      (c.set as (key: string, value: unknown) => void)(SESSIONSYNC_HONO_AUTH_KEY, value);
    },

    getAuth<T>(): T | null {
      return ((c.get as (key: string) => unknown)(SESSIONSYNC_HONO_AUTH_KEY) as T | undefined) ?? null;
    },

    async readJson(): Promise<unknown> {
      const type = c.req.header("content-type") ?? "";
      if (!type.includes("json")) {
        return null;
      }

      try {
        return await c.req.json();
      } catch (error) {
        // malformed body reads as no body
        if (error instanceof SyntaxError) {
          return null;
        }
        throw error;
      }
    },

    status(code: number): void {
      statusCode = code;
      (c.status as (value: number) => void)(code);
    },

    json(body: unknown): void {
      directResponse = (c.json as (value: unknown, status?: number) => Response)(body, statusCode);
    },

    _getDirectResponse(): Response | null {
      return directResponse;
    },
  };
}

function toSerializeOptions(options: CookieOptions, maxAge: number | undefined): SerializeOptions {
  return {
    path: options.path ?? "/",
    httpOnly: options.httpOnly ?? true,
    ...(options.domain !== undefined ? { domain: options.domain } : {}),
    ...(options.secure !== undefined ? { secure: options.secure } : {}),
    ...(options.sameSite !== undefined ? { sameSite: options.sameSite } : {}),
    ...(maxAge !== undefined ? { maxAge } : {}),
  };
}
