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
import { parse as parseCookie, serialize as serializeCookie, type SerializeOptions } from "cookie";

export type SessionSyncExpressRequest = {
  headers: Record<string, string | string[] | undefined>;
  /** Parsed body, as left by `express.json()`. */
  body?: unknown;
  auth?: unknown;
};

export type SessionSyncExpressResponse = {
  status(code: number): unknown;
  json(body: unknown): unknown;
  getHeader(name: string): unknown;
  setHeader(name: string, value: unknown): unknown;
};

export type SessionSyncExpressNext = (error?: unknown) => void;
export type SessionSyncExpressHandler = (
  req: SessionSyncExpressRequest,
  res: SessionSyncExpressResponse,
  next: SessionSyncExpressNext,
) => Promise<void>;

export type SessionSyncExpressAdapterOptions = {
  onError?: (
    error: SessionSyncError,
    req: SessionSyncExpressRequest,
    res: SessionSyncExpressResponse,
  ) => Promise<void> | void;
  /** `Retry-After` sent with transient failures (503). Default 5. */
  retryAfterSeconds?: number;
};

const DEFAULT_RETRY_AFTER_SECONDS = 5;

export function createExpressHttpContext(req: SessionSyncExpressRequest, res: SessionSyncExpressResponse): HttpContext {
  return {
    getCookie(name: string): string | null {
      const header = req.headers.cookie;
      if (!header) {
        return null;
      }

      const parsed = parseCookie(Array.isArray(header) ? header.join("; ") : header);
      return parsed[name] ?? null;
    },

    setCookie(name, value, options) {
      appendSetCookie(res, serializeCookie(name, value, toSerializeOptions(options, options.maxAgeSeconds)));
    },

    clearCookie(name, options) {
      appendSetCookie(res, serializeCookie(name, "", toSerializeOptions(options, 0)));
    },

    setAuth<T>(value: T): void {
      req.auth = value;
    },

    getAuth<T>(): T | null {
      return (req.auth as T | undefined) ?? null;
    },

    async readJson(): Promise<unknown> {
      return req.body ?? null;
    },

    status(code: number): void {
      res.status(code);
    },

    json(body: unknown): void {
      res.json(body);
    },
  };
}

export function toExpressMiddleware(
  middleware: HttpMiddleware,
  options?: SessionSyncExpressAdapterOptions,
): SessionSyncExpressHandler {
  return async (req, res, next) => {
    const ctx = createExpressHttpContext(req, res);

    try {
      await middleware(ctx, async () => {
        next();
      });
    } catch (error) {
      if (!isSessionSyncError(error)) {
        next(error);
        return;
      }

      if (options?.onError) {
        await options.onError(error, req, res);
        return;
      }

      const status = statusFromErrorCode(error.code);
      if (isTransientError(error.code)) {
        res.setHeader("Retry-After", String(options?.retryAfterSeconds ?? DEFAULT_RETRY_AFTER_SECONDS));
      }
      res.status(status);
      res.json(defaultErrorBody(error.code, error.message));
    }
  };
}

function appendSetCookie(res: SessionSyncExpressResponse, value: string): void {
  const prev = res.getHeader("Set-Cookie");

  if (!prev) {
    res.setHeader("Set-Cookie", value);
    return;
  }

  const list = Array.isArray(prev) ? prev.map(String) : [String(prev)];
  list.push(value);
  res.setHeader("Set-Cookie", list);
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
