import type { SessionAuth } from "@sessionsync/core";
import { Hono } from "hono";
import { toHonoMiddleware, type SessionSyncHonoAdapterOptions } from "./HonoAdapter";

export type SessionRoutesOptions = SessionSyncHonoAdapterOptions & {
  /**
   * Resolve the session cookie inside the group. Turn off when the parent app
   * already mounts `auth.middleware()` in front of it.
   */
  resolveSession?: boolean; // default true
};

/**
 * Session self-service endpoints, to be mounted with `app.route("/api/auth", ...)`:
 *
 * - `GET /session`
 * - `GET /sessions`
 * - `POST /logout_session`
 * - `POST /logout_all`
 * - `POST /logout`
 */
export function createSessionRoutes<TPayload, TPrincipal>(
  auth: SessionAuth<TPayload, TPrincipal>,
  options?: SessionRoutesOptions,
): Hono {
  const routes = new Hono();

  if (options?.resolveSession ?? true) {
    routes.use("*", toHonoMiddleware(auth.middleware(), options));
  }

  routes.get("/session", toHonoMiddleware(auth.sessionInfo(), options));
  routes.get("/sessions", toHonoMiddleware(auth.sessionList(), options));
  routes.post("/logout_session", toHonoMiddleware(auth.logoutSession(), options));
  routes.post("/logout_all", toHonoMiddleware(auth.logoutAll(), options));
  routes.post("/logout", toHonoMiddleware(auth.logout(), options));

  return routes;
}
