import { describe, expect, it } from "vitest";
import { Hono } from "hono";
import { SessionSyncError, type HttpMiddleware } from "@sessionsync/core";
import { createHonoHttpContext, toHonoMiddleware } from "../src";

const unauthorizedMiddleware: HttpMiddleware = async () => {
  throw new SessionSyncError("UNAUTHORIZED", "Authentication required.");
};

describe("HonoAdapter", () => {
  it("maps UNAUTHORIZED to default JSON response", async () => {
    const app = new Hono();

    app.use("/me", toHonoMiddleware(unauthorizedMiddleware));
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(401);
    await expect(res.json()).resolves.toEqual({
      error: {
        code: "UNAUTHORIZED",
        message: "Authentication required.",
      },
    });
  });

  it("maps BACKEND_UNAVAILABLE to 503 with Retry-After", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(
        async () => {
          throw new SessionSyncError("BACKEND_UNAVAILABLE", "Cannot verify session.");
        },
        { retryAfterSeconds: 3 },
      ),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me");
    expect(res.status).toBe(503);
    expect(res.headers.get("retry-after")).toBe("3");
    await expect(res.json()).resolves.toEqual({
      error: { code: "BACKEND_UNAVAILABLE", message: "Cannot verify session." },
    });
  });

  it("supports onError override", async () => {
    const app = new Hono();

    app.use(
      "/me",
      toHonoMiddleware(unauthorizedMiddleware, {
        onError(_error, c) {
          return c.redirect("/login", 302);
        },
      }),
    );
    app.get("/me", (c) => c.json({ ok: true }));

    const res = await app.request("http://localhost/me", { redirect: "manual" });
    expect(res.status).toBe(302);
    expect(res.headers.get("location")).toBe("/login");
  });

  it("appends multiple Set-Cookie values", async () => {
    const app = new Hono();

    app.use(
      "/cookie",
      toHonoMiddleware(async (ctx, next) => {
        ctx.setCookie("sid", "token-1", { path: "/", httpOnly: true });
        ctx.clearCookie("sid", { path: "/", httpOnly: true });
        await next();
      }),
    );
    app.get("/cookie", (c) => c.text("ok"));

    const res = await app.request("http://localhost/cookie");

    expect(res.headers.getSetCookie()).toEqual(["sid=token-1; Path=/; HttpOnly", "sid=; Max-Age=0; Path=/; HttpOnly"]);
  });

  it("reads JSON bodies and ignores malformed or non-JSON ones", async () => {
    const app = new Hono();
    app.post("/echo", async (c) => c.json({ body: await createHonoHttpContext(c).readJson() }));

    const post = (body: string, type: string) =>
      app.request("http://localhost/echo", { method: "POST", body, headers: { "content-type": type } });

    await expect((await post('{"session_id":"s1"}', "application/json")).json()).resolves.toEqual({
      body: { session_id: "s1" },
    });
    await expect((await post("{oops", "application/json")).json()).resolves.toEqual({ body: null });
    await expect((await post("session_id=s1", "application/x-www-form-urlencoded")).json()).resolves.toEqual({
      body: null,
    });
  });
});
