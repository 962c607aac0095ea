import { describe, expect, test } from "vitest";
import { SessionStore } from "../../src/auth/session-store.js";
import {
  ALICE_CREDENTIAL,
  createChatServerFixture,
  login,
} from "./chat-server-fixture.js";
import { apiRequest, withHttpServer } from "./http-test-utils.js";

type UserSummary = {
  id: string;
  email: string | null;
  name: string | null;
  created_at: string;
};

describe("Auth API E2E", () => {
  test("should log in, verify, report identity and log out", async () => {
    const { app } = createChatServerFixture();

    await withHttpServer(app, async (baseUrl) => {
      const loginRes = await apiRequest(baseUrl, "/api/auth/login", {
        body: { token: `  ${ALICE_CREDENTIAL}  ` },
      });
      expect(loginRes.status).toBe(200);
      const loggedIn = (await loginRes.json()) as {
        success: boolean;
        user: UserSummary;
        session_token: string;
        expires_at: string;
      };
      expect(loggedIn.success).toBe(true);
      expect(loggedIn.session_token.length).toBeGreaterThan(0);
      expect(loggedIn.user.email).toBeNull();
      expect(new Date(loggedIn.expires_at).getTime()).toBeGreaterThan(Date.now());

      const token = loggedIn.session_token;

      const verifyRes = await apiRequest(baseUrl, "/api/auth/verify", { token });
      expect(verifyRes.status).toBe(200);
      const verified = (await verifyRes.json()) as {
        success: boolean;
        valid: boolean;
        user: UserSummary;
      };
      expect(verified.valid).toBe(true);
      expect(verified.user.id).toBe(loggedIn.user.id);

      const meRes = await apiRequest(baseUrl, "/api/auth/me", { token });
      expect(await meRes.json()).toEqual({
        authenticated: true,
        user: loggedIn.user,
      });

      const logoutRes = await apiRequest(baseUrl, "/api/auth/logout", {
        method: "POST",
        token,
      });
      expect(logoutRes.status).toBe(200);
      expect(await logoutRes.json()).toEqual({ success: true });

      const afterLogout = await apiRequest(baseUrl, "/api/auth/verify", { token });
      expect(afterLogout.status).toBe(401);
      expect(await afterLogout.json()).toEqual({
        success: false,
        error: "Invalid or expired session",
      });
    });
  });

  test("should map the same credential to the same user across logins", async () => {
    const { app } = createChatServerFixture();

    await withHttpServer(app, async (baseUrl) => {
      const first = await login(baseUrl, ALICE_CREDENTIAL);
      const second = await login(baseUrl, ALICE_CREDENTIAL);
      expect(first).not.toBe(second);

      const users = await Promise.all(
        [first, second].map(async (token) => {
          const res = await apiRequest(baseUrl, "/api/auth/verify", { token });
          return ((await res.json()) as { user: UserSummary }).user.id;
        }),
      );
      expect(users[0]).toBe(users[1]);
    });
  });

  test("should reject missing and unknown credentials", async () => {
    const { app, verifier } = createChatServerFixture();

    await withHttpServer(app, async (baseUrl) => {
      const missing = await apiRequest(baseUrl, "/api/auth/login", { body: {} });
      expect(missing.status).toBe(400);
      expect(await missing.json()).toEqual({
        success: false,
        error: "Token is required",
      });

      const blank = await apiRequest(baseUrl, "/api/auth/login", {
        body: { token: "   " },
      });
      expect(blank.status).toBe(400);

      const unknown = await apiRequest(baseUrl, "/api/auth/login", {
        body: { token: "not-a-real-key" },
      });
      expect(unknown.status).toBe(401);
      expect(await unknown.json()).toEqual({
        success: false,
        error: "Invalid token",
      });
      expect(verifier.calls).toEqual(["not-a-real-key"]);
    });
  });

  test("should answer unauthenticated identity and logout requests", async () => {
    const { app } = createChatServerFixture();

    await withHttpServer(app, async (baseUrl) => {
      const me = await apiRequest(baseUrl, "/api/auth/me");
      expect(me.status).toBe(200);
      expect(await me.json()).toEqual({ authenticated: false });

      const staleMe = await apiRequest(baseUrl, "/api/auth/me", {
        token: "stale-token",
      });
      expect(await staleMe.json()).toEqual({ authenticated: false });

      const logout = await apiRequest(baseUrl, "/api/auth/logout", {
        method: "POST",
      });
      expect(logout.status).toBe(200);
      expect(await logout.json()).toEqual({ success: true });

      const verify = await apiRequest(baseUrl, "/api/auth/verify");
      expect(verify.status).toBe(401);
      expect(await verify.json()).toEqual({
        success: false,
        error: "Authentication required",
      });
    });
  });

  test("should reject malformed bodies and unknown api routes", async () => {
    const { app } = createChatServerFixture();

    await withHttpServer(app, async (baseUrl) => {
      const malformed = await apiRequest(baseUrl, "/api/auth/login", {
        body: "{not json",
      });
      expect(malformed.status).toBe(400);
      expect(await malformed.json()).toEqual({
        success: false,
        error: "Malformed JSON body",
      });

      const unknown = await apiRequest(baseUrl, "/api/does-not-exist");
      expect(unknown.status).toBe(404);
      expect(await unknown.json()).toEqual({ success: false, error: "Not found" });
    });
  });

  test("should sweep expired sessions on health checks", async () => {
    let clock = 1_000;
    const sessionStore = new SessionStore({
      ttlMs: 60_000,
      secret: "test-secret",
      now: () => clock,
    });
    const { app } = createChatServerFixture({ sessionStore });

    await withHttpServer(app, async (baseUrl) => {
      const token = await login(baseUrl, ALICE_CREDENTIAL);
      expect(sessionStore.size).toBe(1);

      const fresh = await apiRequest(baseUrl, "/health");
      expect(fresh.status).toBe(200);
      expect(((await fresh.json()) as { status: string }).status).toBe("ok");
      expect(sessionStore.size).toBe(1);

      clock += 60_000;
      await apiRequest(baseUrl, "/health");
      expect(sessionStore.size).toBe(0);

      const verify = await apiRequest(baseUrl, "/api/auth/verify", { token });
      expect(verify.status).toBe(401);
    });
  });
});
