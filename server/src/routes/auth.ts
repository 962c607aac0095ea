import { Router } from "express";
import { z } from "zod";
import {
  readBearerToken,
  requireAuth,
  type SessionAuth,
} from "../middleware/session-auth.js";
import type { AccountService } from "../services/account-service.js";
import { toUserSummary } from "./serializers.js";
import { parseBody } from "./validation.js";

const loginSchema = z.object({
  token: z.string().trim().min(1, "Token is required").default(""),
});

export function createAuthRouter(input: {
  accounts: AccountService;
  auth: SessionAuth;
}): Router {
  const { accounts, auth } = input;
  const router = Router();

  router.post("/auth/login", async (req, res) => {
    const body = parseBody(loginSchema, req.body);
    const result = await accounts.login(body.token);

    res.json({
      success: true,
      user: toUserSummary(result.user),
      session_token: result.sessionToken,
      expires_at: result.expiresAt.toISOString(),
    });
  });

  router.post("/auth/logout", (req, res) => {
    accounts.logout(readBearerToken(req));
    res.json({ success: true });
  });

  router.get("/auth/verify", auth.requireSession, (req, res) => {
    const { user } = requireAuth(req);
    res.json({ success: true, valid: true, user: toUserSummary(user) });
  });

  router.get("/auth/me", auth.optionalSession, (req, res) => {
    if (!req.auth) {
      res.json({ authenticated: false });
      return;
    }
    res.json({ authenticated: true, user: toUserSummary(req.auth.user) });
  });

  return router;
}
