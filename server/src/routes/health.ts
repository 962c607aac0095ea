import { Router } from "express";
import type { SessionStore } from "../auth/session-store.js";

export function createHealthRouter(sessions: SessionStore): Router {
  const router = Router();

  router.get("/health", (_req, res) => {
    sessions.sweepExpired();
    res.json({ status: "ok", time: new Date().toISOString() });
  });

  return router;
}
