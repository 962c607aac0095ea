import { randomUUID } from "node:crypto";
import type { RequestHandler } from "express";
import type { Logger } from "../observability/logger.js";

export function createRequestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const startedAt = Date.now();
    const requestId = randomUUID();
    res.on("finish", () => {
      const fields = {
        requestId,
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      };
      if (res.statusCode >= 500) {
        logger.error("request failed", fields);
      } else if (res.statusCode >= 400) {
        logger.warn("request rejected", fields);
      } else {
        logger.info("request completed", fields);
      }
    });
    next();
  };
}
