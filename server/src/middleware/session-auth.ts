import type { NextFunction, Request, RequestHandler, Response } from "express";
import "../types/express.js";
import { UnauthorizedError } from "../errors.js";
import type { AccountService, AuthContext } from "../services/account-service.js";

export function readBearerToken(req: Request): string | undefined {
  const header = req.get("authorization") ?? "";
  if (!header.startsWith("Bearer ")) {
    return undefined;
  }
  const token = header.slice("Bearer ".length).trim();
  return token.length > 0 ? token : undefined;
}

export interface SessionAuth {
  /** Binds `req.auth` or fails with 401. */
  readonly requireSession: RequestHandler;
  /** Binds `req.auth` when a live session is presented. */
  readonly optionalSession: RequestHandler;
}

export function createSessionAuth(accounts: AccountService): SessionAuth {
  const attach = async (req: Request): Promise<AuthContext | null> => {
    const token = readBearerToken(req);
    if (!token) {
      return null;
    }
    const auth = await accounts.authenticate(token);
    if (auth) {
      req.auth = auth;
    }
    return auth;
  };

  return {
    requireSession: async (req: Request, _res: Response, next: NextFunction) => {
      if (!readBearerToken(req)) {
        throw new UnauthorizedError("Authentication required");
      }
      if (!(await attach(req))) {
        throw new UnauthorizedError("Invalid or expired session");
      }
      next();
    },
    optionalSession: async (req: Request, _res: Response, next: NextFunction) => {
      await attach(req);
      next();
    },
  };
}

/** The session bound by `requireSession`; throws if the route skipped it. */
export function requireAuth(req: Request): AuthContext {
  if (!req.auth) {
    throw new UnauthorizedError();
  }
  return req.auth;
}
