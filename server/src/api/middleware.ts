import type { Request, Response, NextFunction, RequestHandler } from "express";
import { createLogger } from "../utils/logger.js";
import type { GameCoordinator } from "../game/coordinator.js";
import type { Session, SessionStore } from "./sessions.js";

const log = createLogger("auth");

export interface AuthenticatedRequest extends Request {
  auth: Session;
}

export function bearerToken(req: Request): string | null {
  const header = req.headers.authorization;
  if (typeof header !== "string") return null;
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match ? match[1] : null;
}

/**
 * Verifies the bearer session token.
 * On success, sets `req.auth` on the request object.
 */
export function sessionAuth(sessions: SessionStore): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = bearerToken(req);
    if (!token) {
      res.status(401).json({ error: "Missing Authorization header", code: "UNAUTHENTICATED" });
      return;
    }

    const session = sessions.get(token);
    if (!session) {
      log.debug({ path: req.path }, "Unknown or expired session");
      res.status(401).json({ error: "Session expired", code: "UNAUTHENTICATED" });
      return;
    }

    (req as AuthenticatedRequest).auth = session;
    next();
  };
}

/** Must run after sessionAuth. */
export function adminOnly(req: Request, res: Response, next: NextFunction): void {
  if (!(req as AuthenticatedRequest).auth.isAdmin) {
    res.status(403).json({ error: "Admin only", code: "PERMISSION_DENIED" });
    return;
  }
  next();
}

/** Admin or moderator. Must run after sessionAuth. */
export function modOnly(coordinator: GameCoordinator): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const { auth } = req as AuthenticatedRequest;
    if (auth.isAdmin || (auth.deviceId !== null && coordinator.isModerator(auth.deviceId))) {
      next();
      return;
    }
    log.warn({ deviceId: auth.deviceId, path: req.path }, "Moderator action refused");
    res.status(403).json({ error: "Moderator only", code: "PERMISSION_DENIED" });
  };
}
