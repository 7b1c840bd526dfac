import type { Request, Response, NextFunction } from "express";
import { userIdSchema } from "../types/contracts.js";
import { logger } from "../utils/logger.js";
import { unauthorized } from "./error.js";

/**
 * Rejects requests whose user id (body, route param or query string) is not on the
 * allow-list. Malformed ids fall through to the route's own validation.
 */
export function requireAuthorizedUser(authorizedUsers: readonly number[]) {
  const allowed = new Set(authorizedUsers);

  return (req: Request, _res: Response, next: NextFunction) => {
    const raw = pickUserId(req);
    const parsed = userIdSchema.safeParse(raw);
    if (!parsed.success) {
      next();
      return;
    }

    if (!allowed.has(parsed.data)) {
      logger.warn({ msg: "Unauthorized access attempt", userId: parsed.data });
      next(unauthorized());
      return;
    }

    next();
  };
}

function pickUserId(req: Request): unknown {
  const body: unknown = req.body;
  if (typeof body === "object" && body !== null && "userId" in body) {
    return body.userId;
  }
  return req.params.userId ?? req.query.userId;
}
