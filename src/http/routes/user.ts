/**
 * Current User Route
 *
 * `GET /me` reports the user the OAuth middleware resolved for the request.
 */

import { Router } from "express";
import type { Request, Response, NextFunction } from "express";
import type { CurrentUserResponse } from "../types.js";
import { unauthorized } from "../middleware/error-handler.js";

export function createUserRouter(): Router {
  const router = Router();

  router.get("/me", (req: Request, res: Response, next: NextFunction): void => {
    const user = req.user;
    if (!user?.token) {
      next(unauthorized("Authentication required", "UNAUTHORIZED"));
      return;
    }

    const response: CurrentUserResponse = {
      id: user.id,
      provider: user.provider,
      name: user.name,
      email: user.email,
    };
    res.status(200).json(response);
  });

  return router;
}
