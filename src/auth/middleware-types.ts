/**
 * Authentication Middleware Type Definitions
 *
 * Extends Express Request with the user resolved by the OAuth middleware.
 *
 * @module auth/middleware-types
 */

import type { Request, Response, NextFunction } from "express";
import type { User } from "./oauth/oauth-types.js";

/**
 * Extend Express Request with the acting user
 * Using module augmentation (ES2015 module syntax) instead of namespace
 */
declare module "express-serve-static-core" {
  interface Request {
    /** User resolved from the Authorization header (guest when none matched) */
    user?: User;
  }
}

/**
 * Authentication middleware function type
 */
export type AuthMiddleware = (req: Request, res: Response, next: NextFunction) => Promise<void>;
