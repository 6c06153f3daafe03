import bcrypt from "bcrypt";
import type { Request, Response, NextFunction, RequestHandler } from "express";
import type { User, PublicUser } from "@shared/schema";
import type { IStorage } from "./storage";

const SALT_ROUNDS = 10;

declare module "express-session" {
  interface SessionData {
    userId?: number;
  }
}

declare global {
  namespace Express {
    interface Request {
      currentUser?: User;
    }
  }
}

export async function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, SALT_ROUNDS);
}

export async function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}

export async function authenticateUser(storage: IStorage, email: string, password: string): Promise<User | null> {
  const user = await storage.getUserByEmail(email);
  if (!user) return null;

  const isValid = await verifyPassword(password, user.password);
  if (!isValid) return null;

  return user;
}

export function toPublicUser(user: User): PublicUser {
  const { password: _password, avatarKey: _avatarKey, ...rest } = user;
  return rest;
}

/**
 * Loads the signed-in user into req.currentUser. A session whose user has
 * been deleted is treated as signed out.
 */
export function createRequireAuth(storage: IStorage): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction) => {
    const userId = req.session.userId;
    if (!userId) {
      return res.status(401).json({ error: "Not authenticated" });
    }

    try {
      const user = await storage.getUser(userId);
      if (!user) {
        req.session.userId = undefined;
        return res.status(401).json({ error: "Not authenticated" });
      }
      req.currentUser = user;
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireTeacher(req: Request, res: Response, next: NextFunction) {
  if (req.currentUser?.role !== "teacher") {
    return res.status(403).json({ error: "Only teachers can perform this action" });
  }
  next();
}

/** The user loaded by requireAuth; throws if a route forgot the guard. */
export function currentUser(req: Request): User {
  if (!req.currentUser) {
    throw new Error("currentUser() called on a route without requireAuth");
  }
  return req.currentUser;
}
