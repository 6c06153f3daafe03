import type { Express, RequestHandler } from "express";
import { z } from "zod";
import { changePasswordSchema, loginSchema, registerUserSchema, updateProfileSchema, USER_ROLES } from "@shared/schema";
import { authenticateUser, currentUser, hashPassword, toPublicUser, verifyPassword } from "../auth";
import { contentTypeFor, hasAllowedExtension, IMAGE_EXTENSIONS, profileImageKey } from "../objectStore";
import type { AppServices } from "../services";
import { acceptUpload, avatarUpload, AVATAR_MAX_BYTES } from "../uploads";
import { log } from "../log";
import { handleRouteError, isUniqueViolation, parseId } from "./helpers";

export function registerAuthRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage, objectStore, loginLimiter } = services;

  async function removeStoredObjects(keys: string[]) {
    if (!objectStore) return;
    for (const key of keys) {
      try {
        await objectStore.remove(key);
      } catch (error) {
        console.error(`Failed to delete stored object ${key}:`, error);
      }
    }
  }

  app.post("/api/auth/register", async (req, res) => {
    try {
      const { password, ...profile } = registerUserSchema.parse(req.body);

      const existingUser = await storage.getUserByEmail(profile.email);
      if (existingUser) {
        return res.status(409).json({ error: "Email already registered" });
      }

      const user = await storage.createUser({ ...profile, password: await hashPassword(password) });
      req.session.userId = user.id;

      res.status(201).json(toPublicUser(user));
    } catch (error) {
      if (isUniqueViolation(error)) {
        return res.status(409).json({ error: "Email already registered" });
      }
      handleRouteError(res, error, "Registration error", "Failed to create account");
    }
  });

  app.post("/api/auth/login", async (req, res) => {
    try {
      const ip = req.ip || "unknown";
      if (!loginLimiter.check(ip)) {
        return res.status(429).json({ error: "Too many login attempts. Please try again later." });
      }

      const validated = loginSchema.parse(req.body);
      const user = await authenticateUser(storage, validated.email, validated.password);
      if (!user) {
        return res.status(401).json({ error: "Invalid email or password" });
      }

      loginLimiter.reset(ip);
      req.session.userId = user.id;
      res.json(toPublicUser(user));
    } catch (error) {
      handleRouteError(res, error, "Login error", "Failed to log in");
    }
  });

  app.post("/api/auth/logout", (req, res) => {
    req.session.destroy((err) => {
      if (err) {
        console.error("Logout error:", err);
        return res.status(500).json({ error: "Failed to log out" });
      }
      res.json({ message: "Logged out successfully" });
    });
  });

  app.get("/api/auth/me", requireAuth, (req, res) => {
    res.json(toPublicUser(currentUser(req)));
  });

  app.get("/api/auth/users", requireAuth, async (req, res) => {
    try {
      const { role } = z.object({
        role: z.enum(USER_ROLES, { errorMap: () => ({ message: "Role must be teacher or student" }) }).optional(),
      }).parse(req.query);

      const users = await storage.getUsers(role);
      res.json({ users: users.map(toPublicUser), total: users.length });
    } catch (error) {
      handleRouteError(res, error, "Error fetching users", "Failed to fetch users");
    }
  });

  app.get("/api/auth/users/:id", requireAuth, async (req, res) => {
    try {
      const id = parseId(req.params.id);
      if (id === null) {
        return res.status(400).json({ error: "Invalid user ID" });
      }
      const user = await storage.getUser(id);
      if (!user) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json(toPublicUser(user));
    } catch (error) {
      handleRouteError(res, error, "Error fetching user", "Failed to fetch user");
    }
  });

  app.put("/api/auth/profile", requireAuth, async (req, res) => {
    try {
      const updates = updateProfileSchema.parse(req.body);
      const user = await storage.updateUser(currentUser(req).id, updates);
      if (!user) {
        return res.status(404).json({ error: "User not found" });
      }
      res.json(toPublicUser(user));
    } catch (error) {
      handleRouteError(res, error, "Error updating profile", "Failed to update profile");
    }
  });

  app.put("/api/auth/password", requireAuth, async (req, res) => {
    try {
      const { currentPassword, newPassword } = changePasswordSchema.parse(req.body);
      const user = currentUser(req);
      if (!(await verifyPassword(currentPassword, user.password))) {
        return res.status(401).json({ error: "Current password is incorrect" });
      }

      await storage.updateUser(user.id, { password: await hashPassword(newPassword) });
      log(`Password changed for user ${user.id}`, "auth");
      res.json({ message: "Password changed successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error changing password", "Failed to change password");
    }
  });

  app.post(
    "/api/auth/profile/avatar",
    requireAuth,
    acceptUpload(avatarUpload.single("avatar"), AVATAR_MAX_BYTES),
    async (req, res) => {
      try {
        const file = req.file;
        if (!file) {
          return res.status(400).json({ error: "No image file provided" });
        }
        if (!hasAllowedExtension(file.originalname, IMAGE_EXTENSIONS)) {
          return res.status(400).json({ error: `Invalid file type. Allowed: ${IMAGE_EXTENSIONS.join(", ")}` });
        }
        if (!objectStore) {
          return res.status(503).json({ error: "Storage service not available" });
        }

        const user = currentUser(req);
        const avatarKey = profileImageKey(user.id, file.originalname);
        const avatarUrl = await objectStore.put(avatarKey, file.buffer, contentTypeFor(file.originalname));
        const updated = await storage.updateUser(user.id, { avatarUrl, avatarKey });
        if (!updated) {
          return res.status(404).json({ error: "User not found" });
        }
        if (user.avatarKey) {
          await removeStoredObjects([user.avatarKey]);
        }
        res.json(toPublicUser(updated));
      } catch (error) {
        handleRouteError(res, error, "Error uploading avatar", "Failed to upload profile image");
      }
    }
  );

  app.delete("/api/auth/account", requireAuth, async (req, res) => {
    try {
      const userId = currentUser(req).id;
      const keys = await storage.getUserObjectKeys(userId);
      await storage.deleteUser(userId);
      await removeStoredObjects(keys);
      req.session.destroy((err) => {
        if (err) {
          console.error("Session destroy error:", err);
        }
        res.json({ message: "Account deleted successfully" });
      });
    } catch (error) {
      handleRouteError(res, error, "Error deleting account", "Failed to delete account");
    }
  });
}
