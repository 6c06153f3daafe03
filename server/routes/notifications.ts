import type { Express, RequestHandler, Request, Response } from "express";
import { z } from "zod";
import { insertNotificationSchema, NOTIFICATION_TYPES, type Notification } from "@shared/schema";
import { currentUser, requireTeacher } from "../auth";
import type { AppServices } from "../services";
import { handleRouteError, parseBooleanQuery, parseId, parsePagination } from "./helpers";

const notificationQuerySchema = z.object({
  type: z.enum(NOTIFICATION_TYPES, { errorMap: () => ({ message: "Invalid notification type" }) }).optional(),
});

export function registerNotificationRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage } = services;

  // Notifications of other users answer 404.
  async function loadOwnNotification(req: Request, res: Response): Promise<Notification | null> {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: "Invalid notification ID" });
      return null;
    }
    const notification = await storage.getNotification(id);
    if (!notification || notification.userId !== currentUser(req).id) {
      res.status(404).json({ error: "Notification not found" });
      return null;
    }
    return notification;
  }

  app.get("/api/notifications", requireAuth, async (req, res) => {
    try {
      const { type } = notificationQuerySchema.parse(req.query);
      const pagination = parsePagination(req.query);
      const page = await storage.getNotifications({
        userId: currentUser(req).id,
        type,
        isRead: parseBooleanQuery(req.query.isRead),
        ...pagination,
      });
      res.json({ notifications: page.items, total: page.total, ...pagination });
    } catch (error) {
      handleRouteError(res, error, "Error fetching notifications", "Failed to fetch notifications");
    }
  });

  app.post("/api/notifications", requireAuth, requireTeacher, async (req, res) => {
    try {
      const validated = insertNotificationSchema.parse(req.body);
      if (!(await storage.getUser(validated.userId))) {
        return res.status(404).json({ error: "User not found" });
      }
      const [notification] = await storage.createNotifications([validated]);
      res.status(201).json(notification);
    } catch (error) {
      handleRouteError(res, error, "Error creating notification", "Failed to create notification");
    }
  });

  app.get("/api/notifications/unread-count", requireAuth, async (req, res) => {
    try {
      const unreadCount = await storage.getUnreadNotificationCount(currentUser(req).id);
      res.json({ unreadCount });
    } catch (error) {
      handleRouteError(res, error, "Error counting notifications", "Failed to count notifications");
    }
  });

  app.put("/api/notifications/read-all", requireAuth, async (req, res) => {
    try {
      const updated = await storage.markAllNotificationsRead(currentUser(req).id);
      res.json({ message: "All notifications marked as read", updated });
    } catch (error) {
      handleRouteError(res, error, "Error marking notifications read", "Failed to update notifications");
    }
  });

  app.get("/api/notifications/:id", requireAuth, async (req, res) => {
    try {
      const notification = await loadOwnNotification(req, res);
      if (!notification) return;
      res.json(notification);
    } catch (error) {
      handleRouteError(res, error, "Error fetching notification", "Failed to fetch notification");
    }
  });

  app.put("/api/notifications/:id/read", requireAuth, async (req, res) => {
    try {
      const notification = await loadOwnNotification(req, res);
      if (!notification) return;
      res.json(await storage.setNotificationRead(notification.id, true));
    } catch (error) {
      handleRouteError(res, error, "Error updating notification", "Failed to update notification");
    }
  });

  app.put("/api/notifications/:id/unread", requireAuth, async (req, res) => {
    try {
      const notification = await loadOwnNotification(req, res);
      if (!notification) return;
      res.json(await storage.setNotificationRead(notification.id, false));
    } catch (error) {
      handleRouteError(res, error, "Error updating notification", "Failed to update notification");
    }
  });

  app.delete("/api/notifications/:id", requireAuth, async (req, res) => {
    try {
      const notification = await loadOwnNotification(req, res);
      if (!notification) return;
      await storage.deleteNotification(notification.id);
      res.json({ message: "Notification deleted successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error deleting notification", "Failed to delete notification");
    }
  });
}
