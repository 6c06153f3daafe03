import type { Express, RequestHandler, Request, Response } from "express";
import { z } from "zod";
import {
  insertTaskSchema, updateTaskSchema, updateTaskStatusSchema, TASK_PRIORITIES, TASK_STATUSES,
  type TaskWithRefs,
} from "@shared/schema";
import { currentUser, requireTeacher } from "../auth";
import type { AppServices } from "../services";
import { handleRouteError, parseId, parsePagination } from "./helpers";

const taskQuerySchema = z.object({
  userId: z.coerce.number().int().optional(),
  teacherId: z.coerce.number().int().optional(),
  lectureId: z.coerce.number().int().optional(),
  status: z.enum(TASK_STATUSES, { errorMap: () => ({ message: "Invalid status" }) }).optional(),
  priority: z.enum(TASK_PRIORITIES, { errorMap: () => ({ message: "Invalid priority" }) }).optional(),
});

const STUDENT_STATUSES = new Set(["pending", "completed"]);

export function registerTaskRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage } = services;

  // Teachers see every task; students only their own.
  async function loadVisibleTask(req: Request, res: Response): Promise<TaskWithRefs | null> {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: "Invalid task ID" });
      return null;
    }
    const task = await storage.getTask(id);
    const user = currentUser(req);
    if (!task || (user.role === "student" && task.assignedToId !== user.id)) {
      res.status(404).json({ error: "Task not found" });
      return null;
    }
    return task;
  }

  async function validateReferences(lectureId: number | null | undefined, assignedToId: number | null | undefined) {
    if (lectureId != null && !(await storage.getLecture(lectureId))) {
      return "Lecture not found";
    }
    if (assignedToId != null && !(await storage.getUser(assignedToId))) {
      return "Assigned user not found";
    }
    return null;
  }

  app.get("/api/tasks", requireAuth, async (req, res) => {
    try {
      const query = taskQuerySchema.parse(req.query);
      const pagination = parsePagination(req.query);
      const user = currentUser(req);

      const page = await storage.getTasks({
        assignedToId: user.role === "student" ? user.id : query.userId,
        teacherId: query.teacherId,
        lectureId: query.lectureId,
        status: query.status,
        priority: query.priority,
        ...pagination,
      });
      res.json({ tasks: page.items, total: page.total, ...pagination });
    } catch (error) {
      handleRouteError(res, error, "Error fetching tasks", "Failed to fetch tasks");
    }
  });

  app.post("/api/tasks", requireAuth, requireTeacher, async (req, res) => {
    try {
      const validated = insertTaskSchema.parse(req.body);
      const problem = await validateReferences(validated.lectureId, validated.assignedToId);
      if (problem) {
        return res.status(404).json({ error: problem });
      }

      const task = await storage.createTask(validated);
      if (task.assignedToId !== null) {
        await storage.createNotifications([{
          userId: task.assignedToId,
          type: "task_assigned",
          title: "New task assigned",
          message: task.title,
          data: { taskId: task.id, lectureId: task.lectureId },
        }]);
      }
      res.status(201).json(await storage.getTask(task.id));
    } catch (error) {
      handleRouteError(res, error, "Error creating task", "Failed to create task");
    }
  });

  app.get("/api/tasks/:id", requireAuth, async (req, res) => {
    try {
      const task = await loadVisibleTask(req, res);
      if (!task) return;
      res.json(task);
    } catch (error) {
      handleRouteError(res, error, "Error fetching task", "Failed to fetch task");
    }
  });

  app.put("/api/tasks/:id", requireAuth, requireTeacher, async (req, res) => {
    try {
      const task = await loadVisibleTask(req, res);
      if (!task) return;

      const updates = updateTaskSchema.parse(req.body);
      const problem = await validateReferences(undefined, updates.assignedToId);
      if (problem) {
        return res.status(404).json({ error: problem });
      }

      const dueChanged = updates.dueDate !== undefined
        && (updates.dueDate?.getTime() ?? null) !== (task.dueDate?.getTime() ?? null);
      await storage.updateTask(task.id, dueChanged ? { ...updates, dueNotifiedAt: null } : updates);
      res.json(await storage.getTask(task.id));
    } catch (error) {
      handleRouteError(res, error, "Error updating task", "Failed to update task");
    }
  });

  app.put("/api/tasks/:id/status", requireAuth, async (req, res) => {
    try {
      const task = await loadVisibleTask(req, res);
      if (!task) return;

      const { status } = updateTaskStatusSchema.parse(req.body);
      if (currentUser(req).role === "student" && !STUDENT_STATUSES.has(status)) {
        return res.status(403).json({ error: "Students can only mark tasks pending or completed" });
      }

      await storage.updateTask(task.id, { status });
      res.json(await storage.getTask(task.id));
    } catch (error) {
      handleRouteError(res, error, "Error updating task status", "Failed to update task status");
    }
  });

  app.post("/api/tasks/:id/approve", requireAuth, requireTeacher, async (req, res) => {
    try {
      const task = await loadVisibleTask(req, res);
      if (!task) return;

      await storage.updateTask(task.id, { status: "approved" });
      if (task.assignedToId !== null) {
        await storage.createNotifications([{
          userId: task.assignedToId,
          type: "task_approved",
          title: "Task approved",
          message: `Your teacher approved "${task.title}".`,
          data: { taskId: task.id, lectureId: task.lectureId },
        }]);
      }
      res.json(await storage.getTask(task.id));
    } catch (error) {
      handleRouteError(res, error, "Error approving task", "Failed to approve task");
    }
  });

  app.delete("/api/tasks/:id", requireAuth, requireTeacher, async (req, res) => {
    try {
      const task = await loadVisibleTask(req, res);
      if (!task) return;

      await storage.deleteTask(task.id);
      res.json({ message: "Task deleted successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error deleting task", "Failed to delete task");
    }
  });
}
