import type { Express, RequestHandler, Request, Response } from "express";
import { z } from "zod";
import { createChatRoomSchema, sendMessageSchema, type ChatRoom } from "@shared/schema";
import { currentUser } from "../auth";
import { contentTypeFor, documentKey, DOCUMENT_EXTENSIONS, hasAllowedExtension } from "../objectStore";
import type { AppServices } from "../services";
import { unreadCountFor } from "../storage";
import { acceptUpload, documentUpload, DOCUMENT_MAX_BYTES } from "../uploads";
import { handleRouteError, parseId, parsePagination } from "./helpers";

const documentCaptionSchema = z.string().trim().max(2000).optional();

export function registerChatRoutes(app: Express, services: AppServices, requireAuth: RequestHandler): void {
  const { storage, objectStore } = services;

  async function loadMemberRoom(req: Request, res: Response): Promise<ChatRoom | null> {
    const id = parseId(req.params.id);
    if (id === null) {
      res.status(400).json({ error: "Invalid chat room ID" });
      return null;
    }
    const room = await storage.getChatRoom(id);
    if (!room) {
      res.status(404).json({ error: "Chat room not found" });
      return null;
    }
    const userId = currentUser(req).id;
    if (room.teacherId !== userId && room.studentId !== userId) {
      res.status(403).json({ error: "You are not a member of this chat room" });
      return null;
    }
    return room;
  }

  async function removeDocuments(keys: string[]) {
    if (!objectStore) return;
    for (const key of keys) {
      try {
        await objectStore.remove(key);
      } catch (error) {
        console.error(`Failed to delete chat document ${key}:`, error);
      }
    }
  }

  app.get("/api/chat/rooms", requireAuth, async (req, res) => {
    try {
      const rooms = await storage.getChatRoomsForUser(currentUser(req).id);
      res.json({ rooms, total: rooms.length });
    } catch (error) {
      handleRouteError(res, error, "Error fetching chat rooms", "Failed to fetch chat rooms");
    }
  });

  app.post("/api/chat/rooms", requireAuth, async (req, res) => {
    try {
      const { teacherId, studentId } = createChatRoomSchema.parse(req.body);
      const user = currentUser(req);
      if (user.id !== teacherId && user.id !== studentId) {
        return res.status(403).json({ error: "You can only create chat rooms you are part of" });
      }

      const [teacher, student] = await Promise.all([storage.getUser(teacherId), storage.getUser(studentId)]);
      if (!teacher || !student) {
        return res.status(404).json({ error: "User not found" });
      }
      if (teacher.role !== "teacher") {
        return res.status(400).json({ error: "First user must be a teacher" });
      }
      if (student.role !== "student") {
        return res.status(400).json({ error: "Second user must be a student" });
      }

      const existing = await storage.getChatRoomByPair(teacherId, studentId);
      if (existing) {
        return res.json(existing);
      }
      res.status(201).json(await storage.createChatRoom(teacherId, studentId));
    } catch (error) {
      handleRouteError(res, error, "Error creating chat room", "Failed to create chat room");
    }
  });

  app.get("/api/chat/unread-count", requireAuth, async (req, res) => {
    try {
      const unreadCount = await storage.getChatUnreadCount(currentUser(req).id);
      res.json({ unreadCount });
    } catch (error) {
      handleRouteError(res, error, "Error counting unread messages", "Failed to count unread messages");
    }
  });

  app.get("/api/chat/rooms/:id", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;
      res.json({ ...room, unreadCount: unreadCountFor(room, currentUser(req).id) });
    } catch (error) {
      handleRouteError(res, error, "Error fetching chat room", "Failed to fetch chat room");
    }
  });

  app.delete("/api/chat/rooms/:id", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;

      const keys = await storage.getChatDocumentKeys(room.id);
      await storage.deleteChatRoom(room.id);
      await removeDocuments(keys);
      res.json({ message: "Chat room deleted successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error deleting chat room", "Failed to delete chat room");
    }
  });

  app.get("/api/chat/rooms/:id/messages", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;

      const pagination = parsePagination(req.query, 50);
      const page = await storage.getChatMessages(room.id, pagination);
      await storage.markChatRoomRead(room.id, currentUser(req).id);
      res.json({ messages: page.items, total: page.total, ...pagination });
    } catch (error) {
      handleRouteError(res, error, "Error fetching messages", "Failed to fetch messages");
    }
  });

  app.post("/api/chat/rooms/:id/messages", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;

      const { message } = sendMessageSchema.parse(req.body);
      const created = await storage.createChatMessage({
        chatRoomId: room.id,
        senderId: currentUser(req).id,
        message,
      });
      res.status(201).json(created);
    } catch (error) {
      handleRouteError(res, error, "Error sending message", "Failed to send message");
    }
  });

  app.post(
    "/api/chat/rooms/:id/documents",
    requireAuth,
    acceptUpload(documentUpload.single("document"), DOCUMENT_MAX_BYTES),
    async (req, res) => {
      try {
        const room = await loadMemberRoom(req, res);
        if (!room) return;

        const file = req.file;
        if (!file) {
          return res.status(400).json({ error: "No document provided" });
        }
        if (!hasAllowedExtension(file.originalname, DOCUMENT_EXTENSIONS)) {
          return res.status(400).json({ error: `Invalid file type. Allowed: ${DOCUMENT_EXTENSIONS.join(", ")}` });
        }
        const caption = documentCaptionSchema.parse(req.body?.message);
        if (!objectStore) {
          return res.status(503).json({ error: "Storage service not available" });
        }

        const key = documentKey(room.id, file.originalname);
        const contentType = contentTypeFor(file.originalname);
        const documentUrl = await objectStore.put(key, file.buffer, contentType);

        const created = await storage.createChatMessage({
          chatRoomId: room.id,
          senderId: currentUser(req).id,
          message: caption || `Shared a document: ${file.originalname}`,
          documentUrl,
          documentKey: key,
          documentName: file.originalname.slice(0, 255),
          documentSize: file.size,
          documentType: contentType,
        });
        res.status(201).json(created);
      } catch (error) {
        handleRouteError(res, error, "Error uploading document", "Failed to upload document");
      }
    }
  );

  app.delete("/api/chat/rooms/:id/messages/:messageId", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;

      const messageId = parseId(req.params.messageId);
      if (messageId === null) {
        return res.status(400).json({ error: "Invalid message ID" });
      }
      const message = await storage.getChatMessage(messageId);
      if (!message) {
        return res.status(404).json({ error: "Message not found" });
      }
      if (message.chatRoomId !== room.id) {
        return res.status(400).json({ error: "Message does not belong to this chat room" });
      }
      if (message.senderId !== currentUser(req).id) {
        return res.status(403).json({ error: "You can only delete your own messages" });
      }

      await storage.deleteChatMessage(message.id);
      if (message.documentKey) {
        await removeDocuments([message.documentKey]);
      }
      res.json({ message: "Message deleted successfully" });
    } catch (error) {
      handleRouteError(res, error, "Error deleting message", "Failed to delete message");
    }
  });

  app.put("/api/chat/rooms/:id/mark-read", requireAuth, async (req, res) => {
    try {
      const room = await loadMemberRoom(req, res);
      if (!room) return;

      const markedCount = await storage.markChatRoomRead(room.id, currentUser(req).id);
      res.json({ message: "Messages marked as read", markedCount });
    } catch (error) {
      handleRouteError(res, error, "Error marking messages read", "Failed to mark messages as read");
    }
  });
}
