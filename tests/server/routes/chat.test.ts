import { z } from "zod";
import { idBodySchema, readJson, signUp, startTestApp, type SignedInUser, type TestContext } from "../../support/testApp";

const messageBodySchema = z.object({
  id: z.number(),
  chatRoomId: z.number(),
  senderId: z.number(),
  message: z.string(),
  isRead: z.boolean(),
  documentUrl: z.string().nullable(),
  documentKey: z.string().nullable(),
  documentName: z.string().nullable(),
  documentSize: z.number().nullable(),
  documentType: z.string().nullable(),
});

describe("chat routes", () => {
  let ctx: TestContext;
  let teacher: SignedInUser;
  let student: SignedInUser;
  let outsider: SignedInUser;

  async function openRoom(): Promise<number> {
    const res = await student.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: student.id });
    return (await readJson(res, idBodySchema)).id;
  }

  async function send(user: SignedInUser, roomId: number, message: string) {
    const res = await user.client.post(`/api/chat/rooms/${roomId}/messages`, { message });
    expect(res.status).toBe(201);
    return readJson(res, messageBodySchema);
  }

  beforeEach(async () => {
    ctx = await startTestApp();
    teacher = await signUp(ctx, "teacher");
    student = await signUp(ctx, "student");
    outsider = await signUp(ctx, "student");
  });

  afterEach(async () => {
    await ctx.close();
  });

  describe("rooms", () => {
    it("creates one room per teacher and student pair", async () => {
      const first = await student.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: student.id });
      expect(first.status).toBe(201);
      const room = await readJson(first, idBodySchema);

      const again = await teacher.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: student.id });
      expect(again.status).toBe(200);
      expect((await readJson(again, idBodySchema)).id).toBe(room.id);
    });

    it("checks member roles", async () => {
      const swapped = await student.client.post("/api/chat/rooms", { teacherId: student.id, studentId: teacher.id });
      expect(swapped.status).toBe(400);
      expect(await swapped.json()).toEqual({ error: "First user must be a teacher" });

      const twoTeachers = await teacher.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: teacher.id });
      expect(twoTeachers.status).toBe(400);
      expect(await twoTeachers.json()).toEqual({ error: "Second user must be a student" });
    });

    it("only lets members create a room", async () => {
      const res = await outsider.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: student.id });
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: "You can only create chat rooms you are part of" });
    });

    it("answers 404 for an unknown member", async () => {
      const res = await teacher.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: 999999 });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "User not found" });
    });

    it("keeps non-members out", async () => {
      const roomId = await openRoom();
      const res = await outsider.client.get(`/api/chat/rooms/${roomId}`);
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({ error: "You are not a member of this chat room" });
    });

    it("lists rooms with the other member and unread count", async () => {
      const roomId = await openRoom();
      await send(student, roomId, "Is the quiz open book?");

      const res = await teacher.client.get("/api/chat/rooms");
      const body = await readJson(res, z.object({
        rooms: z.array(z.object({
          id: z.number(),
          lastMessage: z.string().nullable(),
          unreadCount: z.number(),
          otherUser: z.object({ id: z.number(), role: z.string() }).nullable(),
        })),
        total: z.number(),
      }));

      expect(body.total).toBe(1);
      expect(body.rooms[0]).toMatchObject({
        id: roomId,
        lastMessage: "Is the quiz open book?",
        unreadCount: 1,
        otherUser: { id: student.id, role: "student" },
      });
    });
  });

  describe("messages", () => {
    it("marks messages read when the other member opens the room", async () => {
      const roomId = await openRoom();
      await send(student, roomId, "Hello");
      await send(student, roomId, "Are you there?");

      expect(await (await teacher.client.get("/api/chat/unread-count")).json()).toEqual({ unreadCount: 2 });

      const res = await teacher.client.get(`/api/chat/rooms/${roomId}/messages`);
      const body = await readJson(res, z.object({
        messages: z.array(messageBodySchema),
        total: z.number(),
        limit: z.number(),
        offset: z.number(),
      }));
      expect(body.messages.map((m) => m.message)).toEqual(["Hello", "Are you there?"]);
      expect(body.limit).toBe(50);

      expect(await (await teacher.client.get("/api/chat/unread-count")).json()).toEqual({ unreadCount: 0 });
    });

    it("validates the message text", async () => {
      const roomId = await openRoom();

      const empty = await student.client.post(`/api/chat/rooms/${roomId}/messages`, { message: "   " });
      expect(empty.status).toBe(400);
      expect(await empty.json()).toEqual({ error: "Message cannot be empty" });

      const missing = await student.client.post(`/api/chat/rooms/${roomId}/messages`, {});
      expect(await missing.json()).toEqual({ error: "Message is required" });
    });

    it("reports how many messages were marked read", async () => {
      const roomId = await openRoom();
      await send(teacher, roomId, "Office hours moved");
      await send(teacher, roomId, "to Thursday");
      await send(student, roomId, "Thanks");

      const res = await student.client.put(`/api/chat/rooms/${roomId}/mark-read`);
      expect(await res.json()).toEqual({ message: "Messages marked as read", markedCount: 2 });
    });

    it("only lets the sender delete a message", async () => {
      const roomId = await openRoom();
      const sent = await send(student, roomId, "Oops");

      const byTeacher = await teacher.client.delete(`/api/chat/rooms/${roomId}/messages/${sent.id}`);
      expect(byTeacher.status).toBe(403);
      expect(await byTeacher.json()).toEqual({ error: "You can only delete your own messages" });

      const bySender = await student.client.delete(`/api/chat/rooms/${roomId}/messages/${sent.id}`);
      expect(await bySender.json()).toEqual({ message: "Message deleted successfully" });
    });

    it("rejects deleting a message through another room", async () => {
      const roomId = await openRoom();
      const sent = await send(student, roomId, "Here");
      const otherRoom = await readJson(
        await outsider.client.post("/api/chat/rooms", { teacherId: teacher.id, studentId: outsider.id }),
        idBodySchema
      );

      const res = await teacher.client.delete(`/api/chat/rooms/${otherRoom.id}/messages/${sent.id}`);
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ error: "Message does not belong to this chat room" });
    });
  });

  describe("documents", () => {
    function documentForm(fileName: string, caption?: string): FormData {
      const form = new FormData();
      if (caption !== undefined) form.append("message", caption);
      form.append("document", new Blob(["%PDF-1.4 test"], { type: "application/pdf" }), fileName);
      return form;
    }

    it("stores the document and posts a message for it", async () => {
      const roomId = await openRoom();

      const res = await teacher.client.post(`/api/chat/rooms/${roomId}/documents`, documentForm("Syllabus 2026.pdf"));

      expect(res.status).toBe(201);
      const message = await readJson(res, messageBodySchema);
      expect(message).toMatchObject({
        message: "Shared a document: Syllabus 2026.pdf",
        documentName: "Syllabus 2026.pdf",
        documentSize: 13,
        documentType: "application/pdf",
      });
      expect(message.documentKey).toMatch(new RegExp(`^documents/${roomId}/[0-9a-f]{32}_Syllabus_2026\\.pdf$`));
      expect(message.documentUrl).toBe(`https://files.test/${message.documentKey}`);
    });

    it("uses the caption when one is given", async () => {
      const roomId = await openRoom();
      const res = await student.client.post(`/api/chat/rooms/${roomId}/documents`, documentForm("essay.pdf", "My draft"));
      expect((await readJson(res, messageBodySchema)).message).toBe("My draft");
    });

    it("rejects unsupported documents", async () => {
      const roomId = await openRoom();
      const res = await student.client.post(`/api/chat/rooms/${roomId}/documents`, documentForm("virus.exe"));
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Invalid file type. Allowed: pdf, doc, docx, ppt, pptx, xls, xlsx, txt, png, jpg, jpeg",
      });
    });

    it("removes stored documents with the room", async () => {
      const roomId = await openRoom();
      const shared = await readJson(
        await teacher.client.post(`/api/chat/rooms/${roomId}/documents`, documentForm("notes.pdf")),
        messageBodySchema
      );

      const res = await student.client.delete(`/api/chat/rooms/${roomId}`);

      expect(await res.json()).toEqual({ message: "Chat room deleted successfully" });
      expect(ctx.objectStore.removed).toEqual([shared.documentKey]);
      expect(await ctx.storage.getChatRoom(roomId)).toBeUndefined();
    });
  });
});
