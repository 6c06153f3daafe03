import {
  type User, type InsertUser, type Lecture, type InsertLecture, type LectureWithTeacher,
  type Task, type InsertTask, type TaskWithRefs, type TaskStatus, type TaskPriority,
  type Notification, type InsertNotification, type NotificationType,
  type ChatRoom, type ChatMessage, type InsertChatMessage, type UserRole,
} from "@shared/schema";
import { users, lectures, tasks, notifications, chatRooms, chatMessages } from "@shared/schema";
import { eq, desc, asc, and, or, lt, lte, gte, ne, sql, count, ilike, inArray, isNull, isNotNull, notInArray, type SQL } from "drizzle-orm";
import { alias } from "drizzle-orm/pg-core";
import type { Database } from "./db";

export interface Page<T> {
  items: T[];
  total: number;
}

export interface Pagination {
  limit: number;
  offset: number;
}

export interface LectureFilters extends Pagination {
  teacherId?: number;
  subject?: string;
}

export interface TaskFilters extends Pagination {
  assignedToId?: number;
  teacherId?: number;
  lectureId?: number;
  status?: TaskStatus;
  priority?: TaskPriority;
}

export interface NotificationFilters extends Pagination {
  userId: number;
  type?: NotificationType;
  isRead?: boolean;
}

export interface LectureCounts {
  total: number;
  processed: number;
  unprocessed: number;
}

export interface ProcessedLectureData {
  /** The recording the run started from; a replaced recording leaves the lecture untouched. */
  audioUrl: string;
  transcript: string;
  summary: string;
  keyPoints: string[] | null;
  tasks: InsertTask[];
}

export interface ChatParticipant {
  id: number;
  name: string;
  role: UserRole;
  avatarUrl: string | null;
}

export type ChatRoomSummary = ChatRoom & {
  otherUser: ChatParticipant | null;
  unreadCount: number;
};

export const LAST_MESSAGE_PREVIEW_LENGTH = 100;

export interface IStorage {
  ping(): Promise<boolean>;

  getUser(id: number): Promise<User | undefined>;
  getUserByEmail(email: string): Promise<User | undefined>;
  getUsers(role?: UserRole): Promise<User[]>;
  createUser(user: InsertUser): Promise<User>;
  updateUser(id: number, updates: Partial<InsertUser>): Promise<User | undefined>;
  deleteUser(id: number): Promise<boolean>;
  /** Bucket keys of everything deleting the user cascades to: avatar, lecture audio, chat documents. */
  getUserObjectKeys(userId: number): Promise<string[]>;

  getLectures(filters: LectureFilters): Promise<Page<LectureWithTeacher>>;
  getLecture(id: number): Promise<LectureWithTeacher | undefined>;
  createLecture(lecture: InsertLecture): Promise<Lecture>;
  updateLecture(id: number, updates: Partial<InsertLecture>): Promise<Lecture | undefined>;
  deleteLecture(id: number): Promise<boolean>;
  getUnprocessedLectures(limit: number, excludeIds?: number[]): Promise<Lecture[]>;
  getStaleUnprocessedLectures(updatedBefore: Date): Promise<Lecture[]>;
  getLectureCounts(): Promise<LectureCounts>;
  /** Stores a transcript only while the lecture still points at `audioUrl`. */
  saveTranscript(id: number, audioUrl: string, transcript: string): Promise<boolean>;
  /** Applies the processing result only while the lecture is unprocessed and still has the same audio; null otherwise. */
  completeLectureProcessing(id: number, data: ProcessedLectureData): Promise<{ lecture: Lecture; tasks: Task[] } | null>;
  recordProcessingFailure(id: number, audioUrl: string, message: string): Promise<void>;

  getTasks(filters: TaskFilters): Promise<Page<TaskWithRefs>>;
  getTask(id: number): Promise<TaskWithRefs | undefined>;
  createTask(task: InsertTask): Promise<Task>;
  updateTask(id: number, updates: Partial<InsertTask>): Promise<Task | undefined>;
  deleteTask(id: number): Promise<boolean>;
  getTasksDueBetween(from: Date, to: Date): Promise<Task[]>;
  markTaskDueNotified(id: number, at: Date): Promise<void>;

  getNotifications(filters: NotificationFilters): Promise<Page<Notification>>;
  getNotification(id: number): Promise<Notification | undefined>;
  createNotifications(notifications: InsertNotification[]): Promise<Notification[]>;
  setNotificationRead(id: number, isRead: boolean): Promise<Notification | undefined>;
  markAllNotificationsRead(userId: number): Promise<number>;
  getUnreadNotificationCount(userId: number): Promise<number>;
  deleteNotification(id: number): Promise<boolean>;

  getChatRoomsForUser(userId: number): Promise<ChatRoomSummary[]>;
  getChatRoom(id: number): Promise<ChatRoom | undefined>;
  getChatRoomByPair(teacherId: number, studentId: number): Promise<ChatRoom | undefined>;
  createChatRoom(teacherId: number, studentId: number): Promise<ChatRoom>;
  deleteChatRoom(id: number): Promise<boolean>;
  getChatMessages(roomId: number, pagination: Pagination): Promise<Page<ChatMessage>>;
  getChatMessage(id: number): Promise<ChatMessage | undefined>;
  /** Inserts the message and bumps the room preview and the other member's unread counter. */
  createChatMessage(message: InsertChatMessage): Promise<ChatMessage>;
  deleteChatMessage(id: number): Promise<boolean>;
  getChatDocumentKeys(roomId: number): Promise<string[]>;
  markChatRoomRead(roomId: number, readerId: number): Promise<number>;
  getChatUnreadCount(userId: number): Promise<number>;
}

export function unreadCountFor(room: ChatRoom, userId: number): number {
  return room.teacherId === userId ? room.unreadCountTeacher : room.unreadCountStudent;
}

export function previewMessage(message: string): string {
  return message.slice(0, LAST_MESSAGE_PREVIEW_LENGTH);
}

export class DrizzleStorage implements IStorage {
  constructor(private db: Database) {}

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch (error) {
      console.error("Database ping failed:", error);
      return false;
    }
  }

  async getUser(id: number): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.id, id));
    return user;
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const [user] = await this.db.select().from(users).where(eq(users.email, email.toLowerCase()));
    return user;
  }

  async getUsers(role?: UserRole): Promise<User[]> {
    return this.db.select().from(users)
      .where(role ? eq(users.role, role) : undefined)
      .orderBy(asc(users.name), asc(users.id));
  }

  async createUser(user: InsertUser): Promise<User> {
    const [created] = await this.db.insert(users)
      .values({ ...user, email: user.email.toLowerCase() })
      .returning();
    return created;
  }

  async updateUser(id: number, updates: Partial<InsertUser>): Promise<User | undefined> {
    const [updated] = await this.db.update(users)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(users.id, id))
      .returning();
    return updated;
  }

  async deleteUser(id: number): Promise<boolean> {
    const deleted = await this.db.delete(users).where(eq(users.id, id)).returning({ id: users.id });
    return deleted.length > 0;
  }

  async getLectures(filters: LectureFilters): Promise<Page<LectureWithTeacher>> {
    const conditions: SQL[] = [];
    if (filters.teacherId !== undefined) conditions.push(eq(lectures.teacherId, filters.teacherId));
    if (filters.subject) conditions.push(ilike(lectures.subject, `%${filters.subject}%`));
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const rows = await this.db
      .select({ lecture: lectures, teacherName: users.name })
      .from(lectures)
      .leftJoin(users, eq(lectures.teacherId, users.id))
      .where(where)
      .orderBy(desc(lectures.createdAt), desc(lectures.id))
      .limit(filters.limit)
      .offset(filters.offset);

    const [{ total }] = await this.db.select({ total: count() }).from(lectures).where(where);

    return {
      items: rows.map((row) => ({ ...row.lecture, teacherName: row.teacherName })),
      total,
    };
  }

  async getLecture(id: number): Promise<LectureWithTeacher | undefined> {
    const [row] = await this.db
      .select({ lecture: lectures, teacherName: users.name })
      .from(lectures)
      .leftJoin(users, eq(lectures.teacherId, users.id))
      .where(eq(lectures.id, id));
    return row ? { ...row.lecture, teacherName: row.teacherName } : undefined;
  }

  async createLecture(lecture: InsertLecture): Promise<Lecture> {
    const [created] = await this.db.insert(lectures).values(lecture).returning();
    return created;
  }

  async updateLecture(id: number, updates: Partial<InsertLecture>): Promise<Lecture | undefined> {
    const [updated] = await this.db.update(lectures)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(lectures.id, id))
      .returning();
    return updated;
  }

  async deleteLecture(id: number): Promise<boolean> {
    const deleted = await this.db.delete(lectures).where(eq(lectures.id, id)).returning({ id: lectures.id });
    return deleted.length > 0;
  }

  async getUnprocessedLectures(limit: number, excludeIds: number[] = []): Promise<Lecture[]> {
    const conditions: SQL[] = [isNotNull(lectures.audioUrl), eq(lectures.isProcessed, false)];
    if (excludeIds.length > 0) conditions.push(notInArray(lectures.id, excludeIds));

    return this.db.select().from(lectures)
      .where(and(...conditions))
      .orderBy(asc(lectures.createdAt), asc(lectures.id))
      .limit(limit);
  }

  async getStaleUnprocessedLectures(updatedBefore: Date): Promise<Lecture[]> {
    return this.db.select().from(lectures)
      .where(and(
        isNotNull(lectures.audioUrl),
        eq(lectures.isProcessed, false),
        lt(lectures.updatedAt, updatedBefore),
      ))
      .orderBy(asc(lectures.updatedAt));
  }

  async getLectureCounts(): Promise<LectureCounts> {
    const [row] = await this.db.select({
      total: count(),
      processed: sql<number>`count(*) filter (where ${lectures.isProcessed})`.mapWith(Number),
      unprocessed: sql<number>`count(*) filter (where not ${lectures.isProcessed} and ${lectures.audioUrl} is not null)`.mapWith(Number),
    }).from(lectures);
    return row;
  }

  async saveTranscript(id: number, audioUrl: string, transcript: string): Promise<boolean> {
    const updated = await this.db.update(lectures)
      .set({ transcript, updatedAt: new Date() })
      .where(and(eq(lectures.id, id), eq(lectures.audioUrl, audioUrl), eq(lectures.isProcessed, false)))
      .returning({ id: lectures.id });
    return updated.length > 0;
  }

  async completeLectureProcessing(id: number, data: ProcessedLectureData): Promise<{ lecture: Lecture; tasks: Task[] } | null> {
    return this.db.transaction(async (tx) => {
      const now = new Date();
      const [lecture] = await tx.update(lectures)
        .set({
          transcript: data.transcript,
          summary: data.summary,
          keyPoints: data.keyPoints,
          isProcessed: true,
          processedAt: now,
          lastProcessingError: null,
          updatedAt: now,
        })
        .where(and(eq(lectures.id, id), eq(lectures.audioUrl, data.audioUrl), eq(lectures.isProcessed, false)))
        .returning();

      if (!lecture) return null;

      const created = data.tasks.length > 0
        ? await tx.insert(tasks).values(data.tasks).returning()
        : [];
      return { lecture, tasks: created };
    });
  }

  async recordProcessingFailure(id: number, audioUrl: string, message: string): Promise<void> {
    await this.db.update(lectures)
      .set({
        processingAttempts: sql`${lectures.processingAttempts} + 1`,
        lastProcessingError: message,
        updatedAt: new Date(),
      })
      .where(and(eq(lectures.id, id), eq(lectures.audioUrl, audioUrl)));
  }

  private taskQuery() {
    const assignee = alias(users, "assignee");
    return this.db
      .select({ task: tasks, lectureTitle: lectures.title, assignedToName: assignee.name })
      .from(tasks)
      .leftJoin(lectures, eq(tasks.lectureId, lectures.id))
      .leftJoin(assignee, eq(tasks.assignedToId, assignee.id))
      .$dynamic();
  }

  async getTasks(filters: TaskFilters): Promise<Page<TaskWithRefs>> {
    const conditions: SQL[] = [];
    if (filters.assignedToId !== undefined) conditions.push(eq(tasks.assignedToId, filters.assignedToId));
    if (filters.teacherId !== undefined) conditions.push(eq(lectures.teacherId, filters.teacherId));
    if (filters.lectureId !== undefined) conditions.push(eq(tasks.lectureId, filters.lectureId));
    if (filters.status) conditions.push(eq(tasks.status, filters.status));
    if (filters.priority) conditions.push(eq(tasks.priority, filters.priority));
    const where = conditions.length > 0 ? and(...conditions) : undefined;

    const rows = await this.taskQuery()
      .where(where)
      .orderBy(desc(tasks.createdAt), desc(tasks.id))
      .limit(filters.limit)
      .offset(filters.offset);

    const [{ total }] = await this.db.select({ total: count() })
      .from(tasks)
      .leftJoin(lectures, eq(tasks.lectureId, lectures.id))
      .where(where);

    return {
      items: rows.map((row) => ({ ...row.task, lectureTitle: row.lectureTitle, assignedToName: row.assignedToName })),
      total,
    };
  }

  async getTask(id: number): Promise<TaskWithRefs | undefined> {
    const [row] = await this.taskQuery().where(eq(tasks.id, id));
    return row ? { ...row.task, lectureTitle: row.lectureTitle, assignedToName: row.assignedToName } : undefined;
  }

  async createTask(task: InsertTask): Promise<Task> {
    const [created] = await this.db.insert(tasks).values(task).returning();
    return created;
  }

  async updateTask(id: number, updates: Partial<InsertTask>): Promise<Task | undefined> {
    const [updated] = await this.db.update(tasks)
      .set({ ...updates, updatedAt: new Date() })
      .where(eq(tasks.id, id))
      .returning();
    return updated;
  }

  async deleteTask(id: number): Promise<boolean> {
    const deleted = await this.db.delete(tasks).where(eq(tasks.id, id)).returning({ id: tasks.id });
    return deleted.length > 0;
  }

  async getTasksDueBetween(from: Date, to: Date): Promise<Task[]> {
    return this.db.select().from(tasks)
      .where(and(
        eq(tasks.status, "pending"),
        isNotNull(tasks.assignedToId),
        isNull(tasks.dueNotifiedAt),
        gte(tasks.dueDate, from),
        lte(tasks.dueDate, to),
      ))
      .orderBy(asc(tasks.dueDate));
  }

  async markTaskDueNotified(id: number, at: Date): Promise<void> {
    await this.db.update(tasks).set({ dueNotifiedAt: at }).where(eq(tasks.id, id));
  }

  async getNotifications(filters: NotificationFilters): Promise<Page<Notification>> {
    const conditions: SQL[] = [eq(notifications.userId, filters.userId)];
    if (filters.type) conditions.push(eq(notifications.type, filters.type));
    if (filters.isRead !== undefined) conditions.push(eq(notifications.isRead, filters.isRead));
    const where = and(...conditions);

    const items = await this.db.select().from(notifications)
      .where(where)
      .orderBy(desc(notifications.createdAt), desc(notifications.id))
      .limit(filters.limit)
      .offset(filters.offset);
    const [{ total }] = await this.db.select({ total: count() }).from(notifications).where(where);
    return { items, total };
  }

  async getNotification(id: number): Promise<Notification | undefined> {
    const [notification] = await this.db.select().from(notifications).where(eq(notifications.id, id));
    return notification;
  }

  async createNotifications(list: InsertNotification[]): Promise<Notification[]> {
    if (list.length === 0) return [];
    return this.db.insert(notifications).values(list).returning();
  }

  async setNotificationRead(id: number, isRead: boolean): Promise<Notification | undefined> {
    const [updated] = await this.db.update(notifications)
      .set({ isRead })
      .where(eq(notifications.id, id))
      .returning();
    return updated;
  }

  async markAllNotificationsRead(userId: number): Promise<number> {
    const updated = await this.db.update(notifications)
      .set({ isRead: true })
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)))
      .returning({ id: notifications.id });
    return updated.length;
  }

  async getUnreadNotificationCount(userId: number): Promise<number> {
    const [{ total }] = await this.db.select({ total: count() }).from(notifications)
      .where(and(eq(notifications.userId, userId), eq(notifications.isRead, false)));
    return total;
  }

  async deleteNotification(id: number): Promise<boolean> {
    const deleted = await this.db.delete(notifications).where(eq(notifications.id, id)).returning({ id: notifications.id });
    return deleted.length > 0;
  }

  async getChatRoomsForUser(userId: number): Promise<ChatRoomSummary[]> {
    const rooms = await this.db.select().from(chatRooms)
      .where(or(eq(chatRooms.teacherId, userId), eq(chatRooms.studentId, userId)))
      .orderBy(sql`${chatRooms.lastMessageAt} desc nulls last`, desc(chatRooms.createdAt), desc(chatRooms.id));
    if (rooms.length === 0) return [];

    const otherIds = rooms.map((room) => (room.teacherId === userId ? room.studentId : room.teacherId));
    const others = await this.db
      .select({ id: users.id, name: users.name, role: users.role, avatarUrl: users.avatarUrl })
      .from(users)
      .where(inArray(users.id, otherIds));
    const byId = new Map(others.map((user) => [user.id, user]));

    return rooms.map((room) => ({
      ...room,
      otherUser: byId.get(room.teacherId === userId ? room.studentId : room.teacherId) ?? null,
      unreadCount: unreadCountFor(room, userId),
    }));
  }

  async getChatRoom(id: number): Promise<ChatRoom | undefined> {
    const [room] = await this.db.select().from(chatRooms).where(eq(chatRooms.id, id));
    return room;
  }

  async getChatRoomByPair(teacherId: number, studentId: number): Promise<ChatRoom | undefined> {
    const [room] = await this.db.select().from(chatRooms)
      .where(and(eq(chatRooms.teacherId, teacherId), eq(chatRooms.studentId, studentId)));
    return room;
  }

  async createChatRoom(teacherId: number, studentId: number): Promise<ChatRoom> {
    const [room] = await this.db.insert(chatRooms)
      .values({ teacherId, studentId })
      .onConflictDoNothing({ target: [chatRooms.teacherId, chatRooms.studentId] })
      .returning();
    if (room) return room;

    // Lost a race with a concurrent create for the same pair
    const existing = await this.getChatRoomByPair(teacherId, studentId);
    if (!existing) {
      throw new Error(`Chat room for teacher ${teacherId} and student ${studentId} could not be created`);
    }
    return existing;
  }

  async deleteChatRoom(id: number): Promise<boolean> {
    const deleted = await this.db.delete(chatRooms).where(eq(chatRooms.id, id)).returning({ id: chatRooms.id });
    return deleted.length > 0;
  }

  async getChatMessages(roomId: number, pagination: Pagination): Promise<Page<ChatMessage>> {
    const newestFirst = await this.db.select().from(chatMessages)
      .where(eq(chatMessages.chatRoomId, roomId))
      .orderBy(desc(chatMessages.createdAt), desc(chatMessages.id))
      .limit(pagination.limit)
      .offset(pagination.offset);
    const [{ total }] = await this.db.select({ total: count() }).from(chatMessages)
      .where(eq(chatMessages.chatRoomId, roomId));
    return { items: newestFirst.reverse(), total };
  }

  async getChatMessage(id: number): Promise<ChatMessage | undefined> {
    const [message] = await this.db.select().from(chatMessages).where(eq(chatMessages.id, id));
    return message;
  }

  async createChatMessage(message: InsertChatMessage): Promise<ChatMessage> {
    return this.db.transaction(async (tx) => {
      const [created] = await tx.insert(chatMessages).values(message).returning();
      await tx.update(chatRooms)
        .set({
          lastMessage: previewMessage(created.message),
          lastMessageAt: created.createdAt,
          updatedAt: new Date(),
          unreadCountTeacher: sql`case when ${chatRooms.teacherId} = ${created.senderId} then ${chatRooms.unreadCountTeacher} else ${chatRooms.unreadCountTeacher} + 1 end`,
          unreadCountStudent: sql`case when ${chatRooms.studentId} = ${created.senderId} then ${chatRooms.unreadCountStudent} else ${chatRooms.unreadCountStudent} + 1 end`,
        })
        .where(eq(chatRooms.id, created.chatRoomId));
      return created;
    });
  }

  async deleteChatMessage(id: number): Promise<boolean> {
    const deleted = await this.db.delete(chatMessages).where(eq(chatMessages.id, id)).returning({ id: chatMessages.id });
    return deleted.length > 0;
  }

  async getUserObjectKeys(userId: number): Promise<string[]> {
    const [user] = await this.db.select({ key: users.avatarKey }).from(users).where(eq(users.id, userId));
    const audio = await this.db.select({ key: lectures.audioKey }).from(lectures)
      .where(and(eq(lectures.teacherId, userId), isNotNull(lectures.audioKey)));
    const documents = await this.db.select({ key: chatMessages.documentKey }).from(chatMessages)
      .innerJoin(chatRooms, eq(chatMessages.chatRoomId, chatRooms.id))
      .where(and(
        or(eq(chatRooms.teacherId, userId), eq(chatRooms.studentId, userId)),
        isNotNull(chatMessages.documentKey),
      ));
    return [user, ...audio, ...documents].flatMap((row) => (row?.key ? [row.key] : []));
  }

  async getChatDocumentKeys(roomId: number): Promise<string[]> {
    const rows = await this.db.select({ key: chatMessages.documentKey }).from(chatMessages)
      .where(and(eq(chatMessages.chatRoomId, roomId), isNotNull(chatMessages.documentKey)));
    return rows.flatMap((row) => (row.key ? [row.key] : []));
  }

  async markChatRoomRead(roomId: number, readerId: number): Promise<number> {
    return this.db.transaction(async (tx) => {
      const marked = await tx.update(chatMessages)
        .set({ isRead: true })
        .where(and(
          eq(chatMessages.chatRoomId, roomId),
          ne(chatMessages.senderId, readerId),
          eq(chatMessages.isRead, false),
        ))
        .returning({ id: chatMessages.id });

      await tx.update(chatRooms)
        .set({
          unreadCountTeacher: sql`case when ${chatRooms.teacherId} = ${readerId} then 0 else ${chatRooms.unreadCountTeacher} end`,
          unreadCountStudent: sql`case when ${chatRooms.studentId} = ${readerId} then 0 else ${chatRooms.unreadCountStudent} end`,
        })
        .where(eq(chatRooms.id, roomId));

      return marked.length;
    });
  }

  async getChatUnreadCount(userId: number): Promise<number> {
    const rooms = await this.db.select().from(chatRooms)
      .where(or(eq(chatRooms.teacherId, userId), eq(chatRooms.studentId, userId)));
    return rooms.reduce((sum, room) => sum + unreadCountFor(room, userId), 0);
  }
}
