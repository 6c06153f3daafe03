import type {
  User, InsertUser, Lecture, InsertLecture, LectureWithTeacher, Task, InsertTask, TaskWithRefs,
  Notification, InsertNotification, ChatRoom, ChatMessage, InsertChatMessage, UserRole,
} from "@shared/schema";
import {
  previewMessage, unreadCountFor,
  type IStorage, type Page, type Pagination, type LectureFilters, type TaskFilters,
  type NotificationFilters, type LectureCounts, type ProcessedLectureData, type ChatRoomSummary,
} from "./storage";

class UniqueViolationError extends Error {
  readonly code = "23505";
  constructor(constraint: string) {
    super(`duplicate key value violates unique constraint "${constraint}"`);
    this.name = "UniqueViolationError";
  }
}

function newestFirst<T extends { id: number; createdAt: Date }>(a: T, b: T): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || b.id - a.id;
}

function oldestFirst<T extends { id: number; createdAt: Date }>(a: T, b: T): number {
  return a.createdAt.getTime() - b.createdAt.getTime() || a.id - b.id;
}

function page<T>(rows: T[], pagination: Pagination): Page<T> {
  return {
    items: rows.slice(pagination.offset, pagination.offset + pagination.limit),
    total: rows.length,
  };
}

/**
 * In-process IStorage used when DATABASE_URL is unset and by the tests.
 * Mirrors the foreign-key cascades and unique constraints of the schema.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private lectures = new Map<number, Lecture>();
  private tasks = new Map<number, Task>();
  private notifications = new Map<number, Notification>();
  private chatRooms = new Map<number, ChatRoom>();
  private chatMessages = new Map<number, ChatMessage>();
  private nextId = { users: 1, lectures: 1, tasks: 1, notifications: 1, chatRooms: 1, chatMessages: 1 };

  constructor(private now: () => Date = () => new Date()) {}

  async ping(): Promise<boolean> {
    return true;
  }

  async getUser(id: number): Promise<User | undefined> {
    return this.users.get(id);
  }

  async getUserByEmail(email: string): Promise<User | undefined> {
    const normalized = email.toLowerCase();
    return Array.from(this.users.values()).find((user) => user.email === normalized);
  }

  async getUsers(role?: UserRole): Promise<User[]> {
    return Array.from(this.users.values())
      .filter((user) => !role || user.role === role)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id);
  }

  async createUser(user: InsertUser): Promise<User> {
    const email = user.email.toLowerCase();
    if (await this.getUserByEmail(email)) {
      throw new UniqueViolationError("users_email_unique");
    }
    const now = this.now();
    const created: User = {
      id: this.nextId.users++,
      email,
      password: user.password,
      name: user.name,
      role: user.role,
      studentId: user.studentId ?? null,
      major: user.major ?? null,
      year: user.year ?? null,
      department: user.department ?? null,
      bio: user.bio ?? null,
      phone: user.phone ?? null,
      avatarUrl: user.avatarUrl ?? null,
      avatarKey: user.avatarKey ?? null,
      notificationsEnabled: user.notificationsEnabled ?? true,
      emailNotifications: user.emailNotifications ?? true,
      darkMode: user.darkMode ?? false,
      createdAt: now,
      updatedAt: now,
    };
    this.users.set(created.id, created);
    return created;
  }

  async updateUser(id: number, updates: Partial<InsertUser>): Promise<User | undefined> {
    const user = this.users.get(id);
    if (!user) return undefined;
    const updated: User = { ...user, ...definedOnly(updates), id, updatedAt: this.now() };
    this.users.set(id, updated);
    return updated;
  }

  async deleteUser(id: number): Promise<boolean> {
    if (!this.users.delete(id)) return false;

    for (const lecture of Array.from(this.lectures.values())) {
      if (lecture.teacherId === id) await this.deleteLecture(lecture.id);
    }
    for (const task of Array.from(this.tasks.values())) {
      if (task.assignedToId === id) this.tasks.delete(task.id);
    }
    for (const notification of Array.from(this.notifications.values())) {
      if (notification.userId === id) this.notifications.delete(notification.id);
    }
    for (const room of Array.from(this.chatRooms.values())) {
      if (room.teacherId === id || room.studentId === id) await this.deleteChatRoom(room.id);
    }
    for (const message of Array.from(this.chatMessages.values())) {
      if (message.senderId === id) this.chatMessages.delete(message.id);
    }
    return true;
  }

  private withTeacher(lecture: Lecture): LectureWithTeacher {
    return { ...lecture, teacherName: this.users.get(lecture.teacherId)?.name ?? null };
  }

  async getLectures(filters: LectureFilters): Promise<Page<LectureWithTeacher>> {
    const subject = filters.subject?.toLowerCase();
    const rows = Array.from(this.lectures.values())
      .filter((lecture) => filters.teacherId === undefined || lecture.teacherId === filters.teacherId)
      .filter((lecture) => !subject || lecture.subject.toLowerCase().includes(subject))
      .sort(newestFirst)
      .map((lecture) => this.withTeacher(lecture));
    return page(rows, filters);
  }

  async getLecture(id: number): Promise<LectureWithTeacher | undefined> {
    const lecture = this.lectures.get(id);
    return lecture ? this.withTeacher(lecture) : undefined;
  }

  async createLecture(lecture: InsertLecture): Promise<Lecture> {
    if (!this.users.has(lecture.teacherId)) {
      throw new Error(`Teacher ${lecture.teacherId} does not exist`);
    }
    const now = this.now();
    const created: Lecture = {
      id: this.nextId.lectures++,
      title: lecture.title,
      subject: lecture.subject,
      teacherId: lecture.teacherId,
      audioUrl: lecture.audioUrl ?? null,
      audioKey: lecture.audioKey ?? null,
      audioDuration: lecture.audioDuration ?? null,
      transcript: lecture.transcript ?? null,
      summary: lecture.summary ?? null,
      keyPoints: lecture.keyPoints ?? null,
      tags: lecture.tags ?? null,
      isProcessed: lecture.isProcessed ?? false,
      processingAttempts: lecture.processingAttempts ?? 0,
      lastProcessingError: lecture.lastProcessingError ?? null,
      processedAt: lecture.processedAt ?? null,
      createdAt: lecture.createdAt ?? now,
      updatedAt: lecture.updatedAt ?? now,
    };
    this.lectures.set(created.id, created);
    return created;
  }

  async updateLecture(id: number, updates: Partial<InsertLecture>): Promise<Lecture | undefined> {
    const lecture = this.lectures.get(id);
    if (!lecture) return undefined;
    const updated: Lecture = { ...lecture, ...definedOnly(updates), id, updatedAt: updates.updatedAt ?? this.now() };
    this.lectures.set(id, updated);
    return updated;
  }

  async deleteLecture(id: number): Promise<boolean> {
    if (!this.lectures.delete(id)) return false;
    for (const task of Array.from(this.tasks.values())) {
      if (task.lectureId === id) this.tasks.delete(task.id);
    }
    return true;
  }

  async getUnprocessedLectures(limit: number, excludeIds: number[] = []): Promise<Lecture[]> {
    return Array.from(this.lectures.values())
      .filter((lecture) => lecture.audioUrl !== null && !lecture.isProcessed && !excludeIds.includes(lecture.id))
      .sort(oldestFirst)
      .slice(0, limit);
  }

  async getStaleUnprocessedLectures(updatedBefore: Date): Promise<Lecture[]> {
    return Array.from(this.lectures.values())
      .filter((lecture) => lecture.audioUrl !== null && !lecture.isProcessed)
      .filter((lecture) => lecture.updatedAt.getTime() < updatedBefore.getTime())
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());
  }

  async getLectureCounts(): Promise<LectureCounts> {
    const all = Array.from(this.lectures.values());
    return {
      total: all.length,
      processed: all.filter((lecture) => lecture.isProcessed).length,
      unprocessed: all.filter((lecture) => !lecture.isProcessed && lecture.audioUrl !== null).length,
    };
  }

  async saveTranscript(id: number, audioUrl: string, transcript: string): Promise<boolean> {
    const lecture = this.lectures.get(id);
    if (!lecture || lecture.isProcessed || lecture.audioUrl !== audioUrl) return false;
    this.lectures.set(id, { ...lecture, transcript, updatedAt: this.now() });
    return true;
  }

  async completeLectureProcessing(id: number, data: ProcessedLectureData): Promise<{ lecture: Lecture; tasks: Task[] } | null> {
    const current = this.lectures.get(id);
    if (!current || current.isProcessed || current.audioUrl !== data.audioUrl) return null;

    const now = this.now();
    const lecture: Lecture = {
      ...current,
      transcript: data.transcript,
      summary: data.summary,
      keyPoints: data.keyPoints,
      isProcessed: true,
      processedAt: now,
      lastProcessingError: null,
      updatedAt: now,
    };
    this.lectures.set(id, lecture);

    const created: Task[] = [];
    for (const task of data.tasks) {
      created.push(await this.createTask(task));
    }
    return { lecture, tasks: created };
  }

  async recordProcessingFailure(id: number, audioUrl: string, message: string): Promise<void> {
    const lecture = this.lectures.get(id);
    if (!lecture || lecture.audioUrl !== audioUrl) return;
    this.lectures.set(id, {
      ...lecture,
      processingAttempts: lecture.processingAttempts + 1,
      lastProcessingError: message,
      updatedAt: this.now(),
    });
  }

  private withRefs(task: Task): TaskWithRefs {
    return {
      ...task,
      lectureTitle: task.lectureId !== null ? this.lectures.get(task.lectureId)?.title ?? null : null,
      assignedToName: task.assignedToId !== null ? this.users.get(task.assignedToId)?.name ?? null : null,
    };
  }

  async getTasks(filters: TaskFilters): Promise<Page<TaskWithRefs>> {
    const rows = Array.from(this.tasks.values())
      .filter((task) => filters.assignedToId === undefined || task.assignedToId === filters.assignedToId)
      .filter((task) => filters.lectureId === undefined || task.lectureId === filters.lectureId)
      .filter((task) => {
        if (filters.teacherId === undefined) return true;
        const lecture = task.lectureId !== null ? this.lectures.get(task.lectureId) : undefined;
        return lecture?.teacherId === filters.teacherId;
      })
      .filter((task) => !filters.status || task.status === filters.status)
      .filter((task) => !filters.priority || task.priority === filters.priority)
      .sort(newestFirst)
      .map((task) => this.withRefs(task));
    return page(rows, filters);
  }

  async getTask(id: number): Promise<TaskWithRefs | undefined> {
    const task = this.tasks.get(id);
    return task ? this.withRefs(task) : undefined;
  }

  async createTask(task: InsertTask): Promise<Task> {
    if (task.lectureId != null && !this.lectures.has(task.lectureId)) {
      throw new Error(`Lecture ${task.lectureId} does not exist`);
    }
    if (task.assignedToId != null && !this.users.has(task.assignedToId)) {
      throw new Error(`User ${task.assignedToId} does not exist`);
    }
    const now = this.now();
    const created: Task = {
      id: this.nextId.tasks++,
      title: task.title,
      description: task.description ?? "",
      lectureId: task.lectureId ?? null,
      assignedToId: task.assignedToId ?? null,
      status: task.status ?? "pending",
      priority: task.priority ?? "medium",
      dueDate: task.dueDate ?? null,
      isAiGenerated: task.isAiGenerated ?? false,
      dueNotifiedAt: task.dueNotifiedAt ?? null,
      createdAt: now,
      updatedAt: now,
    };
    this.tasks.set(created.id, created);
    return created;
  }

  async updateTask(id: number, updates: Partial<InsertTask>): Promise<Task | undefined> {
    const task = this.tasks.get(id);
    if (!task) return undefined;
    const updated: Task = { ...task, ...definedOnly(updates), id, updatedAt: this.now() };
    this.tasks.set(id, updated);
    return updated;
  }

  async deleteTask(id: number): Promise<boolean> {
    return this.tasks.delete(id);
  }

  async getTasksDueBetween(from: Date, to: Date): Promise<Task[]> {
    return Array.from(this.tasks.values())
      .filter((task) => task.status === "pending" && task.assignedToId !== null && task.dueNotifiedAt === null)
      .filter((task) => task.dueDate !== null
        && task.dueDate.getTime() >= from.getTime()
        && task.dueDate.getTime() <= to.getTime())
      .sort((a, b) => (a.dueDate?.getTime() ?? 0) - (b.dueDate?.getTime() ?? 0));
  }

  async markTaskDueNotified(id: number, at: Date): Promise<void> {
    const task = this.tasks.get(id);
    if (task) this.tasks.set(id, { ...task, dueNotifiedAt: at });
  }

  async getNotifications(filters: NotificationFilters): Promise<Page<Notification>> {
    const rows = Array.from(this.notifications.values())
      .filter((notification) => notification.userId === filters.userId)
      .filter((notification) => !filters.type || notification.type === filters.type)
      .filter((notification) => filters.isRead === undefined || notification.isRead === filters.isRead)
      .sort(newestFirst);
    return page(rows, filters);
  }

  async getNotification(id: number): Promise<Notification | undefined> {
    return this.notifications.get(id);
  }

  async createNotifications(list: InsertNotification[]): Promise<Notification[]> {
    const created: Notification[] = [];
    for (const notification of list) {
      if (!this.users.has(notification.userId)) {
        throw new Error(`User ${notification.userId} does not exist`);
      }
      const row: Notification = {
        id: this.nextId.notifications++,
        userId: notification.userId,
        type: notification.type,
        title: notification.title,
        message: notification.message,
        data: notification.data ?? null,
        isRead: notification.isRead ?? false,
        createdAt: this.now(),
      };
      this.notifications.set(row.id, row);
      created.push(row);
    }
    return created;
  }

  async setNotificationRead(id: number, isRead: boolean): Promise<Notification | undefined> {
    const notification = this.notifications.get(id);
    if (!notification) return undefined;
    const updated = { ...notification, isRead };
    this.notifications.set(id, updated);
    return updated;
  }

  async markAllNotificationsRead(userId: number): Promise<number> {
    let updated = 0;
    this.notifications.forEach((notification, id) => {
      if (notification.userId === userId && !notification.isRead) {
        this.notifications.set(id, { ...notification, isRead: true });
        updated++;
      }
    });
    return updated;
  }

  async getUnreadNotificationCount(userId: number): Promise<number> {
    return Array.from(this.notifications.values())
      .filter((notification) => notification.userId === userId && !notification.isRead).length;
  }

  async deleteNotification(id: number): Promise<boolean> {
    return this.notifications.delete(id);
  }

  async getChatRoomsForUser(userId: number): Promise<ChatRoomSummary[]> {
    return Array.from(this.chatRooms.values())
      .filter((room) => room.teacherId === userId || room.studentId === userId)
      .sort((a, b) => {
        const aTime = a.lastMessageAt?.getTime() ?? -Infinity;
        const bTime = b.lastMessageAt?.getTime() ?? -Infinity;
        if (aTime !== bTime) return bTime - aTime;
        return newestFirst(a, b);
      })
      .map((room) => {
        const other = this.users.get(room.teacherId === userId ? room.studentId : room.teacherId);
        return {
          ...room,
          otherUser: other ? { id: other.id, name: other.name, role: other.role, avatarUrl: other.avatarUrl } : null,
          unreadCount: unreadCountFor(room, userId),
        };
      });
  }

  async getChatRoom(id: number): Promise<ChatRoom | undefined> {
    return this.chatRooms.get(id);
  }

  async getChatRoomByPair(teacherId: number, studentId: number): Promise<ChatRoom | undefined> {
    return Array.from(this.chatRooms.values())
      .find((room) => room.teacherId === teacherId && room.studentId === studentId);
  }

  async createChatRoom(teacherId: number, studentId: number): Promise<ChatRoom> {
    const existing = await this.getChatRoomByPair(teacherId, studentId);
    if (existing) return existing;
    if (!this.users.has(teacherId) || !this.users.has(studentId)) {
      throw new Error("Chat room members must exist");
    }
    const now = this.now();
    const room: ChatRoom = {
      id: this.nextId.chatRooms++,
      teacherId,
      studentId,
      lastMessage: null,
      lastMessageAt: null,
      unreadCountTeacher: 0,
      unreadCountStudent: 0,
      createdAt: now,
      updatedAt: now,
    };
    this.chatRooms.set(room.id, room);
    return room;
  }

  async deleteChatRoom(id: number): Promise<boolean> {
    if (!this.chatRooms.delete(id)) return false;
    for (const message of Array.from(this.chatMessages.values())) {
      if (message.chatRoomId === id) this.chatMessages.delete(message.id);
    }
    return true;
  }

  async getChatMessages(roomId: number, pagination: Pagination): Promise<Page<ChatMessage>> {
    const rows = Array.from(this.chatMessages.values())
      .filter((message) => message.chatRoomId === roomId)
      .sort(newestFirst);
    const result = page(rows, pagination);
    return { items: result.items.reverse(), total: result.total };
  }

  async getChatMessage(id: number): Promise<ChatMessage | undefined> {
    return this.chatMessages.get(id);
  }

  async createChatMessage(message: InsertChatMessage): Promise<ChatMessage> {
    const room = this.chatRooms.get(message.chatRoomId);
    if (!room) {
      throw new Error(`Chat room ${message.chatRoomId} does not exist`);
    }
    const now = this.now();
    const created: ChatMessage = {
      id: this.nextId.chatMessages++,
      chatRoomId: message.chatRoomId,
      senderId: message.senderId,
      message: message.message,
      isRead: message.isRead ?? false,
      documentUrl: message.documentUrl ?? null,
      documentKey: message.documentKey ?? null,
      documentName: message.documentName ?? null,
      documentSize: message.documentSize ?? null,
      documentType: message.documentType ?? null,
      createdAt: now,
    };
    this.chatMessages.set(created.id, created);
    this.chatRooms.set(room.id, {
      ...room,
      lastMessage: previewMessage(created.message),
      lastMessageAt: now,
      updatedAt: now,
      unreadCountTeacher: room.teacherId === created.senderId ? room.unreadCountTeacher : room.unreadCountTeacher + 1,
      unreadCountStudent: room.studentId === created.senderId ? room.unreadCountStudent : room.unreadCountStudent + 1,
    });
    return created;
  }

  async deleteChatMessage(id: number): Promise<boolean> {
    return this.chatMessages.delete(id);
  }

  async getUserObjectKeys(userId: number): Promise<string[]> {
    const avatarKey = this.users.get(userId)?.avatarKey;
    const roomIds = new Set(Array.from(this.chatRooms.values())
      .filter((room) => room.teacherId === userId || room.studentId === userId)
      .map((room) => room.id));
    return [
      ...(avatarKey ? [avatarKey] : []),
      ...Array.from(this.lectures.values())
        .filter((lecture) => lecture.teacherId === userId)
        .flatMap((lecture) => (lecture.audioKey ? [lecture.audioKey] : [])),
      ...Array.from(this.chatMessages.values())
        .filter((message) => roomIds.has(message.chatRoomId))
        .flatMap((message) => (message.documentKey ? [message.documentKey] : [])),
    ];
  }

  async getChatDocumentKeys(roomId: number): Promise<string[]> {
    return Array.from(this.chatMessages.values())
      .filter((message) => message.chatRoomId === roomId)
      .flatMap((message) => (message.documentKey ? [message.documentKey] : []));
  }

  async markChatRoomRead(roomId: number, readerId: number): Promise<number> {
    let marked = 0;
    this.chatMessages.forEach((message, id) => {
      if (message.chatRoomId === roomId && message.senderId !== readerId && !message.isRead) {
        this.chatMessages.set(id, { ...message, isRead: true });
        marked++;
      }
    });

    const room = this.chatRooms.get(roomId);
    if (room) {
      this.chatRooms.set(roomId, {
        ...room,
        unreadCountTeacher: room.teacherId === readerId ? 0 : room.unreadCountTeacher,
        unreadCountStudent: room.studentId === readerId ? 0 : room.unreadCountStudent,
      });
    }
    return marked;
  }

  async getChatUnreadCount(userId: number): Promise<number> {
    return Array.from(this.chatRooms.values())
      .filter((room) => room.teacherId === userId || room.studentId === userId)
      .reduce((sum, room) => sum + unreadCountFor(room, userId), 0);
  }
}

// Partial updates skip undefined keys, matching drizzle's update().set().
function definedOnly<T extends object>(updates: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(updates)) {
    if (!isKeyOf(updates, key)) continue;
    const value = updates[key];
    if (value !== undefined) result[key] = value;
  }
  return result;
}

function isKeyOf<T extends object>(obj: T, key: PropertyKey): key is keyof T {
  return key in obj;
}
