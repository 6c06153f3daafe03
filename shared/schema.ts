import { pgTable, text, varchar, serial, index, integer, boolean, timestamp, jsonb, unique } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const USER_ROLES = ["teacher", "student"] as const;
export const TASK_STATUSES = ["pending", "completed", "approved"] as const;
export const TASK_PRIORITIES = ["high", "medium", "low"] as const;
export const NOTIFICATION_TYPES = ["task_assigned", "task_due", "lecture_uploaded", "task_approved"] as const;

export type UserRole = typeof USER_ROLES[number];
export type TaskStatus = typeof TASK_STATUSES[number];
export type TaskPriority = typeof TASK_PRIORITIES[number];
export type NotificationType = typeof NOTIFICATION_TYPES[number];

export const users = pgTable("users", {
  id: serial("id").primaryKey(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  password: text("password").notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  role: text("role", { enum: USER_ROLES }).notNull(),
  studentId: varchar("student_id", { length: 50 }),
  major: varchar("major", { length: 100 }),
  year: varchar("year", { length: 20 }),
  department: varchar("department", { length: 100 }),
  bio: text("bio"),
  phone: varchar("phone", { length: 20 }),
  avatarUrl: text("avatar_url"),
  avatarKey: text("avatar_key"),
  notificationsEnabled: boolean("notifications_enabled").notNull().default(true),
  emailNotifications: boolean("email_notifications").notNull().default(true),
  darkMode: boolean("dark_mode").notNull().default(false),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  roleIdx: index("users_role_idx").on(table.role),
}));

export const lectures = pgTable("lectures", {
  id: serial("id").primaryKey(),
  title: varchar("title", { length: 200 }).notNull(),
  subject: varchar("subject", { length: 100 }).notNull(),
  teacherId: integer("teacher_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  audioUrl: text("audio_url"),
  audioKey: text("audio_key"), // object key inside the bucket, used for deletes
  audioDuration: integer("audio_duration"), // seconds
  transcript: text("transcript"),
  summary: text("summary"),
  keyPoints: jsonb("key_points").$type<string[]>(),
  tags: jsonb("tags").$type<string[]>(),
  isProcessed: boolean("is_processed").notNull().default(false),
  processingAttempts: integer("processing_attempts").notNull().default(0),
  lastProcessingError: text("last_processing_error"),
  processedAt: timestamp("processed_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  teacherIdIdx: index("lectures_teacher_id_idx").on(table.teacherId),
  isProcessedIdx: index("lectures_is_processed_idx").on(table.isProcessed),
}));

export const tasks = pgTable("tasks", {
  id: serial("id").primaryKey(),
  title: varchar("title", { length: 200 }).notNull(),
  description: text("description").notNull().default(""),
  lectureId: integer("lecture_id").references(() => lectures.id, { onDelete: "cascade" }),
  assignedToId: integer("assigned_to_id").references(() => users.id, { onDelete: "cascade" }),
  status: text("status", { enum: TASK_STATUSES }).notNull().default("pending"),
  priority: text("priority", { enum: TASK_PRIORITIES }).notNull().default("medium"),
  dueDate: timestamp("due_date"),
  isAiGenerated: boolean("is_ai_generated").notNull().default(false),
  dueNotifiedAt: timestamp("due_notified_at"),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  lectureIdIdx: index("tasks_lecture_id_idx").on(table.lectureId),
  assignedToIdIdx: index("tasks_assigned_to_id_idx").on(table.assignedToId),
  statusIdx: index("tasks_status_idx").on(table.status),
}));

export const notifications = pgTable("notifications", {
  id: serial("id").primaryKey(),
  userId: integer("user_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  type: text("type", { enum: NOTIFICATION_TYPES }).notNull(),
  title: varchar("title", { length: 200 }).notNull(),
  message: text("message").notNull(),
  data: jsonb("data").$type<Record<string, unknown>>(),
  isRead: boolean("is_read").notNull().default(false),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => ({
  userIdIdx: index("notifications_user_id_idx").on(table.userId),
}));

export const chatRooms = pgTable("chat_rooms", {
  id: serial("id").primaryKey(),
  teacherId: integer("teacher_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  studentId: integer("student_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  lastMessage: text("last_message"),
  lastMessageAt: timestamp("last_message_at"),
  unreadCountTeacher: integer("unread_count_teacher").notNull().default(0),
  unreadCountStudent: integer("unread_count_student").notNull().default(0),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
}, (table) => ({
  teacherStudentUnique: unique("chat_rooms_teacher_student_unique").on(table.teacherId, table.studentId),
}));

export const chatMessages = pgTable("chat_messages", {
  id: serial("id").primaryKey(),
  chatRoomId: integer("chat_room_id").notNull().references(() => chatRooms.id, { onDelete: "cascade" }),
  senderId: integer("sender_id").notNull().references(() => users.id, { onDelete: "cascade" }),
  message: text("message").notNull(),
  isRead: boolean("is_read").notNull().default(false),
  documentUrl: text("document_url"),
  documentKey: text("document_key"),
  documentName: varchar("document_name", { length: 255 }),
  documentSize: integer("document_size"),
  documentType: varchar("document_type", { length: 100 }),
  createdAt: timestamp("created_at").notNull().defaultNow(),
}, (table) => ({
  chatRoomIdIdx: index("chat_messages_chat_room_id_idx").on(table.chatRoomId),
}));

const optionalText = (max: number) => z.string().trim().max(max).nullish();

export const registerUserSchema = createInsertSchema(users, {
  email: z.string().trim().email("A valid email is required"),
  name: z.string().trim().min(1, "Name is required").max(100),
  role: z.enum(USER_ROLES, { errorMap: () => ({ message: "Role must be teacher or student" }) }),
}).pick({
  email: true,
  name: true,
  role: true,
  studentId: true,
  major: true,
  year: true,
  department: true,
  bio: true,
  phone: true,
}).extend({
  password: z.string().min(6, "Password must be at least 6 characters"),
});

export const loginSchema = z.object({
  email: z.string().trim().min(1, "Email and password are required"),
  password: z.string().min(1, "Email and password are required"),
});

export const changePasswordSchema = z.object({
  currentPassword: z.string().min(1, "Current password is required"),
  newPassword: z.string().min(6, "New password must be at least 6 characters"),
});

export const updateProfileSchema = z.object({
  name: z.string().trim().min(1).max(100).optional(),
  studentId: optionalText(50),
  major: optionalText(100),
  year: optionalText(20),
  department: optionalText(100),
  bio: z.string().nullish(),
  phone: optionalText(20),
  notificationsEnabled: z.boolean().optional(),
  emailNotifications: z.boolean().optional(),
  darkMode: z.boolean().optional(),
});

export const insertLectureSchema = createInsertSchema(lectures, {
  title: z.string().trim().min(1, "Title is required").max(200),
  subject: z.string().trim().min(1, "Subject is required").max(100),
  audioUrl: z.string().trim().url("Audio URL must be a valid URL").nullish(),
  keyPoints: z.array(z.string()).nullish(),
  tags: z.array(z.string()).nullish(),
  audioDuration: z.number().int().nonnegative().nullish(),
}).pick({
  title: true,
  subject: true,
  audioUrl: true,
  audioDuration: true,
  transcript: true,
  summary: true,
  keyPoints: true,
  tags: true,
});

export const updateLectureSchema = insertLectureSchema.partial().extend({
  isProcessed: z.boolean().optional(),
});

export const insertTaskSchema = createInsertSchema(tasks, {
  title: z.string().trim().min(1, "Title is required").max(200),
  description: z.string().optional(),
  dueDate: z.coerce.date().nullish(),
}).pick({
  title: true,
  description: true,
  lectureId: true,
  assignedToId: true,
  status: true,
  priority: true,
  dueDate: true,
  isAiGenerated: true,
});

export const updateTaskSchema = insertTaskSchema.pick({
  title: true,
  description: true,
  assignedToId: true,
  priority: true,
  dueDate: true,
}).partial();

export const updateTaskStatusSchema = z.object({
  status: z.enum(TASK_STATUSES, { errorMap: () => ({ message: "Invalid status" }) }),
});

export const insertNotificationSchema = createInsertSchema(notifications, {
  title: z.string().trim().min(1, "Title is required").max(200),
  message: z.string().trim().min(1, "Message is required"),
  data: z.record(z.unknown()).nullish(),
}).pick({
  userId: true,
  type: true,
  title: true,
  message: true,
  data: true,
});

export const createChatRoomSchema = z.object({
  teacherId: z.number().int(),
  studentId: z.number().int(),
});

export const sendMessageSchema = z.object({
  message: z.string({ required_error: "Message is required" }).trim().min(1, "Message cannot be empty"),
});

export type User = typeof users.$inferSelect;
export type InsertUser = typeof users.$inferInsert;
export type PublicUser = Omit<User, "password" | "avatarKey">;
export type RegisterUser = z.infer<typeof registerUserSchema>;
export type UpdateProfile = z.infer<typeof updateProfileSchema>;

export type Lecture = typeof lectures.$inferSelect;
export type InsertLecture = typeof lectures.$inferInsert;
export type LectureWithTeacher = Lecture & { teacherName: string | null };

export type Task = typeof tasks.$inferSelect;
export type InsertTask = typeof tasks.$inferInsert;
export type TaskWithRefs = Task & { lectureTitle: string | null; assignedToName: string | null };

export type Notification = typeof notifications.$inferSelect;
export type InsertNotification = typeof notifications.$inferInsert;

export type ChatRoom = typeof chatRooms.$inferSelect;
export type ChatMessage = typeof chatMessages.$inferSelect;
export type InsertChatMessage = typeof chatMessages.$inferInsert;
