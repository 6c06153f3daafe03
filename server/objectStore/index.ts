import { randomUUID } from "crypto";
import path from "path";
import type { AppConfig } from "../config";
import { log } from "../log";
import { S3ObjectStore } from "./s3";
import { SupabaseObjectStore } from "./supabase";
import type { ObjectStore } from "./types";

export { ObjectStoreError, type ObjectStore } from "./types";

export const AUDIO_EXTENSIONS = ["mp3", "wav", "m4a", "flac", "ogg"] as const;
export const IMAGE_EXTENSIONS = ["png", "jpg", "jpeg", "gif", "webp"] as const;
export const DOCUMENT_EXTENSIONS = ["pdf", "doc", "docx", "ppt", "pptx", "xls", "xlsx", "txt", "png", "jpg", "jpeg"] as const;

const CONTENT_TYPES: Record<string, string> = {
  mp3: "audio/mpeg",
  wav: "audio/wav",
  m4a: "audio/mp4",
  flac: "audio/flac",
  ogg: "audio/ogg",
  aac: "audio/aac",
  webm: "audio/webm",
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  webp: "image/webp",
  pdf: "application/pdf",
  txt: "text/plain",
  doc: "application/msword",
  docx: "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ppt: "application/vnd.ms-powerpoint",
  pptx: "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  xls: "application/vnd.ms-excel",
  xlsx: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
};

export function fileExtension(fileName: string): string {
  return path.extname(fileName).slice(1).toLowerCase();
}

export function hasAllowedExtension(fileName: string, allowed: readonly string[]): boolean {
  const ext = fileExtension(fileName);
  return ext !== "" && allowed.includes(ext);
}

export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[fileExtension(fileName)] ?? "application/octet-stream";
}

function shortId(): string {
  return randomUUID().replace(/-/g, "");
}

export function audioKey(lectureId: number, fileName: string): string {
  return `audio/${lectureId}_${shortId()}.${fileExtension(fileName) || "mp3"}`;
}

export function profileImageKey(userId: number, fileName: string): string {
  return `images/profiles/${userId}_${shortId()}.${fileExtension(fileName) || "png"}`;
}

export function documentKey(roomId: number, fileName: string): string {
  const safeName = path.basename(fileName).replace(/[^A-Za-z0-9._-]/g, "_");
  return `documents/${roomId}/${shortId()}_${safeName}`;
}

export function createObjectStore(config: AppConfig): ObjectStore | null {
  const { s3, supabase } = config.storage;
  const hasS3 = Boolean(s3.accessKeyId && s3.secretAccessKey);
  const hasSupabase = Boolean(supabase.url && supabase.key);

  let provider = config.storage.provider;
  if (!provider) {
    provider = hasS3 ? "s3" : hasSupabase ? "supabase" : undefined;
  }

  if (provider === "s3" && s3.accessKeyId && s3.secretAccessKey) {
    log(`Using S3 bucket ${s3.bucket} (${s3.region})`, "storage");
    return new S3ObjectStore({
      accessKeyId: s3.accessKeyId,
      secretAccessKey: s3.secretAccessKey,
      region: s3.region,
      bucket: s3.bucket,
      publicReadAcl: s3.publicReadAcl,
    });
  }

  if (provider === "supabase" && supabase.url && supabase.key) {
    log(`Using Supabase storage bucket ${supabase.bucket}`, "storage");
    return new SupabaseObjectStore({ url: supabase.url, key: supabase.key, bucket: supabase.bucket });
  }

  if (provider) {
    log(`Storage provider "${provider}" selected but its credentials are missing`, "storage");
  } else {
    log("No object storage configured; uploads are disabled", "storage");
  }
  return null;
}
