import multer from "multer";
import type { RequestHandler } from "express";

const MB = 1024 * 1024;

export const AUDIO_MAX_BYTES = 100 * MB;
export const AVATAR_MAX_BYTES = 5 * MB;
export const DOCUMENT_MAX_BYTES = 20 * MB;

function memoryUpload(maxBytes: number) {
  return multer({ storage: multer.memoryStorage(), limits: { fileSize: maxBytes, files: 1 } });
}

export const audioUpload = memoryUpload(AUDIO_MAX_BYTES);
export const avatarUpload = memoryUpload(AVATAR_MAX_BYTES);
export const documentUpload = memoryUpload(DOCUMENT_MAX_BYTES);

/**
 * Runs a multer middleware and turns its errors into JSON responses.
 */
export function acceptUpload(middleware: RequestHandler, maxBytes: number): RequestHandler {
  return (req, res, next) => {
    middleware(req, res, (err?: unknown) => {
      if (err) {
        if (err instanceof multer.MulterError) {
          if (err.code === "LIMIT_FILE_SIZE") {
            return res.status(413).json({ error: `File too large - maximum ${Math.round(maxBytes / MB)}MB allowed` });
          }
          return res.status(400).json({ error: `Upload error: ${err.message}` });
        }
        console.error("Upload error:", err);
        return res.status(500).json({ error: "Upload failed" });
      }
      next();
    });
  };
}
