import { loadConfig } from "../../server/config";
import {
  audioKey, contentTypeFor, createObjectStore, documentKey, fileExtension, hasAllowedExtension,
  profileImageKey, AUDIO_EXTENSIONS,
} from "../../server/objectStore";
import { S3ObjectStore, s3PublicUrl } from "../../server/objectStore/s3";
import { SupabaseObjectStore } from "../../server/objectStore/supabase";

describe("file helpers", () => {
  it("reads extensions case-insensitively", () => {
    expect(fileExtension("Lecture 1.MP3")).toBe("mp3");
    expect(fileExtension("notes")).toBe("");
  });

  it("checks extensions against an allow list", () => {
    expect(hasAllowedExtension("week1.m4a", AUDIO_EXTENSIONS)).toBe(true);
    expect(hasAllowedExtension("week1.exe", AUDIO_EXTENSIONS)).toBe(false);
    expect(hasAllowedExtension("mp3", AUDIO_EXTENSIONS)).toBe(false);
  });

  it("maps content types with an octet-stream fallback", () => {
    expect(contentTypeFor("talk.mp3")).toBe("audio/mpeg");
    expect(contentTypeFor("slides.pdf")).toBe("application/pdf");
    expect(contentTypeFor("archive.zip")).toBe("application/octet-stream");
  });
});

describe("object keys", () => {
  it("places audio under audio/ with the lecture id", () => {
    expect(audioKey(7, "Recording.WAV")).toMatch(/^audio\/7_[0-9a-f]{32}\.wav$/);
  });

  it("generates a unique key per upload", () => {
    expect(audioKey(7, "a.mp3")).not.toBe(audioKey(7, "a.mp3"));
  });

  it("places avatars under images/profiles/", () => {
    expect(profileImageKey(3, "me.jpeg")).toMatch(/^images\/profiles\/3_[0-9a-f]{32}\.jpeg$/);
    expect(profileImageKey(3, "me")).toMatch(/\.png$/);
  });

  it("sanitizes document names", () => {
    expect(documentKey(12, "../Week 2 (final).pdf")).toMatch(/^documents\/12\/[0-9a-f]{32}_Week_2__final_\.pdf$/);
  });
});

describe("createObjectStore", () => {
  it("returns null when no provider is configured", () => {
    expect(createObjectStore(loadConfig({}))).toBeNull();
  });

  it("picks S3 when AWS credentials are present", () => {
    const store = createObjectStore(loadConfig({ AWS_ACCESS_KEY_ID: "test-id", AWS_SECRET_ACCESS_KEY: "test-secret" }));
    expect(store).toBeInstanceOf(S3ObjectStore);
    expect(store?.provider).toBe("s3");
  });

  it("picks Supabase when only Supabase is configured", () => {
    const store = createObjectStore(loadConfig({ SUPABASE_URL: "https://project.supabase.test", SUPABASE_KEY: "test-key" }));
    expect(store).toBeInstanceOf(SupabaseObjectStore);
  });

  it("honours an explicit provider", () => {
    const store = createObjectStore(loadConfig({
      STORAGE_PROVIDER: "supabase",
      AWS_ACCESS_KEY_ID: "test-id",
      AWS_SECRET_ACCESS_KEY: "test-secret",
      SUPABASE_URL: "https://project.supabase.test",
      SUPABASE_KEY: "test-key",
    }));
    expect(store?.provider).toBe("supabase");
  });

  it("returns null when the chosen provider lacks credentials", () => {
    expect(createObjectStore(loadConfig({ STORAGE_PROVIDER: "s3" }))).toBeNull();
  });
});

describe("SupabaseObjectStore", () => {
  it("builds public URLs under the project's storage endpoint", () => {
    const store = new SupabaseObjectStore({ url: "https://project.supabase.test/", key: "test-key", bucket: "lectures" });
    expect(store.publicUrl("audio/3_ab12.mp3")).toBe(
      "https://project.supabase.test/storage/v1/object/public/lectures/audio/3_ab12.mp3"
    );
  });
});

describe("s3PublicUrl", () => {
  it("builds a virtual-hosted style URL", () => {
    expect(s3PublicUrl("class-audio", "eu-west-1", "audio/1_abc.mp3")).toBe(
      "https://class-audio.s3.eu-west-1.amazonaws.com/audio/1_abc.mp3"
    );
  });
});
