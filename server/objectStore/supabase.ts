import { StorageClient } from "@supabase/storage-js";
import { ObjectStoreError, type ObjectStore } from "./types";

export interface SupabaseStoreOptions {
  url: string;
  key: string;
  bucket: string;
}

/** Supabase Storage over the SDK's storage client alone; no realtime socket is opened. */
export class SupabaseObjectStore implements ObjectStore {
  readonly provider = "supabase" as const;
  private client: StorageClient;

  constructor(private options: SupabaseStoreOptions) {
    this.client = new StorageClient(`${options.url.replace(/\/+$/, "")}/storage/v1`, {
      apikey: options.key,
      Authorization: `Bearer ${options.key}`,
    });
  }

  publicUrl(key: string): string {
    return this.client.from(this.options.bucket).getPublicUrl(key).data.publicUrl;
  }

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    const { error } = await this.client.from(this.options.bucket).upload(key, body, { contentType, upsert: false });
    if (error) {
      throw new ObjectStoreError(`Supabase upload failed for ${key}: ${error.message}`, error);
    }

    const publicUrl = this.publicUrl(key);
    if (!publicUrl) {
      throw new ObjectStoreError(`Supabase returned no public URL for ${key}`);
    }
    return publicUrl;
  }

  async remove(key: string): Promise<void> {
    const { error } = await this.client.from(this.options.bucket).remove([key]);
    if (error) {
      throw new ObjectStoreError(`Supabase delete failed for ${key}: ${error.message}`, error);
    }
  }
}
