import { S3Client, PutObjectCommand, DeleteObjectCommand } from "@aws-sdk/client-s3";
import { ObjectStoreError, type ObjectStore } from "./types";

export interface S3StoreOptions {
  accessKeyId: string;
  secretAccessKey: string;
  region: string;
  bucket: string;
  publicReadAcl: boolean;
}

export function s3PublicUrl(bucket: string, region: string, key: string): string {
  return `https://${bucket}.s3.${region}.amazonaws.com/${key}`;
}

export class S3ObjectStore implements ObjectStore {
  readonly provider = "s3" as const;
  private client: S3Client;

  constructor(private options: S3StoreOptions, client?: S3Client) {
    this.client = client ?? new S3Client({
      region: options.region,
      credentials: {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      },
    });
  }

  async put(key: string, body: Buffer, contentType: string): Promise<string> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
        ...(this.options.publicReadAcl ? { ACL: "public-read" as const } : {}),
      }));
    } catch (error) {
      throw new ObjectStoreError(`S3 upload failed for ${key}`, error);
    }
    return s3PublicUrl(this.options.bucket, this.options.region, key);
  }

  async remove(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.options.bucket, Key: key }));
    } catch (error) {
      throw new ObjectStoreError(`S3 delete failed for ${key}`, error);
    }
  }
}
