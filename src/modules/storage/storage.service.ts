import { DeleteObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import type { EnvConfig } from "../../config/env.config";

@Injectable()
export class StorageService {
  private readonly logger = new Logger(StorageService.name);
  private readonly bucketName: string;
  private readonly region: string;
  private readonly s3Client: S3Client;

  constructor(private readonly configService: ConfigService<EnvConfig, true>) {
    this.bucketName = this.configService.get("AWS_BUCKET_NAME", { infer: true });
    this.region = this.configService.get("AWS_REGION", { infer: true });
    this.s3Client = new S3Client({
      region: this.region,
      credentials: {
        accessKeyId: this.configService.get("AWS_ACCESS_KEY_ID", { infer: true }),
        secretAccessKey: this.configService.get("AWS_SECRET_ACCESS_KEY", { infer: true }),
      },
    });
  }

  get publicBaseUrl(): string {
    return `https://${this.bucketName}.s3.${this.region}.amazonaws.com/`;
  }

  async uploadBuffer(buffer: Buffer, key: string, contentType: string): Promise<string> {
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.bucketName,
        Key: key,
        Body: buffer,
        ContentType: contentType,
        CacheControl: "public, max-age=31536000, immutable",
      }),
    );

    this.logger.log("Uploaded object", { key, size: buffer.length });
    return `${this.publicBaseUrl}${key}`;
  }

  async deleteObjectByKey(key: string): Promise<void> {
    await this.s3Client.send(
      new DeleteObjectCommand({
        Bucket: this.bucketName,
        Key: key,
      }),
    );
  }

  /**
   * Deletes a previously uploaded object by its public URL. URLs that point
   * elsewhere (seeded stock photos, external links) are left alone.
   */
  async deleteByUrl(url: string | null | undefined): Promise<boolean> {
    const key = this.keyFromUrl(url);
    if (!key) return false;

    try {
      await this.deleteObjectByKey(key);
      return true;
    } catch (error) {
      this.logger.warn("Failed to delete stored object", {
        key,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  keyFromUrl(url: string | null | undefined): string | null {
    if (!url?.startsWith(this.publicBaseUrl)) return null;
    const key = url.slice(this.publicBaseUrl.length);
    return key.length > 0 ? key : null;
  }
}
