import { GetObjectCommand, PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import { getSignedUrl } from "@aws-sdk/s3-request-presigner";

export interface AudioStorage {
  /** Stores the object and returns its key. */
  upload(key: string, body: Buffer, contentType: string): Promise<string>;
  /** Returns a URL a client can play the object from. */
  getUrl(key: string): Promise<string>;
}

export interface S3StorageOptions {
  region: string;
  bucket: string;
  urlExpiresInSeconds?: number;
}

export function narrationAudioKey(scriptId: string, segment: string): string {
  return `narrations/${scriptId}/${segment}.mp3`;
}

export class S3AudioStorage implements AudioStorage {
  private readonly s3Client: S3Client;

  constructor(private readonly options: S3StorageOptions) {
    this.s3Client = new S3Client({ region: options.region });
  }

  async upload(key: string, body: Buffer, contentType: string): Promise<string> {
    await this.s3Client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
        Body: body,
        ContentType: contentType,
      }),
    );
    return key;
  }

  /**
   * Generates a presigned URL for an existing S3 key
   */
  async getUrl(key: string): Promise<string> {
    return getSignedUrl(
      this.s3Client,
      new GetObjectCommand({
        Bucket: this.options.bucket,
        Key: key,
      }),
      { expiresIn: this.options.urlExpiresInSeconds ?? 3600 },
    );
  }
}
