// src/core/video/archiver.ts
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { S3Credentials } from '../config/env.js';
import type { VideoAsset } from '../types/index.js';

export interface VideoArchiver {
  /** Stores the asset and resolves with its object key */
  archive(asset: VideoAsset): Promise<string>;
}

export function createS3Client(credentials: S3Credentials): S3Client {
  return new S3Client({
    region: credentials.region,
    ...(credentials.endpoint ? { endpoint: credentials.endpoint, forcePathStyle: true } : {}),
    ...(credentials.accessKeyId && credentials.secretAccessKey
      ? { credentials: { accessKeyId: credentials.accessKeyId, secretAccessKey: credentials.secretAccessKey } }
      : {}),
  });
}

export class S3VideoArchiver implements VideoArchiver {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
    private readonly prefix: string
  ) {}

  async archive(asset: VideoAsset): Promise<string> {
    const key = `${this.prefix}${asset.postId}.mp4`;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: asset.bytes,
        ContentType: asset.contentType,
      })
    );
    return key;
  }
}
