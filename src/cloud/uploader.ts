import * as fs from 'fs';
import { randomUUID } from 'crypto';
import { PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import type { Logger } from '../utils/logger';

const DEFAULT_REGION = 'us-east-2';

export interface UploadCredentials {
  accessKeyID: string;
  secretAccessKey: string;
}

export interface UploaderOptions {
  accountID: number;
  repositoryID: number;
  credentials: UploadCredentials;
  bucket?: string;           // Default: '<accountID>.buildpulse-uploads'
  region?: string;           // Default: 'us-east-2'
  idgen?: () => string;      // Default: crypto.randomUUID
}

export interface Uploader {
  /** Store the archive and return the key it was stored under */
  upload(archivePath: string): Promise<string>;
}

/**
 * Sends result archives to the account's upload bucket.
 */
export class ArchiveUploader implements Uploader {
  private readonly client: S3Client;
  private readonly bucket: string;
  private readonly repositoryID: number;
  private readonly idgen: () => string;

  constructor(options: UploaderOptions, private readonly logger: Logger) {
    this.bucket = options.bucket ?? `${options.accountID}.buildpulse-uploads`;
    this.repositoryID = options.repositoryID;
    this.idgen = options.idgen ?? randomUUID;
    this.client = new S3Client({
      region: options.region ?? DEFAULT_REGION,
      credentials: {
        accessKeyId: options.credentials.accessKeyID,
        secretAccessKey: options.credentials.secretAccessKey,
      },
    });
  }

  async upload(archivePath: string): Promise<string> {
    const key = `${this.repositoryID}/buildpulse-${this.idgen()}.gz`;
    this.logger.log(`Uploading ${archivePath} to s3://${this.bucket}/${key}`);

    await this.client.send(
      new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: fs.readFileSync(archivePath),
      })
    );

    return key;
  }
}
