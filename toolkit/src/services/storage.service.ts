import {
  S3ServiceException,
  type GetObjectCommandInput,
  type HeadBucketCommandInput,
  type PutObjectCommandInput,
} from '@aws-sdk/client-s3';
import { promises as fs } from 'fs';
import path from 'path';

import { createLogger, type Logger } from '../logger.js';
import { errorMessage } from '../utils/errors.js';

export interface IStorageService {
  /** Fails with a readable message when the bucket is missing or forbidden. */
  validateBucket(bucket: string): Promise<void>;
  /**
   * @returns The `s3://` URI of the uploaded object.
   */
  uploadFile(localPath: string, bucket: string, key?: string): Promise<string>;
  getJson(bucket: string, key: string): Promise<unknown>;
}

/** The calls this service makes on the SDK's `S3` client. */
export interface S3Api {
  headBucket(input: HeadBucketCommandInput): Promise<unknown>;
  putObject(input: PutObjectCommandInput): Promise<unknown>;
  getObject(
    input: GetObjectCommandInput
  ): Promise<{ Body?: { transformToString(encoding?: string): Promise<string> } }>;
}

export const toS3Uri = (bucket: string, key: string) => `s3://${bucket}/${key}`;

export class S3StorageService implements IStorageService {
  private s3Client: S3Api;
  private logger: Logger;

  constructor(s3Client: S3Api, logger: Logger = createLogger('S3StorageService')) {
    this.s3Client = s3Client;
    this.logger = logger;
  }

  async validateBucket(bucket: string): Promise<void> {
    try {
      await this.s3Client.headBucket({ Bucket: bucket });
      this.logger.debug(`Bucket ${bucket} is accessible.`);
    } catch (err) {
      if (err instanceof S3ServiceException) {
        const status = err.$metadata.httpStatusCode;
        if (status === 404) throw new Error(`Bucket '${bucket}' does not exist`);
        if (status === 403) throw new Error(`No permission to access bucket '${bucket}'`);
        throw new Error(`Error accessing bucket: ${err.message}`, { cause: err });
      }
      throw new Error(`Bucket validation failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  async uploadFile(localPath: string, bucket: string, key?: string): Promise<string> {
    const stats = await fs.stat(localPath).catch(() => null);
    if (!stats?.isFile()) {
      throw new Error(`Local file '${localPath}' not found`);
    }

    const objectKey = key ?? path.basename(localPath);
    this.logger.info(`Uploading ${localPath} to bucket ${bucket}...`);
    try {
      await this.s3Client.putObject({
        Bucket: bucket,
        Key: objectKey,
        Body: await fs.readFile(localPath),
      });
    } catch (err) {
      if (err instanceof S3ServiceException && err.name === 'AccessDenied') {
        throw new Error(`Permission denied writing to bucket '${bucket}'`, { cause: err });
      }
      throw new Error(`AWS upload error: ${errorMessage(err)}`, { cause: err });
    }
    this.logger.info('Upload successful.');
    return toS3Uri(bucket, objectKey);
  }

  async getJson(bucket: string, key: string): Promise<unknown> {
    this.logger.debug(`Reading s3://${bucket}/${key}`);
    const response = await this.s3Client.getObject({ Bucket: bucket, Key: key });
    if (!response.Body) {
      throw new Error(`Object s3://${bucket}/${key} has no body.`);
    }
    const data: unknown = JSON.parse(await response.Body.transformToString('utf-8'));
    return data;
  }
}
