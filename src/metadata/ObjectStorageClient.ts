import {
  DeleteObjectCommand,
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException
} from '@aws-sdk/client-s3';

export interface PutObjectOptions {
  /** Only create the object; report false instead of overwriting an existing one */
  createOnly?: boolean;
}

/**
 * Minimal blob access the object-storage metadata backend needs
 */
export interface ObjectStorageClient {
  /** Object body, or undefined when the key does not exist */
  getObject(key: string): Promise<string | undefined>;

  /** Returns false only when createOnly was set and the key already exists */
  putObject(key: string, body: string, options?: PutObjectOptions): Promise<boolean>;

  deleteObject(key: string): Promise<void>;
}

function isPreconditionFailure(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return error.name === 'PreconditionFailed' || error.$metadata.httpStatusCode === 412;
}

/**
 * S3 (or S3-compatible) bucket access through the AWS SDK
 */
export class S3ObjectStorageClient implements ObjectStorageClient {
  constructor(
    private readonly bucket: string,
    private readonly client: S3Client = new S3Client({})
  ) {}

  async getObject(key: string): Promise<string | undefined> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: this.bucket, Key: key }));
      if (!response.Body) {
        return '';
      }
      return await response.Body.transformToString('utf-8');
    } catch (error) {
      if (error instanceof NoSuchKey) {
        return undefined;
      }
      throw error;
    }
  }

  async putObject(key: string, body: string, options: PutObjectOptions = {}): Promise<boolean> {
    try {
      await this.client.send(new PutObjectCommand({
        Bucket: this.bucket,
        Key: key,
        Body: body,
        ContentType: 'application/json',
        IfNoneMatch: options.createOnly ? '*' : undefined
      }));
      return true;
    } catch (error) {
      if (options.createOnly && isPreconditionFailure(error)) {
        return false;
      }
      throw error;
    }
  }

  async deleteObject(key: string): Promise<void> {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.bucket, Key: key }));
  }
}
