import {
  CreateBucketCommand,
  GetObjectCommand,
  HeadBucketCommand,
  ListObjectsV2Command,
  NoSuchBucket,
  NotFound,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { describeError, PersistenceError } from "../lib/errors";
import { objectUri, type ObjectBody, type ObjectStore } from "./types";

export type S3StoreConfig = {
  endpoint: string;
  region: string;
  accessKeyId: string;
  secretAccessKey: string;
};

const isMissingBucket = (error: unknown) =>
  error instanceof NotFound ||
  error instanceof NoSuchBucket ||
  (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404);

/**
 * MinIO through the S3 API. Buckets are created on first use.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;
  private readonly ensured = new Set<string>();

  constructor(config: S3StoreConfig) {
    this.client = new S3Client({
      endpoint: config.endpoint,
      region: config.region,
      forcePathStyle: true,
      credentials: {
        accessKeyId: config.accessKeyId,
        secretAccessKey: config.secretAccessKey,
      },
    });
  }

  private async ensureBucket(bucket: string) {
    if (this.ensured.has(bucket)) {
      return;
    }
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
    } catch (error) {
      if (!isMissingBucket(error)) {
        throw error;
      }
      await this.client.send(new CreateBucketCommand({ Bucket: bucket }));
      console.log(`[minio] bucket created: ${bucket}`);
    }
    this.ensured.add(bucket);
  }

  private wrapError(bucket: string, action: string, error: unknown) {
    const scope = error instanceof S3ServiceException ? "record" : "connection";
    return new PersistenceError(scope, bucket, `${action}: ${describeError(error)}`, error);
  }

  async upload(bucket: string, name: string, body: ObjectBody, contentType: string) {
    try {
      await this.ensureBucket(bucket);
      await this.client.send(
        new PutObjectCommand({ Bucket: bucket, Key: name, Body: body, ContentType: contentType }),
      );
    } catch (error) {
      throw this.wrapError(bucket, `upload ${bucket}/${name}`, error);
    }
    const uri = objectUri(bucket, name);
    console.log(`[minio] uploaded ${uri}`);
    return uri;
  }

  async list(bucket: string, prefix: string) {
    const names: string[] = [];
    let continuationToken: string | undefined;
    try {
      do {
        const page = await this.client.send(
          new ListObjectsV2Command({ Bucket: bucket, Prefix: prefix, ContinuationToken: continuationToken }),
        );
        for (const object of page.Contents ?? []) {
          if (object.Key) {
            names.push(object.Key);
          }
        }
        continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
      } while (continuationToken);
    } catch (error) {
      if (isMissingBucket(error)) {
        return [];
      }
      throw this.wrapError(bucket, `list ${bucket}/${prefix}`, error);
    }
    return names.sort();
  }

  async download(bucket: string, name: string) {
    try {
      const object = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: name }));
      if (!object.Body) {
        throw new PersistenceError("record", bucket, `download ${bucket}/${name}: empty body`);
      }
      return Buffer.from(await object.Body.transformToByteArray());
    } catch (error) {
      if (error instanceof PersistenceError) {
        throw error;
      }
      throw this.wrapError(bucket, `download ${bucket}/${name}`, error);
    }
  }

  async close() {
    this.client.destroy();
  }
}
