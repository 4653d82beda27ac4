import { GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3';
import { config } from '../../config';
import type { CopyStore } from '../registry/types';

export function createS3Client(): S3Client {
  return new S3Client({
    region: config.AWS_REGION,
    ...(config.AWS_ACCESS_KEY_ID && config.AWS_SECRET_ACCESS_KEY
      ? {
          credentials: {
            accessKeyId: config.AWS_ACCESS_KEY_ID,
            secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
          },
        }
      : {}),
  });
}

/** Official copies downloaded from the registry, keyed by document id. */
export class S3CopyStore implements CopyStore {
  constructor(
    private readonly client: Pick<S3Client, 'send'> = createS3Client(),
    private readonly bucket: string | undefined = config.S3_BUCKET_NAME
  ) {}

  private requireBucket(): string {
    if (!this.bucket) {
      throw new Error('S3_BUCKET_NAME environment variable is required');
    }
    return this.bucket;
  }

  async save(documentId: string, bytes: Buffer): Promise<string> {
    const bucket = this.requireBucket();
    const key = `certificates/${documentId}/official_copy_${Date.now()}.pdf`;

    await this.client.send(
      new PutObjectCommand({
        Bucket: bucket,
        Key: key,
        Body: bytes,
        ContentType: 'application/pdf',
        Metadata: {
          documentId,
          retrievedAt: new Date().toISOString(),
        },
      })
    );
    return key;
  }

  async load(ref: string): Promise<Buffer> {
    const bucket = this.requireBucket();
    const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: ref }));
    if (!response.Body) {
      throw new Error(`Official copy ${ref} has no content`);
    }
    return Buffer.from(await response.Body.transformToByteArray());
  }
}
