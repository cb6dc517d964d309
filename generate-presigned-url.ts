#!/usr/bin/env node
import { S3Client, GetObjectCommand } from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { getEnvBucketName, getEnvPresignedUrlExpiresIn } from './lib';

const USAGE = 'Usage: generate-presigned-url <key> [expiresInSeconds]';

// SigV4 query signatures are capped at seven days
export const MAX_EXPIRES_IN = 604800;

export interface PresignedUrlRequest {
  bucket: string;
  key: string;
  expiresIn: number;
  /** Pins X-Amz-Date; defaults to the current time */
  signingDate?: Date;
}

/**
 * Sign a GET URL for an S3 object.
 *
 * Signing happens locally with whatever credentials the client resolves;
 * no request is sent to S3. The URL carries X-Amz-Date and X-Amz-Expires, so
 * it can be fed straight back into check-presigned-url-expiry.
 *
 * @param request Bucket, key and lifetime of the URL
 * @param s3Client Client whose region and credentials sign the URL
 * @returns Fully-qualified presigned HTTPS URL
 */
export async function generatePresignedUrl(
  request: PresignedUrlRequest,
  s3Client: S3Client = new S3Client({})
): Promise<string> {
  const command = new GetObjectCommand({
    Bucket: request.bucket,
    Key: request.key,
  });
  return getSignedUrl(s3Client, command, {
    expiresIn: request.expiresIn,
    signingDate: request.signingDate,
  });
}

/**
 * Combine the command-line arguments with the environment
 * @returns The signing request, or the message explaining why there is none
 */
function resolveRequest(key: string, expiresInArg: string | undefined): PresignedUrlRequest | string {
  try {
    const bucket = getEnvBucketName();
    const defaultExpiresIn = getEnvPresignedUrlExpiresIn();
    const expiresIn = expiresInArg === undefined
      ? defaultExpiresIn
      : /^\d+$/.test(expiresInArg) ? parseInt(expiresInArg, 10) : NaN;
    if (!Number.isInteger(expiresIn) || expiresIn < 1 || expiresIn > MAX_EXPIRES_IN) {
      return `expiresInSeconds must be an integer between 1 and ${MAX_EXPIRES_IN}, got ${expiresInArg ?? defaultExpiresIn}`;
    }
    return { bucket, key, expiresIn };
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * GeneratePresignedUrl CLI
 *
 * `generate-presigned-url <key> [expiresInSeconds]` prints a presigned GET URL
 * for `s3://$BUCKET_NAME/<key>`. The lifetime defaults to
 * PRESIGNED_URL_EXPIRES_IN (300 seconds when unset). Region and credentials
 * come from the SDK's default provider chain.
 *
 * @param args Command-line arguments without the node binary and script path
 * @param s3Client Client used for signing
 * @returns Process exit status
 */
export async function main(args: string[], s3Client?: S3Client): Promise<number> {
  if (args.length < 1 || args.length > 2) {
    console.log(USAGE);
    return 1;
  }
  const [key, expiresInArg] = args;

  const request = resolveRequest(key, expiresInArg);
  if (typeof request === 'string') {
    console.log(request);
    return 1;
  }

  try {
    const url = await generatePresignedUrl(request, s3Client);
    console.log(url);
    return 0;
  } catch (error) {
    console.log(`Failed to generate presigned URL: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Unexpected error:', error);
      process.exitCode = 1;
    });
}
