#!/usr/bin/env node
import {
  PresignedUrlError,
  UsageError,
  ParseError,
  checkPresignedUrlExpiry,
  formatUtcTimestamp,
} from './lib';

const USAGE = 'check-presigned-url-expiry <presigned_url>';

/**
 * CheckPresignedUrlExpiry CLI
 *
 * Reads X-Amz-Date and X-Amz-Expires from a presigned URL and reports
 * whether the URL is still usable. Output goes to stdout only:
 *
 * ```
 * URL generated at: 2024-01-15 12:00:00 UTC
 * Expires at:      2024-01-15 12:05:00 UTC
 * Current time:    2024-01-15 12:03:10.250000 UTC
 * The pre-signed URL is still valid.
 * ```
 *
 * Exit status 0 means a verdict was reached (valid or expired); callers tell
 * the two apart from the last line. Exit status 1 means the input was
 * unusable: wrong argument count, missing parameters or unparsable values.
 * The signature is not verified.
 *
 * @param args Command-line arguments without the node binary and script path
 * @param clock Source of the current time, read once per run
 * @returns Process exit status
 */
export function main(args: string[], clock: () => Date = () => new Date()): number {
  try {
    if (args.length !== 1) {
      throw new UsageError(USAGE);
    }

    const check = checkPresignedUrlExpiry(args[0], clock());

    console.log(`URL generated at: ${formatUtcTimestamp(check.issuedAt)} UTC`);
    console.log(`Expires at:      ${formatUtcTimestamp(check.expiresAt)} UTC`);
    console.log(`Current time:    ${formatUtcTimestamp(check.checkedAt)} UTC`);
    console.log(check.expired
      ? 'The pre-signed URL has expired.'
      : 'The pre-signed URL is still valid.');
    return 0;
  } catch (error) {
    if (error instanceof ParseError) {
      console.log(`Error parsing X-Amz-Date or X-Amz-Expires: ${error.message}`);
      return 1;
    }
    if (error instanceof PresignedUrlError) {
      console.log(error.message);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  process.exitCode = main(process.argv.slice(2));
}
