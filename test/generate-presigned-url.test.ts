import { S3Client } from '@aws-sdk/client-s3';
import { generatePresignedUrl, main } from '../generate-presigned-url';
import { main as checkMain } from '../check-presigned-url-expiry';

/**
 * Unit Tests for the GeneratePresignedUrl CLI
 *
 * These tests validate that the CLI:
 * 1. Signs GET URLs carrying X-Amz-Date and X-Amz-Expires
 * 2. Takes the bucket and default lifetime from the environment
 * 3. Rejects bad arguments and configuration with exit status 1
 * 4. Produces URLs the expiry checker accepts
 *
 * Signing is local; placeholder credentials are enough and nothing is sent.
 */

let consoleLogSpy: jest.SpyInstance;

/**
 * Helper function to create an S3 client with placeholder credentials
 * @returns S3Client for us-east-1
 */
const createTestClient = (): S3Client =>
  new S3Client({
    region: 'us-east-1',
    credentials: {
      accessKeyId: 'test-access-key-id',
      secretAccessKey: 'test-secret-access-key',
    },
  });

describe('generatePresignedUrl', () => {
  test('should sign a GET URL with the requested lifetime and signing date', async () => {
    // GIVEN
    const s3Client = createTestClient();

    // WHEN
    const uploadUrl = await generatePresignedUrl(
      {
        bucket: 'test-bucket',
        key: 'reports/2024/q1.pdf',
        expiresIn: 900,
        signingDate: new Date('2024-01-15T12:00:00Z'),
      },
      s3Client
    );

    // THEN
    const url = new URL(uploadUrl);
    expect(url.protocol).toBe('https:');
    expect(url.hostname).toContain('test-bucket');
    expect(url.hostname).toContain('amazonaws.com');
    expect(url.pathname).toBe('/reports/2024/q1.pdf');
    expect(url.searchParams.get('X-Amz-Date')).toBe('20240115T120000Z');
    expect(url.searchParams.get('X-Amz-Expires')).toBe('900');
    expect(url.searchParams.has('X-Amz-Signature')).toBe(true);
    s3Client.destroy();
  });
});

describe('GeneratePresignedUrl CLI', () => {
  beforeEach(() => {
    consoleLogSpy = jest.spyOn(console, 'log').mockImplementation();

    process.env.BUCKET_NAME = 'test-bucket';
    process.env.AWS_ACCESS_KEY_ID = 'test-access-key-id';
    process.env.AWS_SECRET_ACCESS_KEY = 'test-secret-access-key';
    process.env.AWS_REGION = 'us-east-1';
  });

  afterEach(() => {
    consoleLogSpy.mockRestore();

    delete process.env.BUCKET_NAME;
    delete process.env.PRESIGNED_URL_EXPIRES_IN;
    delete process.env.AWS_ACCESS_KEY_ID;
    delete process.env.AWS_SECRET_ACCESS_KEY;
    delete process.env.AWS_REGION;
  });

  /**
   * Helper function to get the single URL printed by the CLI
   * @returns Parsed URL
   */
  const printedUrl = (): URL => {
    expect(consoleLogSpy).toHaveBeenCalledTimes(1);
    return new URL(String(consoleLogSpy.mock.calls[0][0]));
  };

  test('should print a URL with the default 300 second lifetime', async () => {
    const exitCode = await main(['photos/cat.jpg']);

    expect(exitCode).toBe(0);
    expect(printedUrl().searchParams.get('X-Amz-Expires')).toBe('300');
  });

  test('should honour an explicit lifetime argument', async () => {
    const exitCode = await main(['photos/cat.jpg', '60']);

    expect(exitCode).toBe(0);
    expect(printedUrl().searchParams.get('X-Amz-Expires')).toBe('60');
  });

  test('should take the default lifetime from PRESIGNED_URL_EXPIRES_IN', async () => {
    process.env.PRESIGNED_URL_EXPIRES_IN = '120';

    const exitCode = await main(['photos/cat.jpg']);

    expect(exitCode).toBe(0);
    expect(printedUrl().searchParams.get('X-Amz-Expires')).toBe('120');
  });

  test('should produce a URL the expiry checker reports as valid', async () => {
    // GIVEN
    await main(['photos/cat.jpg', '600']);
    const url = String(consoleLogSpy.mock.calls[0][0]);
    consoleLogSpy.mockClear();

    // WHEN
    const exitCode = checkMain([url]);

    // THEN
    expect(exitCode).toBe(0);
    expect(consoleLogSpy).toHaveBeenLastCalledWith('The pre-signed URL is still valid.');
  });

  test('should print usage and exit 1 without arguments', async () => {
    const exitCode = await main([]);

    expect(exitCode).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith('Usage: generate-presigned-url <key> [expiresInSeconds]');
  });

  test('should print usage and exit 1 for too many arguments', async () => {
    const exitCode = await main(['photos/cat.jpg', '60', 'extra']);

    expect(exitCode).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith('Usage: generate-presigned-url <key> [expiresInSeconds]');
  });

  test.each([['0'], ['604801'], ['abc'], ['1.5'], ['0x3c'], ['1e2'], [' 60 '], ['']])(
    'should reject lifetime %p',
    async (expiresIn) => {
      const exitCode = await main(['photos/cat.jpg', expiresIn]);

      expect(exitCode).toBe(1);
      expect(consoleLogSpy).toHaveBeenCalledWith(
        `expiresInSeconds must be an integer between 1 and 604800, got ${expiresIn}`
      );
    }
  );

  test('should accept the maximum lifetime of seven days', async () => {
    const exitCode = await main(['photos/cat.jpg', '604800']);

    expect(exitCode).toBe(0);
    expect(printedUrl().searchParams.get('X-Amz-Expires')).toBe('604800');
  });

  test('should exit 1 when BUCKET_NAME is not set', async () => {
    delete process.env.BUCKET_NAME;

    const exitCode = await main(['photos/cat.jpg']);

    expect(exitCode).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith('BUCKET_NAME environment variable is not set');
  });

  test('should exit 1 when PRESIGNED_URL_EXPIRES_IN is not an integer', async () => {
    process.env.PRESIGNED_URL_EXPIRES_IN = 'soon';

    const exitCode = await main(['photos/cat.jpg']);

    expect(exitCode).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      'PRESIGNED_URL_EXPIRES_IN environment variable must be a valid integer'
    );
  });

  test('should exit 1 when signing fails', async () => {
    // GIVEN
    const s3Client = new S3Client({
      region: 'us-east-1',
      credentials: async () => {
        throw new Error('no credentials available');
      },
    });

    // WHEN
    const exitCode = await main(['photos/cat.jpg'], s3Client);

    // THEN
    expect(exitCode).toBe(1);
    expect(consoleLogSpy).toHaveBeenCalledWith(
      expect.stringMatching(/^Failed to generate presigned URL: /)
    );
    s3Client.destroy();
  });
});
