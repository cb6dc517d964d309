import { APIGatewayProxyEventV2, APIGatewayProxyStructuredResultV2, Context } from 'aws-lambda';
import {
  PresignedUrlError,
  checkPresignedUrlExpiry,
  createErrorResponse,
  createSuccessResponse,
  getEnvCheckUrlMaxLength,
  toExpiryReport,
} from './lib';

/**
 * CheckPresignedUrl Lambda Function Handler
 *
 * Architectural Decision: Expose the expiry check behind an API Gateway HTTP API
 * (`GET /check-url?url=...`) so a frontend can tell users whether a shared link
 * still works before they click it. The presigned URL travels percent-encoded in
 * the `url` query parameter; API Gateway decodes it before it reaches us.
 *
 * Implementation:
 * - Reads the presigned URL from the query string and bounds its length
 * - Samples the clock once and compares it with X-Amz-Date + X-Amz-Expires
 * - Returns an ExpiryReport as JSON; malformed input is a 400, not a 500
 *
 * The signature is not verified; a URL reported as valid may still be refused
 * by S3 if it was tampered with.
 *
 * @param event - API Gateway HTTP API event with `url` in the query string
 * @param context - Lambda execution context with runtime information
 * @returns API Gateway HTTP API response with an ExpiryReport body
 */
export const handler = async (
  event: APIGatewayProxyEventV2,
  context: Context
): Promise<APIGatewayProxyStructuredResultV2> => {
  console.log('Event received', JSON.stringify(event, null, 2));
  console.log('Lambda Context', JSON.stringify(context, null, 2));

  try {
    const maxUrlLength = getEnvCheckUrlMaxLength();

    const url = event.queryStringParameters?.url;
    if (!url) {
      return createErrorResponse(400, 'url query parameter is required');
    }
    if (url.length > maxUrlLength) {
      return createErrorResponse(400, `url must not exceed ${maxUrlLength} characters`);
    }

    const check = checkPresignedUrlExpiry(url, new Date());
    console.log(
      `Presigned URL ${check.expired ? 'has expired' : 'is still valid'} (expires at ${check.expiresAt.toISOString()})`
    );

    return createSuccessResponse(toExpiryReport(check));
  } catch (error) {
    /**
     * Error Handling
     *
     * Problems with the URL itself are the caller's to fix and come back as 400
     * with the reason. Anything else (bad configuration included) is logged in
     * full and answered with a generic 500.
     */
    if (error instanceof PresignedUrlError) {
      return createErrorResponse(400, error);
    }
    return createErrorResponse(500, 'Failed to check presigned URL', error);
  }
};
