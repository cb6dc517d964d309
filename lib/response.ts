import { APIGatewayProxyStructuredResultV2 } from 'aws-lambda';

/**
 * Common Headers
 *
 * CORS is open to any origin: the check endpoint only reads the URL it is
 * given. `no-store` because an expiry verdict only holds for the instant it
 * was computed; a cached "still valid" would be wrong minutes later.
 */
const COMMON_HEADERS = {
    'Access-Control-Allow-Origin': '*',
    'Cache-Control': 'no-store',
};

export type ErrorStatusCode = 400 | 500;
const ERROR_STATUS_CODE_MESSAGE_MAP: Record<ErrorStatusCode, string> = {
    400: 'Bad request',
    500: 'Internal server error',
};

/**
 * Create a standardized error response
 * Logs the error message and optional error object to console
 * @param statusCode HTTP status code for the error
 * @param message Detailed error message; can be string or Error object
 * @param error Optional error object for raw logging
 * @returns Standardized error response object
 */
export function createErrorResponse(
    statusCode: ErrorStatusCode,
    message: string | Error,
    error?: unknown
): APIGatewayProxyStructuredResultV2 {
    const _message = message instanceof Error ? message.message : message;
    if (error)
        console.error(`${_message}:`, error);
    else
        console.error(_message);
    return {
        statusCode,
        headers: {
            'Content-Type': 'application/json',
            ...COMMON_HEADERS,
        },
        body: JSON.stringify({ error: ERROR_STATUS_CODE_MESSAGE_MAP[statusCode], message: _message }),
    };
}

/**
 * Create a standardized 200 OK response with a JSON body
 * @param data Value serialized as the response body
 * @returns Standardized success response object
 */
export function createSuccessResponse(data: unknown): APIGatewayProxyStructuredResultV2 {
    return {
        statusCode: 200,
        headers: {
            'Content-Type': 'application/json',
            ...COMMON_HEADERS,
        },
        body: JSON.stringify(data),
    };
}
