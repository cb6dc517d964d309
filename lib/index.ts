export {
    getEnvBucketName,
    getEnvPresignedUrlExpiresIn,
    getEnvCheckUrlMaxLength
} from './env'
export {
    PresignedUrlError,
    UsageError,
    MissingParameterError,
    ParseError
} from './errors'
export {
    extractQueryParameters,
    parseAmzDate,
    parseExpiresSeconds,
    addSeconds,
    formatUtcTimestamp,
    checkPresignedUrlExpiry,
    toExpiryReport
} from './expiry'
export type { ExpiryCheck } from './expiry'
export { createErrorResponse, createSuccessResponse } from './response'
export type { ErrorStatusCode } from './response'
