/**
 * Base class for every failure the expiry check can report.
 *
 * Callers map these at their boundary: the CLI prints the message and exits
 * with status 1, the HTTP handler answers 400 Bad Request.
 */
export class PresignedUrlError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'PresignedUrlError';
    }
}

/**
 * Wrong number of command-line arguments
 */
export class UsageError extends PresignedUrlError {
    constructor(usage: string) {
        super(`Usage: ${usage}`);
        this.name = 'UsageError';
    }
}

/**
 * X-Amz-Date or X-Amz-Expires is absent (or blank) in the query string
 */
export class MissingParameterError extends PresignedUrlError {
    constructor() {
        super('Could not find X-Amz-Date or X-Amz-Expires in the URL.');
        this.name = 'MissingParameterError';
    }
}

/**
 * X-Amz-Date or X-Amz-Expires is present but cannot be turned into an instant
 */
export class ParseError extends PresignedUrlError {
    constructor(message: string) {
        super(message);
        this.name = 'ParseError';
    }
}
