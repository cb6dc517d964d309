/**
 * ExpiryReport Interface
 *
 * JSON body returned by the CheckPresignedUrl handler. Timestamps are
 * ISO-8601 strings in UTC; `secondsRemaining` is rounded down and turns
 * negative once the URL has expired.
 */
export interface ExpiryReport {
    generatedAt: string;
    expiresAt: string;
    checkedAt: string;
    expiresIn: number;
    expired: boolean;
    secondsRemaining: number;
}

/**
 * Type Guard for {@link ExpiryReport}
 * @param obj Object to be checked if it conforms to ExpiryReport
 * @returns True if obj is ExpiryReport, false otherwise
 */
export function isExpiryReport(obj: unknown): obj is ExpiryReport {
    return (
        typeof obj === 'object' &&
        obj !== null &&
        ('generatedAt' in obj && typeof obj.generatedAt === 'string') &&
        ('expiresAt' in obj && typeof obj.expiresAt === 'string') &&
        ('checkedAt' in obj && typeof obj.checkedAt === 'string') &&
        ('expiresIn' in obj && typeof obj.expiresIn === 'number') &&
        ('expired' in obj && typeof obj.expired === 'boolean') &&
        ('secondsRemaining' in obj && typeof obj.secondsRemaining === 'number')
    );
}
