/**
 * Get the S3 bucket that presigned URLs are generated for
 * @returns S3 bucket name
 * @throws Error if the environment variable is not set
 */
export function getEnvBucketName(): string {
  return getEnvStringVar('BUCKET_NAME');
}

/**
 * Get the default lifetime of a generated presigned URL in seconds
 * @returns Lifetime in seconds
 */
export function getEnvPresignedUrlExpiresIn(defaultValue = 300): number {
  return getEnvIntVar('PRESIGNED_URL_EXPIRES_IN', defaultValue);
}

/**
 * Get the longest URL the check endpoint accepts
 * @returns Maximum URL length in characters
 */
export function getEnvCheckUrlMaxLength(defaultValue = 8192): number {
  return getEnvIntVar('CHECK_URL_MAX_LENGTH', defaultValue);
}

/**
 * Helper function to retrieve and validate string environment variables
 * @param varName Name of the environment variable
 * @returns Value of the environment variable
 * @throws Error if the environment variable is not set or empty
 */
function getEnvStringVar(varName: string): string {
  const value = process.env[varName];
  if (!value) {
    throw new Error(`${varName} environment variable is not set`);
  }
  return value;
}

/**
 * Helper function to retrieve and validate integer environment variables
 * @param varName Name of the environment variable
 * @param defaultValue Value used when the environment variable is not set
 * @returns Integer value of the environment variable
 * @throws Error if the environment variable is set but not a valid integer
 */
function getEnvIntVar(varName: string, defaultValue: number): number {
  const value = process.env[varName];
  if (!value) {
    return defaultValue;
  }
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`${varName} environment variable must be a valid integer`);
  }
  return parseInt(value, 10);
}
