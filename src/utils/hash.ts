import { createHash } from 'crypto';

/**
 * Generate a SHA-256 hash of the input string
 * @param input - The string to hash
 * @returns The hexadecimal hash string
 */
export function sha256(input: string): string {
  return createHash('sha256').update(input).digest('hex');
}

/**
 * Hash sensitive data for safe logging
 * @param data - Sensitive data to hash
 * @returns A masked representation with partial hash
 */
export function hashForLogging(data: string): string {
  if (!data || data.length === 0) {
    return '[empty]';
  }
  const hash = sha256(data).substring(0, 8);
  return `***${hash}`;
}
