import { createHash } from 'crypto';

/**
 * Calculate SHA-256 hash of a buffer or string
 */
export function hashBuffer(input: Buffer | string): string {
    return createHash('sha256').update(input).digest('hex');
}

/**
 * Generate a short hash for display purposes
 */
export function shortHash(hash: string, length: number = 8): string {
    return hash.substring(0, length);
}
