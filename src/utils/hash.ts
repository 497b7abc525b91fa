import { createHash } from 'crypto';

/**
 * Digest used for source_file_hash
 */
export const HASH_ALGORITHM = 'sha256';

/**
 * Calculate the SHA-256 hex digest of a buffer
 */
export function hashBuffer(buffer: Buffer): string {
    return createHash(HASH_ALGORITHM).update(buffer).digest('hex');
}

/**
 * Generate a short hash for display purposes
 */
export function shortHash(hash: string, length: number = 8): string {
    return hash.substring(0, length);
}
