/**
 * UUID generation utility
 */

import * as crypto from 'crypto';

/**
 * Generate a UUID v4 string, used for run identifiers
 */
export function generateUUID(): string {
  return crypto.randomUUID();
}
