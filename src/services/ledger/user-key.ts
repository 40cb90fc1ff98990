import { randomBytes } from 'crypto';

/**
 * Random URL-safe secret identifying a prepaid user at the point of sale
 */
export function generateUserKey(bytes: number): string {
  return randomBytes(bytes).toString('base64url');
}
