import { PublicKey } from '@solana/web3.js';
import { z } from 'zod';

/**
 * Principals on the HTTP surface are base58 Solana public keys.
 */
export function isPublicKey(value: string): boolean {
  try {
    new PublicKey(value);
    return true;
  } catch {
    return false;
  }
}

export const publicKeySchema = z.string().refine(isPublicKey, { message: 'Invalid public key' });
