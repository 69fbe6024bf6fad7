import crypto from 'node:crypto';

/**
 * SHA-256 digest of a PIN, lowercase hex (64 chars)
 *
 * Uniqueness checks compare these digests, never raw PINs.
 */
export const hashPin = (pin: string): string => {
  return crypto.createHash('sha256').update(pin, 'utf8').digest('hex');
};

/**
 * Constant-time comparison of a candidate PIN against a stored digest
 */
export const pinMatches = (pin: string, pinHash: string): boolean => {
  const candidate = Buffer.from(hashPin(pin), 'hex');
  const stored = Buffer.from(pinHash, 'hex');

  if (candidate.length !== stored.length) {
    return false;
  }

  return crypto.timingSafeEqual(candidate, stored);
};
