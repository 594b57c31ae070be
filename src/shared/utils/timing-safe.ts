const encoder = new TextEncoder();

/**
 * Constant-time string comparison for tokens and secrets. Only the length
 * difference leaks.
 */
export const timingSafeEqual = (a: string, b: string): boolean => {
  const bufA = encoder.encode(a);
  const bufB = encoder.encode(b);
  if (bufA.byteLength !== bufB.byteLength) return false;

  let mismatch = 0;
  for (let i = 0; i < bufA.byteLength; i++) {
    mismatch |= (bufA[i] ?? 0) ^ (bufB[i] ?? 0);
  }
  return mismatch === 0;
};
