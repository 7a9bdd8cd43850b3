import { createHash } from 'crypto';

export interface NotificationKeyPolicy {
  /** Length of the dedup window */
  dedupWindowMs: number;
  /** Width of a price bucket; drops into the same bucket share an id */
  priceBucketSize: number;
}

/**
 * Bucket index of a price
 */
export function priceBucket(price: number, bucketSize: number): number {
  // Round to cents first so 79.99999 and 80 land together
  return Math.floor(Math.round(price * 100) / 100 / bucketSize);
}

/**
 * Index of the dedup window containing `at`
 */
export function windowIndex(at: Date, windowMs: number): number {
  return Math.floor(at.getTime() / windowMs);
}

/**
 * Deterministic notification id: the same product dropping into the same
 * price bucket within one dedup window always gets the same id.
 */
export function notificationIdFor(
  productId: string,
  price: number,
  at: Date,
  policy: NotificationKeyPolicy
): string {
  const key = [
    productId,
    priceBucket(price, policy.priceBucketSize),
    windowIndex(at, policy.dedupWindowMs),
  ].join('|');
  return createHash('sha256').update(key).digest('hex').slice(0, 32);
}
