import { createHash } from 'crypto';

export function sha256Bytes(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

/** Cents for `hours` of work at `rateCents` per hour, rounded half away from zero. */
export function amountForHours(rateCents: number, hours: number): number {
  return Math.round(rateCents * hours);
}
