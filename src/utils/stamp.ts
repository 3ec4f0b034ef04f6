import { randomUUID } from 'crypto';

/** Random UUID v4 naming a swap record. */
export const newSwapId = (): string => randomUUID();

/** Unix milliseconds for `createdAt` and `settledAt`. */
export const nowMs = (): number => Date.now();
