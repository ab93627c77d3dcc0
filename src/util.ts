/** Capacity of a deque that never evicts */
export const UNLIMITED = Infinity;

export function sleep(ms: number) {
  return new Promise<void>(resolve => setTimeout(resolve, ms));
}

/** The comparison used by Array.prototype.includes: like ===, but NaN equals NaN */
export function sameValueZero(a: unknown, b: unknown) {
  return a === b || (a !== a && b !== b);
}

/** true for UNLIMITED and for non-negative safe integers */
export function isValidCapacity(capacity: number) {
  return capacity === UNLIMITED || (Number.isSafeInteger(capacity) && capacity >= 0);
}
