export interface DequeOptions<T = unknown> {
  /**
   * maximum number of elements; inserting into a full deque evicts one element from the
   * opposite end (default: UNLIMITED)
   */
  capacity?: number;
  /** equality used by count() (default: SameValueZero, as in Array.prototype.includes) */
  equals?: (a: T, b: T) => boolean;
}
