import { AssertionError } from 'assert';

import { PeekError } from './errors';
import { LinkedList } from './list';
import { Mutex } from './mutex';
import type { DequeOptions } from './options';
import { UNLIMITED, isValidCapacity, sameValueZero } from './util';

/**
 * Double-ended queue shared safely between async tasks.
 *
 * Every operation that reads or changes the contents waits for the deque's lock, so
 * operations never interleave. A bounded deque evicts from the opposite end when an
 * insertion would take it over capacity.
 */
export class Deque<T> implements AsyncIterable<T> {
  private readonly list = new LinkedList<T>();
  private readonly mutex = new Mutex();
  private readonly _capacity: number;
  private readonly equals: (a: T, b: T) => boolean;

  /**
   * @param options a capacity, or a DequeOptions object (default: unlimited capacity)
   * @throws {RangeError} if the capacity is neither a non-negative integer nor UNLIMITED
   */
  constructor(options: number | DequeOptions<T> = {}) {
    if (typeof options === 'number') {
      options = { capacity: options };
    } else if (typeof options !== 'object' || options === null) {
      console.warn(
        '[locked-deque Deque] A Deque was created with invalid options; using an unlimited capacity.'
      );
      options = {};
    }

    const capacity = options.capacity === undefined ? UNLIMITED : options.capacity;
    if (!isValidCapacity(capacity)) {
      const msg =
        `[locked-deque Deque] Invalid capacity ${capacity}: expected a non-negative ` +
        `integer or UNLIMITED.`;
      throw new RangeError(msg);
    }

    this._capacity = capacity;
    this.equals = options.equals || sameValueZero;
  }

  /** Create a deque that never evicts */
  static unlimited<T>(): Deque<T> {
    return new Deque<T>(UNLIMITED);
  }

  /**
   * Create a deque holding `values` in order. A bounded deque keeps the last `capacity`
   * of them.
   */
  static from<T>(values: Iterable<T>, options: number | DequeOptions<T> = UNLIMITED): Deque<T> {
    const deque = new Deque<T>(options);
    // nobody else can see the deque yet, so there is nothing to lock
    for (const value of values) {
      deque.pushRight(value);
    }
    return deque;
  }

  /** Like `from()`, for a source that produces its values asynchronously */
  static async fromAsync<T>(
    values: AsyncIterable<T>,
    options: number | DequeOptions<T> = UNLIMITED
  ): Promise<Deque<T>> {
    const deque = new Deque<T>(options);
    for await (const value of values) {
      deque.pushRight(value);
    }
    return deque;
  }

  /** The number of elements */
  get length() {
    return this.list.length;
  }

  /** The maximum number of elements, or UNLIMITED */
  get capacity() {
    return this._capacity;
  }

  isUnlimited() {
    return this._capacity === UNLIMITED;
  }

  isFull() {
    return !this.isUnlimited() && this.list.length >= this._capacity;
  }

  isEmpty() {
    return this.list.length === 0;
  }

  /**
   * Add a value to the right end. If that takes the deque over capacity, the leftmost
   * value is evicted.
   * @returns the evicted value, or undefined if nothing was evicted
   */
  append(value: T): Promise<T | undefined> {
    return this.mutex.runExclusive(() => this.pushRight(value));
  }

  /**
   * Add a value to the left end. If that takes the deque over capacity, the rightmost
   * value is evicted.
   * @returns the evicted value, or undefined if nothing was evicted
   */
  appendLeft(value: T): Promise<T | undefined> {
    return this.mutex.runExclusive(() => this.pushLeft(value));
  }

  /**
   * Remove the rightmost value.
   * @throws {PopError} if the deque is empty
   */
  tryPop(): Promise<T> {
    return this.mutex.runExclusive(() => this.list.pop());
  }

  /**
   * Remove the leftmost value.
   * @throws {PopError} if the deque is empty
   */
  tryPopLeft(): Promise<T> {
    return this.mutex.runExclusive(() => this.list.shift());
  }

  /** Remove every value */
  clear(): Promise<void> {
    return this.mutex.runExclusive(() => this.list.clear());
  }

  /** The number of elements equal to `value` */
  count(value: T): Promise<number> {
    return this.mutex.runExclusive(() => this.list.count(element => this.equals(element, value)));
  }

  /**
   * Value at zero-based `index`, counted from the left.
   * @throws {PeekError} if there is no element at `index`
   */
  tryPeek(index: number): Promise<T> {
    return this.mutex.runExclusive(() => {
      if (!Number.isInteger(index) || index < 0 || index >= this.list.length) {
        throw new PeekError(index);
      }
      return this.list.at(index);
    });
  }

  /**
   * Value at zero-based `index`, for callers that have already checked the bounds.
   *
   * A bad index is treated as a bug, not as a condition to recover from: it rejects
   * with an AssertionError whose `cause` is the PeekError. Use `tryPeek()` when the
   * index may be out of bounds.
   */
  async peek(index: number): Promise<T> {
    try {
      return await this.tryPeek(index);
    } catch (err) {
      if (!(err instanceof PeekError)) {
        throw err;
      }
      const assertion = new AssertionError({
        message: err.message,
        actual: index,
        operator: 'peek'
      });
      assertion.cause = err;
      throw assertion;
    }
  }

  /** A new deque with the same capacity and values, sharing no links with this one */
  copy(): Promise<Deque<T>> {
    return this.mutex.runExclusive(() =>
      Deque.from(this.list.values(), { capacity: this._capacity, equals: this.equals })
    );
  }

  /**
   * Rotate `steps` places to the right (the rightmost value becomes the leftmost), or to
   * the left for a negative `steps`.
   * @throws {RangeError} if `steps` is not an integer
   */
  rotate(steps: number): Promise<void> {
    return this.mutex.runExclusive(() => {
      if (!Number.isInteger(steps)) {
        throw new RangeError(`[locked-deque Deque] Invalid rotation ${steps}: expected an integer.`);
      }

      const length = this.list.length;
      if (length < 2) { return; }

      // a full turn is a no-op, and turning one way k places equals turning the
      // other way length - k places
      const right = ((steps % length) + length) % length;
      if (right <= length / 2) {
        for (let i = 0; i < right; i++) { this.list.rotateRight(); }
      } else {
        for (let i = right; i < length; i++) { this.list.rotateLeft(); }
      }
    });
  }

  /**
   * Iterate over the values from left to right.
   *
   * The lock is taken before the first value and held until the iteration finishes or is
   * abandoned with `break`, `return()` or `throw()`, so the values form one consistent
   * snapshot and every other operation waits meanwhile. Do not await another operation
   * on the same deque inside the loop: the lock is not reentrant.
   */
  async *values(): AsyncGenerator<T, void, undefined> {
    const release = await this.mutex.acquire();
    try {
      yield* this.list.values();
    } finally {
      release();
    }
  }

  /** Like `values()`, with each value's index */
  async *all(): AsyncGenerator<[number, T], void, undefined> {
    let index = 0;
    for await (const value of this.values()) {
      yield [index++, value];
    }
  }

  [Symbol.asyncIterator]() {
    return this.values();
  }

  /** The values from left to right, as an array */
  toArray(): Promise<T[]> {
    return this.mutex.runExclusive(() => [...this.list.values()]);
  }

  toString() {
    const capacity = this.isUnlimited() ? 'unlimited' : String(this._capacity);
    const values = [...this.list.values()].map(value => String(value)).join(', ');
    return `Deque{capacity:${capacity}, values:[${values}]}`;
  }

  private isOverflowing() {
    return this.list.length > this._capacity;
  }

  private pushRight(value: T): T | undefined {
    this.list.push(value);
    return this.isOverflowing() ? this.list.shift() : undefined;
  }

  private pushLeft(value: T): T | undefined {
    this.list.unshift(value);
    return this.isOverflowing() ? this.list.pop() : undefined;
  }
}
