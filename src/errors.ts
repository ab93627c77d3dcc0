/** Raised when a value is removed from an empty deque */
export class PopError extends Error {
  constructor() {
    super('deque: pop from empty queue');
    this.name = 'PopError';
  }
}

/** Raised when an index does not address an element of the deque */
export class PeekError extends Error {
  constructor(public readonly index: number) {
    super(`deque: index ${index} out of bounds`);
    this.name = 'PeekError';
  }
}
