import { PopError } from './errors';

interface Node<T> {
  value: T;
  prev: Node<T> | undefined;
  next: Node<T> | undefined;
}

/**
 * Doubly linked list with no locking of its own. Nodes never leave this class;
 * callers only see values.
 */
export class LinkedList<T> {
  private _length = 0;
  private head: Node<T> | undefined = undefined;
  private tail: Node<T> | undefined = undefined;

  get length() { return this._length; }

  clear() {
    this.head = this.tail = undefined;
    this._length = 0;
  }

  push(value: T) {
    const newNode: Node<T> = {
      value,
      prev: this.tail,
      next: undefined
    };

    if (this.tail) {
      this.tail.next = newNode;
      this.tail = newNode;
    } else {
      this.head = this.tail = newNode;
    }
    this._length++;
  }

  /** @throws {PopError} if the list is empty */
  pop(): T {
    const result = this.tail;
    if (!result) { throw new PopError(); }

    this.tail = result.prev;
    if (this.tail) {
      this.tail.next = undefined;
    } else {
      this.head = undefined;
    }
    result.prev = result.next = undefined;
    this._length--;
    return result.value;
  }

  unshift(value: T) {
    const newNode: Node<T> = {
      value,
      prev: undefined,
      next: this.head
    };

    if (this.head) {
      this.head.prev = newNode;
      this.head = newNode;
    } else {
      this.head = this.tail = newNode;
    }

    this._length++;
  }

  /** @throws {PopError} if the list is empty */
  shift(): T {
    const result = this.head;
    if (!result) { throw new PopError(); }

    this.head = result.next;
    if (this.head) {
      this.head.prev = undefined;
    } else {
      this.tail = undefined;
    }
    result.prev = result.next = undefined;
    this._length--;
    return result.value;
  }

  /**
   * Find the node at `index`, walking from whichever end is closer. Head and tail
   * lookups are O(1); the worst case is the middle, at length / 2 steps.
   */
  private nodeAt(index: number): Node<T> | undefined {
    if (!Number.isInteger(index) || index < 0 || index >= this._length) {
      return undefined;
    }

    if (index < Math.floor(this._length / 2)) {
      let node = this.head;
      for (let i = 0; i < index && node; i++) {
        node = node.next;
      }
      return node;
    }

    let node = this.tail;
    for (let i = this._length - 1; i > index && node; i--) {
      node = node.prev;
    }
    return node;
  }

  /** Value at `index`; the caller checks the bounds */
  at(index: number): T {
    const node = this.nodeAt(index);
    if (!node) { throw new RangeError(`index ${index} out of range`); }
    return node.value;
  }

  count(predicate: (value: T) => boolean) {
    let result = 0;
    for (let node = this.head; node; node = node.next) {
      if (predicate(node.value)) { result++; }
    }
    return result;
  }

  /** Move the tail to the front */
  rotateRight() {
    const oldTail = this.tail;
    const oldHead = this.head;
    if (!oldTail || !oldHead || oldTail === oldHead) { return; }

    const newTail = oldTail.prev;
    if (!newTail) { return; }
    newTail.next = undefined;
    this.tail = newTail;

    oldTail.prev = undefined;
    oldTail.next = oldHead;
    oldHead.prev = oldTail;
    this.head = oldTail;
  }

  /** Move the head to the back */
  rotateLeft() {
    const oldTail = this.tail;
    const oldHead = this.head;
    if (!oldTail || !oldHead || oldTail === oldHead) { return; }

    const newHead = oldHead.next;
    if (!newHead) { return; }
    newHead.prev = undefined;
    this.head = newHead;

    oldHead.next = undefined;
    oldHead.prev = oldTail;
    oldTail.next = oldHead;
    this.tail = oldHead;
  }

  *values(): Generator<T, void, undefined> {
    for (let node = this.head; node; node = node.next) {
      yield node.value;
    }
  }

  /** Walk the chain both ways and confirm the links agree with `length`. Used by tests. */
  isConsistent(): boolean {
    if (!this.head || !this.tail) {
      return this.head === this.tail && this._length === 0;
    }
    if (this.head.prev || this.tail.next) { return false; }

    let forward = 0;
    let last: Node<T> | undefined;
    for (let node: Node<T> | undefined = this.head; node; node = node.next) {
      if (node.prev !== last) { return false; }
      last = node;
      if (++forward > this._length) { return false; }
    }

    let backward = 0;
    for (let node: Node<T> | undefined = this.tail; node; node = node.prev) {
      if (++backward > this._length) { return false; }
    }

    return last === this.tail && forward === this._length && backward === this._length;
  }
}
