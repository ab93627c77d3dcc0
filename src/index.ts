export { Deque } from './deque';
export { PeekError, PopError } from './errors';
export { Mutex } from './mutex';
export type { Release } from './mutex';
export type { DequeOptions } from './options';
export { UNLIMITED } from './util';
