/**
 * Growable circular buffer deque
 *
 * Provides amortized O(1) push and pop at both ends over any storage
 * strategy. Capacity is zero or a power of two, so the slot of logical
 * index `i` is `(head + i) & (capacity - 1)`.
 */

import type { BaseLogger } from '@mutables/logger';

import type { DoubleEnded } from '../capabilities.mjs';
import { MAX_CAPACITY, resolveDequeOptions } from '../config.mjs';
import type { DequeOptions } from '../config.mjs';
import { AllocationError } from '../errors.mjs';
import { libraryLogger } from '../internal/library-logger.mjs';
import { none, some } from '../option.mjs';
import type { Option } from '../option.mjs';
import { assertScope, currentScope } from '../scope.mjs';
import type { ExecutionScope } from '../scope.mjs';
import { indirected } from '../storage/indirected.mjs';
import { bindStorage } from '../storage/strategy.mjs';
import type { BoundStorage, Slots, StorageStrategy } from '../storage/strategy.mjs';

export interface DequeStats {
  length: number;
  capacity: number;
  /** Number of times capacity doubled */
  grows: number;
  /** Number of times capacity halved */
  shrinks: number;
  /** Element moves performed while growing or shrinking */
  relocations: number;
}

let dequeCount = 0;

/**
 * A double-ended queue that doubles its buffer when full and halves it
 * when a pop leaves it a quarter full
 */
export class CircularBufferDeque<T> implements DoubleEnded<T> {
  readonly name: string;
  readonly scope: ExecutionScope;
  private readonly storage: BoundStorage<T>;
  private readonly minCapacity: number;
  private readonly shrinkEnabled: boolean;
  private readonly logger: BaseLogger;
  private buffer: Slots<T>;
  private head = 0;
  private size = 0;
  private grows = 0;
  private shrinks = 0;
  private relocations = 0;

  constructor(strategy: StorageStrategy<T, unknown>, options: DequeOptions = {}) {
    const resolved = resolveDequeOptions(options);
    this.minCapacity = resolved.minCapacity;
    this.shrinkEnabled = resolved.shrink;
    this.storage = bindStorage(strategy);
    this.buffer = this.storage.allocate(0);
    this.scope = options.scope ?? currentScope();
    this.name = options.name ?? `deque-${dequeCount++}`;
    this.logger = options.logger ?? libraryLogger();
  }

  /**
   * Empty deque holding any value by reference
   */
  static empty<T>(options?: DequeOptions): CircularBufferDeque<T> {
    return new CircularBufferDeque(indirected<T>(), options);
  }

  /**
   * Add an element at the back
   * O(1) amortized
   */
  pushBack(value: T): void {
    this.guard('pushBack');
    if (this.size === this.buffer.capacity) {
      this.grow();
    }
    this.buffer.write(this.slot(this.size), value);
    this.size++;
  }

  /**
   * Add an element at the front
   * O(1) amortized
   */
  pushFront(value: T): void {
    this.guard('pushFront');
    if (this.size === this.buffer.capacity) {
      this.grow();
    }
    const slot = (this.head - 1) & (this.buffer.capacity - 1);
    this.buffer.write(slot, value);
    this.head = slot;
    this.size++;
  }

  /**
   * Remove and return the front element
   * O(1) amortized
   */
  popFront(): Option<T> {
    this.guard('popFront');
    if (this.size === 0) {
      return none();
    }

    const value = this.buffer.take(this.head);
    this.head = this.slot(1);
    this.size--;
    this.shrinkIfSparse();

    return some(value);
  }

  /**
   * Remove and return the back element
   * O(1) amortized
   */
  popBack(): Option<T> {
    this.guard('popBack');
    if (this.size === 0) {
      return none();
    }

    const value = this.buffer.take(this.slot(this.size - 1));
    this.size--;
    this.shrinkIfSparse();

    return some(value);
  }

  /**
   * Get the front element without removing it
   * O(1) operation
   */
  peekFront(): Option<T> {
    this.guard('peekFront');
    if (this.size === 0) {
      return none();
    }
    return some(this.buffer.read(this.head));
  }

  /**
   * Get the back element without removing it
   * O(1) operation
   */
  peekBack(): Option<T> {
    this.guard('peekBack');
    if (this.size === 0) {
      return none();
    }
    return some(this.buffer.read(this.slot(this.size - 1)));
  }

  /**
   * Get the element at a logical index counted from the front
   * O(1) operation
   */
  at(index: number): Option<T> {
    this.guard('at');
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      return none();
    }
    return some(this.buffer.read(this.slot(index)));
  }

  /**
   * Get all elements front to back
   * O(n) operation
   */
  toArray(): T[] {
    this.guard('toArray');
    const result: T[] = [];
    for (let i = 0; i < this.size; i++) {
      result.push(this.buffer.read(this.slot(i)));
    }
    return result;
  }

  *[Symbol.iterator](): Iterator<T> {
    this.guard('iterate');
    for (let i = 0; i < this.size; i++) {
      yield this.buffer.read(this.slot(i));
    }
  }

  /**
   * Get the current number of elements
   */
  get length(): number {
    return this.size;
  }

  /**
   * Get the number of allocated slots
   */
  get capacity(): number {
    return this.buffer.capacity;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Release all elements, keeping the current capacity
   */
  clear(): void {
    this.guard('clear');
    for (let i = 0; i < this.size; i++) {
      this.buffer.clear(this.slot(i));
    }
    this.head = 0;
    this.size = 0;
  }

  /**
   * Release all elements and the buffer. The deque stays usable and
   * allocates again on the next push.
   */
  dispose(): void {
    this.guard('dispose');
    this.buffer.release();
    this.buffer = this.storage.allocate(0);
    this.head = 0;
    this.size = 0;
  }

  stats(): DequeStats {
    return {
      length: this.size,
      capacity: this.buffer.capacity,
      grows: this.grows,
      shrinks: this.shrinks,
      relocations: this.relocations,
    };
  }

  private slot(index: number): number {
    return (this.head + index) & (this.buffer.capacity - 1);
  }

  private guard(operation: string): void {
    assertScope(this.scope, this.name, operation, this.logger);
  }

  private grow(): void {
    const capacity = this.buffer.capacity;
    this.relocate(capacity === 0 ? this.minCapacity : capacity * 2);
    this.grows++;
  }

  private shrinkIfSparse(): void {
    const capacity = this.buffer.capacity;
    if (!this.shrinkEnabled || capacity <= this.minCapacity || this.size > capacity / 4) {
      return;
    }
    this.relocate(Math.max(capacity / 2, this.minCapacity));
    this.shrinks++;
  }

  /**
   * Moves the live elements into a fresh buffer starting at slot 0.
   * The new buffer is allocated before anything moves, so a failed
   * allocation leaves the deque untouched.
   */
  private relocate(capacity: number): void {
    if (capacity > MAX_CAPACITY) {
      throw new AllocationError(capacity, this.storage.name);
    }

    let next: Slots<T>;
    try {
      next = this.storage.allocate(capacity);
    } catch (error) {
      throw new AllocationError(capacity, this.storage.name, error instanceof Error ? error : undefined);
    }

    const previous = this.buffer;
    for (let i = 0; i < this.size; i++) {
      previous.moveTo(this.slot(i), next, i);
    }
    previous.release();

    this.logger.debug('deque capacity changed', {
      deque: this.name,
      storage: this.storage.name,
      from: previous.capacity,
      to: capacity,
      length: this.size,
    });

    this.relocations += this.size;
    this.buffer = next;
    this.head = 0;
  }
}
