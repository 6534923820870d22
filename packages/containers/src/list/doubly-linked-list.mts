/**
 * Doubly-linked list over an index arena.
 *
 * Nodes are slots in parallel arrays: `next` / `prev` hold slot indices
 * (-1 for none) and the elements live in a storage-strategy buffer under
 * the same index. The forward chain from `front` is the owning chain; `prev`
 * links are navigation only. Removed slots go on a free list threaded
 * through `next` and are reused by later pushes. The arena doubles when it
 * runs out of slots and never shrinks.
 *
 * Handles carry the slot, the slot's generation at the time the node was
 * created and the list's epoch. Removing a node bumps its slot generation
 * and `clear` / `dispose` bump the epoch, so stale handles are detected in
 * O(1).
 */

import type { BaseLogger } from '@mutables/logger';

import type { DoubleEnded } from '../capabilities.mjs';
import { MAX_CAPACITY, resolveListOptions } from '../config.mjs';
import type { ListOptions } from '../config.mjs';
import { AllocationError, InvalidHandleError } from '../errors.mjs';
import type { InvalidHandleReason } from '../errors.mjs';
import { libraryLogger } from '../internal/library-logger.mjs';
import { none, some } from '../option.mjs';
import type { Option } from '../option.mjs';
import { assertScope, currentScope } from '../scope.mjs';
import type { ExecutionScope } from '../scope.mjs';
import { indirected } from '../storage/indirected.mjs';
import { bindStorage } from '../storage/strategy.mjs';
import type { BoundStorage, Slots, StorageStrategy } from '../storage/strategy.mjs';

const NIL = -1;
const FIRST_ARENA_CAPACITY = 4;

/**
 * Opaque reference to one node, valid only for the list that produced it
 * and only while that node is in the list
 */
export class NodeHandle {
  constructor(
    readonly owner: object,
    readonly slot: number,
    readonly generation: number,
    readonly epoch: number
  ) {}
}

let listCount = 0;

export class DoublyLinkedList<T> implements DoubleEnded<T> {
  readonly name: string;
  readonly scope: ExecutionScope;
  private readonly storage: BoundStorage<T>;
  private readonly logger: BaseLogger;
  private values: Slots<T>;
  private next: Int32Array;
  private prev: Int32Array;
  private generations: Uint32Array;
  private live: Uint8Array;
  private front = NIL;
  private back = NIL;
  private size = 0;
  /** Slots handed out at least once since the last clear */
  private used = 0;
  private freeHead = NIL;
  private epoch = 0;

  constructor(strategy: StorageStrategy<T, unknown>, options: ListOptions = {}) {
    const { initialCapacity } = resolveListOptions(options);
    this.storage = bindStorage(strategy);
    this.values = this.storage.allocate(initialCapacity);
    this.next = new Int32Array(initialCapacity);
    this.prev = new Int32Array(initialCapacity);
    this.generations = new Uint32Array(initialCapacity);
    this.live = new Uint8Array(initialCapacity);
    this.scope = options.scope ?? currentScope();
    this.name = options.name ?? `list-${listCount++}`;
    this.logger = options.logger ?? libraryLogger();
  }

  /**
   * Empty list holding any value by reference
   */
  static empty<T>(options?: ListOptions): DoublyLinkedList<T> {
    return new DoublyLinkedList(indirected<T>(), options);
  }

  get length(): number {
    return this.size;
  }

  /** Node slots currently allocated in the arena */
  get capacity(): number {
    return this.values.capacity;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  pushFront(value: T): NodeHandle {
    this.guard('pushFront');
    const slot = this.acquire(value);
    this.link(slot, NIL, this.front);
    return this.handle(slot);
  }

  pushBack(value: T): NodeHandle {
    this.guard('pushBack');
    const slot = this.acquire(value);
    this.link(slot, this.back, NIL);
    return this.handle(slot);
  }

  popFront(): Option<T> {
    this.guard('popFront');
    if (this.front === NIL) {
      return none();
    }
    return some(this.detach(this.front));
  }

  popBack(): Option<T> {
    this.guard('popBack');
    if (this.back === NIL) {
      return none();
    }
    return some(this.detach(this.back));
  }

  peekFront(): Option<T> {
    this.guard('peekFront');
    return this.front === NIL ? none() : some(this.values.read(this.front));
  }

  peekBack(): Option<T> {
    this.guard('peekBack');
    return this.back === NIL ? none() : some(this.values.read(this.back));
  }

  /**
   * Unlinks the node behind `handle` and returns its element.
   * Throws InvalidHandleError, leaving the list untouched, when the handle
   * belongs to another list or its node was already removed.
   */
  remove(handle: NodeHandle): T {
    this.guard('remove');
    return this.detach(this.resolve(handle, 'remove'));
  }

  get(handle: NodeHandle): T {
    this.guard('get');
    return this.values.read(this.resolve(handle, 'get'));
  }

  /**
   * Replaces the element of a node in place, releasing the previous one
   */
  set(handle: NodeHandle, value: T): void {
    this.guard('set');
    this.values.replace(this.resolve(handle, 'set'), value);
  }

  insertBefore(handle: NodeHandle, value: T): NodeHandle {
    this.guard('insertBefore');
    const anchor = this.resolve(handle, 'insertBefore');
    const slot = this.acquire(value);
    this.link(slot, this.prev[anchor], anchor);
    return this.handle(slot);
  }

  insertAfter(handle: NodeHandle, value: T): NodeHandle {
    this.guard('insertAfter');
    const anchor = this.resolve(handle, 'insertAfter');
    const slot = this.acquire(value);
    this.link(slot, anchor, this.next[anchor]);
    return this.handle(slot);
  }

  /**
   * Whether `handle` refers to a node currently in this list
   */
  has(handle: NodeHandle): boolean {
    this.guard('has');
    return this.invalidity(handle) === undefined;
  }

  frontHandle(): Option<NodeHandle> {
    this.guard('frontHandle');
    return this.front === NIL ? none() : some(this.handle(this.front));
  }

  backHandle(): Option<NodeHandle> {
    this.guard('backHandle');
    return this.back === NIL ? none() : some(this.handle(this.back));
  }

  /** Handle of the node after `handle`, None at the back */
  after(handle: NodeHandle): Option<NodeHandle> {
    this.guard('after');
    const following = this.next[this.resolve(handle, 'after')];
    return following === NIL ? none() : some(this.handle(following));
  }

  /** Handle of the node before `handle`, None at the front */
  before(handle: NodeHandle): Option<NodeHandle> {
    this.guard('before');
    const preceding = this.prev[this.resolve(handle, 'before')];
    return preceding === NIL ? none() : some(this.handle(preceding));
  }

  *[Symbol.iterator](): Iterator<T> {
    this.guard('iterate');
    // removing the node just yielded relinks its slot into the free list
    for (let slot = this.front; slot !== NIL; ) {
      const following = this.next[slot];
      yield this.values.read(slot);
      slot = following;
    }
  }

  /**
   * Elements from back to front
   */
  *reversed(): Generator<T, void, undefined> {
    this.guard('reversed');
    for (let slot = this.back; slot !== NIL; ) {
      const preceding = this.prev[slot];
      yield this.values.read(slot);
      slot = preceding;
    }
  }

  toArray(): T[] {
    return [...this];
  }

  /**
   * Releases every element. Capacity is kept; all handles become stale.
   */
  clear(): void {
    this.guard('clear');
    for (let slot = this.front; slot !== NIL; slot = this.next[slot]) {
      this.values.clear(slot);
    }
    this.reset();
  }

  /**
   * Releases every element and the arena
   */
  dispose(): void {
    this.guard('dispose');
    this.values.release();
    this.values = this.storage.allocate(0);
    this.next = new Int32Array(0);
    this.prev = new Int32Array(0);
    this.generations = new Uint32Array(0);
    this.live = new Uint8Array(0);
    this.reset();
  }

  private guard(operation: string): void {
    assertScope(this.scope, this.name, operation, this.logger);
  }

  private handle(slot: number): NodeHandle {
    return new NodeHandle(this, slot, this.generations[slot], this.epoch);
  }

  private invalidity(handle: NodeHandle): InvalidHandleReason | undefined {
    if (handle.owner !== this) {
      return 'foreign';
    }
    const { slot } = handle;
    if (
      handle.epoch !== this.epoch ||
      slot >= this.used ||
      this.live[slot] !== 1 ||
      this.generations[slot] !== handle.generation
    ) {
      return 'stale';
    }
    return undefined;
  }

  private resolve(handle: NodeHandle, operation: string): number {
    const reason = this.invalidity(handle);
    if (reason !== undefined) {
      const error = new InvalidHandleError(this.name, reason);
      this.logger.warn(error.message, { ...error.context, operation });
      throw error;
    }
    return handle.slot;
  }

  /**
   * Takes a free slot and stores `value` in it. Grows the arena first when
   * no slot is free; nothing changes if that allocation fails.
   */
  private acquire(value: T): number {
    if (this.freeHead === NIL && this.used === this.values.capacity) {
      this.grow();
    }
    const recycled = this.freeHead !== NIL;
    const slot = recycled ? this.freeHead : this.used;
    // a codec may reject the value; claim the slot only once it is written
    this.values.write(slot, value);
    if (recycled) {
      this.freeHead = this.next[slot];
    } else {
      this.used++;
    }
    this.live[slot] = 1;
    return slot;
  }

  private link(slot: number, before: number, after: number): void {
    this.prev[slot] = before;
    this.next[slot] = after;
    if (before === NIL) {
      this.front = slot;
    } else {
      this.next[before] = slot;
    }
    if (after === NIL) {
      this.back = slot;
    } else {
      this.prev[after] = slot;
    }
    this.size++;
  }

  private detach(slot: number): T {
    const before = this.prev[slot];
    const after = this.next[slot];
    if (before === NIL) {
      this.front = after;
    } else {
      this.next[before] = after;
    }
    if (after === NIL) {
      this.back = before;
    } else {
      this.prev[after] = before;
    }
    this.size--;

    const value = this.values.take(slot);
    this.live[slot] = 0;
    this.generations[slot]++;
    this.prev[slot] = NIL;
    this.next[slot] = this.freeHead;
    this.freeHead = slot;
    return value;
  }

  private grow(): void {
    const capacity = this.values.capacity;
    const nextCapacity = capacity === 0 ? FIRST_ARENA_CAPACITY : capacity * 2;
    if (nextCapacity > MAX_CAPACITY) {
      throw new AllocationError(nextCapacity, this.storage.name);
    }

    let values: Slots<T>;
    let next: Int32Array;
    let prev: Int32Array;
    let generations: Uint32Array;
    let live: Uint8Array;
    try {
      values = this.storage.allocate(nextCapacity);
      next = new Int32Array(nextCapacity);
      prev = new Int32Array(nextCapacity);
      generations = new Uint32Array(nextCapacity);
      live = new Uint8Array(nextCapacity);
    } catch (error) {
      throw new AllocationError(nextCapacity, this.storage.name, error instanceof Error ? error : undefined);
    }

    for (let slot = 0; slot < this.used; slot++) {
      if (this.live[slot] === 1) {
        this.values.moveTo(slot, values, slot);
      }
    }
    next.set(this.next);
    prev.set(this.prev);
    generations.set(this.generations);
    live.set(this.live);
    this.values.release();

    this.logger.debug('list arena grew', {
      list: this.name,
      storage: this.storage.name,
      from: capacity,
      to: nextCapacity,
      length: this.size,
    });

    this.values = values;
    this.next = next;
    this.prev = prev;
    this.generations = generations;
    this.live = live;
  }

  private reset(): void {
    this.live.fill(0);
    this.front = NIL;
    this.back = NIL;
    this.size = 0;
    this.used = 0;
    this.freeHead = NIL;
    this.epoch++;
  }
}
