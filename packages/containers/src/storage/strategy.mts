/**
 * Storage strategies decide how a fixed-capacity buffer lays out elements.
 *
 * A strategy is a stateless policy object: it allocates buffers and reads,
 * writes and vacates slots in them. Containers never touch a buffer
 * directly, so the same deque or list code runs over typed arrays, encoded
 * bytes or owning handles.
 *
 * Slot indices are trusted. Reading or writing outside `[0, capacity)` is a
 * caller bug the strategies do not guard against.
 *
 * @packageDocumentation
 */

import { StorageMismatchError } from '../errors.mjs';

export type StorageKind = 'packed' | 'marshalled' | 'indirected' | 'hosted';

export interface StorageStrategy<T, B> {
  readonly kind: StorageKind;
  /** e.g. `packed<float64>` */
  readonly name: string;
  /** Bytes per slot, 0 where slots are references */
  readonly elementWidth: number;

  allocate(capacity: number): B;
  read(buffer: B, index: number): T;
  /**
   * Stores `value` at `index`. Whatever occupied the slot is overwritten
   * without being released; vacate it first with `clear` or `take`.
   */
  write(buffer: B, index: number, value: T): void;
  /**
   * Stores `value` at `index`, releasing the previous occupant unless it
   * is `value` itself.
   */
  replace(buffer: B, index: number, value: T): void;
  /** Reads the occupant and vacates the slot; the caller now owns the value */
  take(buffer: B, index: number): T;
  /** Releases the occupant and vacates the slot */
  clear(buffer: B, index: number): void;
  /** Transfers an occupant to another buffer, vacating the source without releasing */
  move(source: B, sourceIndex: number, target: B, targetIndex: number): void;
  /** Releases every occupant still in the buffer */
  release(buffer: B): void;
}

/**
 * A single mutable reference
 */
export interface Ref<T> {
  get(): T;
  set(value: T): void;
}

/**
 * A buffer bound to its strategy, with the buffer type hidden
 */
export interface Slots<T> {
  readonly capacity: number;
  read(index: number): T;
  write(index: number, value: T): void;
  replace(index: number, value: T): void;
  take(index: number): T;
  clear(index: number): void;
  /** Moves the occupant at `index` into `target` at `targetIndex` */
  moveTo(index: number, target: Slots<T>, targetIndex: number): void;
  release(): void;
}

export interface BoundStorage<T> {
  readonly kind: StorageKind;
  readonly name: string;
  readonly elementWidth: number;
  allocate(capacity: number): Slots<T>;
}

/**
 * Binds a strategy so containers can hold its buffers without naming the
 * buffer type. Slots allocated by one binding only move into slots of the
 * same binding.
 */
export function bindStorage<T, B>(strategy: StorageStrategy<T, B>): BoundStorage<T> {
  class BoundSlots implements Slots<T> {
    constructor(readonly buffer: B, readonly capacity: number) {}

    read(index: number): T {
      return strategy.read(this.buffer, index);
    }

    write(index: number, value: T): void {
      strategy.write(this.buffer, index, value);
    }

    replace(index: number, value: T): void {
      strategy.replace(this.buffer, index, value);
    }

    take(index: number): T {
      return strategy.take(this.buffer, index);
    }

    clear(index: number): void {
      strategy.clear(this.buffer, index);
    }

    moveTo(index: number, target: Slots<T>, targetIndex: number): void {
      if (!(target instanceof BoundSlots)) {
        throw new StorageMismatchError(strategy.name, 'foreign');
      }
      strategy.move(this.buffer, index, target.buffer, targetIndex);
    }

    release(): void {
      strategy.release(this.buffer);
    }
  }

  return {
    kind: strategy.kind,
    name: strategy.name,
    elementWidth: strategy.elementWidth,
    allocate: (capacity) => new BoundSlots(strategy.allocate(capacity), capacity),
  };
}
