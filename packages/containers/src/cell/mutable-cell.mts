/**
 * Single-slot mutable container over any storage strategy
 */

import type { BaseLogger } from '@mutables/logger';

import type { CellOptions } from '../config.mjs';
import { DisposedError } from '../errors.mjs';
import { libraryLogger } from '../internal/library-logger.mjs';
import { assertScope, currentScope } from '../scope.mjs';
import type { ExecutionScope } from '../scope.mjs';
import { hostedRef } from '../storage/hosted.mjs';
import { indirected } from '../storage/indirected.mjs';
import type { IndirectedOptions } from '../storage/indirected.mjs';
import { bindStorage } from '../storage/strategy.mjs';
import type { Ref, Slots, StorageStrategy } from '../storage/strategy.mjs';

let cellCount = 0;

/**
 * Holds exactly one element. Reads never mutate; `set` releases the
 * previous payload where the storage owns it.
 *
 * Not atomic: `modify` is a plain read followed by a write and assumes the
 * cell has a single owner.
 */
export class MutableCell<T> implements Ref<T> {
  readonly name: string;
  readonly scope: ExecutionScope;
  private readonly logger: BaseLogger;
  private slots: Slots<T> | undefined;

  private constructor(slots: Slots<T>, options: CellOptions) {
    this.slots = slots;
    this.scope = options.scope ?? currentScope();
    this.name = options.name ?? `cell-${cellCount++}`;
    this.logger = options.logger ?? libraryLogger();
  }

  /**
   * Cell over `strategy`, initialised with `initial`
   */
  static of<T, B>(strategy: StorageStrategy<T, B>, initial: T, options: CellOptions = {}): MutableCell<T> {
    const slots = bindStorage(strategy).allocate(1);
    slots.write(0, initial);
    return new MutableCell(slots, options);
  }

  /**
   * Cell holding any value by reference
   */
  static boxed<T>(initial: T, options: CellOptions & IndirectedOptions<T> = {}): MutableCell<T> {
    return MutableCell.of(indirected<T>({ dispose: options.dispose }), initial, options);
  }

  /**
   * Cell backed by a host-supplied reference. The ref's current value is
   * the cell's initial value.
   */
  static over<T>(ref: Ref<T>, options: CellOptions = {}): MutableCell<T> {
    return new MutableCell(bindStorage(hostedRef(ref)).allocate(1), options);
  }

  get(): T {
    return this.slot('get').read(0);
  }

  set(value: T): void {
    this.slot('set').replace(0, value);
  }

  /**
   * Applies `fn` to the current value, stores and returns the result
   */
  modify(fn: (value: T) => T): T {
    const slots = this.slot('modify');
    const next = fn(slots.read(0));
    slots.replace(0, next);
    return next;
  }

  /**
   * Stores `value` and returns the previous value without releasing it
   */
  swap(value: T): T {
    const slots = this.slot('swap');
    const previous = slots.take(0);
    slots.write(0, value);
    return previous;
  }

  /**
   * Releases the payload. Any later operation throws.
   */
  dispose(): void {
    const slots = this.slot('dispose');
    slots.release();
    this.slots = undefined;
  }

  get disposed(): boolean {
    return this.slots === undefined;
  }

  private slot(operation: string): Slots<T> {
    assertScope(this.scope, this.name, operation, this.logger);
    if (this.slots === undefined) {
      throw new DisposedError(this.name, operation);
    }
    return this.slots;
  }
}
