/**
 * Indirected storage: each slot holds an owning handle to a value of any
 * type. Dropping a handle through `clear`, `replace` or `release` runs the
 * strategy's `dispose` hook on its payload; `take` and `move` hand the
 * payload on without disposing it.
 */

import { VacantSlotError } from '../errors.mjs';
import type { StorageStrategy } from './strategy.mjs';

/**
 * Owning handle to one payload
 */
export class Handle<T> {
  constructor(readonly value: T) {}
}

export type IndirectBuffer<T> = (Handle<T> | undefined)[];

export interface IndirectedOptions<T> {
  /** Called once for every payload the storage drops */
  dispose?: (value: T) => void;
}

export class IndirectedStrategy<T> implements StorageStrategy<T, IndirectBuffer<T>> {
  readonly kind = 'indirected';
  readonly name = 'indirected';
  readonly elementWidth = 0;
  private readonly dispose: ((value: T) => void) | undefined;

  constructor(options: IndirectedOptions<T> = {}) {
    this.dispose = options.dispose;
  }

  allocate(capacity: number): IndirectBuffer<T> {
    return new Array<Handle<T> | undefined>(capacity).fill(undefined);
  }

  read(buffer: IndirectBuffer<T>, index: number): T {
    return this.occupant(buffer, index).value;
  }

  write(buffer: IndirectBuffer<T>, index: number, value: T): void {
    buffer[index] = new Handle(value);
  }

  replace(buffer: IndirectBuffer<T>, index: number, value: T): void {
    const previous = buffer[index];
    buffer[index] = new Handle(value);
    if (previous !== undefined && previous.value !== value) {
      this.drop(previous);
    }
  }

  take(buffer: IndirectBuffer<T>, index: number): T {
    const handle = this.occupant(buffer, index);
    buffer[index] = undefined;
    return handle.value;
  }

  clear(buffer: IndirectBuffer<T>, index: number): void {
    const handle = buffer[index];
    buffer[index] = undefined;
    if (handle !== undefined) {
      this.drop(handle);
    }
  }

  move(source: IndirectBuffer<T>, sourceIndex: number, target: IndirectBuffer<T>, targetIndex: number): void {
    target[targetIndex] = source[sourceIndex];
    source[sourceIndex] = undefined;
  }

  release(buffer: IndirectBuffer<T>): void {
    for (let i = 0; i < buffer.length; i++) {
      this.clear(buffer, i);
    }
  }

  private occupant(buffer: IndirectBuffer<T>, index: number): Handle<T> {
    const handle = buffer[index];
    if (handle === undefined) {
      throw new VacantSlotError(index);
    }
    return handle;
  }

  private drop(handle: Handle<T>): void {
    this.dispose?.(handle.value);
  }
}

export function indirected<T>(options?: IndirectedOptions<T>): IndirectedStrategy<T> {
  return new IndirectedStrategy(options);
}
