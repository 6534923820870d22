/**
 * Hosted storage: each slot is a single-cell reference supplied by the
 * host (a signal, an observable box, a plain `{ get, set }` object).
 * The host owns the values; vacating a slot only forgets it.
 */

import { VacantSlotError } from '../errors.mjs';
import type { Ref, StorageStrategy } from './strategy.mjs';

interface HostedSlot<T> {
  ref: Ref<T>;
  occupied: boolean;
}

export type HostedBuffer<T> = HostedSlot<T>[];

export class HostedStrategy<T> implements StorageStrategy<T, HostedBuffer<T>> {
  readonly kind = 'hosted';
  readonly name = 'hosted';
  readonly elementWidth = 0;

  /**
   * @param createRef - called once per slot; `occupied` tells whether the
   * ref already holds a value the slot should expose
   */
  constructor(private readonly createRef: (index: number) => { ref: Ref<T>; occupied: boolean }) {}

  allocate(capacity: number): HostedBuffer<T> {
    return Array.from({ length: capacity }, (_, index) => this.createRef(index));
  }

  read(buffer: HostedBuffer<T>, index: number): T {
    const slot = buffer[index];
    if (!slot.occupied) {
      throw new VacantSlotError(index);
    }
    return slot.ref.get();
  }

  write(buffer: HostedBuffer<T>, index: number, value: T): void {
    const slot = buffer[index];
    slot.ref.set(value);
    slot.occupied = true;
  }

  replace(buffer: HostedBuffer<T>, index: number, value: T): void {
    this.write(buffer, index, value);
  }

  take(buffer: HostedBuffer<T>, index: number): T {
    const value = this.read(buffer, index);
    buffer[index].occupied = false;
    return value;
  }

  clear(buffer: HostedBuffer<T>, index: number): void {
    buffer[index].occupied = false;
  }

  move(source: HostedBuffer<T>, sourceIndex: number, target: HostedBuffer<T>, targetIndex: number): void {
    this.write(target, targetIndex, this.take(source, sourceIndex));
  }

  release(buffer: HostedBuffer<T>): void {
    for (const slot of buffer) {
      slot.occupied = false;
    }
  }
}

/**
 * Strategy over fresh host refs, one per slot
 */
export function hosted<T>(createRef: () => Ref<T>): HostedStrategy<T> {
  return new HostedStrategy(() => ({ ref: createRef(), occupied: false }));
}

/**
 * Single-slot strategy exposing an existing ref and its current value
 */
export function hostedRef<T>(ref: Ref<T>): HostedStrategy<T> {
  return new HostedStrategy(() => ({ ref, occupied: true }));
}
