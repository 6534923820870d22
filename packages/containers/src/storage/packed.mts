/**
 * Packed storage: elements live in a typed array in their native layout.
 */

import { CodecError } from '../errors.mjs';
import {
  BIGINT64,
  BIGUINT64,
  INT16,
  INT32,
  INT8,
  UINT16,
  UINT32,
  UINT8,
  float32Exact,
} from './numeric-range.mjs';
import type { NumericCheck } from './numeric-range.mjs';
import type { StorageStrategy } from './strategy.mjs';

/**
 * The part of a typed array the packed strategy relies on
 */
export interface PackedArray<T> {
  readonly length: number;
  [index: number]: T;
  fill(value: T, start?: number, end?: number): this;
}

export class PackedStrategy<T extends number | bigint> implements StorageStrategy<T, PackedArray<T>> {
  readonly kind = 'packed';
  readonly name: string;

  constructor(
    readonly layout: string,
    readonly elementWidth: number,
    private readonly zero: T,
    private readonly create: (capacity: number) => PackedArray<T>,
    /** Values the layout cannot hold exactly are rejected with CodecError */
    private readonly check: NumericCheck<T> = () => undefined
  ) {
    this.name = `packed<${layout}>`;
  }

  allocate(capacity: number): PackedArray<T> {
    return this.create(capacity);
  }

  read(buffer: PackedArray<T>, index: number): T {
    return buffer[index];
  }

  write(buffer: PackedArray<T>, index: number, value: T): void {
    const problem = this.check(value);
    if (problem !== undefined) {
      throw new CodecError(this.name, problem);
    }
    buffer[index] = value;
  }

  replace(buffer: PackedArray<T>, index: number, value: T): void {
    this.write(buffer, index, value);
  }

  take(buffer: PackedArray<T>, index: number): T {
    const value = buffer[index];
    buffer[index] = this.zero;
    return value;
  }

  clear(buffer: PackedArray<T>, index: number): void {
    buffer[index] = this.zero;
  }

  move(source: PackedArray<T>, sourceIndex: number, target: PackedArray<T>, targetIndex: number): void {
    target[targetIndex] = source[sourceIndex];
    source[sourceIndex] = this.zero;
  }

  release(buffer: PackedArray<T>): void {
    buffer.fill(this.zero);
  }
}

/**
 * Packed strategies, one per typed array layout.
 *
 * @example
 * const samples = new CircularBufferDeque(packed.float64());
 */
export const packed = {
  int8: () => new PackedStrategy<number>('int8', 1, 0, (n) => new Int8Array(n), INT8),
  uint8: () => new PackedStrategy<number>('uint8', 1, 0, (n) => new Uint8Array(n), UINT8),
  int16: () => new PackedStrategy<number>('int16', 2, 0, (n) => new Int16Array(n), INT16),
  uint16: () => new PackedStrategy<number>('uint16', 2, 0, (n) => new Uint16Array(n), UINT16),
  int32: () => new PackedStrategy<number>('int32', 4, 0, (n) => new Int32Array(n), INT32),
  uint32: () => new PackedStrategy<number>('uint32', 4, 0, (n) => new Uint32Array(n), UINT32),
  float32: () => new PackedStrategy<number>('float32', 4, 0, (n) => new Float32Array(n), float32Exact),
  float64: () => new PackedStrategy<number>('float64', 8, 0, (n) => new Float64Array(n)),
  bigint64: () => new PackedStrategy<bigint>('bigint64', 8, 0n, (n) => new BigInt64Array(n), BIGINT64),
  biguint64: () => new PackedStrategy<bigint>('biguint64', 8, 0n, (n) => new BigUint64Array(n), BIGUINT64),
} as const;

export type PackedLayout = keyof typeof packed;
