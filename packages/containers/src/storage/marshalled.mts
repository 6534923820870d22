/**
 * Marshalled storage: every element is encoded into a fixed-width byte
 * slot by a codec, so arbitrary structured values share one flat buffer.
 */

import type { Codec } from './codecs.mjs';
import type { StorageStrategy } from './strategy.mjs';

export class MarshalledStrategy<T> implements StorageStrategy<T, DataView> {
  readonly kind = 'marshalled';
  readonly name: string;
  readonly elementWidth: number;

  constructor(readonly codec: Codec<T>) {
    this.name = `marshalled<${codec.name}>`;
    this.elementWidth = codec.width;
  }

  allocate(capacity: number): DataView {
    return new DataView(new ArrayBuffer(capacity * this.elementWidth));
  }

  read(buffer: DataView, index: number): T {
    return this.codec.decode(buffer, index * this.elementWidth);
  }

  write(buffer: DataView, index: number, value: T): void {
    this.codec.encode(buffer, index * this.elementWidth, value);
  }

  replace(buffer: DataView, index: number, value: T): void {
    this.write(buffer, index, value);
  }

  take(buffer: DataView, index: number): T {
    const value = this.read(buffer, index);
    this.clear(buffer, index);
    return value;
  }

  clear(buffer: DataView, index: number): void {
    this.bytes(buffer, index).fill(0);
  }

  move(source: DataView, sourceIndex: number, target: DataView, targetIndex: number): void {
    const bytes = this.bytes(source, sourceIndex);
    this.bytes(target, targetIndex).set(bytes);
    bytes.fill(0);
  }

  release(buffer: DataView): void {
    new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength).fill(0);
  }

  private bytes(buffer: DataView, index: number): Uint8Array {
    return new Uint8Array(buffer.buffer, buffer.byteOffset + index * this.elementWidth, this.elementWidth);
  }
}

export function marshalled<T>(codec: Codec<T>): MarshalledStrategy<T> {
  return new MarshalledStrategy(codec);
}
