// Fixed-width codecs for marshalled storage. All multi-byte values are little-endian.
// Numbers a layout cannot hold exactly are rejected, never wrapped or rounded.
import { CodecError } from '../errors.mjs';
import { BIGINT64, INT16, INT32, INT8, UINT16, UINT32, UINT8, float32Exact } from './numeric-range.mjs';
import type { NumericCheck } from './numeric-range.mjs';

export const encoder = new TextEncoder();
export const decoder = new TextDecoder();

export interface Codec<T> {
  readonly name: string;
  /** Bytes every encoded value occupies */
  readonly width: number;
  encode(view: DataView, offset: number, value: T): void;
  decode(view: DataView, offset: number): T;
}

/**
 * Rejects values `check` reports before they reach `codec`
 */
function checked<T>(check: NumericCheck<T>, codec: Codec<T>): Codec<T> {
  return {
    ...codec,
    encode(view, offset, value) {
      const problem = check(value);
      if (problem !== undefined) {
        throw new CodecError(codec.name, problem);
      }
      codec.encode(view, offset, value);
    },
  };
}

export const float64: Codec<number> = {
  name: 'float64',
  width: 8,
  encode: (view, offset, value) => view.setFloat64(offset, value, true),
  decode: (view, offset) => view.getFloat64(offset, true),
};

export const float32: Codec<number> = checked(float32Exact, {
  name: 'float32',
  width: 4,
  encode: (view, offset, value) => view.setFloat32(offset, value, true),
  decode: (view, offset) => view.getFloat32(offset, true),
});

export const int8: Codec<number> = checked(INT8, {
  name: 'int8',
  width: 1,
  encode: (view, offset, value) => view.setInt8(offset, value),
  decode: (view, offset) => view.getInt8(offset),
});

export const uint8: Codec<number> = checked(UINT8, {
  name: 'uint8',
  width: 1,
  encode: (view, offset, value) => view.setUint8(offset, value),
  decode: (view, offset) => view.getUint8(offset),
});

export const int16: Codec<number> = checked(INT16, {
  name: 'int16',
  width: 2,
  encode: (view, offset, value) => view.setInt16(offset, value, true),
  decode: (view, offset) => view.getInt16(offset, true),
});

export const uint16: Codec<number> = checked(UINT16, {
  name: 'uint16',
  width: 2,
  encode: (view, offset, value) => view.setUint16(offset, value, true),
  decode: (view, offset) => view.getUint16(offset, true),
});

export const int32: Codec<number> = checked(INT32, {
  name: 'int32',
  width: 4,
  encode: (view, offset, value) => view.setInt32(offset, value, true),
  decode: (view, offset) => view.getInt32(offset, true),
});

export const uint32: Codec<number> = checked(UINT32, {
  name: 'uint32',
  width: 4,
  encode: (view, offset, value) => view.setUint32(offset, value, true),
  decode: (view, offset) => view.getUint32(offset, true),
});

export const bigint64: Codec<bigint> = checked(BIGINT64, {
  name: 'bigint64',
  width: 8,
  encode: (view, offset, value) => view.setBigInt64(offset, value, true),
  decode: (view, offset) => view.getBigInt64(offset, true),
});

export const boolean: Codec<boolean> = {
  name: 'boolean',
  width: 1,
  encode: (view, offset, value) => view.setUint8(offset, value ? 1 : 0),
  decode: (view, offset) => view.getUint8(offset) === 1,
};

/**
 * UTF-8 string stored as a uint16 byte length followed by at most
 * `maxBytes` bytes. Longer strings are rejected, never truncated.
 */
export function utf8(maxBytes: number): Codec<string> {
  if (!Number.isInteger(maxBytes) || maxBytes < 0 || maxBytes > 0xffff) {
    throw new CodecError(`utf8(${maxBytes})`, 'maxBytes must be an integer between 0 and 65535');
  }
  const name = `utf8(${maxBytes})`;
  return {
    name,
    width: 2 + maxBytes,
    encode(view, offset, value) {
      const bytes = encoder.encode(value);
      if (bytes.length > maxBytes) {
        throw new CodecError(name, `string needs ${bytes.length} bytes, at most ${maxBytes} fit`);
      }
      view.setUint16(offset, bytes.length, true);
      new Uint8Array(view.buffer, view.byteOffset + offset + 2, maxBytes).set(bytes);
    },
    decode(view, offset) {
      const length = view.getUint16(offset, true);
      return decoder.decode(new Uint8Array(view.buffer, view.byteOffset + offset + 2, length));
    },
  };
}

/**
 * Two codecs laid out back to back
 */
export function pair<A, B>(first: Codec<A>, second: Codec<B>): Codec<[A, B]> {
  return {
    name: `pair<${first.name},${second.name}>`,
    width: first.width + second.width,
    encode(view, offset, [a, b]) {
      first.encode(view, offset, a);
      second.encode(view, offset + first.width, b);
    },
    decode(view, offset) {
      return [first.decode(view, offset), second.decode(view, offset + first.width)];
    },
  };
}

/**
 * Reuses the layout of `codec` for another type.
 *
 * @example
 * const point = mapped(
 *   pair(float64, float64),
 *   ([x, y]) => ({ x, y }),
 *   (p) => [p.x, p.y],
 * );
 */
export function mapped<A, B>(codec: Codec<A>, decode: (value: A) => B, encode: (value: B) => A): Codec<B> {
  return {
    name: codec.name,
    width: codec.width,
    encode: (view, offset, value) => codec.encode(view, offset, encode(value)),
    decode: (view, offset) => decode(codec.decode(view, offset)),
  };
}
