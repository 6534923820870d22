import { describe, it, expect, vi } from 'vitest';

import { hosted } from './hosted.mjs';
import { indirected } from './indirected.mjs';
import { marshalled } from './marshalled.mjs';
import { packed } from './packed.mjs';
import { bindStorage } from './strategy.mjs';
import type { Ref } from './strategy.mjs';
import * as codecs from './codecs.mjs';
import { CodecError, StorageMismatchError, VacantSlotError } from '../errors.mjs';

describe('storage strategies', () => {
  describe('packed', () => {
    it('should describe its layout', () => {
      const strategy = packed.float32();
      expect(strategy.kind).toBe('packed');
      expect(strategy.name).toBe('packed<float32>');
      expect(strategy.elementWidth).toBe(4);
    });

    it('should zero slots that are taken or moved', () => {
      const strategy = packed.int16();
      const source = strategy.allocate(2);
      const target = strategy.allocate(2);
      strategy.write(source, 0, 12);
      strategy.write(source, 1, -3);

      expect(strategy.take(source, 0)).toBe(12);
      expect(strategy.read(source, 0)).toBe(0);

      strategy.move(source, 1, target, 0);
      expect(strategy.read(target, 0)).toBe(-3);
      expect(strategy.read(source, 1)).toBe(0);
    });

    it('should refuse values the layout would wrap or round', () => {
      const uint8 = packed.uint8();
      const int32 = packed.int32();
      const float32 = packed.float32();
      const buffer = uint8.allocate(1);

      expect(() => uint8.write(buffer, 0, 300)).toThrow('packed<uint8>: 300 is not an integer between 0 and 255');
      expect(() => uint8.replace(buffer, 0, -1)).toThrow(CodecError);
      expect(uint8.read(buffer, 0)).toBe(0);
      expect(() => int32.write(int32.allocate(1), 0, 1.5)).toThrow(
        'packed<int32>: 1.5 is not an integer between -2147483648 and 2147483647'
      );
      expect(() => float32.write(float32.allocate(1), 0, 0.1)).toThrow(
        'packed<float32>: 0.1 has no exact float32 representation'
      );
    });

    it('should store float32 values that survive rounding', () => {
      const strategy = packed.float32();
      const buffer = strategy.allocate(2);
      strategy.write(buffer, 0, 0.5);
      strategy.write(buffer, 1, NaN);

      expect(strategy.read(buffer, 0)).toBe(0.5);
      expect(strategy.read(buffer, 1)).toBeNaN();
    });

    it('should hold 64-bit integers', () => {
      const strategy = packed.bigint64();
      const buffer = strategy.allocate(1);
      strategy.write(buffer, 0, 2n ** 63n - 1n);
      expect(strategy.read(buffer, 0)).toBe(9223372036854775807n);

      strategy.release(buffer);
      expect(strategy.read(buffer, 0)).toBe(0n);
      expect(() => strategy.write(buffer, 0, 2n ** 63n)).toThrow(CodecError);
      expect(() => packed.biguint64().write(packed.biguint64().allocate(1), 0, -1n)).toThrow(CodecError);
    });
  });

  describe('marshalled', () => {
    it('should size slots by the codec width', () => {
      const strategy = marshalled(codecs.pair(codecs.int32, codecs.boolean));
      expect(strategy.name).toBe('marshalled<pair<int32,boolean>>');
      expect(strategy.elementWidth).toBe(5);
      expect(strategy.allocate(3).byteLength).toBe(15);
    });

    it('should keep neighbouring slots apart', () => {
      const strategy = marshalled(codecs.pair(codecs.uint16, codecs.float64));
      const buffer = strategy.allocate(2);
      strategy.write(buffer, 0, [1, 0.5]);
      strategy.write(buffer, 1, [65535, -0.25]);

      expect(strategy.read(buffer, 0)).toEqual([1, 0.5]);
      expect(strategy.read(buffer, 1)).toEqual([65535, -0.25]);
    });

    it('should preserve negative zero', () => {
      const strategy = marshalled(codecs.float64);
      const buffer = strategy.allocate(1);
      strategy.write(buffer, 0, -0);
      expect(Object.is(strategy.read(buffer, 0), -0)).toBe(true);
    });

    it('should zero the source slot of a move', () => {
      const strategy = marshalled(codecs.uint32);
      const source = strategy.allocate(1);
      const target = strategy.allocate(4);
      strategy.write(source, 0, 4000000000);

      strategy.move(source, 0, target, 3);
      expect(strategy.read(target, 3)).toBe(4000000000);
      expect(strategy.read(source, 0)).toBe(0);
    });

    it('should vacate a slot to the empty string', () => {
      const strategy = marshalled(codecs.utf8(8));
      const buffer = strategy.allocate(1);
      strategy.write(buffer, 0, 'héllo');

      expect(strategy.take(buffer, 0)).toBe('héllo');
      expect(strategy.read(buffer, 0)).toBe('');
    });
  });

  describe('codecs', () => {
    it('should reject strings longer than the slot', () => {
      const codec = codecs.utf8(4);
      const view = new DataView(new ArrayBuffer(codec.width));

      expect(codec.width).toBe(6);
      expect(() => codec.encode(view, 0, 'toolong')).toThrow(CodecError);
      expect(() => codec.encode(view, 0, 'toolong')).toThrow('utf8(4): string needs 7 bytes, at most 4 fit');
    });

    it('should count multi-byte characters in bytes', () => {
      const codec = codecs.utf8(6);
      const view = new DataView(new ArrayBuffer(codec.width));

      codec.encode(view, 0, 'héllo'); // é takes two bytes
      expect(view.getUint16(0, true)).toBe(6);
      expect(codec.decode(view, 0)).toBe('héllo');
      expect(() => codecs.utf8(5).encode(view, 0, 'héllo')).toThrow('utf8(5): string needs 6 bytes, at most 5 fit');
    });

    it('should reject an invalid maximum length', () => {
      expect(() => codecs.utf8(70000)).toThrow('utf8(70000): maxBytes must be an integer between 0 and 65535');
    });

    it('should map a layout onto another type', () => {
      const celsius = codecs.mapped(
        codecs.int16,
        (tenths) => tenths / 10,
        (degrees: number) => Math.round(degrees * 10)
      );
      const view = new DataView(new ArrayBuffer(celsius.width));

      celsius.encode(view, 0, -12.3);
      expect(view.getInt16(0, true)).toBe(-123);
      expect(celsius.decode(view, 0)).toBe(-12.3);
    });

    it('should refuse numbers the layout would wrap or round', () => {
      const view = new DataView(new ArrayBuffer(8));

      expect(() => codecs.int8.encode(view, 0, 200)).toThrow(CodecError);
      expect(() => codecs.int8.encode(view, 0, 200)).toThrow('int8: 200 is not an integer between -128 and 127');
      expect(() => codecs.uint8.encode(view, 0, 300)).toThrow('uint8: 300 is not an integer between 0 and 255');
      expect(() => codecs.int32.encode(view, 0, 1.5)).toThrow(
        'int32: 1.5 is not an integer between -2147483648 and 2147483647'
      );
      expect(() => codecs.float32.encode(view, 0, 0.1)).toThrow('float32: 0.1 has no exact float32 representation');
      expect(() => codecs.bigint64.encode(view, 0, -(2n ** 63n) - 1n)).toThrow(CodecError);
      expect(view.getBigUint64(0, true)).toBe(0n);
    });

    it('should accept the limits of each layout', () => {
      const view = new DataView(new ArrayBuffer(8));

      codecs.int8.encode(view, 0, -128);
      expect(codecs.int8.decode(view, 0)).toBe(-128);
      codecs.uint32.encode(view, 0, 4294967295);
      expect(codecs.uint32.decode(view, 0)).toBe(4294967295);
      codecs.float32.encode(view, 0, Math.fround(0.1));
      expect(codecs.float32.decode(view, 0)).toBe(Math.fround(0.1));
    });

    it('should encode booleans as one byte', () => {
      const view = new DataView(new ArrayBuffer(1));
      codecs.boolean.encode(view, 0, true);
      expect(view.getUint8(0)).toBe(1);
      expect(codecs.boolean.decode(view, 0)).toBe(true);
    });
  });

  describe('indirected', () => {
    it('should hand back the stored reference', () => {
      const strategy = indirected<{ id: number }>();
      const buffer = strategy.allocate(1);
      const value = { id: 1 };
      strategy.write(buffer, 0, value);

      expect(strategy.read(buffer, 0)).toBe(value);
    });

    it('should throw when reading a vacant slot', () => {
      const strategy = indirected<number>();
      const buffer = strategy.allocate(2);

      expect(() => strategy.read(buffer, 1)).toThrow(VacantSlotError);
      expect(() => strategy.read(buffer, 1)).toThrow('Slot 1 holds no element');
    });

    it('should dispose on clear, replace and release only', () => {
      const dispose = vi.fn();
      const strategy = indirected<string>({ dispose });
      const buffer = strategy.allocate(4);
      const target = strategy.allocate(4);
      ['a', 'b', 'c', 'd'].forEach((s, i) => strategy.write(buffer, i, s));

      expect(strategy.take(buffer, 0)).toBe('a');
      strategy.move(buffer, 1, target, 0);
      expect(dispose).not.toHaveBeenCalled();

      strategy.replace(buffer, 2, 'c2');
      strategy.replace(buffer, 2, 'c2');
      strategy.clear(buffer, 3);
      strategy.release(buffer);
      strategy.release(target);

      expect(dispose.mock.calls).toEqual([['c'], ['d'], ['c2'], ['b']]);
    });
  });

  describe('hosted', () => {
    const cellRef = (): Ref<number> => {
      let value = 0;
      return {
        get: () => value,
        set: (next) => {
          value = next;
        },
      };
    };

    it('should create one ref per slot', () => {
      const createRef = vi.fn(cellRef);
      const strategy = hosted(createRef);
      strategy.allocate(3);
      expect(createRef).toHaveBeenCalledTimes(3);
    });

    it('should treat fresh slots as vacant until written', () => {
      const strategy = hosted(cellRef);
      const buffer = strategy.allocate(2);

      expect(() => strategy.read(buffer, 0)).toThrow(VacantSlotError);
      strategy.write(buffer, 0, 5);
      expect(strategy.read(buffer, 0)).toBe(5);
      expect(strategy.take(buffer, 0)).toBe(5);
      expect(() => strategy.read(buffer, 0)).toThrow(VacantSlotError);
    });

    it('should move values between host refs', () => {
      const strategy = hosted(cellRef);
      const source = strategy.allocate(1);
      const target = strategy.allocate(1);
      strategy.write(source, 0, 42);

      strategy.move(source, 0, target, 0);
      expect(strategy.read(target, 0)).toBe(42);
      expect(() => strategy.read(source, 0)).toThrow(VacantSlotError);
    });
  });

  describe('bindStorage', () => {
    it('should move between slots of the same binding', () => {
      const storage = bindStorage(packed.int32());
      const from = storage.allocate(2);
      const to = storage.allocate(2);
      from.write(1, 99);

      from.moveTo(1, to, 0);
      expect(to.read(0)).toBe(99);
      expect(from.read(1)).toBe(0);
      expect(to.capacity).toBe(2);
    });

    it('should refuse slots from another binding', () => {
      const strategy = packed.int32();
      const from = bindStorage(strategy).allocate(1);
      const to = bindStorage(strategy).allocate(1);

      expect(() => from.moveTo(0, to, 0)).toThrow(StorageMismatchError);
      expect(() => from.moveTo(0, to, 0)).toThrow('Cannot move elements from packed<int32> slots into foreign slots');
    });
  });
});
