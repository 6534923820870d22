export { bindStorage } from './strategy.mjs';
export type { BoundStorage, Ref, Slots, StorageKind, StorageStrategy } from './strategy.mjs';
export { PackedStrategy, packed } from './packed.mjs';
export type { PackedArray, PackedLayout } from './packed.mjs';
export { MarshalledStrategy, marshalled } from './marshalled.mjs';
export * as codecs from './codecs.mjs';
export type { Codec } from './codecs.mjs';
export { Handle, IndirectedStrategy, indirected } from './indirected.mjs';
export type { IndirectBuffer, IndirectedOptions } from './indirected.mjs';
export { HostedStrategy, hosted, hostedRef } from './hosted.mjs';
export type { HostedBuffer } from './hosted.mjs';
