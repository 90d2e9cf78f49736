import type { JsonObject } from '../src/json';

/** Smallest PNG header the signature provider can read dimensions from. */
export function png(width: number, height: number = width): Uint8Array {
  const bytes = new Uint8Array(24);
  bytes.set([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]);
  const view = new DataView(bytes.buffer);
  view.setUint32(8, 13);
  bytes.set([0x49, 0x48, 0x44, 0x52], 12);
  view.setUint32(16, width);
  view.setUint32(20, height);
  return bytes;
}

export function manifestV3(extra: JsonObject = {}): JsonObject {
  return { manifest_version: 3, name: 'Reader', version: '1.0', description: 'Reads pages.', ...extra };
}

export function manifestV2(extra: JsonObject = {}): JsonObject {
  return { manifest_version: 2, name: 'Reader', version: '1.0', description: 'Reads pages.', ...extra };
}
