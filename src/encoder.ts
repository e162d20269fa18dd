import type { bytes } from './@types/basic';

export function uint16BEEncode (value: number): bytes {
  const target = new Uint8Array(2);
  new DataView(target.buffer, target.byteOffset, target.byteLength).setUint16(0, value, false);
  return target;
}

export function uint16BEDecode (data: Uint8Array): number {
  if (data.length < 2) {
    throw new RangeError('Could not decode int16BE');
  }

  return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint16(0, false);
}

export function uint32BEEncode (value: number): bytes {
  const target = new Uint8Array(4);
  new DataView(target.buffer, target.byteOffset, target.byteLength).setUint32(0, value, false);
  return target;
}

export function uint32BEDecode (data: Uint8Array): number {
  if (data.length < 4) {
    throw new RangeError('Could not decode int32BE');
  }

  return new DataView(data.buffer, data.byteOffset, data.byteLength).getUint32(0, false);
}
