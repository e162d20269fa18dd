import type { bytes } from './@types/basic';

export function isValidPublicKey (pk: unknown): pk is bytes {
  if (!(pk instanceof Uint8Array)) {
    return false;
  }

  if (pk.length !== 32) {
    return false;
  }

  return true;
}

export function concat (arrays: Uint8Array[], length?: number): bytes {
  const total = length ?? arrays.reduce((acc, curr) => acc + curr.length, 0);
  const output = new Uint8Array(total);
  let offset = 0;

  for (const arr of arrays) {
    output.set(arr, offset);
    offset += arr.length;
  }

  return output;
}

export function equals (a: Uint8Array, b: Uint8Array): boolean {
  if (a === b) {
    return true;
  }

  if (a.byteLength !== b.byteLength) {
    return false;
  }

  for (let i = 0; i < a.byteLength; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }

  return true;
}

export function fromString (input: string, encoding: BufferEncoding = 'utf8'): bytes {
  const buf = Buffer.from(input, encoding);
  return new Uint8Array(buf.buffer, buf.byteOffset, buf.byteLength);
}

export function toHex (input: Uint8Array): string {
  return Buffer.from(input.buffer, input.byteOffset, input.byteLength).toString('hex');
}
