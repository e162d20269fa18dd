import { decode, encode } from 'cbor';
import type { PayloadSerializer, ValueFormat } from './serializer';
import { createEnvelopeSerializer } from './serializer';
import { fromString } from '../utils';

export const cborFormat: ValueFormat = {
  name: 'cbor',

  encode(value: unknown): Uint8Array {
    return encode(value);
  },

  decode(data: Uint8Array): unknown {
    return decode(Buffer.from(data.buffer, data.byteOffset, data.byteLength));
  }
};

// Byte arrays do not survive JSON; use the CBOR binding for binary bodies.
export const jsonFormat: ValueFormat = {
  name: 'json',

  encode(value: unknown): Uint8Array {
    return fromString(JSON.stringify(value === undefined ? null : value) ?? 'null');
  },

  decode(data: Uint8Array): unknown {
    return JSON.parse(Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf8'));
  }
};

export const cborSerializer: PayloadSerializer = createEnvelopeSerializer(cborFormat);
export const jsonSerializer: PayloadSerializer = createEnvelopeSerializer(jsonFormat);
