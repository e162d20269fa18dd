import type { bytes } from '../@types/basic';
import { uint32BEDecode, uint32BEEncode } from '../encoder';
import { SerializationError } from '../errors';
import { concat } from '../utils';

const HEADER_LENGTH_BYTES = 4;

/**
 * Turns a decoded, untyped value into the type the caller expects, or throws.
 */
export type BodyParser<T> = (value: unknown) => T;

/**
 * Body of a received envelope, decoded only once the caller says what it should be.
 */
export interface BodyDecoder {
  decode<T>(parse: BodyParser<T>): T
}

export interface DecodedEnvelope {
  header: unknown
  body: BodyDecoder
}

export interface PayloadSerializer {
  readonly name: string
  encode(header: unknown, body: unknown): bytes
  decodeHeader(envelope: Uint8Array): DecodedEnvelope
}

/**
 * Wire format for a single value.
 */
export interface ValueFormat {
  readonly name: string
  encode(value: unknown): Uint8Array
  decode(data: Uint8Array): unknown
}

function decodeValue(format: ValueFormat, data: Uint8Array, part: string): unknown {
  try {
    return format.decode(data);
  } catch (e) {
    throw new SerializationError(`${format.name}: cannot decode envelope ${part}`, { cause: e });
  }
}

/**
 * Envelope layout: 4-byte big-endian header length, header, body. Header and
 * body are encoded separately so the body can be left undecoded until asked for.
 */
export function createEnvelopeSerializer(format: ValueFormat): PayloadSerializer {
  return {
    name: format.name,

    encode(header: unknown, body: unknown): bytes {
      let headerBytes: Uint8Array;
      let bodyBytes: Uint8Array;
      try {
        headerBytes = format.encode(header);
        bodyBytes = format.encode(body);
      } catch (e) {
        throw new SerializationError(`${format.name}: cannot encode envelope`, { cause: e });
      }

      return concat([uint32BEEncode(headerBytes.length), headerBytes, bodyBytes]);
    },

    decodeHeader(envelope: Uint8Array): DecodedEnvelope {
      if (envelope.length < HEADER_LENGTH_BYTES) {
        throw new SerializationError(`${format.name}: truncated envelope`);
      }
      const headerLength = uint32BEDecode(envelope);
      if (envelope.length < HEADER_LENGTH_BYTES + headerLength) {
        throw new SerializationError(`${format.name}: truncated envelope`);
      }

      const header = decodeValue(format, envelope.subarray(HEADER_LENGTH_BYTES, HEADER_LENGTH_BYTES + headerLength), 'header');
      const bodyBytes = envelope.subarray(HEADER_LENGTH_BYTES + headerLength);

      return {
        header,
        body: {
          decode<T>(parse: BodyParser<T>): T {
            const value = decodeValue(format, bodyBytes, 'body');
            try {
              return parse(value);
            } catch (e) {
              if (e instanceof SerializationError) {
                throw e;
              }
              throw new SerializationError(`${format.name}: envelope body has unexpected shape`, { cause: e });
            }
          }
        }
      };
    }
  };
}
