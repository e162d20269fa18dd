export type { RequestHeader, ResponseHeader } from './envelope';
export { parseRequestHeader, parseResponseHeader } from './envelope';
export type { BodyDecoder, BodyParser, DecodedEnvelope, PayloadSerializer, ValueFormat } from './serializer';
export { createEnvelopeSerializer } from './serializer';
export { cborFormat, cborSerializer, jsonFormat, jsonSerializer } from './formats';
export type { CodecOptions } from './codec';
export {
  ClientCodec,
  ServerCodec,
  createClientCodec,
  createServerCodec,
  createCborClientCodec,
  createCborServerCodec,
  createJsonClientCodec,
  createJsonServerCodec
} from './codec';
export { RpcClient } from './client';
export type { RpcMethod } from './server';
export { RpcServer } from './server';
