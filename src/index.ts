export { Noise, resolveProtocol } from './noise';
export type { HandshakeParams, NoiseInit, SecureChannelParams, SecuredConnection } from './noise';
export { NoiseHandshake } from './handshake';
export { PatternHandshake, PATTERNS, Token, messageCount } from './handshakes/pattern';
export type { Pattern } from './handshakes/pattern';
export { runHandshake, outboundMessageCount } from './handshake-driver';
export { SecureChannel, stagingChunkSize } from './secure-channel';
export type { SecureChannelOptions } from './secure-channel';
export { createSecureDuplex } from './secure-duplex';
export { EncryptedReader, EncryptedWriter } from './crypto/streaming';
export type { EncryptedReaderOptions, EncryptedStreamOptions } from './crypto/streaming';
export { ReceiveCipher, SendCipher } from './crypto/cipher-state';
export type { CipherPair } from './crypto/cipher-state';
export { createPbStream, PbStreamImpl } from './pb-stream';
export type { PbStream, PbStreamOptions } from './pb-stream';
export { stablelib } from './crypto/stablelib';
export type { CipherFunctions, DHFunctions, HashFunctions, NoiseCrypto } from './@types/crypto';
export { Role } from './@types/handshake-interface';
export type {
  HandshakeEngine,
  HandshakeHandler,
  HandshakeReadResult,
  HandshakeStepResult,
  HandshakeWriteResult
} from './@types/handshake-interface';
export type { FrameTransport } from './@types/transport';
export type { KeyPair } from './@types/keypair';
export type { Counter, CounterOptions, Metrics } from './@types/metrics';
export {
  DecryptionError,
  FrameTooLargeError,
  InvalidCryptoExchangeError,
  InvalidStateError,
  RemoteCallError,
  SerializationError,
  TransportError
} from './errors';
export * from './rpc';
