import type * as streams from 'stream';
import type { bytes } from './@types/basic';
import { Role } from './@types/handshake-interface';
import type { KeyPair } from './@types/keypair';
import type { Metrics } from './@types/metrics';
import type { FrameTransport } from './@types/transport';
import type { NoiseCrypto } from './@types/crypto';
import { DEFAULT_PROTOCOL } from './constants';
import { stablelib } from './crypto/stablelib';
import { InvalidCryptoExchangeError } from './errors';
import { NoiseHandshake } from './handshake';
import { PatternHandshake, PATTERNS } from './handshakes/pattern';
import type { Pattern } from './handshakes/pattern';
import { MetricsRegistry, registerMetrics } from './metrics';
import { SecureChannel } from './secure-channel';
import { createSecureDuplex } from './secure-duplex';
import { isValidPublicKey } from './utils';

export interface HandshakeParams {
  role: Role
  remoteStaticPublicKey?: Uint8Array
}

export interface SecureChannelParams extends HandshakeParams {
  connection: FrameTransport
  /**
   * Sent inside the handshake messages, before any transport key exists.
   */
  payload?: Uint8Array
}

export interface SecuredConnection {
  conn: streams.Duplex
  channel: SecureChannel
  remotePublicKey: Uint8Array | null
}

export interface NoiseInit {
  // Noise_<pattern>_<dh>_<cipher>_<hash>; defaults to DEFAULT_PROTOCOL
  protocol?: string
  // 32-byte seed for the static x25519 key pair; a fresh pair is generated otherwise
  staticNoiseKey?: bytes
  crypto?: NoiseCrypto
  prologueBytes?: Uint8Array
  metrics?: Metrics
}

/**
 * Resolves a full protocol name to its handshake pattern, refusing any
 * primitive `crypto` does not implement.
 */
export function resolveProtocol(name: string, crypto: NoiseCrypto = stablelib): Pattern {
  const parts = name.split('_');
  if (parts.length !== 5 || parts[0] !== 'Noise') {
    throw new Error(`invalid protocol name: ${name}`);
  }

  const [, patternName, dh, cipher, hash] = parts;
  const requested = [['dh', dh, crypto.dh], ['cipher', cipher, crypto.cipher], ['hash', hash, crypto.hash]] as const;
  for (const [kind, wanted, available] of requested) {
    if (wanted !== available.name) {
      throw new Error(`not supported ${kind}: ${wanted}`);
    }
  }

  if (!Object.hasOwn(PATTERNS, patternName)) {
    throw new Error(`not supported pattern: ${patternName}`);
  }
  return PATTERNS[patternName];
}

/**
 * Static identity plus protocol choice, shared by every connection it secures.
 */
export class Noise {
  public readonly crypto: NoiseCrypto
  public readonly protocol: string

  private readonly prologue: Uint8Array
  private readonly staticKeys: KeyPair
  private readonly metrics?: MetricsRegistry
  private readonly handshake: PatternHandshake

  constructor (init: NoiseInit = {}) {
    this.protocol = init.protocol ?? DEFAULT_PROTOCOL;
    this.crypto = init.crypto ?? stablelib;
    this.handshake = new PatternHandshake(this.crypto, this.protocol, resolveProtocol(this.protocol, this.crypto));
    this.staticKeys = init.staticNoiseKey
      ? this.crypto.dh.keyPairFromSeed(init.staticNoiseKey)
      : this.crypto.dh.generateKeyPair();
    this.prologue = init.prologueBytes ?? new Uint8Array(0);
    this.metrics = init.metrics ? registerMetrics(init.metrics) : undefined;
  }

  public getPublicKey(): Uint8Array {
    return this.staticKeys.publicKey;
  }

  public getMetrics(): MetricsRegistry | undefined {
    return this.metrics;
  }

  /**
   * Fresh handshake engine for one connection.
   */
  public createHandshake(params: HandshakeParams): NoiseHandshake {
    const { role, remoteStaticPublicKey } = params;
    if (remoteStaticPublicKey !== undefined && !isValidPublicKey(remoteStaticPublicKey)) {
      throw new InvalidCryptoExchangeError('invalid remote static public key');
    }

    return new NoiseHandshake(role, this.prologue, this.staticKeys, this.handshake, remoteStaticPublicKey);
  }

  /**
   * Runs the handshake over `connection` and returns the established channel.
   */
  public async secureChannel(params: SecureChannelParams): Promise<SecureChannel> {
    const { channel } = await this.performHandshake(params);
    return channel;
  }

  public async secureConnection(params: SecureChannelParams): Promise<SecuredConnection> {
    const { channel, handshake } = await this.performHandshake(params);

    return {
      conn: createSecureDuplex(channel),
      channel,
      remotePublicKey: handshake.getRemoteStaticKey()
    };
  }

  private async performHandshake (params: SecureChannelParams): Promise<{ channel: SecureChannel, handshake: NoiseHandshake }> {
    const handshake = this.createHandshake(params);
    const channel = new SecureChannel({ metrics: this.metrics });
    channel.init();
    if (params.payload && params.payload.length > 0) {
      await channel.write(params.payload);
    }

    await channel.handshake(params.connection, handshake);

    return { channel, handshake };
  }
}
