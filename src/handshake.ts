import type { HandshakeEngine, HandshakeReadResult, HandshakeStepResult, HandshakeWriteResult } from './@types/handshake-interface';
import { Role } from './@types/handshake-interface';
import type { bytes, bytes32 } from './@types/basic';
import { Action, NoiseSession } from './@types/handshake';
import type { KeyPair } from './@types/keypair';
import { NOISE_MSG_MAX_LENGTH_BYTES } from './constants';
import { ReceiveCipher, SendCipher } from './crypto/cipher-state';
import { InvalidCryptoExchangeError } from './errors';
import { PatternHandshake } from './handshakes/pattern';
import {
  logCipherState,
  logger,
  logLocalEphemeralKeys,
  logLocalStaticKeys,
  logRemoteEphemeralKey,
  logRemoteStaticKey
} from './logger';
import { equals } from './utils';

const NO_CIPHERS: HandshakeStepResult = { send: null, receive: null };

/**
 * Noise handshake for one side of one connection, exposed round by round.
 */
export class NoiseHandshake implements HandshakeEngine {
  public readonly role: Role
  public readonly session: NoiseSession

  protected handshake: PatternHandshake

  private remotePublicKey: bytes | null
  private yielded = false

  constructor(
    role: Role,
    prologue: bytes32,
    staticKeypair: KeyPair,
    handshake: PatternHandshake,
    remotePublicKey?: bytes | null
  ) {
    this.role = role;
    this.handshake = handshake;
    this.remotePublicKey = remotePublicKey || null;
    this.session = handshake.initSession(this.isInitiator, prologue, staticKeypair, this.remotePublicKey);
    logLocalStaticKeys(staticKeypair);
  }

  public get isInitiator(): boolean {
    return this.role === Role.INITIATOR;
  }

  public get messageCount(): number {
    return this.handshake.messageCount;
  }

  public get maxPayloadLength(): number {
    return this.handshake.payloadCapacity(this.session.mc);
  }

  public get isComplete(): boolean {
    return this.session.action === Action.SPLIT;
  }

  writeMessage(payload: Uint8Array): HandshakeWriteResult {
    const round = this.session.mc;
    const message = this.handshake.writeMessage(this.session, payload);
    if (message.length > NOISE_MSG_MAX_LENGTH_BYTES) {
      throw new InvalidCryptoExchangeError(`handshake message of ${message.length} bytes exceeds ${NOISE_MSG_MAX_LENGTH_BYTES} bytes`);
    }

    logger('%s wrote handshake message %d (%d bytes, %d payload)', this.role, round, message.length, payload.length);
    logLocalEphemeralKeys(this.session.hs.e);

    return { message, ...this.takeCiphers() };
  }

  readMessage(message: Uint8Array): HandshakeReadResult {
    const round = this.session.mc;
    const payload = this.handshake.readMessage(this.session, message);

    logger('%s read handshake message %d (%d bytes, %d payload)', this.role, round, message.length, payload.length);
    logRemoteEphemeralKey(this.session.hs.re);

    const rs = this.session.hs.rs;
    if (rs) {
      if (this.remotePublicKey && !equals(this.remotePublicKey, rs)) {
        throw new InvalidCryptoExchangeError('not same remote public key');
      }
      this.remotePublicKey = rs;
      logRemoteStaticKey(rs);
    }

    return { payload, ...this.takeCiphers() };
  }

  getRemoteStaticKey(): bytes | null {
    return this.remotePublicKey;
  }

  getHandshakeHash(): bytes | null {
    return this.session.h ?? null;
  }

  private takeCiphers(): HandshakeStepResult {
    const { cs1, cs2 } = this.session;
    if (this.yielded || !this.isComplete || !cs1 || !cs2) {
      return NO_CIPHERS;
    }
    this.yielded = true;
    logCipherState(this.session);

    // cs1 carries initiator -> responder traffic, cs2 the reverse
    if (this.isInitiator) {
      return { send: new SendCipher(this.handshake, cs1), receive: new ReceiveCipher(this.handshake, cs2) };
    } else {
      return { send: new SendCipher(this.handshake, cs2), receive: new ReceiveCipher(this.handshake, cs1) };
    }
  }
}
