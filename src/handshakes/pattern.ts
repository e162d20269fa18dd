import { AbstractHandshake } from './abstract-handshake';
import { Action } from '../@types/handshake';
import type { HandshakeState, NoiseSession } from '../@types/handshake';
import type { KeyPair } from '../@types/keypair';
import type { bytes, bytes32 } from '../@types/basic';
import type { NoiseCrypto } from '../@types/crypto';
import { ByteQueue } from '../byte-queue';
import { NOISE_MSG_MAX_LENGTH_BYTES } from '../constants';
import { InvalidCryptoExchangeError } from '../errors';

export enum Token {
  E = 'e',
  S = 's',
  EE = 'ee',
  ES = 'es',
  SE = 'se',
  SS = 'ss'
}

/**
 * Handshake pattern in Noise notation (section 7 of the Noise specification).
 * `messages[0]` is written by the initiator and the turns alternate from there.
 * Pre-messages only ever carry static keys.
 */
export interface Pattern {
  initiatorPreMessage: readonly Token[]
  responderPreMessage: readonly Token[]
  messages: ReadonlyArray<readonly Token[]>
}

const PUBLIC_KEY_SIZE = 32;
const MAC_SIZE = 16;

const { E, S, EE, ES, SE } = Token;

function define(messages: Token[][], responderPreMessage: Token[] = [], initiatorPreMessage: Token[] = []): Pattern {
  return Object.freeze({ initiatorPreMessage, responderPreMessage, messages });
}

export const PATTERNS: Readonly<Record<string, Pattern>> = Object.freeze({
  N: define([[E, ES]], [S]),
  NN: define([[E], [E, EE]]),
  NK: define([[E, ES], [E, EE]], [S]),
  NX: define([[E], [E, EE, S, ES]]),
  XN: define([[E], [E, EE], [S, SE]]),
  XK: define([[E, ES], [E, EE], [S, SE]], [S]),
  XX: define([[E], [E, EE, S, ES], [S, SE]])
});

/**
 * Number of handshake messages the pattern exchanges in total.
 */
export function messageCount(pattern: Pattern): number {
  return pattern.messages.length;
}

export class PatternHandshake extends AbstractHandshake {
  constructor(crypto: NoiseCrypto, public readonly name: string, public readonly pattern: Pattern) {
    super(crypto);
  }

  public get messageCount(): number {
    return messageCount(this.pattern);
  }

  /**
   * Largest payload message `round` can carry without exceeding
   * NOISE_MSG_MAX_LENGTH_BYTES, after its public keys and tags.
   */
  public payloadCapacity(round: number): number {
    let keyed = false;
    let overhead = 0;

    for (const tokens of this.pattern.messages.slice(0, round + 1)) {
      overhead = 0;
      for (const token of tokens) {
        if (token === Token.E) {
          overhead += PUBLIC_KEY_SIZE;
        } else if (token === Token.S) {
          overhead += PUBLIC_KEY_SIZE + (keyed ? MAC_SIZE : 0);
        } else {
          keyed = true;
        }
      }
    }

    return NOISE_MSG_MAX_LENGTH_BYTES - overhead - (keyed ? MAC_SIZE : 0);
  }

  initSession(initiator: boolean, prologue: bytes32, s: KeyPair, remotePublicKey: bytes | null = null): NoiseSession {
    const ss = this.initializeSymmetric(this.name);
    this.mixHash(ss, prologue);

    const hs: HandshakeState = { ss, s, rs: null, re: null, e: null };

    // initiator's pre-message is hashed first on both sides
    if (this.pattern.initiatorPreMessage.includes(Token.S)) {
      this.mixHash(ss, initiator ? s.publicKey : this.preSharedRemoteKey(hs, remotePublicKey));
    }
    if (this.pattern.responderPreMessage.includes(Token.S)) {
      this.mixHash(ss, initiator ? this.preSharedRemoteKey(hs, remotePublicKey) : s.publicKey);
    }

    return {
      hs,
      i: initiator,
      mc: 0,
      action: initiator ? Action.WRITE_MESSAGE : Action.READ_MESSAGE
    };
  }

  public writeMessage (session: NoiseSession, payload: bytes): bytes {
    if (session.action !== Action.WRITE_MESSAGE) {
      throw new InvalidCryptoExchangeError('invalid state: not expecting to write a handshake message');
    }

    const { hs } = session;
    const buffer = new ByteQueue();

    for (const token of this.pattern.messages[session.mc]) {
      switch (token) {
        case Token.E: {
          const e = this.crypto.dh.generateKeyPair();
          hs.e = e;
          this.mixHash(hs.ss, e.publicKey);
          buffer.append(e.publicKey);
          break;
        }

        case Token.S:
          buffer.append(this.encryptAndHash(hs.ss, hs.s.publicKey));
          break;

        default:
          this.mixToken(session, token);
      }
    }

    buffer.append(this.encryptAndHash(hs.ss, payload));
    this.advance(session);

    return buffer.drain();
  }

  public readMessage (session: NoiseSession, message: Uint8Array): bytes {
    if (session.action !== Action.READ_MESSAGE) {
      throw new InvalidCryptoExchangeError('invalid state: not expecting to read a handshake message');
    }

    const { hs } = session;
    let offset = 0;

    for (const token of this.pattern.messages[session.mc]) {
      switch (token) {
        case Token.E: {
          if (message.length - offset < PUBLIC_KEY_SIZE) {
            throw new InvalidCryptoExchangeError('short buffer');
          }
          hs.re = message.slice(offset, offset + PUBLIC_KEY_SIZE);
          offset += PUBLIC_KEY_SIZE;
          this.mixHash(hs.ss, hs.re);
          break;
        }

        case Token.S: {
          const size = this.hasKey(hs.ss.cs) ? PUBLIC_KEY_SIZE + MAC_SIZE : PUBLIC_KEY_SIZE;
          if (message.length - offset < size) {
            throw new InvalidCryptoExchangeError('short buffer');
          }

          const decrypted = this.decryptAndHash(hs.ss, message.slice(offset, offset + size));
          if (!decrypted.valid) {
            throw new InvalidCryptoExchangeError('handshake validation fail');
          }
          hs.rs = decrypted.plaintext;
          offset += size;
          break;
        }

        default:
          this.mixToken(session, token);
      }
    }

    const decrypted = this.decryptAndHash(hs.ss, message.slice(offset));
    if (!decrypted.valid) {
      throw new InvalidCryptoExchangeError('handshake validation fail');
    }
    this.advance(session);

    return decrypted.plaintext;
  }

  private preSharedRemoteKey (hs: HandshakeState, remotePublicKey: bytes | null): bytes {
    if (!remotePublicKey) {
      throw new InvalidCryptoExchangeError(`remote static public key required by ${this.name}`);
    }
    hs.rs = remotePublicKey;
    return remotePublicKey;
  }

  private mixToken (session: NoiseSession, token: Token): void {
    const { hs } = session;

    switch (token) {
      case Token.EE:
        this.mixKey(hs.ss, this.dh(hs.e?.privateKey, hs.re));
        break;

      case Token.ES:
        this.mixKey(hs.ss, session.i ? this.dh(hs.e?.privateKey, hs.rs) : this.dh(hs.s.privateKey, hs.re));
        break;

      case Token.SE:
        this.mixKey(hs.ss, session.i ? this.dh(hs.s.privateKey, hs.re) : this.dh(hs.e?.privateKey, hs.rs));
        break;

      case Token.SS:
        this.mixKey(hs.ss, this.dh(hs.s.privateKey, hs.rs));
        break;

      default:
        throw new InvalidCryptoExchangeError(`unexpected token: ${token}`);
    }
  }

  private advance (session: NoiseSession): void {
    session.mc++;

    if (session.mc < this.pattern.messages.length) {
      session.action = session.action === Action.WRITE_MESSAGE ? Action.READ_MESSAGE : Action.WRITE_MESSAGE;
      return;
    }

    const { cs1, cs2 } = this.split(session.hs.ss);
    session.action = Action.SPLIT;
    session.cs1 = cs1;
    session.cs2 = cs2;
    session.h = session.hs.ss.h;
  }
}
