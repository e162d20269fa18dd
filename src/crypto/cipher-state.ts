import type { bytes } from '../@types/basic';
import type { CipherState } from '../@types/handshake';
import type { AbstractHandshake } from '../handshakes/abstract-handshake';
import { DecryptionError } from '../errors';

const EMPTY_AD = new Uint8Array(0);

/**
 * Outbound half of a split Noise session. Every call consumes one nonce.
 */
export class SendCipher {
  private readonly handshake: AbstractHandshake;
  private readonly cs: CipherState;

  constructor(handshake: AbstractHandshake, cs: CipherState) {
    this.handshake = handshake;
    this.cs = cs;
  }

  public get nonce(): number {
    return this.cs.n.getUint64();
  }

  public encrypt(plaintext: Uint8Array): bytes {
    return this.handshake.encryptWithAd(this.cs, EMPTY_AD, plaintext);
  }
}

/**
 * Inbound half of a split Noise session. A ciphertext that fails to
 * authenticate leaves the nonce untouched and throws.
 */
export class ReceiveCipher {
  private readonly handshake: AbstractHandshake;
  private readonly cs: CipherState;

  constructor(handshake: AbstractHandshake, cs: CipherState) {
    this.handshake = handshake;
    this.cs = cs;
  }

  public get nonce(): number {
    return this.cs.n.getUint64();
  }

  public decrypt(ciphertext: Uint8Array): bytes {
    const { plaintext, valid } = this.handshake.decryptWithAd(this.cs, EMPTY_AD, ciphertext);
    if (!valid) {
      throw new DecryptionError();
    }

    return plaintext;
  }
}

export interface CipherPair {
  send: SendCipher
  receive: ReceiveCipher
}
