import type { bytes, bytes32 } from '../@types/basic';
import type { CipherState, SymmetricState } from '../@types/handshake';
import type { NoiseCrypto } from '../@types/crypto';
import { InvalidCryptoExchangeError, toError } from '../errors';
import { logger } from '../logger';
import { concat, equals, fromString } from '../utils';
import { Nonce } from './nonce';

export interface DecryptResult {
  plaintext: bytes
  valid: boolean
}

export interface SplitResult {
  cs1: CipherState
  cs2: CipherState
}

/**
 * Symmetric state operations of the Noise framework (section 5.1 / 5.2 of the
 * Noise specification). Pattern processing lives in subclasses.
 */
export abstract class AbstractHandshake {
  public crypto: NoiseCrypto;

  constructor (crypto: NoiseCrypto) {
    this.crypto = crypto;
  }

  public encryptWithAd (cs: CipherState, ad: Uint8Array, plaintext: Uint8Array): bytes {
    const e = this.encrypt(cs.k, cs.n, ad, plaintext);
    cs.n.increment();

    return e;
  }

  public decryptWithAd (cs: CipherState, ad: Uint8Array, ciphertext: Uint8Array): DecryptResult {
    const { plaintext, valid } = this.decrypt(cs.k, cs.n, ad, ciphertext);
    if (valid) cs.n.increment();

    return { plaintext, valid };
  }

  // Cipher state related
  protected hasKey (cs: CipherState): boolean {
    return !this.isEmptyKey(cs.k);
  }

  protected createEmptyKey (): bytes32 {
    return new Uint8Array(32);
  }

  protected isEmptyKey (k: bytes32): boolean {
    const emptyKey = this.createEmptyKey();
    return equals(emptyKey, k);
  }

  protected encrypt (k: bytes32, n: Nonce, ad: Uint8Array, plaintext: Uint8Array): bytes {
    n.assertValue();

    return this.crypto.cipher.seal(k, n.getBytes(), ad, plaintext);
  }

  protected encryptAndHash (ss: SymmetricState, plaintext: bytes): bytes {
    let ciphertext;
    if (this.hasKey(ss.cs)) {
      ciphertext = this.encryptWithAd(ss.cs, ss.h, plaintext);
    } else {
      ciphertext = plaintext;
    }

    this.mixHash(ss, ciphertext);
    return ciphertext;
  }

  protected decrypt (k: bytes32, n: Nonce, ad: bytes, ciphertext: bytes): DecryptResult {
    n.assertValue();

    const plaintext = this.crypto.cipher.open(k, n.getBytes(), ad, ciphertext);

    if (plaintext) {
      return { plaintext, valid: true };
    } else {
      return { plaintext: new Uint8Array(0), valid: false };
    }
  }

  protected decryptAndHash (ss: SymmetricState, ciphertext: bytes): DecryptResult {
    let plaintext: bytes;
    let valid = true;
    if (this.hasKey(ss.cs)) {
      ({ plaintext, valid } = this.decryptWithAd(ss.cs, ss.h, ciphertext));
    } else {
      plaintext = ciphertext;
    }

    this.mixHash(ss, ciphertext);
    return { plaintext, valid };
  }

  protected dh (privateKey: bytes32 | undefined, publicKey: bytes | null | undefined): bytes32 {
    if (!privateKey || !publicKey) {
      throw new InvalidCryptoExchangeError('missing key for diffie-hellman');
    }

    try {
      const derived = this.crypto.dh.sharedKey(privateKey, publicKey);
      if (derived.length === 32) {
        return derived;
      }

      return derived.subarray(0, 32);
    } catch (e) {
      const err = toError(e);
      logger('dh failed: %s', err.message);
      throw new InvalidCryptoExchangeError(`diffie-hellman failed: ${err.message}`);
    }
  }

  // Symmetric state related

  protected mixHash (ss: SymmetricState, data: bytes): void {
    ss.h = this.getHash(ss.h, data);
  }

  protected getHash (a: Uint8Array, b: Uint8Array): bytes32 {
    return this.crypto.hash.digest(concat([a, b], a.length + b.length));
  }

  protected mixKey (ss: SymmetricState, ikm: bytes32): void {
    const [ck, tempK] = this.crypto.hash.hkdf(ss.ck, ikm);
    ss.cs = this.initializeKey(tempK);
    ss.ck = ck;
  }

  protected initializeKey (k: bytes32): CipherState {
    return { k, n: new Nonce() };
  }

  // Handshake state related
  protected initializeSymmetric (protocolName: string): SymmetricState {
    const protocolNameBytes = fromString(protocolName, 'utf-8');
    const h = this.hashProtocolName(protocolNameBytes);

    const ck = h;
    const key = this.createEmptyKey();
    const cs: CipherState = this.initializeKey(key);

    return { cs, ck, h };
  }

  protected hashProtocolName (protocolName: Uint8Array): bytes32 {
    if (protocolName.length <= 32) {
      const h = new Uint8Array(32);
      h.set(protocolName);
      return h;
    } else {
      return this.getHash(protocolName, new Uint8Array(0));
    }
  }

  protected split (ss: SymmetricState): SplitResult {
    const [tempk1, tempk2] = this.crypto.hash.hkdf(ss.ck, new Uint8Array(0));
    const cs1 = this.initializeKey(tempk1);
    const cs2 = this.initializeKey(tempk2);

    return { cs1, cs2 };
  }
}
