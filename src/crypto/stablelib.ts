import { ChaCha20Poly1305 } from '@stablelib/chacha20poly1305';
import { HKDF } from '@stablelib/hkdf';
import { hash, SHA256 } from '@stablelib/sha256';
import * as x25519 from '@stablelib/x25519';
import type { NoiseCrypto } from '../@types/crypto';
import type { KeyPair } from '../@types/keypair';

function toKeyPair({ publicKey, secretKey }: x25519.KeyPair): KeyPair {
  return { publicKey, privateKey: secretKey };
}

export const stablelib: NoiseCrypto = {
  dh: {
    name: '25519',
    generateKeyPair: () => toKeyPair(x25519.generateKeyPair()),
    keyPairFromSeed: (seed) => toKeyPair(x25519.generateKeyPairFromSeed(seed)),
    sharedKey: (privateKey, publicKey) => x25519.sharedKey(privateKey, publicKey)
  },

  cipher: {
    name: 'ChaChaPoly',
    seal: (k, nonce, ad, plaintext) => new ChaCha20Poly1305(k).seal(nonce, plaintext, ad),
    open: (k, nonce, ad, ciphertext) => new ChaCha20Poly1305(k).open(nonce, ciphertext, ad)
  },

  hash: {
    name: 'SHA256',
    digest: (data) => hash(data),
    hkdf: (ck, ikm) => {
      const okm = new HKDF(SHA256, ikm, ck).expand(96);
      return [okm.subarray(0, 32), okm.subarray(32, 64), okm.subarray(64, 96)];
    }
  }
};
