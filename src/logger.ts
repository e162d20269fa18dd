import debug from 'debug';
import type { KeyPair } from './@types/keypair';
import type { NoiseSession } from './@types/handshake';
import { DUMP_SESSION_KEYS } from './constants';
import { toHex } from './utils';

export const logger = debug('noise-channel');

const keyLogger: debug.Debugger | null = DUMP_SESSION_KEYS ? logger.extend('keys') : null;

export function logLocalStaticKeys (s: KeyPair): void {
  if (!keyLogger) {
    return;
  }

  keyLogger(`LOCAL_STATIC_PUBLIC_KEY ${toHex(s.publicKey)}`);
  keyLogger(`LOCAL_STATIC_PRIVATE_KEY ${toHex(s.privateKey)}`);
}

export function logLocalEphemeralKeys (e: KeyPair | null): void {
  if (!keyLogger || !e) {
    return;
  }

  keyLogger(`LOCAL_PUBLIC_EPHEMERAL_KEY ${toHex(e.publicKey)}`);
  keyLogger(`LOCAL_PRIVATE_EPHEMERAL_KEY ${toHex(e.privateKey)}`);
}

export function logRemoteStaticKey (rs: Uint8Array | null): void {
  if (!keyLogger || !rs) {
    return;
  }

  keyLogger(`REMOTE_STATIC_PUBLIC_KEY ${toHex(rs)}`);
}

export function logRemoteEphemeralKey (re: Uint8Array | null): void {
  if (!keyLogger || !re) {
    return;
  }

  keyLogger(`REMOTE_EPHEMERAL_PUBLIC_KEY ${toHex(re)}`);
}

export function logCipherState (session: NoiseSession): void {
  if (!keyLogger || !session.cs1 || !session.cs2) {
    return;
  }

  keyLogger(`CIPHER_STATE_1 ${session.cs1.n.getUint64()} ${toHex(session.cs1.k)}`);
  keyLogger(`CIPHER_STATE_2 ${session.cs2.n.getUint64()} ${toHex(session.cs2.k)}`);
}
