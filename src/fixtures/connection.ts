import type { Counter, Metrics } from '../@types/metrics';
import type { KeyPair } from '../@types/keypair';
import { Role } from '../@types/handshake-interface';
import { stablelib } from '../crypto/stablelib';
import { NoiseHandshake } from '../handshake';
import { PatternHandshake, PATTERNS } from '../handshakes/pattern';
import { createPbStream, PbStreamImpl } from '../pb-stream';

/**
 * Two frame streams wired back to back, as if over one socket.
 */
export function connectedStreams(): [PbStreamImpl, PbStreamImpl] {
  const a = createPbStream();
  const b = createPbStream();
  a.pipe(b).pipe(a);

  return [a, b];
}

export interface EnginePair {
  initiator: NoiseHandshake
  responder: NoiseHandshake
  initiatorKeys: KeyPair
  responderKeys: KeyPair
}

export interface EnginePairOptions {
  prologue?: Uint8Array
  // static key the initiator expects from the responder; defaults to the real one
  expectedResponderKey?: Uint8Array | null
  expectedInitiatorKey?: Uint8Array | null
}

export function createEnginePair(patternName: string, options: EnginePairOptions = {}): EnginePair {
  const prologue = options.prologue ?? new Uint8Array(0);
  const handshake = new PatternHandshake(stablelib, `Noise_${patternName}_25519_ChaChaPoly_SHA256`, PATTERNS[patternName]);
  const initiatorKeys = stablelib.dh.generateKeyPair();
  const responderKeys = stablelib.dh.generateKeyPair();

  const expectedResponderKey = options.expectedResponderKey === undefined ? responderKeys.publicKey : options.expectedResponderKey;

  return {
    initiator: new NoiseHandshake(Role.INITIATOR, prologue, initiatorKeys, handshake, expectedResponderKey),
    responder: new NoiseHandshake(Role.RESPONDER, prologue, responderKeys, handshake, options.expectedInitiatorKey ?? null),
    initiatorKeys,
    responderKeys
  };
}

export interface FakeMetrics extends Metrics {
  count: (name: string) => number
}

export function createFakeMetrics(): FakeMetrics {
  const counts = new Map<string, number>();

  return {
    registerCounter(name: string): Counter {
      counts.set(name, 0);
      return {
        increment: (value = 1) => {
          counts.set(name, (counts.get(name) ?? 0) + value);
        }
      };
    },
    count: (name: string) => counts.get(name) ?? 0
  };
}

export function text(data: Uint8Array): string {
  return Buffer.from(data.buffer, data.byteOffset, data.byteLength).toString('utf8');
}
