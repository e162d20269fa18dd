import { Role } from './@types/handshake-interface';
import type { HandshakeHandler } from './@types/handshake-interface';
import { stablelib } from './crypto/stablelib';
import { InvalidCryptoExchangeError } from './errors';
import { connectedStreams, createEnginePair, text } from './fixtures/connection';
import { NoiseHandshake } from './handshake';
import { runHandshake } from './handshake-driver';
import { PatternHandshake, PATTERNS } from './handshakes/pattern';
import { fromString, toHex } from './utils';

const PRESHARED_RESPONDER_KEY = ['N', 'NK', 'XK'];
const INITIATOR_LEARNS = ['NX', 'XX'];
const RESPONDER_LEARNS = ['XN', 'XK', 'XX'];

function sendOnce(payload: string, sink: string[]): HandshakeHandler {
  let sent = false;
  return {
    nextPayload: () => {
      if (sent) {
        return new Uint8Array(0);
      }
      sent = true;
      return fromString(payload);
    },
    onPayload: (data) => {
      sink.push(text(data));
    }
  };
}

for (const name of Object.keys(PATTERNS)) {
  describe(`${name} handshake`, () => {
    it('agrees on keys and exchanges payloads', async () => {
      const { initiator, responder, initiatorKeys, responderKeys } = createEnginePair(name, {
        expectedResponderKey: PRESHARED_RESPONDER_KEY.includes(name) ? undefined : null
      });
      const [a, b] = connectedStreams();
      const atInitiator: string[] = [];
      const atResponder: string[] = [];

      const [initiatorCiphers, responderCiphers] = await Promise.all([
        runHandshake(a, initiator, sendOnce('ping', atInitiator)),
        runHandshake(b, responder, sendOnce('pong', atResponder))
      ]);

      expect(initiator.isComplete).toBe(true);
      expect(responder.isComplete).toBe(true);
      expect(atResponder).toEqual(['ping']);
      expect(atInitiator).toEqual(name === 'N' ? [] : ['pong']);

      const initiatorHash = initiator.getHandshakeHash();
      const responderHash = responder.getHandshakeHash();
      expect(initiatorHash).not.toBeNull();
      expect(toHex(initiatorHash ?? new Uint8Array(0))).toEqual(toHex(responderHash ?? new Uint8Array(1)));

      expect(text(responderCiphers.receive.decrypt(initiatorCiphers.send.encrypt(fromString('to responder'))))).toEqual('to responder');
      expect(text(initiatorCiphers.receive.decrypt(responderCiphers.send.encrypt(fromString('to initiator'))))).toEqual('to initiator');

      const initiatorRemote = initiator.getRemoteStaticKey();
      if (PRESHARED_RESPONDER_KEY.includes(name) || INITIATOR_LEARNS.includes(name)) {
        expect(toHex(initiatorRemote ?? new Uint8Array(0))).toEqual(toHex(responderKeys.publicKey));
      } else {
        expect(initiatorRemote).toBeNull();
      }

      const responderRemote = responder.getRemoteStaticKey();
      if (RESPONDER_LEARNS.includes(name)) {
        expect(toHex(responderRemote ?? new Uint8Array(0))).toEqual(toHex(initiatorKeys.publicKey));
      } else {
        expect(responderRemote).toBeNull();
      }
    });

    it('fits a payload of the advertised size into every message', () => {
      const { initiator, responder } = createEnginePair(name, {
        expectedResponderKey: PRESHARED_RESPONDER_KEY.includes(name) ? undefined : null
      });
      const sizes: number[] = [];
      let [writer, reader] = [initiator, responder];

      for (let round = 0; round < initiator.messageCount; round++) {
        const payload = new Uint8Array(writer.maxPayloadLength).fill(round + 1);
        const { message } = writer.writeMessage(payload);
        sizes.push(message.length);
        expect(reader.readMessage(message).payload).toEqual(payload);
        [writer, reader] = [reader, writer];
      }

      expect(sizes).toEqual(new Array(initiator.messageCount).fill(65535));
    });
  });
}

describe('NoiseHandshake', () => {
  const empty = new Uint8Array(0);

  it('yields ciphers exactly once, on the final message', () => {
    const { initiator, responder } = createEnginePair('NN');

    const first = initiator.writeMessage(empty);
    expect(first.send).toBeNull();
    expect(first.receive).toBeNull();

    const read = responder.readMessage(first.message);
    expect(read.send).toBeNull();

    const second = responder.writeMessage(empty);
    expect(second.send).not.toBeNull();
    expect(second.receive).not.toBeNull();

    const last = initiator.readMessage(second.message);
    expect(last.send).not.toBeNull();
    expect(last.receive).not.toBeNull();
  });

  it('fails when the responder presents an unexpected static key', () => {
    const stranger = stablelib.dh.generateKeyPair();
    const { initiator, responder } = createEnginePair('XX', { expectedResponderKey: stranger.publicKey });

    responder.readMessage(initiator.writeMessage(empty).message);
    const second = responder.writeMessage(empty);

    expect(() => initiator.readMessage(second.message)).toThrow(new InvalidCryptoExchangeError('not same remote public key'));
  });

  it('fails when the initiator presents an unexpected static key', () => {
    const stranger = stablelib.dh.generateKeyPair();
    const { initiator, responder } = createEnginePair('XX', { expectedInitiatorKey: stranger.publicKey });

    responder.readMessage(initiator.writeMessage(empty).message);
    initiator.readMessage(responder.writeMessage(empty).message);
    const third = initiator.writeMessage(empty);

    expect(() => responder.readMessage(third.message)).toThrow('not same remote public key');
  });

  it('fails when the initiator pre-shares the wrong responder key', () => {
    const stranger = stablelib.dh.generateKeyPair();
    const { initiator, responder } = createEnginePair('NK', { expectedResponderKey: stranger.publicKey });

    const first = initiator.writeMessage(fromString('secret'));

    expect(() => responder.readMessage(first.message)).toThrow('handshake validation fail');
  });

  it('fails when the prologues differ', () => {
    const handshake = new PatternHandshake(stablelib, 'Noise_NN_25519_ChaChaPoly_SHA256', PATTERNS.NN);
    const initiator = new NoiseHandshake(Role.INITIATOR, fromString('one'), stablelib.dh.generateKeyPair(), handshake);
    const responder = new NoiseHandshake(Role.RESPONDER, fromString('two'), stablelib.dh.generateKeyPair(), handshake);

    responder.readMessage(initiator.writeMessage(empty).message);
    const second = responder.writeMessage(empty);

    expect(() => initiator.readMessage(second.message)).toThrow('handshake validation fail');
  });

  it('requires the pre-shared key up front', () => {
    expect(() => createEnginePair('NK', { expectedResponderKey: null })).toThrow(InvalidCryptoExchangeError);
  });

  it('refuses a handshake message above the Noise limit', () => {
    const { initiator } = createEnginePair('NN');

    expect(() => initiator.writeMessage(new Uint8Array(65535 - 32 + 1))).toThrow(InvalidCryptoExchangeError);
  });

  it('reports how many messages the pattern has', () => {
    expect(createEnginePair('XX').initiator.messageCount).toEqual(3);
    expect(createEnginePair('N').responder.messageCount).toEqual(1);
  });
});
