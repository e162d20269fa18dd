import type { HandshakeEngine, HandshakeReadResult, HandshakeWriteResult } from './@types/handshake-interface';
import { Role } from './@types/handshake-interface';
import type { FrameTransport } from './@types/transport';
import { SendCipher } from './crypto/cipher-state';
import { stablelib } from './crypto/stablelib';
import { InvalidCryptoExchangeError, TransportError } from './errors';
import { connectedStreams, createEnginePair } from './fixtures/connection';
import { outboundMessageCount, runHandshake } from './handshake-driver';
import { Nonce } from './handshakes/nonce';
import { PatternHandshake, PATTERNS } from './handshakes/pattern';
import { fromString } from './utils';

function lonelySendCipher(): SendCipher {
  const handshake = new PatternHandshake(stablelib, 'Noise_NN_25519_ChaChaPoly_SHA256', PATTERNS.NN);
  return new SendCipher(handshake, { k: new Uint8Array(32).fill(1), n: new Nonce() });
}

function stubTransport(): FrameTransport & { sent: Uint8Array[] } {
  const sent: Uint8Array[] = [];
  return {
    sent,
    sendFrame: jest.fn(async (frame: Uint8Array) => {
      sent.push(frame);
    }),
    receiveFrame: jest.fn(() => Promise.reject(new TransportError('connection closed', { closed: true })))
  };
}

describe('outboundMessageCount', () => {
  it.each([
    [Role.INITIATOR, 1, 1],
    [Role.RESPONDER, 1, 0],
    [Role.INITIATOR, 2, 1],
    [Role.RESPONDER, 2, 1],
    [Role.INITIATOR, 3, 2],
    [Role.RESPONDER, 3, 1]
  ])('%s writes in a %d message pattern: %d', (role, total, expected) => {
    expect(outboundMessageCount(role, total)).toEqual(expected);
  });
});

describe('runHandshake', () => {
  it('treats a single cipher state as a failed exchange', async () => {
    const engine: HandshakeEngine = {
      role: Role.INITIATOR,
      messageCount: 1,
      maxPayloadLength: 65535,
      writeMessage: (): HandshakeWriteResult => ({ message: fromString('m'), send: lonelySendCipher(), receive: null }),
      readMessage: (): HandshakeReadResult => {
        throw new Error('not reached');
      }
    };
    const transport = stubTransport();

    await expect(runHandshake(transport, engine)).rejects.toThrow(new InvalidCryptoExchangeError('handshake yielded only one cipher state'));
    expect(transport.sent).toHaveLength(1);
  });

  it('passes transport failures through unchanged', async () => {
    const { responder } = createEnginePair('NN');
    const transport = stubTransport();
    const failure = new TransportError('connection reset');
    transport.receiveFrame = jest.fn(() => Promise.reject(failure));

    await expect(runHandshake(transport, responder)).rejects.toBe(failure);
  });

  it('starts with a write for the initiator and a read for the responder', async () => {
    const { initiator, responder } = createEnginePair('NN');
    const toResponder = stubTransport();
    const toInitiator = stubTransport();

    await expect(runHandshake(toResponder, initiator)).rejects.toMatchObject({ closed: true });
    expect(toResponder.sent).toHaveLength(1);

    await expect(runHandshake(toInitiator, responder)).rejects.toMatchObject({ closed: true });
    expect(toInitiator.sent).toHaveLength(0);
  });

  it('only reports non-empty payloads', async () => {
    const { initiator, responder } = createEnginePair('XX');
    const [initiatorTransport, responderTransport] = connectedStreams();

    const onPayload = jest.fn<void, [Uint8Array]>();
    let written = 0;

    await Promise.all([
      runHandshake(initiatorTransport, initiator, {
        nextPayload: () => (written++ === 1 ? fromString('late') : new Uint8Array(0))
      }),
      runHandshake(responderTransport, responder, { onPayload })
    ]);

    expect(written).toEqual(2);
    expect(onPayload).toHaveBeenCalledTimes(1);
    expect(Buffer.from(onPayload.mock.calls[0][0]).toString()).toEqual('late');
  });

  it('offers each outbound message its payload room', async () => {
    const { initiator, responder } = createEnginePair('XX');
    const [initiatorTransport, responderTransport] = connectedStreams();
    const initiatorRoom = jest.fn((_maxLength: number) => new Uint8Array(0));
    const responderRoom = jest.fn((_maxLength: number) => new Uint8Array(0));

    await Promise.all([
      runHandshake(initiatorTransport, initiator, { nextPayload: initiatorRoom }),
      runHandshake(responderTransport, responder, { nextPayload: responderRoom })
    ]);

    expect(initiatorRoom.mock.calls).toEqual([[65503], [65471]]);
    expect(responderRoom.mock.calls).toEqual([[65439]]);
  });
});
