import type { HandshakeEngine, HandshakeHandler, HandshakeStepResult } from './@types/handshake-interface';
import { Role } from './@types/handshake-interface';
import type { FrameTransport } from './@types/transport';
import type { CipherPair } from './crypto/cipher-state';
import { InvalidCryptoExchangeError } from './errors';
import { logger } from './logger';

const EMPTY_BUFFER = new Uint8Array(0);

/**
 * Number of handshake messages `role` writes in a pattern of `messageCount` messages.
 */
export function outboundMessageCount(role: Role, messageCount: number): number {
  return role === Role.INITIATOR ? Math.ceil(messageCount / 2) : Math.floor(messageCount / 2);
}

function completion({ send, receive }: HandshakeStepResult): CipherPair | null {
  if (send && receive) {
    return { send, receive };
  }
  if (send || receive) {
    throw new InvalidCryptoExchangeError('handshake yielded only one cipher state');
  }
  return null;
}

/**
 * Runs `engine` to completion over `transport`, alternating writes and reads
 * starting with the initiator. Errors from either side are rethrown as-is.
 */
export async function runHandshake(
  transport: FrameTransport,
  engine: HandshakeEngine,
  handler: HandshakeHandler = {}
): Promise<CipherPair> {
  let myTurn = engine.role === Role.INITIATOR;

  while (true) {
    let ciphers: CipherPair | null;

    if (myTurn) {
      const payload = handler.nextPayload ? handler.nextPayload(engine.maxPayloadLength) : EMPTY_BUFFER;
      const result = engine.writeMessage(payload);
      await transport.sendFrame(result.message);
      ciphers = completion(result);
    } else {
      const frame = await transport.receiveFrame();
      const result = engine.readMessage(frame);
      if (handler.onPayload && result.payload.length > 0) {
        handler.onPayload(result.payload);
      }
      ciphers = completion(result);
    }

    if (ciphers) {
      logger('%s handshake complete', engine.role);
      return ciphers;
    }

    myTurn = !myTurn;
  }
}
