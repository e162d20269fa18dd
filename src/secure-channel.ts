import type { HandshakeEngine } from './@types/handshake-interface';
import type { FrameTransport } from './@types/transport';
import type { MetricsRegistry } from './metrics';
import { ByteQueue } from './byte-queue';
import { STAGING_CHUNK_THRESHOLD } from './constants';
import { EncryptedReader, EncryptedWriter } from './crypto/streaming';
import { InvalidStateError, toError } from './errors';
import { outboundMessageCount, runHandshake } from './handshake-driver';
import { logger } from './logger';

enum ChannelState {
  IDLE,
  STAGING,
  HANDSHAKING,
  ESTABLISHED,
  FAILED
}

interface Staging {
  outbound: ByteQueue
  inbound: ByteQueue
}

export interface SecureChannelOptions {
  metrics?: MetricsRegistry
}

/**
 * Payload size per handshake message for `staged` bytes spread over
 * `outboundMessages` messages. Small buffers go out whole in the first message.
 */
export function stagingChunkSize(staged: number, outboundMessages: number): number {
  if (staged <= STAGING_CHUNK_THRESHOLD || outboundMessages < 1) {
    return staged;
  }

  if (outboundMessages * STAGING_CHUNK_THRESHOLD < staged) {
    return Math.floor(staged / outboundMessages) + 1;
  }

  return STAGING_CHUNK_THRESHOLD;
}

/**
 * Byte stream secured by a Noise handshake.
 *
 * Between `init()` and the end of `handshake()`, writes are staged and ride
 * inside the handshake messages, so they are protected only as far as the
 * handshake pattern protects payloads at that stage. Bytes the peer staged the
 * same way can be read as soon as their handshake message arrives. Once the
 * handshake completes, reads and writes go through an encrypted
 * reader/writer pair. Staged bytes that did not fit the handshake messages
 * are sent first; if that fails the channel fails with it.
 */
export class SecureChannel {
  private state = ChannelState.IDLE;
  private staging: Staging | null = null;
  private reader: EncryptedReader | null = null;
  private writer: EncryptedWriter | null = null;
  private failure: Error | null = null;
  private waiters: Array<() => void> = [];
  private readonly metrics?: MetricsRegistry;

  constructor(options: SecureChannelOptions = {}) {
    this.metrics = options.metrics;
  }

  public get isEstablished(): boolean {
    return this.state === ChannelState.ESTABLISHED;
  }

  public init(): void {
    if (this.state !== ChannelState.IDLE) {
      throw new InvalidStateError('channel already initialized');
    }

    this.staging = { outbound: new ByteQueue(), inbound: new ByteQueue() };
    this.state = ChannelState.STAGING;
  }

  public async write(data: Uint8Array): Promise<number> {
    if (this.writer) {
      return this.writer.write(data);
    }
    if (this.failure) {
      throw this.failure;
    }
    if (!this.staging) {
      throw new InvalidStateError('channel not initialized');
    }

    this.staging.outbound.append(data.slice());
    return data.length;
  }

  public async read(maxLength = Infinity): Promise<Uint8Array> {
    if (!(maxLength >= 1)) {
      throw new RangeError('maxLength must be at least 1');
    }

    while (true) {
      if (this.reader) {
        return this.reader.read(maxLength);
      }
      if (this.failure) {
        throw this.failure;
      }
      if (!this.staging) {
        throw new InvalidStateError('channel not initialized');
      }
      if (this.staging.inbound.length > 0) {
        return this.staging.inbound.take(maxLength);
      }

      await this.nextProgress();
    }
  }

  public getReader(): EncryptedReader {
    if (!this.reader) {
      throw new InvalidStateError('handshake not completed');
    }
    return this.reader;
  }

  public getWriter(): EncryptedWriter {
    if (!this.writer) {
      throw new InvalidStateError('handshake not completed');
    }
    return this.writer;
  }

  public async handshake(transport: FrameTransport, engine: HandshakeEngine): Promise<void> {
    const staging = this.staging;
    if (this.state !== ChannelState.STAGING || !staging) {
      throw new InvalidStateError(this.state === ChannelState.IDLE ? 'channel not initialized' : 'handshake already started');
    }
    this.state = ChannelState.HANDSHAKING;

    const outboundMessages = outboundMessageCount(engine.role, engine.messageCount);
    const chunkSize = stagingChunkSize(staging.outbound.length, outboundMessages);
    logger('%s handshake: %d staged bytes over %d messages, %d per message', engine.role, staging.outbound.length, outboundMessages, chunkSize);

    try {
      const { send, receive } = await runHandshake(transport, engine, {
        nextPayload: (maxLength) => staging.outbound.take(Math.min(chunkSize, maxLength)),
        onPayload: (payload) => {
          staging.inbound.append(payload);
          this.notifyProgress();
        }
      });

      const writer = new EncryptedWriter(transport, send, { metrics: this.metrics });
      this.writer = writer;
      this.reader = new EncryptedReader(transport, receive, {
        initial: staging.inbound.drain(),
        metrics: this.metrics
      });
      this.staging = null;
      this.notifyProgress();

      // bytes that found no room in a handshake message
      const residual = staging.outbound.drain();
      if (residual.length > 0) {
        logger('%s sending %d staged bytes after handshake', engine.role, residual.length);
        await writer.write(residual);
      }

      this.state = ChannelState.ESTABLISHED;
      this.metrics?.handshakeSuccesses.increment();
    } catch (e) {
      logger('%s handshake failed: %s', engine.role, e instanceof Error ? e.message : e);
      this.failure = toError(e);
      this.staging = null;
      this.reader = null;
      this.writer = null;
      this.state = ChannelState.FAILED;
      this.metrics?.handshakeErrors.increment();
      throw e;
    } finally {
      this.notifyProgress();
    }
  }

  private nextProgress(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private notifyProgress(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) {
      wake();
    }
  }
}
