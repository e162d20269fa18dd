import { TAG_LENGTH } from '@stablelib/chacha20poly1305';
import type { FrameTransport } from '../@types/transport';
import type { MetricsRegistry } from '../metrics';
import type { ReceiveCipher, SendCipher } from './cipher-state';
import { ByteQueue } from '../byte-queue';
import { NOISE_MSG_MAX_LENGTH_BYTES, NOISE_MSG_MAX_LENGTH_BYTES_WITHOUT_TAG } from '../constants';
import { DecryptionError, FrameTooLargeError, InvalidStateError, toError } from '../errors';
import { Mutex } from '../mutex';

export interface EncryptedStreamOptions {
  metrics?: MetricsRegistry
}

export interface EncryptedReaderOptions extends EncryptedStreamOptions {
  /**
   * Plaintext that arrived before the reader existed, served before any frame is read.
   */
  initial?: Uint8Array
}

/**
 * Encrypts writes into Noise transport messages, one frame per record.
 * Writes are serialized so nonces go out in order.
 */
export class EncryptedWriter {
  private readonly lock = new Mutex();
  private readonly transport: FrameTransport;
  private readonly cipher: SendCipher;
  private readonly metrics?: MetricsRegistry;
  private failure: Error | null = null;

  constructor(transport: FrameTransport, cipher: SendCipher, options: EncryptedStreamOptions = {}) {
    this.transport = transport;
    this.cipher = cipher;
    this.metrics = options.metrics;
  }

  /**
   * Sends all of `data`, split into as many records as one Noise message allows.
   */
  public write(data: Uint8Array): Promise<number> {
    return this.lock.runExclusive(async () => {
      for (let i = 0; i < data.length; i += NOISE_MSG_MAX_LENGTH_BYTES_WITHOUT_TAG) {
        await this.send(data.subarray(i, Math.min(i + NOISE_MSG_MAX_LENGTH_BYTES_WITHOUT_TAG, data.length)));
      }

      return data.length;
    });
  }

  /**
   * Sends `plaintext` as exactly one record.
   */
  public async writeRecord(plaintext: Uint8Array): Promise<void> {
    if (plaintext.length > NOISE_MSG_MAX_LENGTH_BYTES_WITHOUT_TAG) {
      throw new FrameTooLargeError(plaintext.length + TAG_LENGTH, NOISE_MSG_MAX_LENGTH_BYTES);
    }

    await this.lock.runExclusive(() => this.send(plaintext));
  }

  private async send(plaintext: Uint8Array): Promise<void> {
    if (this.failure) {
      throw this.failure;
    }

    try {
      const ciphertext = this.cipher.encrypt(plaintext);
      this.metrics?.encryptedPackets.increment();
      await this.transport.sendFrame(ciphertext);
    } catch (e) {
      this.failure = toError(e);
      throw this.failure;
    }
  }
}

/**
 * Decrypts Noise transport messages and serves them as a byte stream.
 * A failed frame (transport or authentication) ends the reader for good.
 */
export class EncryptedReader {
  private readonly lock = new Mutex();
  private readonly buffer = new ByteQueue();
  private readonly transport: FrameTransport;
  private readonly cipher: ReceiveCipher;
  private readonly metrics?: MetricsRegistry;
  private failure: Error | null = null;

  constructor(transport: FrameTransport, cipher: ReceiveCipher, options: EncryptedReaderOptions = {}) {
    this.transport = transport;
    this.cipher = cipher;
    this.metrics = options.metrics;

    if (options.initial) {
      this.buffer.append(options.initial);
    }
  }

  public get buffered(): number {
    return this.buffer.length;
  }

  /**
   * Returns between 1 and `maxLength` bytes, waiting for a record only when
   * nothing is buffered.
   */
  public read(maxLength = Infinity): Promise<Uint8Array> {
    if (!(maxLength >= 1)) {
      return Promise.reject(new RangeError('maxLength must be at least 1'));
    }

    return this.lock.runExclusive(async () => {
      while (this.buffer.length === 0) {
        this.buffer.append(await this.receive());
      }

      return this.buffer.take(maxLength);
    });
  }

  public readExactly(length: number): Promise<Uint8Array> {
    return this.lock.runExclusive(async () => {
      while (this.buffer.length < length) {
        this.buffer.append(await this.receive());
      }

      return this.buffer.take(length);
    });
  }

  /**
   * Returns the plaintext of exactly one record.
   */
  public readRecord(): Promise<Uint8Array> {
    return this.lock.runExclusive(async () => {
      if (this.buffer.length > 0) {
        throw new InvalidStateError('cannot read a record while stream bytes are buffered');
      }

      return this.receive();
    });
  }

  private async receive(): Promise<Uint8Array> {
    if (this.failure) {
      throw this.failure;
    }

    try {
      const frame = await this.transport.receiveFrame();
      const plaintext = this.cipher.decrypt(frame);
      this.metrics?.decryptedPackets.increment();
      return plaintext;
    } catch (e) {
      if (e instanceof DecryptionError) {
        this.metrics?.decryptErrors.increment();
      }
      this.failure = toError(e);
      throw this.failure;
    }
  }
}
