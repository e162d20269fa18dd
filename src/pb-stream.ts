import * as streams from 'stream';
import type { FrameTransport } from './@types/transport';
import { ByteQueue } from './byte-queue';
import { uint16BEEncode, uint16BEDecode } from './encoder';
import { NOISE_MSG_MAX_LENGTH_BYTES } from './constants';
import { FrameTooLargeError, TransportError } from './errors';
import { logger } from './logger';

const LENGTH_PREFIX_BYTES = 2;

interface PendingReader {
  resolve: (d: Uint8Array) => void;
  reject: (err: Error) => void;
}

class RingBuffer {
  private buffers: Uint8Array[] = [];
  private pendingReaders: PendingReader[] = [];
  private error: Error | null = null;

  public push(data: Uint8Array) {
    const pendingReader = this.pendingReaders.shift();
    if (pendingReader) {
      pendingReader.resolve(data);
    } else {
      this.buffers.push(data);
    }
  }

  public poll(): Promise<Uint8Array> {
    return new Promise<Uint8Array>((resolve, reject) => {
      const buffered = this.buffers.shift();
      if (buffered) {
        resolve(buffered);
      } else if (this.error) {
        reject(this.error);
      } else {
        this.pendingReaders.push({
          resolve, reject
        });
      }
    });
  }

  public close(err: Error) {
    if (!this.error) {
      this.error = err;
    }
    let item: PendingReader | undefined;
    while ((item = this.pendingReaders.shift())) {
      item.reject(this.error);
    }
  }
}

export interface PbStream extends FrameTransport {
  writeLP(input: Uint8Array): void;
  readLP(): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface PbStreamOptions extends streams.DuplexOptions {
  maxLength?: number;
}

/**
 * Length-prefixed framing over a Node.js duplex. Bytes written into this
 * stream are parsed into frames for `receiveFrame`; frames sent with
 * `sendFrame` come out of its readable side.
 */
export class PbStreamImpl extends streams.Duplex implements PbStream {
  private readonly ringBuffer = new RingBuffer();
  private readonly receiveBuffer = new ByteQueue();
  private readonly maxLength: number;

  constructor(options?: PbStreamOptions) {
    const { maxLength, ...duplexOptions } = options ?? {};
    super({
      autoDestroy: true,
      ...duplexOptions
    });

    this.maxLength = Math.min(maxLength || NOISE_MSG_MAX_LENGTH_BYTES, NOISE_MSG_MAX_LENGTH_BYTES);

    this.once('finish', () => {
      this.ringBuffer.close(new TransportError('connection closed', { closed: true }));
    });
    this.once('close', () => {
      this.ringBuffer.close(new TransportError('connection closed', { closed: true }));
    });
    this.on('error', (err: Error) => {
      logger('frame stream error: %s', err.message);
      this.ringBuffer.close(err instanceof TransportError ? err : new TransportError(err.message, { cause: err }));
    });
  }

  writeLP(input: Uint8Array): void {
    if (this.destroyed || this.readableEnded) {
      throw new TransportError('connection closed', { closed: true });
    }
    if (input.length > this.maxLength) {
      throw new FrameTooLargeError(input.length, this.maxLength);
    }

    this.push(uint16BEEncode(input.length));
    this.push(input);
  }

  readLP(): Promise<Uint8Array> {
    return this.ringBuffer.poll();
  }

  async sendFrame(frame: Uint8Array): Promise<void> {
    this.writeLP(frame);
  }

  receiveFrame(): Promise<Uint8Array> {
    return this.readLP();
  }

  /**
   * Ends the outbound side. The peer sees its pending and future reads fail as closed.
   */
  async close(): Promise<void> {
    if (!this.readableEnded && !this.destroyed) {
      this.push(null);
    }
  }

  _read(_size: number) {
    // frames are pushed as soon as they are sent
  }

  _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: (Error | null)) => void) {
    if (!(chunk instanceof Uint8Array)) {
      callback(new TransportError('expected binary chunk'));
      return;
    }

    this.receiveBuffer.append(chunk);

    while (this.receiveBuffer.length >= LENGTH_PREFIX_BYTES) {
      const length = uint16BEDecode(this.receiveBuffer.slice(0, LENGTH_PREFIX_BYTES));
      if (length > this.maxLength) {
        callback(new FrameTooLargeError(length, this.maxLength));
        return;
      }
      if (this.receiveBuffer.length < LENGTH_PREFIX_BYTES + length) {
        break;
      }

      const data = this.receiveBuffer.slice(LENGTH_PREFIX_BYTES, LENGTH_PREFIX_BYTES + length);
      this.receiveBuffer.consume(LENGTH_PREFIX_BYTES + length);
      this.ringBuffer.push(data);
    }

    callback();
  }
}

export function createPbStream(options?: PbStreamOptions): PbStreamImpl {
  return new PbStreamImpl(options);
}
