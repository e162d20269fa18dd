import type { HandshakeEngine } from '../@types/handshake-interface';
import type { FrameTransport } from '../@types/transport';
import type { CipherPair } from '../crypto/cipher-state';
import type { MetricsRegistry } from '../metrics';
import type { RequestHeader, ResponseHeader } from './envelope';
import type { BodyDecoder, BodyParser, PayloadSerializer } from './serializer';
import { EncryptedReader, EncryptedWriter } from '../crypto/streaming';
import { InvalidStateError } from '../errors';
import { runHandshake } from '../handshake-driver';
import { logger } from '../logger';
import { parseRequestHeader, parseResponseHeader } from './envelope';
import { cborSerializer, jsonSerializer } from './formats';

export interface CodecOptions {
  /**
   * Called once by `close()`. Usually closes the underlying connection.
   */
  closer?: () => void | Promise<void>
  metrics?: MetricsRegistry
}

/**
 * One envelope per encrypted record, in both directions. Reading an envelope
 * decodes only its header; the body stays pending until `readBody`.
 */
abstract class EnvelopeCodec<Outbound, Inbound> {
  private readonly reader: EncryptedReader;
  private readonly writer: EncryptedWriter;
  private readonly closer?: () => void | Promise<void>;
  private pendingBody: BodyDecoder | null = null;
  private closed = false;

  constructor(
    transport: FrameTransport,
    ciphers: CipherPair,
    private readonly serializer: PayloadSerializer,
    private readonly parseHeader: (value: unknown) => Inbound,
    options: CodecOptions
  ) {
    this.reader = new EncryptedReader(transport, ciphers.receive, { metrics: options.metrics });
    this.writer = new EncryptedWriter(transport, ciphers.send, { metrics: options.metrics });
    this.closer = options.closer;
  }

  public get format(): string {
    return this.serializer.name;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.pendingBody = null;

    if (this.closer) {
      await this.closer();
    }
  }

  protected async writeEnvelope(header: Outbound, body: unknown): Promise<void> {
    const envelope = this.serializer.encode(header, body);
    await this.writer.writeRecord(envelope);
  }

  protected async readHeader(): Promise<Inbound> {
    this.pendingBody = null;

    const record = await this.reader.readRecord();
    const { header, body } = this.serializer.decodeHeader(record);
    const parsed = this.parseHeader(header);
    this.pendingBody = body;

    return parsed;
  }

  protected readBody<T>(parse: BodyParser<T>): T {
    const body = this.pendingBody;
    if (!body) {
      throw new InvalidStateError('no envelope body pending');
    }
    this.pendingBody = null;

    return body.decode(parse);
  }
}

export class ClientCodec extends EnvelopeCodec<RequestHeader, ResponseHeader> {
  constructor(transport: FrameTransport, ciphers: CipherPair, serializer: PayloadSerializer, options: CodecOptions = {}) {
    super(transport, ciphers, serializer, parseResponseHeader, options);
  }

  public writeRequest(header: RequestHeader, args: unknown): Promise<void> {
    return this.writeEnvelope(header, args);
  }

  public readResponseHeader(): Promise<ResponseHeader> {
    return this.readHeader();
  }

  /**
   * Decodes the body of the response whose header was read last.
   */
  public readResponseBody<T>(parse: BodyParser<T>): T {
    return this.readBody(parse);
  }
}

export class ServerCodec extends EnvelopeCodec<ResponseHeader, RequestHeader> {
  constructor(transport: FrameTransport, ciphers: CipherPair, serializer: PayloadSerializer, options: CodecOptions = {}) {
    super(transport, ciphers, serializer, parseRequestHeader, options);
  }

  public readRequestHeader(): Promise<RequestHeader> {
    return this.readHeader();
  }

  public readRequestBody<T>(parse: BodyParser<T>): T {
    return this.readBody(parse);
  }

  public writeResponse(header: ResponseHeader, reply: unknown): Promise<void> {
    return this.writeEnvelope(header, reply);
  }
}

async function establish(transport: FrameTransport, engine: HandshakeEngine, metrics?: MetricsRegistry): Promise<CipherPair> {
  try {
    const ciphers = await runHandshake(transport, engine);
    metrics?.handshakeSuccesses.increment();
    return ciphers;
  } catch (e) {
    logger('%s codec handshake failed: %s', engine.role, e instanceof Error ? e.message : e);
    metrics?.handshakeErrors.increment();
    throw e;
  }
}

/**
 * Completes the handshake over `transport`, without payloads, and returns a
 * codec for the calling side.
 */
export async function createClientCodec(
  transport: FrameTransport,
  engine: HandshakeEngine,
  serializer: PayloadSerializer,
  options: CodecOptions = {}
): Promise<ClientCodec> {
  const ciphers = await establish(transport, engine, options.metrics);
  return new ClientCodec(transport, ciphers, serializer, options);
}

export async function createServerCodec(
  transport: FrameTransport,
  engine: HandshakeEngine,
  serializer: PayloadSerializer,
  options: CodecOptions = {}
): Promise<ServerCodec> {
  const ciphers = await establish(transport, engine, options.metrics);
  return new ServerCodec(transport, ciphers, serializer, options);
}

export function createCborClientCodec(transport: FrameTransport, engine: HandshakeEngine, options?: CodecOptions): Promise<ClientCodec> {
  return createClientCodec(transport, engine, cborSerializer, options);
}

export function createCborServerCodec(transport: FrameTransport, engine: HandshakeEngine, options?: CodecOptions): Promise<ServerCodec> {
  return createServerCodec(transport, engine, cborSerializer, options);
}

export function createJsonClientCodec(transport: FrameTransport, engine: HandshakeEngine, options?: CodecOptions): Promise<ClientCodec> {
  return createClientCodec(transport, engine, jsonSerializer, options);
}

export function createJsonServerCodec(transport: FrameTransport, engine: HandshakeEngine, options?: CodecOptions): Promise<ServerCodec> {
  return createServerCodec(transport, engine, jsonSerializer, options);
}
