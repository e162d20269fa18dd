import * as streams from 'stream';
import { Role } from './@types/handshake-interface';
import { InvalidCryptoExchangeError } from './errors';
import { connectedStreams, createFakeMetrics, text } from './fixtures/connection';
import { stablelib } from './crypto/stablelib';
import { PATTERNS } from './handshakes/pattern';
import { Noise, resolveProtocol } from './noise';
import { fromString, toHex } from './utils';

class EchoStream extends streams.Duplex {
  constructor() {
    super({
      autoDestroy: true
    });
  }

  _read() {
  }

  _write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: (Error | null)) => void) {
    setTimeout(() => {
      this.push(chunk);
      callback();
    }, 10);
  }
}

function collect(stream: streams.Readable, length: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;
    const timer = setTimeout(() => {
      stream.off('data', onData);
      reject(new Error('timeout'));
    }, 5000);
    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      received += chunk.length;
      if (received >= length) {
        clearTimeout(timer);
        stream.off('data', onData);
        resolve(Buffer.concat(chunks));
      }
    };
    stream.on('data', onData);
  });
}

async function setupConnection() {
  const noiseA = new Noise();
  const noiseB = new Noise();
  const [streamA, streamB] = connectedStreams();

  const [connA, connB] = await Promise.all([
    noiseA.secureConnection({
      connection: streamA,
      role: Role.RESPONDER,
      remoteStaticPublicKey: noiseB.getPublicKey()
    }),
    noiseB.secureConnection({
      connection: streamB,
      role: Role.INITIATOR,
      remoteStaticPublicKey: noiseA.getPublicKey()
    })
  ]);

  connA.conn.pipe(new EchoStream()).pipe(connA.conn);

  return { noiseA, noiseB, connA, connB };
}

describe('Noise', () => {
  it.each([
    ['Noise_XX_25519_AESGCM_SHA256', 'not supported cipher: AESGCM'],
    ['Noise_XX_448_ChaChaPoly_SHA256', 'not supported dh: 448'],
    ['Noise_XX_25519_ChaChaPoly_BLAKE2s', 'not supported hash: BLAKE2s'],
    ['Noise_IK_25519_ChaChaPoly_SHA256', 'not supported pattern: IK'],
    ['Snow_XX_25519_ChaChaPoly_SHA256', 'invalid protocol name: Snow_XX_25519_ChaChaPoly_SHA256'],
    ['Noise_XX', 'invalid protocol name: Noise_XX']
  ])('rejects %s', (protocol, message) => {
    expect(() => new Noise({ protocol })).toThrow(message);
  });

  it('checks primitive names against the crypto in use', () => {
    const renamed = { ...stablelib, hash: { ...stablelib.hash, name: 'BLAKE2s' } };

    expect(resolveProtocol('Noise_NN_25519_ChaChaPoly_BLAKE2s', renamed)).toBe(PATTERNS.NN);
    expect(() => resolveProtocol('Noise_NN_25519_ChaChaPoly_SHA256', renamed)).toThrow('not supported hash: SHA256');
  });

  it('defaults to XX', () => {
    expect(new Noise().protocol).toEqual('Noise_XX_25519_ChaChaPoly_SHA256');
  });

  it('derives the static key from a seed', () => {
    const seed = new Uint8Array(32).fill(3);
    const a = new Noise({ staticNoiseKey: seed });
    const b = new Noise({ staticNoiseKey: seed });

    expect(toHex(a.getPublicKey())).toEqual(toHex(b.getPublicKey()));
    expect(toHex(a.getPublicKey())).not.toEqual(toHex(new Noise().getPublicKey()));
  });

  it('rejects a malformed remote static key', () => {
    const noise = new Noise();

    expect(() => noise.createHandshake({ role: Role.INITIATOR, remoteStaticPublicKey: new Uint8Array(31) }))
      .toThrow(new InvalidCryptoExchangeError('invalid remote static public key'));
  });

  it('carries the handshake payload and reports the remote key', async () => {
    const metricsA = createFakeMetrics();
    const metricsB = createFakeMetrics();
    const noiseA = new Noise({ protocol: 'Noise_XK_25519_ChaChaPoly_SHA256', metrics: metricsA });
    const noiseB = new Noise({ protocol: 'Noise_XK_25519_ChaChaPoly_SHA256', metrics: metricsB });
    const [streamA, streamB] = connectedStreams();

    const [initiator, responder] = await Promise.all([
      noiseA.secureConnection({
        connection: streamA,
        role: Role.INITIATOR,
        remoteStaticPublicKey: noiseB.getPublicKey(),
        payload: fromString('hello')
      }),
      noiseB.secureConnection({ connection: streamB, role: Role.RESPONDER })
    ]);

    expect(text(await responder.channel.read())).toEqual('hello');
    expect(toHex(responder.remotePublicKey ?? new Uint8Array(0))).toEqual(toHex(noiseA.getPublicKey()));
    expect(toHex(initiator.remotePublicKey ?? new Uint8Array(0))).toEqual(toHex(noiseB.getPublicKey()));

    await initiator.channel.write(fromString('again'));
    expect(text(await responder.channel.read())).toEqual('again');

    expect(metricsA.count('noise_channel_handshake_successes_total')).toEqual(1);
    expect(metricsB.count('noise_channel_handshake_successes_total')).toEqual(1);
    expect(metricsA.count('noise_channel_encrypted_packets_total')).toEqual(1);
    expect(metricsB.count('noise_channel_decrypted_packets_total')).toEqual(1);
  });

  it('echoes 4kb through the duplex view', async () => {
    const { connB } = await setupConnection();
    const payload = Buffer.from('A'.repeat(4096));

    const received = collect(connB.conn, payload.length);
    connB.conn.write(payload);

    expect((await received).toString('hex')).toEqual(payload.toString('hex'));
  });

  it('echoes 128kb through the duplex view', async () => {
    const { connB } = await setupConnection();
    const payload = Buffer.alloc(128 * 1024);
    for (let i = 0; i < payload.length; i++) {
      payload[i] = i % 256;
    }

    const received = collect(connB.conn, payload.length);
    connB.conn.write(payload);

    expect((await received).toString('hex')).toEqual(payload.toString('hex'));
  });
});
