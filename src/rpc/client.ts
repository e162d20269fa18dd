import type { ClientCodec } from './codec';
import type { ResponseHeader } from './envelope';
import type { BodyParser } from './serializer';
import { InvalidStateError, RemoteCallError, toError } from '../errors';
import { logger } from '../logger';

interface PendingCall {
  serviceMethod: string
  settle: (header: ResponseHeader) => void
  reject: (err: Error) => void
}

/**
 * Issues calls over a client codec. Replies are matched to calls by sequence
 * number, so any number of calls may be outstanding at once.
 */
export class RpcClient {
  /**
   * Settles once the codec stops yielding responses. Never rejects.
   */
  public readonly done: Promise<void>;

  private readonly codec: ClientCodec;
  private readonly pending = new Map<number, PendingCall>();
  private seq = 0;
  private failure: Error | null = null;
  private closing = false;

  constructor(codec: ClientCodec) {
    this.codec = codec;
    this.done = this.receiveLoop();
  }

  public get outstanding(): number {
    return this.pending.size;
  }

  public call<T>(serviceMethod: string, args: unknown, parseReply: BodyParser<T>): Promise<T> {
    if (this.closing) {
      return Promise.reject(new InvalidStateError('client closed'));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    const seq = this.seq++;

    return new Promise<T>((resolve, reject) => {
      this.pending.set(seq, {
        serviceMethod,
        settle: (header) => {
          if (header.error !== '') {
            reject(new RemoteCallError(serviceMethod, header.error));
            return;
          }
          try {
            resolve(this.codec.readResponseBody(parseReply));
          } catch (e) {
            reject(toError(e));
          }
        },
        reject
      });

      this.codec.writeRequest({ serviceMethod, seq }, args).catch((err: unknown) => {
        if (this.pending.delete(seq)) {
          reject(toError(err));
        }
      });
    });
  }

  public async close(): Promise<void> {
    this.closing = true;
    await this.codec.close();
  }

  private async receiveLoop(): Promise<void> {
    while (true) {
      let header: ResponseHeader;
      try {
        header = await this.codec.readResponseHeader();
      } catch (e) {
        this.terminate(toError(e));
        return;
      }

      const call = this.pending.get(header.seq);
      if (!call) {
        logger('dropping response %d for %s: no such call', header.seq, header.serviceMethod);
        continue;
      }

      this.pending.delete(header.seq);
      call.settle(header);
    }
  }

  private terminate(err: Error): void {
    logger('rpc client stopped: %s', err.message);
    this.failure = err;

    for (const call of this.pending.values()) {
      call.reject(err);
    }
    this.pending.clear();
  }
}
