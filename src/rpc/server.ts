import type { ServerCodec } from './codec';
import type { RequestHeader } from './envelope';
import type { BodyParser } from './serializer';
import { TransportError, toError } from '../errors';
import { logger } from '../logger';

export interface RpcMethod<A, R> {
  parseArgs: BodyParser<A>
  handler: (args: A) => R | Promise<R>
}

// decodes the pending body now and returns the deferred invocation
type PreparedCall = (codec: ServerCodec) => () => Promise<unknown>;

export class RpcServer {
  private readonly methods = new Map<string, PreparedCall>();

  public register<A, R>(serviceMethod: string, method: RpcMethod<A, R>): this {
    if (this.methods.has(serviceMethod)) {
      throw new Error(`rpc: method already defined: ${serviceMethod}`);
    }

    this.methods.set(serviceMethod, (codec) => {
      const args = codec.readRequestBody(method.parseArgs);
      return async () => method.handler(args);
    });
    return this;
  }

  /**
   * Serves requests from `codec` until the peer closes the connection. Calls
   * run concurrently; responses are written as they finish.
   */
  public async serveCodec(codec: ServerCodec): Promise<void> {
    const inflight = new Set<Promise<void>>();

    try {
      while (true) {
        let header: RequestHeader;
        try {
          header = await codec.readRequestHeader();
        } catch (e) {
          if (e instanceof TransportError && e.closed) {
            return;
          }
          throw e;
        }

        // the request body is decoded synchronously, before the next header is read
        const task = this.dispatch(codec, header);
        inflight.add(task);
        void task.then(() => inflight.delete(task));
      }
    } finally {
      await Promise.all(inflight);
    }
  }

  private async dispatch(codec: ServerCodec, header: RequestHeader): Promise<void> {
    const prepare = this.methods.get(header.serviceMethod);
    if (!prepare) {
      await this.reply(codec, header, `rpc: can't find method ${header.serviceMethod}`, null);
      return;
    }

    let invoke: () => Promise<unknown>;
    try {
      invoke = prepare(codec);
    } catch (e) {
      await this.reply(codec, header, `rpc: ${toError(e).message}`, null);
      return;
    }

    let result: unknown;
    try {
      result = await invoke();
    } catch (e) {
      await this.reply(codec, header, toError(e).message || 'rpc: call failed', null);
      return;
    }

    await this.reply(codec, header, '', result);
  }

  private async reply(codec: ServerCodec, request: RequestHeader, error: string, body: unknown): Promise<void> {
    try {
      await codec.writeResponse({ serviceMethod: request.serviceMethod, seq: request.seq, error }, body);
    } catch (e) {
      logger('rpc: writing response %d for %s: %s', request.seq, request.serviceMethod, toError(e).message);
    }
  }
}
