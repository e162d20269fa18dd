import * as streams from 'stream';
import duplexify from 'duplexify';
import type { SecureChannel } from './secure-channel';
import { TransportError, toError } from './errors';

/**
 * Node.js stream view of a secure channel. The readable side ends when the
 * peer closes its side of the transport.
 */
export function createSecureDuplex(channel: SecureChannel): duplexify.Duplexify {
  const userOutbound = new streams.Writable({
    autoDestroy: true,
    write(chunk: unknown, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
      if (!(chunk instanceof Uint8Array)) {
        callback(new TypeError('expected binary chunk'));
        return;
      }

      channel.write(chunk).then(() => callback(), (err: unknown) => callback(toError(err)));
    }
  });

  const userInbound = new streams.Readable({
    autoDestroy: true,
    read() {
      channel.read().then((data) => {
        this.push(data);
      }, (err: unknown) => {
        if (err instanceof TransportError && err.closed) {
          this.push(null);
        } else {
          this.destroy(toError(err));
        }
      });
    }
  });

  return new duplexify(userOutbound, userInbound);
}
