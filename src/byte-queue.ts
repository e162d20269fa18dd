import type { bytes } from './@types/basic';

const EMPTY_BUFFER = new Uint8Array(0);

/**
 * Growable FIFO of bytes. Appended chunks are kept as-is and only copied when
 * a read crosses a chunk boundary.
 */
export class ByteQueue {
  private chunks: Uint8Array[] = [];
  private size = 0;

  public get length(): number {
    return this.size;
  }

  public append(data: Uint8Array): void {
    if (data.length === 0) {
      return;
    }
    this.chunks.push(data);
    this.size += data.length;
  }

  /**
   * Copies `[start, end)` without consuming it.
   */
  public slice(start = 0, end = this.size): bytes {
    const from = Math.max(0, start);
    const to = Math.min(this.size, end);
    if (to <= from) {
      return EMPTY_BUFFER;
    }

    const output = new Uint8Array(to - from);
    let chunkStart = 0;
    let written = 0;
    for (const chunk of this.chunks) {
      const chunkEnd = chunkStart + chunk.length;
      if (chunkEnd > from && chunkStart < to) {
        const part = chunk.subarray(Math.max(from - chunkStart, 0), Math.min(to - chunkStart, chunk.length));
        output.set(part, written);
        written += part.length;
      }
      if (chunkEnd >= to) {
        break;
      }
      chunkStart = chunkEnd;
    }
    return output;
  }

  public consume(count: number): void {
    let remaining = Math.min(count, this.size);
    this.size -= remaining;

    while (remaining > 0) {
      const head = this.chunks[0];
      if (head.length <= remaining) {
        this.chunks.shift();
        remaining -= head.length;
      } else {
        this.chunks[0] = head.subarray(remaining);
        remaining = 0;
      }
    }
  }

  /**
   * Removes and returns up to `count` bytes from the front.
   */
  public take(count: number): bytes {
    if (this.chunks.length > 0 && this.chunks[0].length === Math.min(count, this.size)) {
      const head = this.chunks[0];
      this.consume(head.length);
      return head;
    }

    const data = this.slice(0, count);
    this.consume(data.length);
    return data;
  }

  public drain(): bytes {
    return this.take(this.size);
  }

  public clear(): void {
    this.chunks = [];
    this.size = 0;
  }
}
