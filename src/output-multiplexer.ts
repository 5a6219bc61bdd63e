import type { Readable } from "stream";

import type { OutputStream } from "./protocol";

export const DEFAULT_MAX_CHUNK_BYTES = 64 * 1024;

export type OutputChunk = {
  stream: OutputStream;
  data: Buffer;
};

/** transport side of the multiplexer */
export interface OutputTarget {
  /** send one chunk; `false` means the transport buffer is full */
  writeOutput(chunk: OutputChunk): boolean;
  /** resolves once the transport accepts more data, or is gone */
  waitWritable(): Promise<void>;
}

export type OutputMultiplexerOptions = {
  /** bytes queued before the sources are paused */
  maxBufferedBytes: number;
  /** largest chunk forwarded in one frame in `bytes` */
  maxChunkBytes?: number;
  /** replace every occurrence of `from` with `to`, also across chunk boundaries */
  replace?: { from: string; to: string };
};

/** length of the longest suffix of `data` that is a proper prefix of `pattern` */
function partialMatchLength(data: Buffer, pattern: Buffer): number {
  for (let length = Math.min(data.length, pattern.length - 1); length > 0; length--) {
    if (data.subarray(data.length - length).equals(pattern.subarray(0, length))) {
      return length;
    }
  }
  return 0;
}

/**
 * Bounded channel between a command's output pipes and the transport.
 *
 * Chunks leave in the order they were read, so each stream keeps its own
 * order. When more than `maxBufferedBytes` are queued the sources are paused
 * and resumed once the queue drains below half of it.
 */
export class OutputMultiplexer {
  readonly done: Promise<void>;

  private readonly queue: OutputChunk[] = [];
  private readonly paused = new Set<Readable>();
  private readonly maxBufferedBytes: number;
  private readonly maxChunkBytes: number;
  private queuedBytes = 0;
  private openSources = 0;
  private pumping = false;
  private closed = false;
  private resolveDone: () => void = () => {};
  private forwardedBytes = 0;
  private readonly replaceFrom: Buffer | null;
  private readonly replaceTo: Buffer;
  /** per stream tail that may start an occurrence of `replace.from` */
  private readonly held = new Map<OutputStream, Buffer>();

  constructor(
    private readonly target: OutputTarget,
    options: OutputMultiplexerOptions,
  ) {
    this.maxBufferedBytes = options.maxBufferedBytes;
    this.maxChunkBytes = options.maxChunkBytes ?? DEFAULT_MAX_CHUNK_BYTES;
    this.replaceFrom = options.replace?.from ? Buffer.from(options.replace.from) : null;
    this.replaceTo = Buffer.from(options.replace?.to ?? "");
    this.done = new Promise((resolve) => {
      this.resolveDone = resolve;
    });
  }

  /** bytes read from the sources but not yet handed to the transport */
  get bufferedBytes() {
    return this.queuedBytes;
  }

  /** bytes handed to the transport */
  get totalForwardedBytes() {
    return this.forwardedBytes;
  }

  isPaused(source: Readable) {
    return this.paused.has(source);
  }

  attach(source: Readable, stream: OutputStream) {
    this.openSources += 1;

    let finished = false;
    const finish = () => {
      if (finished) return;
      finished = true;
      const tail = this.held.get(stream);
      this.held.delete(stream);
      if (tail) this.enqueueChunks(source, stream, tail);
      this.openSources -= 1;
      this.maybeFinish();
    };

    source.on("data", (data: Buffer | string) => {
      this.enqueue(source, stream, Buffer.isBuffer(data) ? data : Buffer.from(data));
    });
    source.once("end", finish);
    source.once("close", finish);
    source.once("error", finish);
  }

  /** stop forwarding and discard queued output */
  close() {
    if (this.closed) return;
    this.closed = true;
    this.queue.length = 0;
    this.queuedBytes = 0;
    this.held.clear();
    // keep draining the pipes so the process never blocks on a full pipe
    for (const source of this.paused) source.resume();
    this.paused.clear();
    this.resolveDone();
  }

  private enqueue(source: Readable, stream: OutputStream, data: Buffer) {
    if (this.closed) return;
    this.enqueueChunks(source, stream, this.replaceIn(stream, data));
  }

  /** apply `replace`, holding back a tail that may continue in the next chunk */
  private replaceIn(stream: OutputStream, data: Buffer): Buffer {
    const from = this.replaceFrom;
    if (!from) return data;

    const previous = this.held.get(stream);
    const input = previous ? Buffer.concat([previous, data]) : data;
    const parts: Buffer[] = [];
    let start = 0;
    let found = input.indexOf(from, start);
    while (found !== -1) {
      parts.push(input.subarray(start, found), this.replaceTo);
      start = found + from.length;
      found = input.indexOf(from, start);
    }
    const keep = partialMatchLength(input.subarray(start), from);
    parts.push(input.subarray(start, input.length - keep));
    if (keep > 0) this.held.set(stream, Buffer.from(input.subarray(input.length - keep)));
    else this.held.delete(stream);
    return Buffer.concat(parts);
  }

  private enqueueChunks(source: Readable, stream: OutputStream, data: Buffer) {
    if (this.closed || data.length === 0) return;

    for (let offset = 0; offset < data.length; offset += this.maxChunkBytes) {
      this.queue.push({ stream, data: data.subarray(offset, offset + this.maxChunkBytes) });
    }
    this.queuedBytes += data.length;

    if (this.queuedBytes >= this.maxBufferedBytes && !this.paused.has(source)) {
      source.pause();
      this.paused.add(source);
    }
    this.pump();
  }

  private pump() {
    if (this.pumping) return;
    this.pumping = true;
    void this.run();
  }

  private async run() {
    let chunk = this.queue.shift();
    while (chunk && !this.closed) {
      this.queuedBytes -= chunk.data.length;
      this.resumeBelowLowWater();

      let writable: boolean;
      try {
        writable = this.target.writeOutput(chunk);
      } catch {
        this.close();
        break;
      }
      this.forwardedBytes += chunk.data.length;
      if (!writable) {
        await this.target.waitWritable();
      }
      chunk = this.queue.shift();
    }
    this.pumping = false;
    this.maybeFinish();
  }

  private resumeBelowLowWater() {
    if (this.paused.size === 0) return;
    if (this.queuedBytes > this.maxBufferedBytes / 2) return;
    for (const source of this.paused) source.resume();
    this.paused.clear();
  }

  private maybeFinish() {
    if (this.openSources === 0 && this.queue.length === 0 && !this.pumping) {
      this.resolveDone();
    }
  }
}
