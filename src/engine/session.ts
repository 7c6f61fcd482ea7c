import type { Readable, Writable } from "node:stream";
import { StringDecoder } from "node:string_decoder";
import { EndOfStreamError } from "../core/errors.js";
import { logger } from "../logger.js";

/** Largest chunk a single read() hands back. */
export const READ_CHUNK_SIZE = 4096;

export type SessionKind = "logs" | "stats" | "exec";

function toBuffer(value: unknown): Buffer {
  if (Buffer.isBuffer(value)) return value;
  if (value instanceof Uint8Array) return Buffer.from(value);
  return Buffer.from(String(value));
}

/**
 * A pull-based reader over a daemon stream. Each read() resolves one chunk
 * (at most READ_CHUNK_SIZE bytes, decoded as UTF-8) and rejects with
 * EndOfStreamError once the stream is exhausted or the session is closed.
 */
export class StreamSession {
  private readonly iterator: AsyncIterator<unknown>;
  private readonly decoder = new StringDecoder("utf8");
  private pending: Buffer | null = null;
  private closed = false;

  constructor(
    readonly kind: SessionKind,
    private readonly stream: Readable,
    private readonly closer: () => void = () => {},
  ) {
    this.iterator = stream[Symbol.asyncIterator]();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async read(): Promise<string> {
    if (this.closed) throw new EndOfStreamError();

    let chunk = this.pending;
    this.pending = null;
    while (!chunk || chunk.length === 0) {
      let next: IteratorResult<unknown>;
      try {
        next = await this.iterator.next();
      } catch (err: unknown) {
        if (this.closed) throw new EndOfStreamError();
        throw err;
      }
      if (next.done) {
        const tail = this.decoder.end();
        if (tail) return tail;
        throw new EndOfStreamError();
      }
      chunk = toBuffer(next.value);
    }

    if (chunk.length > READ_CHUNK_SIZE) {
      this.pending = chunk.subarray(READ_CHUNK_SIZE);
      chunk = chunk.subarray(0, READ_CHUNK_SIZE);
    }
    return this.decoder.write(chunk);
  }

  /** Runs the closer and destroys the stream. Only the first call has an effect. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    try {
      this.closer();
    } catch (err: unknown) {
      logger.warn(`[engine] Closing ${this.kind} session failed: ${err}`);
    }
    this.stream.destroy();
  }
}

/** A session with a writable side: stdin of an interactive shell. */
export class ExecSession extends StreamSession {
  constructor(
    stream: Readable,
    private readonly writer: Writable,
    closer: () => void = () => {},
  ) {
    super("exec", stream, closer);
  }

  write(text: string): Promise<void> {
    if (this.isClosed) return Promise.reject(new EndOfStreamError());
    return new Promise<void>((resolve, reject) => {
      this.writer.write(text, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }
}
