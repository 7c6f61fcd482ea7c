import { PassThrough, Readable } from "node:stream";

const HEADER_LEN = 8;
const MAX_FRAME_LEN = 64 * 1024 * 1024;

/**
 * Demultiplex a Docker framed stream (non-TTY logs, exec attach) into one
 * ordered stream carrying both stdout and stderr payloads.
 *
 * Frame header: byte 0 is the stream type (0 stdin, 1 stdout, 2 stderr),
 * bytes 1-3 are zero and bytes 4-7 are the big-endian payload length. A
 * header that does not look like that means the stream is raw (TTY) and the
 * rest is passed through untouched.
 */
export function demuxDockerStream(source: NodeJS.ReadableStream): PassThrough {
  const out = new PassThrough();
  let buffer: Buffer | null = null;
  let passthrough = false;
  let ended = false;

  const onData = (chunk: Buffer) => {
    if (passthrough) {
      out.write(chunk);
      return;
    }
    buffer = buffer ? Buffer.concat([buffer, chunk]) : chunk;
    while (buffer && buffer.length >= HEADER_LEN) {
      const type = buffer[0];
      const len = buffer.readUInt32BE(4);
      const sane = type <= 2 && (buffer[1] | buffer[2] | buffer[3]) === 0 && len <= MAX_FRAME_LEN;
      if (!sane) {
        out.write(buffer);
        buffer = null;
        passthrough = true;
        return;
      }
      if (buffer.length < HEADER_LEN + len) return;
      // stdin frames carry nothing for us
      if (type !== 0) out.write(buffer.subarray(HEADER_LEN, HEADER_LEN + len));
      buffer = buffer.subarray(HEADER_LEN + len);
    }
  };

  const finish = () => {
    if (ended) return;
    ended = true;
    if (buffer && buffer.length) out.write(buffer);
    buffer = null;
    out.end();
  };

  source.on("data", (c: Buffer | string) => onData(Buffer.isBuffer(c) ? c : Buffer.from(c)));
  source.on("end", finish);
  source.on("close", finish);
  source.on("error", (err: Error) => out.destroy(err));

  // Tearing down the reader tears down the daemon connection.
  out.on("close", () => destroyStream(source));

  return out;
}

export function destroyStream(stream: NodeJS.ReadableStream): void {
  if (stream instanceof Readable && !stream.destroyed) stream.destroy();
}

export function toReadable(stream: NodeJS.ReadableStream): Readable {
  return stream instanceof Readable ? stream : Readable.from(stream);
}
