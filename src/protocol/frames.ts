/**
 * Length-delimited JSON framing: a 4-byte big-endian body length, then the
 * UTF-8 JSON body.
 */
export const FRAME_HEADER_BYTES = 4;

export const DEFAULT_MAX_FRAME_BYTES = 8 * 1024 * 1024;

export function encodeFrame(obj: unknown): Buffer {
  const body = Buffer.from(JSON.stringify(obj), 'utf8');
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUInt32BE(body.length, 0);
  return Buffer.concat([header, body]);
}

export type FrameCallback = (parsed: unknown) => void;
export type FrameErrorCallback = (error: string) => void;

export interface FrameDecoder {
  write(chunk: Buffer): void;
  /** Bytes held while waiting for the rest of a frame. */
  buffered(): number;
}

/**
 * Once a decode error is reported the decoder drops its buffer and ignores
 * every later chunk: the stream position is lost and the caller is expected
 * to close the connection.
 */
export function createFrameDecoder(
  onFrame: FrameCallback,
  onError: FrameErrorCallback,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES
): FrameDecoder {
  let buffer: Buffer = Buffer.alloc(0);
  let failed = false;

  function fail(error: string): void {
    failed = true;
    buffer = Buffer.alloc(0);
    onError(error);
  }

  return {
    write(chunk: Buffer) {
      if (failed) return;
      buffer = buffer.length === 0 ? chunk : Buffer.concat([buffer, chunk]);

      while (!failed && buffer.length >= FRAME_HEADER_BYTES) {
        const length = buffer.readUInt32BE(0);
        if (length > maxFrameBytes) {
          fail(`Frame of ${length} bytes exceeds limit of ${maxFrameBytes}`);
          return;
        }
        if (buffer.length < FRAME_HEADER_BYTES + length) return;

        const body = buffer.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length);
        buffer = buffer.subarray(FRAME_HEADER_BYTES + length);

        let parsed: unknown;
        try {
          parsed = JSON.parse(body.toString('utf8'));
        } catch {
          fail('Frame body is not valid JSON');
          return;
        }
        onFrame(parsed);
      }
    },
    buffered() {
      return buffer.length;
    },
  };
}
