import { Duplex } from 'node:stream';
import { pino } from 'pino';
import { createFrameDecoder, encodeFrame } from '../src/protocol/frames.js';

export const silentLogger = pino({ level: 'silent' });

/** In-memory socket: frames pushed in arrive as data, writes are captured. */
export function createFakeSocket(): { socket: Duplex; written: Buffer[] } {
  const written: Buffer[] = [];
  const socket = new Duplex({
    read() {},
    write(chunk: Buffer, _encoding, callback) {
      written.push(chunk);
      callback();
    },
  });
  return { socket, written };
}

export function pushFrames(socket: Duplex, ...messages: unknown[]): void {
  socket.push(Buffer.concat(messages.map((m) => encodeFrame(m))));
}

export function decodeFrames(chunks: Buffer[]): unknown[] {
  const frames: unknown[] = [];
  const decoder = createFrameDecoder(
    (frame) => frames.push(frame),
    (error) => {
      throw new Error(error);
    }
  );
  decoder.write(Buffer.concat(chunks));
  return frames;
}
