import type { Duplex } from 'node:stream';
import type { Logger } from '../logger.js';
import type { KvStore } from '../store.js';
import type { KvRequest, KvResponse } from '../protocol/types.js';
import { createFrameDecoder, encodeFrame } from '../protocol/frames.js';
import { validateRequest } from '../protocol/validate.js';
import type { ConnectionLimits } from './connectionLimits.js';

export type ConnectionState = 'accepted' | 'serving' | 'closed';

export interface ConnectionHandlerOptions {
  socket: Duplex;
  /** Address the admission slot was taken under. */
  address: string;
  store: KvStore;
  limits: ConnectionLimits;
  logger: Logger;
  maxFrameBytes?: number;
}

/**
 * Serves one admitted connection until it closes.
 *
 * The caller must already hold an admission slot for `address`; run() gives
 * it back exactly once, whichever way the connection ends.
 */
export class ConnectionHandler {
  private currentState: ConnectionState = 'accepted';
  private released = false;
  private served = 0;
  private readonly socket: Duplex;
  private readonly address: string;
  private readonly store: KvStore;
  private readonly limits: ConnectionLimits;
  private readonly logger: Logger;
  private readonly maxFrameBytes: number | undefined;

  constructor(options: ConnectionHandlerOptions) {
    this.socket = options.socket;
    this.address = options.address;
    this.store = options.store;
    this.limits = options.limits;
    this.logger = options.logger;
    this.maxFrameBytes = options.maxFrameBytes;
  }

  get state(): ConnectionState {
    return this.currentState;
  }

  get requestsServed(): number {
    return this.served;
  }

  async run(): Promise<void> {
    try {
      await this.serve();
    } finally {
      this.currentState = 'closed';
      this.release();
    }
  }

  private serve(): Promise<void> {
    this.currentState = 'serving';
    const decoder = createFrameDecoder(
      (frame) => this.handleFrame(frame),
      (error) => this.abort(`bad frame: ${error}`),
      this.maxFrameBytes
    );

    return new Promise<void>((resolve) => {
      this.socket.on('data', (chunk: Buffer | string) => {
        decoder.write(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
      });
      this.socket.on('end', () => this.socket.end());
      this.socket.on('error', (err: Error) => {
        this.logger.warn({ err }, 'connection error');
      });
      this.socket.once('close', () => resolve());
      if (this.socket.closed) resolve();
    });
  }

  private handleFrame(frame: unknown): void {
    if (this.currentState !== 'serving') return;
    const result = validateRequest(frame);
    if (!result.ok) {
      this.abort(`bad message: ${result.error}`);
      return;
    }
    const response = this.dispatch(result.message);
    this.served += 1;
    this.socket.write(encodeFrame(response));
  }

  private dispatch(request: KvRequest): KvResponse {
    this.logger.debug({ op: request.op, key: request.key }, 'request');
    switch (request.op) {
      case 'set':
        this.store.set(request.key, request.value);
        return { id: request.id, op: 'set' };
      case 'get':
        return { id: request.id, op: 'get', value: this.store.get(request.key) ?? null };
      case 'delete':
        this.store.delete(request.key);
        return { id: request.id, op: 'delete' };
    }
  }

  private abort(reason: string): void {
    if (this.currentState === 'closed') return;
    this.currentState = 'closed';
    this.logger.warn({ reason }, 'closing connection');
    this.socket.destroy();
  }

  private release(): void {
    if (this.released) return;
    this.released = true;
    this.limits.release(this.address);
    this.logger.info(
      { served: this.served, total: this.limits.getTotal() },
      'connection closed'
    );
  }
}
