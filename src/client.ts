import net, { type Socket } from 'node:net';
import {
  ConnectionClosedError,
  ConnectionRejectedError,
  ErrorCode,
  FrameError,
  KvError,
} from './errors.js';
import {
  createFrameDecoder,
  encodeFrame,
  validateServerMessage,
  type KvOp,
  type KvRequest,
  type KvResponse,
} from './protocol/index.js';

export interface KvClientOptions {
  host: string;
  port: number;
  maxFrameBytes?: number;
}

interface PendingCall {
  op: KvOp;
  resolve: (response: KvResponse) => void;
  reject: (err: KvError) => void;
}

/**
 * Client for one key-value connection. Calls may be issued concurrently;
 * the server answers them in order and each response is matched by id.
 */
export class KvClient {
  private nextId = 0;
  private pending = new Map<number, PendingCall>();
  private failure: KvError | null = null;
  private readonly closedPromise: Promise<void>;

  private constructor(
    private readonly socket: Socket,
    maxFrameBytes?: number
  ) {
    const decoder = createFrameDecoder(
      (frame) => this.handleFrame(frame),
      (error) => this.fail(new FrameError(error), true),
      maxFrameBytes
    );
    socket.on('data', (chunk: Buffer) => decoder.write(chunk));
    socket.on('end', () => this.fail(new ConnectionClosedError()));
    socket.on('error', (err: Error) => this.fail(new ConnectionClosedError(err.message)));
    this.closedPromise = new Promise<void>((resolve) => {
      socket.once('close', () => {
        this.fail(new ConnectionClosedError());
        resolve();
      });
    });
  }

  /** Resolves once the TCP connection is up; admission is reported on the first call. */
  static connect(options: KvClientOptions): Promise<KvClient> {
    return new Promise<KvClient>((resolve, reject) => {
      const socket = net.connect({ host: options.host, port: options.port });
      const onError = (err: Error): void => reject(err);
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(new KvClient(socket, options.maxFrameBytes));
      });
    });
  }

  async set(key: string, value: string): Promise<void> {
    await this.call((id) => ({ id, op: 'set', key, value }));
  }

  /** @returns the stored value, or null when the key is absent */
  async get(key: string): Promise<string | null> {
    const response = await this.call((id) => ({ id, op: 'get', key }));
    if (response.op !== 'get') {
      throw new KvError(ErrorCode.BAD_MESSAGE, `Expected get response, got ${response.op}`);
    }
    return response.value;
  }

  async delete(key: string): Promise<void> {
    await this.call((id) => ({ id, op: 'delete', key }));
  }

  /** The error that ended this connection, if it has ended. */
  get error(): KvError | null {
    return this.failure;
  }

  /** False once the connection has been rejected, closed or failed. */
  isOpen(): boolean {
    return this.failure === null;
  }

  /** Resolves when the socket has fully closed. */
  closed(): Promise<void> {
    return this.closedPromise;
  }

  async close(): Promise<void> {
    if (!this.socket.destroyed) this.socket.end();
    await this.closedPromise;
  }

  private call(build: (id: number) => KvRequest): Promise<KvResponse> {
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    const request = build(this.nextId++);
    return new Promise<KvResponse>((resolve, reject) => {
      this.pending.set(request.id, { op: request.op, resolve, reject });
      this.socket.write(encodeFrame(request));
    });
  }

  private handleFrame(frame: unknown): void {
    const result = validateServerMessage(frame);
    if (!result.ok) {
      this.fail(new KvError(ErrorCode.BAD_MESSAGE, result.error), true);
      return;
    }
    const message = result.message;
    if (message.op === 'rejected') {
      this.fail(new ConnectionRejectedError(message.reason));
      return;
    }
    const call = this.pending.get(message.id);
    if (!call || call.op !== message.op) {
      this.fail(
        new KvError(ErrorCode.BAD_MESSAGE, `Unexpected ${message.op} response for id ${message.id}`),
        true
      );
      return;
    }
    this.pending.delete(message.id);
    call.resolve(message);
  }

  /** First failure wins; every pending and later call rejects with it. */
  private fail(err: KvError, destroy = false): void {
    if (!this.failure) {
      this.failure = err;
    }
    const failure = this.failure;
    for (const call of this.pending.values()) {
      call.reject(failure);
    }
    this.pending.clear();
    if (destroy) {
      this.socket.destroy();
    }
  }
}
