import net, { type AddressInfo, type Server, type Socket } from 'node:net';
import type { Logger } from '../logger.js';
import type { KvStore } from '../store.js';
import { encodeFrame, type RejectionNotice } from '../protocol/index.js';
import type { ConnectionLimits, RejectionReason } from './connectionLimits.js';
import { ConnectionHandler } from './connectionHandler.js';

/** Hard deadline for a rejected peer to read the notice and hang up. */
const REJECT_LINGER_MS = 5_000;

export type AddressResolver = (socket: Socket) => string | undefined;

export interface KvServerConfig {
  host: string;
  port: number;
  store: KvStore;
  limits: ConnectionLimits;
  logger: Logger;
  maxFrameBytes?: number;
  /** Defaults to the peer IP from the socket. */
  resolveAddress?: AddressResolver;
  /** Rejected sockets are destroyed this long after the notice, whatever the peer does. */
  rejectLingerMs?: number;
}

const IPV4_MAPPED = /^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i;

/** `::ffff:10.0.0.1` and `10.0.0.1` are the same client. */
export function normalizeAddress(address: string): string {
  const mapped = IPV4_MAPPED.exec(address);
  return mapped?.[1] ?? address;
}

export const peerAddress: AddressResolver = (socket) =>
  socket.remoteAddress === undefined ? undefined : normalizeAddress(socket.remoteAddress);

/**
 * TCP listener for key-value traffic. Every inbound socket goes through the
 * admission gate before a ConnectionHandler is started for it.
 */
export class KvServer {
  private server: Server | null = null;
  private active = new Map<Socket, Promise<void>>();
  private rejecting = new Set<Socket>();
  private config: KvServerConfig;
  private logger: Logger;
  private resolveAddress: AddressResolver;
  private rejectLingerMs: number;

  constructor(config: KvServerConfig) {
    this.config = config;
    this.logger = config.logger;
    this.resolveAddress = config.resolveAddress ?? peerAddress;
    this.rejectLingerMs = config.rejectLingerMs ?? REJECT_LINGER_MS;
  }

  get limits(): ConnectionLimits {
    return this.config.limits;
  }

  /**
   * Start listening.
   * @returns the bound address, useful when port 0 was requested
   */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Server already running');
    }

    const server = net.createServer((socket) => this.handleSocket(socket));
    this.server = server;

    try {
      await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(this.config.port, this.config.host, () => {
          server.off('error', reject);
          resolve();
        });
      });
    } catch (err) {
      this.server = null;
      throw err;
    }

    server.on('error', (err) => {
      this.logger.error({ err }, 'listener error');
    });

    const bound = server.address();
    if (bound === null || typeof bound === 'string') {
      throw new Error('Server is not bound to a TCP address');
    }
    const { maxPerAddress, maxTotal } = this.limits.snapshot();
    this.logger.info(
      { host: bound.address, port: bound.port, maxPerAddress, maxTotal },
      'listening'
    );
    return bound;
  }

  /**
   * Stop accepting, close every open connection and wait for each handler
   * to give its admission slot back.
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }

    const closed = new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });

    this.logger.info({ connections: this.active.size }, 'stopping');
    for (const socket of this.active.keys()) {
      socket.destroy();
    }
    for (const socket of this.rejecting) {
      socket.destroy();
    }
    this.rejecting.clear();

    await Promise.all(this.active.values());
    await closed;
    this.server = null;
    this.logger.info('stopped');
  }

  getClientCount(): number {
    return this.active.size;
  }

  isRunning(): boolean {
    return this.server !== null;
  }

  /** Rejected sockets still waiting to close. */
  getRejectingCount(): number {
    return this.rejecting.size;
  }

  private handleSocket(socket: Socket): void {
    const address = this.resolveAddress(socket);
    if (address === undefined) {
      this.logger.warn('dropping connection without a peer address');
      socket.destroy();
      return;
    }

    const decision = this.limits.tryAcquire(address);
    if (!decision.ok) {
      this.reject(socket, address, decision.reason);
      return;
    }

    this.logger.info(
      { address, addressCount: this.limits.getCount(address), total: this.limits.getTotal() },
      'connection accepted'
    );
    const handler = new ConnectionHandler({
      socket,
      address,
      store: this.config.store,
      limits: this.limits,
      logger: this.logger.child({ address }),
      maxFrameBytes: this.config.maxFrameBytes,
    });
    const run = handler
      .run()
      .catch((err: unknown) => {
        this.logger.error({ err, address }, 'connection handler failed');
      })
      .finally(() => {
        this.active.delete(socket);
      });
    this.active.set(socket, run);
  }

  private reject(socket: Socket, address: string, reason: RejectionReason): void {
    this.logger.warn(
      { address, reason, total: this.limits.getTotal() },
      'connection rejected'
    );
    this.rejecting.add(socket);
    // Absolute, not idle: a peer that keeps writing must not hold the socket.
    const deadline = setTimeout(() => socket.destroy(), this.rejectLingerMs);
    socket.on('error', (err) => {
      this.logger.debug({ err, address }, 'rejected socket error');
    });
    socket.once('close', () => {
      clearTimeout(deadline);
      this.rejecting.delete(socket);
    });

    const notice: RejectionNotice = { op: 'rejected', reason };
    socket.end(encodeFrame(notice));
    // Discard whatever the peer already sent so its FIN is seen.
    socket.resume();
  }
}
