import { describe, it, expect, afterEach, vi } from 'vitest';
import net from 'node:net';
import { KvClient } from '../src/client.js';
import { ConnectionClosedError, ConnectionRejectedError } from '../src/errors.js';
import { KvStore } from '../src/store.js';
import { createConnectionLimits } from '../src/tcp/connectionLimits.js';
import { KvServer, normalizeAddress, type AddressResolver } from '../src/tcp/server.js';
import { silentLogger } from './helpers.js';

const HOST = '127.0.0.1';

interface Harness {
  server: KvServer;
  store: KvStore;
  port: number;
}

let servers: KvServer[] = [];
let clients: KvClient[] = [];

async function startServer(
  resolveAddress?: AddressResolver,
  rejectLingerMs?: number
): Promise<Harness> {
  const store = new KvStore();
  const server = new KvServer({
    host: HOST,
    port: 0,
    store,
    limits: createConnectionLimits({ maxPerAddress: 1, maxTotal: 10 }),
    logger: silentLogger,
    resolveAddress,
    rejectLingerMs,
  });
  const { port } = await server.start();
  servers.push(server);
  return { server, store, port };
}

async function connect(port: number): Promise<KvClient> {
  const client = await KvClient.connect({ host: HOST, port });
  clients.push(client);
  return client;
}

/** Every connection looks like it comes from a different machine. */
function distinctAddresses(): AddressResolver {
  let n = 0;
  return () => `192.168.0.${++n}`;
}

/** Connects and makes one request, like a client probing whether it was admitted. */
async function tryConnect(port: number): Promise<{ client: KvClient; admitted: boolean }> {
  const client = await connect(port);
  try {
    await client.get('test');
    return { client, admitted: true };
  } catch (err) {
    if (err instanceof ConnectionRejectedError) return { client, admitted: false };
    throw err;
  }
}

afterEach(async () => {
  await Promise.all(clients.map((c) => c.close()));
  await Promise.all(servers.map((s) => s.stop()));
  clients = [];
  servers = [];
});

describe('normalizeAddress', () => {
  it('strips the IPv4-mapped IPv6 prefix', () => {
    expect(normalizeAddress('::ffff:127.0.0.1')).toBe('127.0.0.1');
    expect(normalizeAddress('::FFFF:10.1.2.3')).toBe('10.1.2.3');
  });

  it('leaves other addresses alone', () => {
    expect(normalizeAddress('127.0.0.1')).toBe('127.0.0.1');
    expect(normalizeAddress('::1')).toBe('::1');
  });
});

describe('KvServer', () => {
  it('serves set, get and delete over TCP', async () => {
    const { port } = await startServer();
    const client = await connect(port);

    await client.set('hello', 'world');
    expect(await client.get('hello')).toBe('world');
    expect(await client.get('nonexistent')).toBeNull();
    await client.delete('hello');
    expect(await client.get('hello')).toBeNull();
  });

  it('answers pipelined requests in order', async () => {
    const { port } = await startServer();
    const client = await connect(port);

    const results = await Promise.all([
      client.set('k', '1'),
      client.get('k'),
      client.set('k', '2'),
      client.get('k'),
      client.delete('k'),
      client.get('k'),
    ]);

    expect(results).toEqual([undefined, '1', undefined, '2', undefined, null]);
  });

  it('shares one store across connections', async () => {
    const { port, store } = await startServer(distinctAddresses());
    const writer = await connect(port);
    const reader = await connect(port);

    await writer.set('shared', 'value');
    expect(await reader.get('shared')).toBe('value');
    expect(store.get('shared')).toBe('value');
  });

  it('admits one of three connections from the same address', async () => {
    const { port, server } = await startServer();

    const results = await Promise.all([tryConnect(port), tryConnect(port), tryConnect(port)]);

    expect(results.filter((r) => r.admitted)).toHaveLength(1);
    expect(results.filter((r) => !r.admitted)).toHaveLength(2);
    for (const { client, admitted } of results) {
      expect(client.isOpen()).toBe(admitted);
      if (!admitted) expect(client.error).toMatchObject({ reason: 'address_limit' });
    }
    expect(server.limits.getCount(HOST)).toBe(1);
  });

  it('admits 10 of 11 connections from distinct addresses', async () => {
    const { port, server } = await startServer(distinctAddresses());

    const results = await Promise.all(Array.from({ length: 11 }, () => tryConnect(port)));

    expect(results.filter((r) => r.admitted)).toHaveLength(10);
    const rejected = results.filter((r) => !r.admitted);
    expect(rejected).toHaveLength(1);
    expect(rejected[0]?.client.error).toMatchObject({ reason: 'total_limit' });
    expect(server.limits.getTotal()).toBe(10);
    expect(server.getClientCount()).toBe(10);
  });

  it('frees a slot as soon as an admitted connection closes', async () => {
    const { port, server } = await startServer(distinctAddresses());

    const results = await Promise.all(Array.from({ length: 11 }, () => tryConnect(port)));
    const admitted = results.filter((r) => r.admitted);
    expect(admitted).toHaveLength(10);

    await admitted[0]?.client.close();
    await vi.waitFor(() => expect(server.limits.getTotal()).toBe(9));

    const late = await tryConnect(port);
    expect(late.admitted).toBe(true);
    expect(server.limits.getTotal()).toBe(10);
  });

  it('lets an address reconnect after its connection closes', async () => {
    const { port, server } = await startServer();

    const first = await tryConnect(port);
    expect(first.admitted).toBe(true);
    await first.client.close();
    await vi.waitFor(() => expect(server.limits.getCount(HOST)).toBe(0));

    const second = await tryConnect(port);
    expect(second.admitted).toBe(true);
  });

  it('rejects calls made after a rejection without writing them', async () => {
    const { port } = await startServer();
    const held = await tryConnect(port);
    expect(held.admitted).toBe(true);

    const { client, admitted } = await tryConnect(port);
    expect(admitted).toBe(false);
    await expect(client.set('a', 'b')).rejects.toBeInstanceOf(ConnectionRejectedError);
  });

  it('closes a rejected peer at the deadline even while it keeps writing', async () => {
    const { port, server } = await startServer(undefined, 200);
    const held = await tryConnect(port);
    expect(held.admitted).toBe(true);

    const peer = net.connect({ host: HOST, port, allowHalfOpen: true });
    const errors: Error[] = [];
    peer.on('error', (err) => errors.push(err));
    const closedAt = new Promise<number>((resolve) => peer.once('close', () => resolve(Date.now())));
    await new Promise<void>((resolve) => peer.once('connect', () => resolve()));
    const connectedAt = Date.now();
    const writer = setInterval(() => {
      if (!peer.destroyed) peer.write('x');
    }, 50);

    try {
      await vi.waitFor(() => expect(server.getRejectingCount()).toBe(1));
      expect((await closedAt) - connectedAt).toBeGreaterThanOrEqual(150);
      expect(server.getRejectingCount()).toBe(0);
    } finally {
      clearInterval(writer);
      peer.destroy();
    }
    expect(server.limits.getTotal()).toBe(1);
    expect(server.getClientCount()).toBe(1);
  });

  it('releases every slot on stop', async () => {
    const { port, server } = await startServer(distinctAddresses());
    const results = await Promise.all(Array.from({ length: 4 }, () => tryConnect(port)));
    expect(results.every((r) => r.admitted)).toBe(true);

    await server.stop();

    expect(server.isRunning()).toBe(false);
    expect(server.limits.getTotal()).toBe(0);
    expect(server.getClientCount()).toBe(0);
    await Promise.all(results.map((r) => r.client.closed()));
  });

  it('refuses to start twice', async () => {
    const { server } = await startServer();
    await expect(server.start()).rejects.toThrow('Server already running');
  });

  it('drops a socket whose address cannot be resolved without counting it', async () => {
    const { port, server } = await startServer(() => undefined);
    const client = await connect(port);

    await expect(client.get('k')).rejects.toBeInstanceOf(ConnectionClosedError);
    expect(server.limits.getTotal()).toBe(0);
  });
});
