import net from 'node:net';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BUILTIN_ACTION_MODULES } from '../actions/index.js';
import { defineAction } from '../actions/types.js';
import { BridgeClient } from '../bridge_client.js';
import { MemoryEditorHost } from '../host/memory_host.js';

import { BridgeDispatcher } from './dispatcher.js';
import { ActionRegistry } from './registry.js';
import { BridgeTcpServer } from './tcp_server.js';

const HOST = '127.0.0.1';

function createServer(
  options: {
    maxRequestBytes?: number;
    readTimeoutMs?: number;
    lingerMs?: number;
  } = {},
): BridgeTcpServer {
  const registry = new ActionRegistry({
    modules: {
      ...BUILTIN_ACTION_MODULES,
      echo_actions: async () => ({
        actions: {
          echo: defineAction({
            description: 'echo',
            params: { value: (value: unknown) => value },
            run: ({ value }) => JSON.stringify({ value }),
          }),
        },
      }),
    },
  });
  const dispatcher = new BridgeDispatcher({
    registry,
    host: new MemoryEditorHost(),
  });
  return new BridgeTcpServer({
    dispatcher,
    host: HOST,
    port: 0,
    log: () => undefined,
    ...options,
  });
}

/** Writes raw chunks and collects everything until the server closes. */
function rawExchange(
  port: number,
  chunks: string[],
  options: { halfClose: boolean },
): Promise<string> {
  return new Promise((resolve, reject) => {
    const socket = net.connect({ host: HOST, port, allowHalfOpen: true });
    const received: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => received.push(chunk));
    socket.on('end', () => {
      socket.destroy();
      resolve(Buffer.concat(received).toString('utf8'));
    });
    socket.on('error', reject);
    socket.on('connect', () => {
      for (const chunk of chunks) socket.write(chunk);
      if (options.halfClose) socket.end();
    });
  });
}

/**
 * Writes raw chunks and never half-closes. Resolves with the reply once the
 * server has ended its side; the socket stays open until `release`.
 */
async function stallingExchange(
  port: number,
  chunks: string[],
): Promise<{ text: string; release: () => void }> {
  const socket = net.connect({ host: HOST, port, allowHalfOpen: true });
  socket.on('error', () => undefined);
  const text = await new Promise<string>((resolve) => {
    const received: Buffer[] = [];
    socket.on('data', (chunk: Buffer) => received.push(chunk));
    socket.on('end', () => resolve(Buffer.concat(received).toString('utf8')));
    socket.on('connect', () => {
      for (const chunk of chunks) socket.write(chunk);
    });
  });
  return { text, release: () => socket.destroy() };
}

interface FakePeer {
  port: number;
  close: () => Promise<void>;
}

async function startFakePeer(
  onConnection: (socket: net.Socket) => void,
): Promise<FakePeer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer({ allowHalfOpen: true }, (socket) => {
    sockets.add(socket);
    socket.on('error', () => undefined);
    socket.resume();
    onConnection(socket);
  });
  await new Promise<void>((resolve) => server.listen(0, HOST, resolve));
  const address = server.address();
  if (!address || typeof address === 'string') throw new Error('no address');

  return {
    port: address.port,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

describe('bridge server and client over loopback', () => {
  let server: BridgeTcpServer;
  let client: BridgeClient;
  let port: number;

  beforeEach(async () => {
    server = createServer();
    port = (await server.start()).port;
    client = new BridgeClient({ host: HOST, port, timeoutMs: 2000 });
  });

  afterEach(async () => {
    await server.stop();
  });

  it('spawns an actor and decodes the inner result', async () => {
    const result = await client.call('actor_actions', 'ue_spawn_from_class', {
      class_path: '/Script/Engine.StaticMeshActor',
      location: [0, 0, 100],
    });
    expect(result).toEqual({
      success: true,
      message: 'Action executed successfully.',
      data: {
        success: true,
        actor_label: 'StaticMeshActor_1',
        actor_path:
          '/Game/Maps/Untitled.Untitled:PersistentLevel.StaticMeshActor_1',
      },
    });
  });

  it('reports a missing function', async () => {
    const result = await client.call('actor_actions', 'ue_does_not_exist');
    expect(result).toEqual({
      success: false,
      type: 'FunctionNotFoundError',
      message: "Function 'ue_does_not_exist' not found in module 'actor_actions'.",
    });
  });

  it('rejects path traversal in the module name', async () => {
    const result = await client.call('../../etc', 'passwd');
    expect(result).toEqual({
      success: false,
      type: 'ModuleNotFoundError',
      message: 'Invalid module name: ../../etc. Contains restricted characters.',
    });
  });

  it('preserves nested float lists exactly', async () => {
    const value = [[0.1, 0.2, 0.30000000000000004], [-1e-9, 123456.789, 2]];
    const result = await client.call('echo_actions', 'echo', { value });
    expect(result).toEqual({
      success: true,
      message: 'Action executed successfully.',
      data: { value },
    });
  });

  it('returns identical results for repeated read-only calls', async () => {
    await client.call('actor_actions', 'ue_spawn_from_class', {
      class_path: '/Script/Engine.PointLight',
      location: [1, 2, 3],
    });
    const first = await client.call('actor_actions', 'ue_get_all_details');
    const second = await client.call('actor_actions', 'ue_get_all_details');
    expect(second).toEqual(first);
  });

  it('serves a client that never half-closes', async () => {
    const request =
      '{"type":"python_call","module":"actor_actions","function":"ue_list_all_with_locations","args":{}}';
    const text = await rawExchange(
      port,
      [request.slice(0, 20), request.slice(20)],
      { halfClose: false },
    );
    expect(JSON.parse(text)).toEqual({
      success: true,
      message: 'Action executed successfully.',
      result: '{"success":true,"actors":[]}',
    });
  });

  it('answers undecodable requests and keeps serving', async () => {
    const text = await rawExchange(port, ['not json at all'], {
      halfClose: true,
    });
    expect(JSON.parse(text)).toMatchObject({
      success: false,
      type: 'RequestDecodeError',
    });

    const result = await client.call('util_actions', 'ue_print_message', {
      message: 'still here',
    });
    expect(result.success).toBe(true);
  });

  it('closes silently when the client sends nothing', async () => {
    expect(await rawExchange(port, [], { halfClose: true })).toBe('');
    expect(server.isListening).toBe(true);
  });
});

describe('bridge server hardening', () => {
  let server: BridgeTcpServer | undefined;

  afterEach(async () => {
    await server?.stop();
    server = undefined;
  });

  it('rejects requests above the size limit', async () => {
    server = createServer({ maxRequestBytes: 64 });
    const { port } = await server.start();
    const client = new BridgeClient({ host: HOST, port, timeoutMs: 2000 });

    const result = await client.call('util_actions', 'ue_print_message', {
      message: 'x'.repeat(200),
    });
    expect(result).toEqual({
      success: false,
      type: 'RequestTooLarge',
      message: 'Request rejected: Message exceeds 64 bytes',
    });
  });

  it('answers RequestTimeout when the request never completes', async () => {
    server = createServer({ readTimeoutMs: 50 });
    const { port } = await server.start();

    const text = await rawExchange(port, ['{"type":'], { halfClose: false });
    expect(JSON.parse(text)).toEqual({
      success: false,
      type: 'RequestTimeout',
      message: 'No complete request received within 50ms',
    });
  });

  it('drops a stalled connection after answering RequestTimeout', async () => {
    server = createServer({ readTimeoutMs: 50, lingerMs: 50 });
    const { port } = await server.start();

    const { text, release } = await stallingExchange(port, ['{"type":']);
    expect(JSON.parse(text)).toMatchObject({ type: 'RequestTimeout' });
    const running = server;
    try {
      await vi.waitFor(() => expect(running.connectionCount).toBe(0));
    } finally {
      release();
    }
  });

  it('drops an oversized sender that never half-closes', async () => {
    server = createServer({ maxRequestBytes: 16, lingerMs: 50 });
    const { port } = await server.start();

    const { text, release } = await stallingExchange(port, [
      '{"type":"python_call","module":"m"',
    ]);
    expect(JSON.parse(text)).toMatchObject({ type: 'RequestTooLarge' });
    const running = server;
    try {
      await vi.waitFor(() => expect(running.connectionCount).toBe(0));
    } finally {
      release();
    }
  });
});

describe('BridgeClient failure mapping', () => {
  let peer: FakePeer | undefined;

  afterEach(async () => {
    await peer?.close();
    peer = undefined;
  });

  it('reports a refused connection promptly', async () => {
    const probe = await startFakePeer(() => undefined);
    const closedPort = probe.port;
    await probe.close();

    const client = new BridgeClient({ host: HOST, port: closedPort, timeoutMs: 2000 });
    const startedAt = Date.now();
    const result = await client.call('actor_actions', 'ue_select_all');

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.type).toBe('TransportRefused');
    expect(result.message).toContain('refused');
    expect(Date.now() - startedAt).toBeLessThan(2000);
  });

  it('times out when the peer never answers', async () => {
    peer = await startFakePeer(() => undefined);
    const client = new BridgeClient({ host: HOST, port: peer.port, timeoutMs: 100 });

    const result = await client.call('actor_actions', 'ue_select_all');
    expect(result).toEqual({
      success: false,
      type: 'TransportTimeout',
      message: `Socket timeout (${HOST}:${peer.port}): no complete response within 100ms`,
    });
  });

  it('reports undecodable response bytes', async () => {
    peer = await startFakePeer((socket) =>
      socket.on('end', () => socket.end('<html>oops</html>')),
    );
    const client = new BridgeClient({ host: HOST, port: peer.port, timeoutMs: 2000 });

    const result = await client.call('m', 'f');
    expect(result).toMatchObject({
      success: false,
      type: 'TransportDecodeError',
      details: { raw_response: '<html>oops</html>' },
    });
  });

  it('reports an empty reply as a protocol error', async () => {
    peer = await startFakePeer((socket) => socket.on('end', () => socket.end()));
    const client = new BridgeClient({ host: HOST, port: peer.port, timeoutMs: 2000 });

    const result = await client.call('m', 'f');
    expect(result).toEqual({
      success: false,
      type: 'TransportProtocolError',
      message: `Connection closed by the editor bridge (${HOST}:${peer.port}) without a response`,
    });
  });

  it('surfaces a non-JSON inner result as raw_result', async () => {
    peer = await startFakePeer((socket) =>
      socket.on('end', () =>
        socket.end('{"success":true,"result":"plain text"}'),
      ),
    );
    const client = new BridgeClient({ host: HOST, port: peer.port, timeoutMs: 2000 });

    expect(await client.call('m', 'f')).toEqual({
      success: true,
      raw_result: 'plain text',
    });
  });

  it('rejects responses above the size bound', async () => {
    peer = await startFakePeer((socket) =>
      socket.on('end', () =>
        socket.end(JSON.stringify({ success: true, result: 'x'.repeat(500) })),
      ),
    );
    const client = new BridgeClient({
      host: HOST,
      port: peer.port,
      timeoutMs: 2000,
      maxResponseBytes: 100,
    });

    const result = await client.call('m', 'f');
    expect(result).toMatchObject({
      success: false,
      type: 'TransportProtocolError',
      message: 'Message exceeds 100 bytes',
    });
  });
});
