import net from 'net';

import { DEFAULT_BRIDGE_HOST, DEFAULT_BRIDGE_PORT } from '../config.js';

import type { BridgeDispatcher } from './dispatcher.js';
import { getErrorMessage, isBridgeError } from './errors.js';
import { MessageBuffer } from './framing.js';
import { errorEnvelope } from './protocol.js';
import type { ResponseEnvelope } from './protocol.js';

export interface BridgeTcpServerOptions {
  dispatcher: BridgeDispatcher;
  host?: string;
  /** 0 binds an ephemeral port. */
  port?: number;
  maxRequestBytes?: number;
  /** 0 disables the read deadline. */
  readTimeoutMs?: number;
  /** How long a peer may keep the connection open after the response is flushed. */
  lingerMs?: number;
  log?: (message: string) => void;
  logDebug?: (message: string) => void;
}

type InboundRequest =
  | { kind: 'message'; message: Record<string, unknown> }
  | { kind: 'text'; text: string }
  | { kind: 'rejected'; response: ResponseEnvelope }
  | { kind: 'gone' };

/**
 * One request per connection: read until the client half-closes (or a whole
 * JSON object has arrived), dispatch, write one envelope, close.
 */
export class BridgeTcpServer {
  private readonly dispatcher: BridgeDispatcher;
  private readonly host: string;
  private readonly port: number;
  private readonly maxRequestBytes: number;
  private readonly readTimeoutMs: number;
  private readonly lingerMs: number;
  private readonly log: (message: string) => void;
  private readonly logDebug: (message: string) => void;

  private server: net.Server | null = null;
  private readonly sockets = new Set<net.Socket>();

  constructor(options: BridgeTcpServerOptions) {
    this.dispatcher = options.dispatcher;
    this.host = options.host ?? DEFAULT_BRIDGE_HOST;
    this.port = options.port ?? DEFAULT_BRIDGE_PORT;
    this.maxRequestBytes = options.maxRequestBytes ?? 8 * 1024 * 1024;
    this.readTimeoutMs = options.readTimeoutMs ?? 30000;
    this.lingerMs = options.lingerMs ?? 1000;
    this.log = options.log ?? ((m) => console.error(`[BRIDGE] ${m}`));
    this.logDebug = options.logDebug ?? (() => undefined);
  }

  get isListening(): boolean {
    return this.server?.listening ?? false;
  }

  /** Connections currently held open, including lingering ones. */
  get connectionCount(): number {
    return this.sockets.size;
  }

  /** Bound address; the actual port when started with port 0. */
  address(): { host: string; port: number } {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') {
      throw new Error('Bridge server is not listening');
    }
    return { host: addr.address, port: addr.port };
  }

  async start(): Promise<{ host: string; port: number }> {
    if (this.server) throw new Error('Bridge server already started');

    const server = net.createServer({ allowHalfOpen: true }, (socket) =>
      this.handleConnection(socket),
    );
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => {
        this.server = null;
        reject(err);
      };
      server.once('error', onError);
      server.listen(this.port, this.host, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (err) => this.log(`Server error: ${err.message}`));
    const bound = this.address();
    this.log(`TCP server started at ${bound.host}:${bound.port}.`);
    return bound;
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = null;

    for (const socket of this.sockets) socket.destroy();
    this.sockets.clear();

    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
    this.log('TCP server stopped.');
  }

  private handleConnection(socket: net.Socket): void {
    const peer = `${socket.remoteAddress ?? '?'}:${socket.remotePort ?? '?'}`;
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', (err) =>
      this.logDebug(`Socket error from ${peer}: ${err.message}`),
    );
    this.logDebug(`Incoming connection from ${peer}`);

    this.serve(socket, peer).catch((error: unknown) => {
      this.log(`Connection from ${peer} failed: ${getErrorMessage(error)}`);
      socket.destroy();
    });
  }

  private async serve(socket: net.Socket, peer: string): Promise<void> {
    const inbound = await this.readRequest(socket);

    let response: ResponseEnvelope;
    switch (inbound.kind) {
      case 'gone':
        this.logDebug(`Connection from ${peer} closed before a request arrived`);
        socket.destroy();
        return;
      case 'rejected':
        response = inbound.response;
        break;
      case 'message':
        response = await this.dispatcher.handleMessage(inbound.message);
        break;
      case 'text':
        response = await this.dispatcher.handleText(inbound.text);
        break;
    }

    if (socket.destroyed || !socket.writable) {
      this.log(
        `Client ${peer} disconnected before the response was ready; dropping it`,
      );
      socket.destroy();
      return;
    }
    this.respond(socket, peer, response);
  }

  /**
   * Writes the envelope and half-closes. A peer that never closes its own
   * side is destroyed once the linger period has passed.
   */
  private respond(
    socket: net.Socket,
    peer: string,
    response: ResponseEnvelope,
  ): void {
    socket.end(JSON.stringify(response), () => {
      if (socket.destroyed) return;
      const linger = setTimeout(() => {
        this.logDebug(
          `Dropping ${peer}: still open ${this.lingerMs}ms after the response`,
        );
        socket.destroy();
      }, this.lingerMs);
      linger.unref();
      socket.once('close', () => clearTimeout(linger));
    });
  }

  private readRequest(socket: net.Socket): Promise<InboundRequest> {
    const buffer = new MessageBuffer(this.maxRequestBytes, 'RequestTooLarge');

    return new Promise<InboundRequest>((resolve) => {
      let settled = false;
      const finish = (inbound: InboundRequest) => {
        if (settled) return;
        settled = true;
        socket.setTimeout(0);
        socket.off('data', onData);
        socket.off('end', onEnd);
        socket.off('timeout', onTimeout);
        socket.off('close', onClose);
        resolve(inbound);
      };

      const onData = (chunk: Buffer) => {
        try {
          buffer.append(chunk);
        } catch (error) {
          const message = getErrorMessage(error);
          finish({
            kind: 'rejected',
            response: errorEnvelope(
              isBridgeError(error) ? error.kind : 'RequestTooLarge',
              `Request rejected: ${message}`,
            ),
          });
          return;
        }
        const complete = buffer.tryComplete();
        if (complete) finish({ kind: 'message', message: complete });
      };
      const onEnd = () => {
        if (buffer.isEmpty) finish({ kind: 'gone' });
        else finish({ kind: 'text', text: buffer.text() });
      };
      const onTimeout = () =>
        finish({
          kind: 'rejected',
          response: errorEnvelope(
            'RequestTimeout',
            `No complete request received within ${this.readTimeoutMs}ms`,
          ),
        });
      const onClose = () => finish({ kind: 'gone' });

      socket.on('data', onData);
      socket.on('end', onEnd);
      socket.on('timeout', onTimeout);
      socket.on('close', onClose);
      if (this.readTimeoutMs > 0) socket.setTimeout(this.readTimeoutMs);
    });
  }
}
