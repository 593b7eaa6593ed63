import net from 'net';

import { DEFAULT_BRIDGE_HOST, DEFAULT_BRIDGE_PORT } from './config.js';
import { BridgeError, getErrorMessage, isBridgeError } from './bridge/errors.js';
import { MessageBuffer } from './bridge/framing.js';
import {
  decodeResponse,
  encodeRequest,
  failureResult,
} from './bridge/protocol.js';
import type { CallResult } from './bridge/protocol.js';

export interface BridgeClientOptions {
  host?: string;
  port?: number;
  /** Covers connect, send and receive together. */
  timeoutMs?: number;
  maxResponseBytes?: number;
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !('code' in error)) return undefined;
  return typeof error.code === 'string' ? error.code : undefined;
}

/**
 * Client side of the bridge. Each call opens a fresh connection, writes one
 * request, half-closes and reads one response envelope.
 */
export class BridgeClient {
  readonly host: string;
  readonly port: number;
  readonly timeoutMs: number;
  readonly maxResponseBytes: number;

  constructor(options: BridgeClientOptions = {}) {
    this.host = options.host ?? DEFAULT_BRIDGE_HOST;
    this.port = options.port ?? DEFAULT_BRIDGE_PORT;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.maxResponseBytes = options.maxResponseBytes ?? 64 * 1024 * 1024;
  }

  get endpoint(): string {
    return `${this.host}:${this.port}`;
  }

  /**
   * Calls `module.fn(**args)` on the bridge host. Transport and decode
   * failures come back as `{ success: false }` results, never as rejections.
   */
  async call(
    module: string,
    fn: string,
    args: Record<string, unknown> = {},
  ): Promise<CallResult> {
    const payload = encodeRequest({ kind: 'call', module, function: fn, args });
    try {
      const text = await this.exchange(payload);
      return decodeResponse(text);
    } catch (error) {
      if (isBridgeError(error)) return failureResult(error);
      return failureResult(
        new BridgeError(
          'TransportError',
          `An unexpected error occurred (${this.endpoint}): ${getErrorMessage(error)}`,
        ),
      );
    }
  }

  private exchange(payload: string): Promise<string> {
    const buffer = new MessageBuffer(
      this.maxResponseBytes,
      'TransportProtocolError',
    );

    return new Promise<string>((resolve, reject) => {
      const socket = new net.Socket({ allowHalfOpen: true });
      let settled = false;

      const settle = (outcome: { text: string } | { error: BridgeError }) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.destroy();
        if ('text' in outcome) resolve(outcome.text);
        else reject(outcome.error);
      };

      const timer = setTimeout(() => {
        settle({
          error: new BridgeError(
            'TransportTimeout',
            `Socket timeout (${this.endpoint}): no complete response within ${this.timeoutMs}ms`,
          ),
        });
      }, this.timeoutMs);

      socket.on('data', (chunk: Buffer) => {
        try {
          buffer.append(chunk);
        } catch (error) {
          settle({
            error: isBridgeError(error)
              ? error
              : new BridgeError('TransportProtocolError', getErrorMessage(error)),
          });
          return;
        }
        if (buffer.tryComplete()) settle({ text: buffer.text() });
      });

      socket.on('end', () => {
        if (buffer.isEmpty) {
          settle({
            error: new BridgeError(
              'TransportProtocolError',
              `Connection closed by the editor bridge (${this.endpoint}) without a response`,
            ),
          });
          return;
        }
        settle({ text: buffer.text() });
      });

      socket.on('close', () => {
        settle({
          error: new BridgeError(
            'TransportProtocolError',
            `Connection to the editor bridge (${this.endpoint}) closed unexpectedly`,
          ),
        });
      });

      socket.on('error', (err) => {
        const code = errorCode(err);
        if (code === 'ECONNREFUSED') {
          settle({
            error: new BridgeError(
              'TransportRefused',
              `Connection refused (${this.endpoint}). Ensure the editor bridge host is running.`,
            ),
          });
          return;
        }
        settle({
          error: new BridgeError(
            'TransportError',
            `Socket error (${this.endpoint}): ${err.message}`,
            code ? { code } : undefined,
          ),
        });
      });

      socket.connect(this.port, this.host, () => {
        socket.end(payload);
      });
    });
  }
}
