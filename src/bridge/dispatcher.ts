import type { EditorHost } from '../host/types.js';
import { appendAuditLog, redactSecrets } from '../security.js';

import {
  BridgeError,
  getErrorMessage,
  getErrorTypeName,
  isBridgeError,
} from './errors.js';
import { invokeAction } from './invoker.js';
import { errorEnvelope, parseRequest } from './protocol.js';
import type { CallRequest, ResponseEnvelope } from './protocol.js';
import type { ActionRegistry } from './registry.js';
import { SerialExecutor } from './serial_executor.js';

export interface BridgeDispatcherOptions {
  registry: ActionRegistry;
  host: EditorHost;
  executor?: SerialExecutor;
  /** 0 disables the deadline. */
  executeTimeoutMs?: number;
  auditLogPath?: string;
  logDebug?: (message: string) => void;
}

function envelopeFromError(error: unknown): ResponseEnvelope {
  if (isBridgeError(error)) {
    const traceback = error.details?.traceback;
    return errorEnvelope(
      error.kind,
      error.message,
      typeof traceback === 'string' ? traceback : undefined,
    );
  }
  return errorEnvelope(
    getErrorTypeName(error),
    getErrorMessage(error),
    error instanceof Error ? error.stack : undefined,
  );
}

/** Turns one decoded request into one response envelope. Never throws. */
export class BridgeDispatcher {
  private readonly registry: ActionRegistry;
  private readonly host: EditorHost;
  private readonly executor: SerialExecutor;
  private readonly executeTimeoutMs: number;
  private readonly auditLogPath?: string;
  private readonly logDebug: (message: string) => void;

  constructor(options: BridgeDispatcherOptions) {
    this.registry = options.registry;
    this.host = options.host;
    this.executor = options.executor ?? new SerialExecutor();
    this.executeTimeoutMs = options.executeTimeoutMs ?? 0;
    this.auditLogPath = options.auditLogPath;
    this.logDebug = options.logDebug ?? (() => undefined);
  }

  async handleText(text: string): Promise<ResponseEnvelope> {
    let message: unknown;
    try {
      message = JSON.parse(text);
    } catch (error) {
      return errorEnvelope(
        'RequestDecodeError',
        `Failed: JSON parse error on received data: ${getErrorMessage(error)}`,
      );
    }
    return await this.handleMessage(message);
  }

  async handleMessage(message: unknown): Promise<ResponseEnvelope> {
    let request: CallRequest;
    try {
      request = parseRequest(message);
    } catch (error) {
      return envelopeFromError(error);
    }

    const startedAt = Date.now();
    const response = await this.withDeadline(
      request,
      this.executor.run(() => this.execute(request)),
    );
    this.logDebug(
      `${request.module}.${request.function} -> ${response.success ? 'ok' : response.type} (${Date.now() - startedAt}ms)`,
    );
    this.audit(request, response, Date.now() - startedAt);
    return response;
  }

  private async execute(request: CallRequest): Promise<ResponseEnvelope> {
    const qualifiedName = `${request.module}.${request.function}`;
    try {
      const handle = await this.registry.resolve(request.module);
      const action = this.registry.getCallable(handle, request.function);
      return await invokeAction(qualifiedName, action, request.args, {
        host: this.host,
        logDebug: this.logDebug,
      });
    } catch (error) {
      return envelopeFromError(error);
    }
  }

  private async withDeadline(
    request: CallRequest,
    work: Promise<ResponseEnvelope>,
  ): Promise<ResponseEnvelope> {
    if (this.executeTimeoutMs <= 0) return await work;

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<ResponseEnvelope>((resolve) => {
      timer = setTimeout(() => {
        resolve(
          envelopeFromError(
            new BridgeError(
              'ActionTimeout',
              `Action '${request.module}.${request.function}' did not finish within ${this.executeTimeoutMs}ms`,
            ),
          ),
        );
      }, this.executeTimeoutMs);
    });

    try {
      return await Promise.race([work, deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private audit(
    request: CallRequest,
    response: ResponseEnvelope,
    durationMs: number,
  ): void {
    if (!this.auditLogPath) return;
    try {
      appendAuditLog(this.auditLogPath, {
        ts: new Date().toISOString(),
        module: request.module,
        function: request.function,
        args: redactSecrets(request.args),
        ok: response.success,
        ...(response.success ? {} : { type: response.type }),
        message: response.message ?? '',
        durationMs,
      });
    } catch (error) {
      this.logDebug(`Audit log failed: ${getErrorMessage(error)}`);
    }
  }
}
