import { isRecord } from '../validation.js';

import { BridgeError, getErrorMessage } from './errors.js';
import type { BridgeErrorKind } from './errors.js';

export const CALL_REQUEST_TYPE = 'python_call';

export interface CallRequest {
  kind: 'call';
  module: string;
  function: string;
  args: Record<string, unknown>;
}

/** Outer envelope written by the bridge host. `result` is JSON text. */
export interface ResponseEnvelope {
  success: boolean;
  message?: string;
  result?: string;
  type?: string;
  traceback?: string;
}

export type CallResult =
  | { success: true; message?: string; data?: unknown }
  | { success: true; message?: string; raw_result: string }
  | {
      success: false;
      message: string;
      type: string;
      traceback?: string;
      details?: Record<string, unknown>;
    };

export function encodeRequest(request: CallRequest): string {
  return JSON.stringify({
    type: CALL_REQUEST_TYPE,
    module: request.module,
    function: request.function,
    args: request.args,
  });
}

/** Validates an already-parsed wire request. */
export function parseRequest(message: unknown): CallRequest {
  if (!isRecord(message)) {
    throw new BridgeError('InvalidRequest', 'Request must be a JSON object');
  }

  const type = message.type;
  if (typeof type !== 'string') {
    throw new BridgeError(
      'InvalidRequest',
      "Missing 'type' field in JSON request",
    );
  }
  if (type !== CALL_REQUEST_TYPE) {
    throw new BridgeError(
      'UnsupportedRequestType',
      `Unsupported type: ${type}`,
    );
  }

  const module = message.module;
  const fn = message.function;
  if (typeof module !== 'string' || typeof fn !== 'string') {
    throw new BridgeError(
      'InvalidRequest',
      `Missing 'module' or 'function' field for type '${CALL_REQUEST_TYPE}'`,
    );
  }

  const args = message.args ?? {};
  if (!isRecord(args)) {
    throw new BridgeError('InvalidRequest', "'args' must be a JSON object");
  }

  return { kind: 'call', module, function: fn, args };
}

export function successEnvelope(result: string): ResponseEnvelope {
  return {
    success: true,
    message: 'Action executed successfully.',
    result,
  };
}

export function errorEnvelope(
  type: BridgeErrorKind | string,
  message: string,
  traceback?: string,
): ResponseEnvelope {
  return {
    success: false,
    message,
    type,
    ...(traceback ? { traceback } : {}),
  };
}

/**
 * Decodes the outer envelope and, when present, the action's own JSON
 * payload. A payload that is not JSON comes back as `raw_result`.
 */
export function decodeResponse(text: string): CallResult {
  let outer: unknown;
  try {
    outer = JSON.parse(text);
  } catch (error) {
    throw new BridgeError(
      'TransportDecodeError',
      `Failed to decode JSON response from editor: ${getErrorMessage(error)}. Raw response: '${text.slice(0, 200)}'`,
      { raw_response: text },
    );
  }

  if (!isRecord(outer) || typeof outer.success !== 'boolean') {
    throw new BridgeError(
      'TransportDecodeError',
      'Response envelope is missing a boolean success field',
      { raw_response: text },
    );
  }

  const message = typeof outer.message === 'string' ? outer.message : undefined;

  if (!outer.success) {
    return {
      success: false,
      message: message ?? 'Unknown error from editor action.',
      type: typeof outer.type === 'string' ? outer.type : 'UnknownError',
      ...(typeof outer.traceback === 'string'
        ? { traceback: outer.traceback }
        : {}),
    };
  }

  const base = message === undefined ? {} : { message };
  if (typeof outer.result !== 'string') {
    return { success: true, ...base };
  }

  try {
    return { success: true, ...base, data: JSON.parse(outer.result) };
  } catch {
    return { success: true, ...base, raw_result: outer.result };
  }
}

export function failureResult(error: BridgeError): CallResult {
  return {
    success: false,
    message: error.message,
    type: error.kind,
    ...(error.details ? { details: error.details } : {}),
  };
}
