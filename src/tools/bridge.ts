import type { CallResult } from '../bridge/protocol.js';
import {
  asNonEmptyString,
  asOptionalRecord,
  asRecord,
  isRecord,
} from '../validation.js';

import type { ServerContext } from './context.js';
import type { ToolHandler, ToolResponse } from './types.js';

/**
 * Maps a decoded bridge result onto a tool response. Actions report their
 * own failures as `{"success": false}` payloads inside a successful
 * envelope; those are failures here too.
 */
export function toToolResponse(
  module: string,
  fn: string,
  result: CallResult,
): ToolResponse {
  const target = `${module}.${fn}`;

  if (!result.success) {
    return {
      ok: false,
      summary: `${target} failed (${result.type}): ${result.message}`,
      details: {
        module,
        function: fn,
        type: result.type,
        ...(result.traceback ? { traceback: result.traceback } : {}),
        ...(result.details ? { transport: result.details } : {}),
      },
    };
  }

  if ('raw_result' in result) {
    return {
      ok: true,
      summary: `${target} returned non-JSON output`,
      details: { module, function: fn, raw_result: result.raw_result },
    };
  }

  const data = result.data;
  const message =
    isRecord(data) && typeof data.message === 'string'
      ? data.message
      : undefined;

  if (isRecord(data) && data.success === false) {
    return {
      ok: false,
      summary: message ?? `${target} reported a failure`,
      details: { module, function: fn, result: data },
    };
  }

  return {
    ok: true,
    summary: message ?? `${target} succeeded`,
    details: {
      module,
      function: fn,
      ...(data === undefined ? {} : { result: data }),
    },
  };
}

export function createBridgeToolHandlers(
  ctx: ServerContext,
): Record<string, ToolHandler> {
  return {
    bridge_call: async (args: unknown) => {
      const input = asRecord(args, 'arguments');
      const module = asNonEmptyString(input.module, 'module');
      const fn = asNonEmptyString(input.function, 'function');
      const callArgs = asOptionalRecord(input.args, 'args') ?? {};

      ctx.logDebug(`bridge_call ${module}.${fn}`);
      const result = await ctx.getBridgeClient().call(module, fn, callArgs);
      return toToolResponse(module, fn, result);
    },
  };
}
