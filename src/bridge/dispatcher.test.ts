import { mkdtemp, readFile, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { BUILTIN_ACTION_MODULES } from '../actions/index.js';
import { defineAction } from '../actions/types.js';
import { MemoryEditorHost } from '../host/memory_host.js';

import { BridgeDispatcher } from './dispatcher.js';
import { ActionRegistry } from './registry.js';

function createDispatcher(
  options: { executeTimeoutMs?: number; auditLogPath?: string } = {},
): BridgeDispatcher {
  const registry = new ActionRegistry({
    modules: {
      ...BUILTIN_ACTION_MODULES,
      slow_actions: async () => ({
        actions: {
          wait: defineAction({
            description: 'resolves after 200ms',
            params: {},
            run: () =>
              new Promise<string>((resolve) =>
                setTimeout(() => resolve('{}'), 200),
              ),
          }),
        },
      }),
    },
  });
  return new BridgeDispatcher({
    registry,
    host: new MemoryEditorHost(),
    ...options,
  });
}

describe('BridgeDispatcher', () => {
  it('answers undecodable text with a decode error', async () => {
    const response = await createDispatcher().handleText('{"type":');
    expect(response.success).toBe(false);
    expect(response.type).toBe('RequestDecodeError');
    expect(
      response.message?.startsWith('Failed: JSON parse error on received data: '),
    ).toBe(true);
  });

  it('spawns an actor and returns the action payload as JSON text', async () => {
    const response = await createDispatcher().handleMessage({
      type: 'python_call',
      module: 'actor_actions',
      function: 'ue_spawn_from_class',
      args: {
        class_path: '/Script/Engine.StaticMeshActor',
        location: [0, 0, 100],
      },
    });
    expect(response).toEqual({
      success: true,
      message: 'Action executed successfully.',
      result: JSON.stringify({
        success: true,
        actor_label: 'StaticMeshActor_1',
        actor_path:
          '/Game/Maps/Untitled.Untitled:PersistentLevel.StaticMeshActor_1',
      }),
    });
  });

  it('reports a missing function', async () => {
    const response = await createDispatcher().handleMessage({
      type: 'python_call',
      module: 'actor_actions',
      function: 'ue_does_not_exist',
      args: {},
    });
    expect(response).toEqual({
      success: false,
      type: 'FunctionNotFoundError',
      message: "Function 'ue_does_not_exist' not found in module 'actor_actions'.",
    });
  });

  it('rejects traversal in module names', async () => {
    const response = await createDispatcher().handleMessage({
      type: 'python_call',
      module: '../../etc',
      function: 'passwd',
      args: {},
    });
    expect(response.type).toBe('ModuleNotFoundError');
  });

  it('reports request shape errors', async () => {
    const dispatcher = createDispatcher();
    expect(
      (await dispatcher.handleMessage({ type: 'script', code: '1' })).type,
    ).toBe('UnsupportedRequestType');
    expect((await dispatcher.handleMessage({ type: 'python_call' })).type).toBe(
      'InvalidRequest',
    );
  });

  it('returns byte-identical results for repeated read-only calls', async () => {
    const dispatcher = createDispatcher();
    const request = {
      type: 'python_call',
      module: 'actor_actions',
      function: 'ue_list_all_with_locations',
      args: {},
    };
    const first = await dispatcher.handleMessage(request);
    const second = await dispatcher.handleMessage(request);
    expect(first.success).toBe(true);
    expect(second.result).toBe(first.result);
  });

  it('answers ActionTimeout when an action outlives the deadline', async () => {
    const response = await createDispatcher({
      executeTimeoutMs: 20,
    }).handleMessage({ type: 'python_call', module: 'slow_actions', function: 'wait' });
    expect(response).toEqual({
      success: false,
      type: 'ActionTimeout',
      message: "Action 'slow_actions.wait' did not finish within 20ms",
    });
  });

  it('appends redacted audit entries', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'bridge-audit-'));
    try {
      const auditLogPath = path.join(dir, 'logs', 'audit.log');
      const dispatcher = createDispatcher({ auditLogPath });
      await dispatcher.handleMessage({
        type: 'python_call',
        module: 'util_actions',
        function: 'ue_print_message',
        args: { message: 'hello', api_key: 'test-secret' },
      });

      const lines = (await readFile(auditLogPath, 'utf8')).trim().split('\n');
      expect(lines).toHaveLength(1);
      const entry: unknown = JSON.parse(lines[0]);
      expect(entry).toMatchObject({
        module: 'util_actions',
        function: 'ue_print_message',
        args: { message: 'hello', api_key: '[REDACTED]' },
        ok: false,
        type: 'ValidationError',
        message: `Invalid arguments for 'util_actions.ue_print_message': Unexpected argument "api_key"`,
      });
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});
