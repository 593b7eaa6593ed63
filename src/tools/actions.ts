import { actions as actorActions } from '../actions/actor_actions.js';
import { actions as assetActions } from '../actions/asset_actions.js';
import type { ActionTable } from '../actions/types.js';
import { actions as utilActions } from '../actions/util_actions.js';
import { bindArguments } from '../bridge/invoker.js';
import { ValidationError, asRecord } from '../validation.js';

import { toToolResponse } from './bridge.js';
import type { ServerContext } from './context.js';
import type { ToolHandler } from './types.js';

const ACTION_PREFIX = 'ue_';

interface ActionToolGroup {
  prefix: string;
  module: string;
  actions: ActionTable;
}

const ACTION_TOOL_GROUPS: ActionToolGroup[] = [
  { prefix: 'actor', module: 'actor_actions', actions: actorActions },
  { prefix: 'asset', module: 'asset_actions', actions: assetActions },
  { prefix: 'util', module: 'util_actions', actions: utilActions },
];

const EXTRA_CHECKS: Record<string, (args: Record<string, unknown>) => void> = {
  actor_set_transform: (args) => {
    const given = ['location', 'rotation', 'scale'].filter(
      (key) => args[key] !== undefined && args[key] !== null,
    );
    if (given.length === 0) {
      throw new ValidationError(
        'location',
        'Provide at least one of "location", "rotation" or "scale"',
        'undefined',
      );
    }
  },
};

/** `actor_spawn_from_class` -> `ue_spawn_from_class` in `actor_actions`. */
export function toolNameForAction(prefix: string, action: string): string {
  return `${prefix}_${action.slice(ACTION_PREFIX.length)}`;
}

/**
 * One tool per built-in action. Arguments are checked against the action's
 * own parameter schema before anything is sent to the bridge.
 */
export function createActionToolHandlers(
  ctx: ServerContext,
): Record<string, ToolHandler> {
  const handlers: Record<string, ToolHandler> = {};

  for (const group of ACTION_TOOL_GROUPS) {
    for (const [actionName, action] of Object.entries(group.actions)) {
      if (!actionName.startsWith(ACTION_PREFIX)) continue;
      const tool = toolNameForAction(group.prefix, actionName);
      const extraCheck = EXTRA_CHECKS[tool];

      handlers[tool] = async (args: unknown) => {
        const input = asRecord(args, 'arguments');
        const bound = bindArguments(action.params, input);
        extraCheck?.(bound);

        ctx.logDebug(`${tool} -> ${group.module}.${actionName}`);
        const result = await ctx
          .getBridgeClient()
          .call(group.module, actionName, bound);
        return toToolResponse(group.module, actionName, result);
      };
    }
  }

  return handlers;
}
