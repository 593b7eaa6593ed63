import type { ActionModule } from './types.js';

export type ActionModuleLoader = () => Promise<ActionModule>;

/** Modules compiled into the bridge. Keys are the wire-level module names. */
export const BUILTIN_ACTION_MODULES: Record<string, ActionModuleLoader> = {
  actor_actions: () => import('./actor_actions.js'),
  asset_actions: () => import('./asset_actions.js'),
  util_actions: () => import('./util_actions.js'),
};
