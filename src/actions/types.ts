import { isRecord } from '../validation.js';
import type { FieldParser } from '../validation.js';
import type { EditorHost } from '../host/types.js';

export type ParamSchema = Record<string, FieldParser<unknown>>;

export type ParamsOf<S extends ParamSchema> = {
  [K in keyof S]: ReturnType<S[K]>;
};

export interface ActionContext {
  host: EditorHost;
  logDebug: (message: string) => void;
}

/**
 * A single bridge action. `params` names every keyword the action accepts;
 * the invoker binds request arguments through it before `run` is called.
 *
 * `run` must return JSON text. The invoker checks that at runtime, since
 * modules loaded from the reload directory are not type-checked.
 */
export interface ActionDefinition<S extends ParamSchema = ParamSchema> {
  kind: 'action';
  description: string;
  params: S;
  run(params: ParamsOf<S>, ctx: ActionContext): unknown;
}

export type ActionTable = Record<string, ActionDefinition>;

/** Shape every action module exports, built-in or reloaded. */
export interface ActionModule {
  actions: ActionTable;
}

export function defineAction<S extends ParamSchema>(definition: {
  description: string;
  params: S;
  run(params: ParamsOf<S>, ctx: ActionContext): unknown;
}): ActionDefinition<S> {
  return { kind: 'action', ...definition };
}

export function isActionDefinition(value: unknown): value is ActionDefinition {
  if (!isRecord(value)) return false;
  if (value.kind !== 'action' || typeof value.run !== 'function') return false;
  const params = value.params;
  if (!isRecord(params)) return false;
  return Object.values(params).every((parser) => typeof parser === 'function');
}

export function isActionModule(value: unknown): value is ActionModule {
  return isRecord(value) && isRecord(value.actions);
}

export function jsonResult(payload: Record<string, unknown>): string {
  return JSON.stringify(payload);
}

export function actionFailure(message: string): string {
  return JSON.stringify({ success: false, message });
}
