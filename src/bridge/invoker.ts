import type {
  ActionContext,
  ActionDefinition,
  ParamSchema,
  ParamsOf,
} from '../actions/types.js';
import { ValidationError, valueType } from '../validation.js';

import { getErrorMessage, getErrorTypeName } from './errors.js';
import { errorEnvelope, successEnvelope } from './protocol.js';
import type { ResponseEnvelope } from './protocol.js';

const RETURN_PREVIEW_CHARS = 200;

/**
 * Binds request arguments to an action's parameters by name. Keys the action
 * does not declare are rejected, as are missing or ill-typed required ones.
 */
export function bindArguments(
  schema: ParamSchema,
  args: Record<string, unknown>,
): ParamsOf<ParamSchema> {
  for (const key of Object.keys(args)) {
    if (!Object.prototype.hasOwnProperty.call(schema, key)) {
      throw new ValidationError(
        key,
        `Unexpected argument "${key}"`,
        valueType(args[key]),
      );
    }
  }

  const bound: Record<string, unknown> = {};
  for (const [key, parse] of Object.entries(schema)) {
    bound[key] = parse(args[key], key);
  }
  return bound;
}

/**
 * Runs one action and folds whatever happens into a response envelope.
 * Nothing thrown by the action escapes this function.
 */
export async function invokeAction(
  qualifiedName: string,
  action: ActionDefinition,
  args: Record<string, unknown>,
  ctx: ActionContext,
): Promise<ResponseEnvelope> {
  let params: ParamsOf<ParamSchema>;
  try {
    params = bindArguments(action.params, args);
  } catch (error) {
    if (error instanceof ValidationError) {
      return errorEnvelope(
        'ValidationError',
        `Invalid arguments for '${qualifiedName}': ${error.message}`,
      );
    }
    return errorEnvelope(
      getErrorTypeName(error),
      getErrorMessage(error),
      error instanceof Error ? error.stack : undefined,
    );
  }

  let returned: unknown;
  try {
    returned = await action.run(params, ctx);
  } catch (error) {
    return errorEnvelope(
      getErrorTypeName(error),
      getErrorMessage(error),
      error instanceof Error ? error.stack : undefined,
    );
  }

  if (typeof returned !== 'string') {
    return errorEnvelope(
      'InvalidReturnType',
      `Function '${qualifiedName}' returned a non-string type. Returned type: ${valueType(returned)}`,
    );
  }

  try {
    JSON.parse(returned);
  } catch (error) {
    return errorEnvelope(
      'InvalidReturnFormat',
      `Function '${qualifiedName}' did not return a valid JSON string. Error: ${getErrorMessage(error)}. Returned: ${returned.slice(0, RETURN_PREVIEW_CHARS)}`,
    );
  }

  return successEnvelope(returned);
}
