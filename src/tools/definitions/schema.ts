export type JsonSchema = Record<string, unknown>;

export type JsonSchemaProperties = Record<string, JsonSchema>;

export type ObjectSchema = {
  type: 'object';
  properties?: JsonSchemaProperties;
  required?: string[];
  [keyword: string]: unknown;
};

export function strictObjectSchema(options: {
  properties?: JsonSchemaProperties;
  required?: string[];
  description?: string;
}): ObjectSchema {
  const { properties, required, description } = options;
  return {
    type: 'object',
    ...(description ? { description } : {}),
    additionalProperties: false,
    ...(properties ? { properties } : { properties: {} }),
    ...(required ? { required } : {}),
  };
}

export function looseObjectSchema(options: {
  description?: string;
}): ObjectSchema {
  const { description } = options;
  return {
    type: 'object',
    ...(description ? { description } : {}),
  };
}

/** `[x, y, z]` as the bridge passes vectors and rotators through. */
export function vector3Schema(description: string): JsonSchema {
  return {
    type: 'array',
    description,
    items: { type: 'number' },
    minItems: 3,
    maxItems: 3,
  };
}

export function stringSchema(description: string): JsonSchema {
  return { type: 'string', description };
}
