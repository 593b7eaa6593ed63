import type { ObjectSchema } from './schema.js';

export type ToolDefinition = {
  name: string;
  description?: string;
  inputSchema: ObjectSchema;
};
