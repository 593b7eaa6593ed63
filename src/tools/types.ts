export interface ToolResponse {
  ok: boolean;
  summary: string;
  details?: Record<string, unknown>;
  logs?: string[];
}

export type ToolHandler = (args: unknown) => Promise<ToolResponse>;
