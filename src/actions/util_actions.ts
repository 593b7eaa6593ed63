import {
  asNonEmptyString,
  asOptionalPositiveInteger,
  asOptionalString,
} from '../validation.js';

import { defineAction, jsonResult } from './types.js';
import type { ActionTable } from './types.js';

export const actions: ActionTable = {
  ue_print_message: defineAction({
    description: 'Write a message to the editor output log.',
    params: { message: asNonEmptyString },
    run({ message }, ctx) {
      ctx.host.log(`MCP Message: ${message}`);
      return jsonResult({
        received_message: message,
        success: true,
        source: 'ue_print_message',
      });
    },
  }),

  ue_get_output_log: defineAction({
    description:
      'Recent editor output log lines, optionally filtered by a case-insensitive keyword.',
    params: { line_count: asOptionalPositiveInteger, keyword: asOptionalString },
    run({ line_count, keyword }, ctx) {
      const all = ctx.host.getOutputLog();
      const needle = keyword?.toLowerCase();
      const filtered = needle
        ? all.filter((line) => line.toLowerCase().includes(needle))
        : all;
      const lines = filtered.slice(-(line_count ?? 50));

      return jsonResult({
        success: true,
        total_lines: all.length,
        returned_lines: lines.length,
        log: lines.join('\n'),
      });
    },
  }),
};
