/** Tool manifest served at /.well-known/mcp-schema.json */

export const QUERY_TOOL_NAME = 'query_sql';

export const TOOL_MANIFEST = {
  tools: [
    {
      name: QUERY_TOOL_NAME,
      description: 'Run a SELECT SQL query on the dataset.',
      input_schema: {
        type: 'object',
        properties: {
          query: { type: 'string' },
        },
        required: ['query'],
      },
      output_schema: {
        type: 'object',
        properties: {
          result: {
            type: 'array',
            items: { type: 'object' },
          },
        },
      },
    },
  ],
} as const;
