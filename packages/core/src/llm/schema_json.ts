/**
 * AJV JSON Schema for the SQL plan the model returns.
 */

export const sqlPlanSchema = {
  type: 'object',
  properties: {
    sql: { type: 'string', minLength: 1 },
    assumptions: {
      type: 'array',
      items: { type: 'string' },
      default: [],
    },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
  },
  required: ['sql', 'assumptions'],
  additionalProperties: true,
} as const;
