/**
 * Runtime JSON Schema for Hookrail config files, validated with ajv.
 *
 * Kept as a plain object so it can be fed directly to
 * `new Ajv().compile(FILTERS_CONFIG_JSON_SCHEMA)`.
 */

const stepReferenceSchema = {
  type: 'string' as const,
  minLength: 1,
};

export const FILTERS_CONFIG_JSON_SCHEMA = {
  $id: 'https://hookrail.dev/schemas/filters-config.json',
  type: 'object' as const,
  additionalProperties: true,

  $defs: {
    stepReference: stepReferenceSchema,

    filterTable: {
      type: 'object' as const,
      additionalProperties: true,
      properties: {
        pipeline: {
          anyOf: [
            { $ref: '#/$defs/stepReference' },
            { type: 'array', items: { $ref: '#/$defs/stepReference' } },
            { type: 'null' },
          ],
        },
        fail_silently: { type: 'boolean' },
        log_level: { type: 'string' },
      },
    },

    filterValue: {
      anyOf: [
        { type: 'string' },
        { type: 'array', items: { $ref: '#/$defs/stepReference' } },
        { $ref: '#/$defs/filterTable' },
        { type: 'null' },
      ],
    },
  },

  properties: {
    filters: {
      type: 'object',
      additionalProperties: { $ref: '#/$defs/filterValue' },
    },
  },
} as const;
