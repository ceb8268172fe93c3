const policy = {
  type: 'object',
  additionalProperties: false,
  properties: {
    intervalMs: { type: 'integer', minimum: 0 },
    maxAttempts: { type: 'integer', minimum: 1 }
  }
} as const

const variables = {
  type: 'object',
  propertyNames: { pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
  additionalProperties: { type: 'string', minLength: 1 }
} as const

const service = {
  type: 'object',
  additionalProperties: false,
  properties: {
    sourceDir: { type: 'string', minLength: 1 },
    healthPath: { type: 'string', pattern: '^/' },
    variables
  }
} as const

/**
 * JSON Schema for `deploy.config.json`. Unknown keys are rejected so typos
 * surface before any platform call.
 */
export const deployConfigSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: false,
  properties: {
    $schema: { type: 'string' },
    appName: { type: 'string', pattern: '^[a-z0-9][a-z0-9-]*$' },
    database: {
      type: 'object',
      additionalProperties: false,
      properties: {
        sourceDir: { type: 'string', minLength: 1 },
        variables,
        bootstrapFile: { type: 'string', minLength: 1 },
        table: { type: 'string', pattern: '^[A-Za-z_][A-Za-z0-9_]*$' },
        requiredColumns: { type: 'array', items: { type: 'string', minLength: 1 } }
      }
    },
    backend: service,
    frontend: service,
    polling: {
      type: 'object',
      additionalProperties: false,
      properties: { deploy: policy, database: policy, health: policy, smoke: policy }
    },
    smoke: {
      type: 'object',
      additionalProperties: false,
      properties: {
        mode: { enum: ['warn', 'fail'] },
        settleMs: { type: 'integer', minimum: 0 },
        apiPaths: { type: 'array', items: { type: 'string', pattern: '^/' } }
      }
    }
  }
} as const
