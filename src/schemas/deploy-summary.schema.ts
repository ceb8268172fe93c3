const errorInfo = {
  type: 'object',
  additionalProperties: true,
  required: ['code', 'message'],
  properties: {
    code: { type: 'string', minLength: 1 },
    message: { type: 'string' },
    remedy: { type: 'string' },
    step: { type: 'string' },
    command: { type: 'string' },
    exitCode: { type: 'integer' },
    elapsedMs: { type: 'integer', minimum: 0 },
    lastError: { type: 'string' }
  }
} as const

/**
 * JSON Schema for the final JSON object emitted by `deploy-all`.
 * Keep broad to avoid breaking changes; tests pin the stricter shape.
 */
export const deploySummarySchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  type: 'object',
  additionalProperties: true,
  required: ['ok', 'action', 'status', 'environment', 'target', 'results', 'final'],
  properties: {
    ok: { type: 'boolean' },
    action: { const: 'deploy' },
    status: { enum: ['success', 'failed', 'aborted'] },
    environment: { enum: ['staging', 'production'] },
    target: { enum: ['all', 'database', 'backend', 'frontend', 'verify'] },
    results: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: true,
        required: ['role', 'service', 'status', 'startedAt', 'finishedAt'],
        properties: {
          role: { enum: ['database', 'backend', 'frontend'] },
          service: { type: 'string', minLength: 1 },
          status: { enum: ['pending', 'deployed', 'failed', 'timed-out'] },
          url: { type: 'string' },
          error: errorInfo,
          startedAt: { type: 'string' },
          finishedAt: { type: 'string' },
          transitions: { type: 'array', items: { type: 'string' } }
        }
      }
    },
    warnings: { type: 'array', items: { type: 'string' } },
    smoke: {
      type: 'object',
      required: ['healthy', 'checks'],
      properties: {
        healthy: { type: 'boolean' },
        checks: { type: 'array' }
      }
    },
    error: errorInfo,
    final: { const: true },
    schemaOk: { type: 'boolean' },
    schemaErrors: { type: 'array', items: { type: 'string' } }
  }
} as const
