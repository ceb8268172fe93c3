import Ajv2020 from 'ajv/dist/2020'
import type { ErrorObject, Schema, ValidateFunction } from 'ajv'

const ajv = new Ajv2020({ allErrors: true, strict: false })

export interface SchemaCheck {
  readonly schemaOk: boolean
  readonly schemaErrors: readonly string[]
}

export function formatSchemaErrors(errors: readonly ErrorObject[] | null | undefined): string[] {
  return Array.isArray(errors) ? errors.map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim()) : []
}

export function compileSchema<T>(schema: Schema): ValidateFunction<T> {
  return ajv.compile<T>(schema)
}

/** Validate a summary object and return the flags attached to JSON output. */
export function checkAgainst(validate: ValidateFunction<unknown>, value: unknown): SchemaCheck {
  const ok: boolean = validate(value)
  return { schemaOk: ok, schemaErrors: ok ? [] : formatSchemaErrors(validate.errors) }
}
