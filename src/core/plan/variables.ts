import type { DeploymentResult, ServiceRole, VariableEntry, VariableSet } from '../../types/deployment'
import { UnresolvedVariableError } from '../../utils/errors'
import type { ServiceSpec, VariableRef } from './service-spec'

/** Looks up a late-bound value outside this run (platform, state, config). */
export type ReferenceSource = (ref: VariableRef) => Promise<string | undefined>

export function outputOf(result: DeploymentResult, output: VariableRef['output']): string | undefined {
  return output === 'URL' ? result.url : result.outputs[output]
}

/**
 * Resolve a service's declarations into a concrete VariableSet. References
 * are read from results of this run first, then from `fallback` when given.
 * Fails before any external call on an empty or unresolvable value.
 */
export async function resolveVariables(
  spec: ServiceSpec,
  results: ReadonlyMap<ServiceRole, DeploymentResult>,
  fallback?: ReferenceSource
): Promise<VariableSet> {
  const out: VariableEntry[] = []
  for (const decl of spec.variables) {
    let value: string | undefined
    if (decl.source.kind === 'literal') {
      value = decl.source.value
    } else {
      const { ref } = decl.source
      const producer: DeploymentResult | undefined = results.get(ref.role)
      if (producer !== undefined && producer.status === 'deployed') value = outputOf(producer, ref.output)
      if ((value === undefined || value.length === 0) && fallback !== undefined) value = await fallback(ref)
      if (value === undefined || value.length === 0) {
        const detail: string = producer === undefined
          ? `no ${ref.role} deployment in this run and no persisted ${ref.output}`
          : `${ref.role} did not produce ${ref.output}`
        throw new UnresolvedVariableError(spec.name, decl.name, detail)
      }
    }
    if (value.trim().length === 0) throw new UnresolvedVariableError(spec.name, decl.name, 'value is empty')
    out.push({ name: decl.name, value })
  }
  return Object.freeze(out)
}
