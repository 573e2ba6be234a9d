import {ConfigurationError, SpecValidationError} from '../errors.js'
import type {EvaluationSpec} from '../types.js'
import type {AgentContext, AgentDefinition, AgentExecutor} from './agent-executor.js'
import {ContainerAgent} from './container-agent.js'
import {LocalAgent} from './local-agent.js'

/**
 * Agents known to a run, resolved per spec (`spec.agent`, else the run
 * default). Executors are built once per name.
 */
export class AgentRegistry {
  private readonly executors = new Map<string, AgentExecutor>()

  constructor(
    private readonly definitions: Record<string, AgentDefinition>,
    private readonly defaultName: string,
    private readonly context: AgentContext
  ) {
    if (!Object.hasOwn(definitions, defaultName)) {
      throw new ConfigurationError(`Unknown default agent "${defaultName}" (known: ${Object.keys(definitions).join(', ') || 'none'})`)
    }
  }

  get names(): string[] {
    return Object.keys(this.definitions)
  }

  resolve(spec: EvaluationSpec): AgentExecutor {
    const name = spec.agent ?? this.defaultName
    const existing = this.executors.get(name)
    if (existing) {
      return existing
    }

    const definition = Object.hasOwn(this.definitions, name) ? this.definitions[name] : undefined
    if (!definition) {
      throw new SpecValidationError(`Spec ${spec.id} names unknown agent "${name}"`)
    }

    const executor = definition.mode === 'local'
      ? new LocalAgent(name, definition, this.context)
      : new ContainerAgent(name, definition, this.context)
    this.executors.set(name, executor)
    return executor
  }
}
