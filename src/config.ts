import {isPlainObject, mergeWith} from 'lodash-es'
import {ConfigurationError} from './errors.js'
import type {AgentDefinition} from './agent/agent-executor.js'
import {usageFormats, type UsageFormat} from './agent/usage.js'
import type {RetryPolicy} from './core/retry.js'
import type {PatchOptions} from './patch/patch-analyzer.js'
import {defaultTestCommand} from './testing/pytest-parser.js'
import type {ResourceLimits} from './types.js'

export type RetrySettings = Pick<RetryPolicy, 'maxAttempts' | 'backoffMs'>

/**
 * Configuration consumed by the orchestrator. Validated before the first
 * spec is scheduled.
 */
export type EvalConfig = {
  /** Specs in flight at once */
  concurrency: number;
  /** Wall-clock budget of one spec, from image preparation to scoring */
  instanceTimeoutMs: number;
  /** Time in-flight specs get after a shutdown request before they are aborted */
  gracePeriodMs: number;
  /** Timeout of bookkeeping commands in an instance (checkout, file access, diffs) */
  commandTimeoutMs: number;
  /** Margin between an in-instance `timeout` and the hard exec timeout */
  execGraceMs: number;
  network: 'none' | 'bridge';
  limits: ResourceLimits;
  image: {
    baseImage: string;
    buildTimeoutMs: number;
    negativeTtlMs: number;
    retry: RetrySettings;
  };
  /** Default agent name */
  agent: string;
  agents: Record<string, AgentDefinition>;
  tests: {
    workers: number;
    perTestTimeoutMs: number;
    maxPassToPass: number;
    command: string[];
  };
  patch: PatchOptions;
  cleanup: {
    retry: RetrySettings;
  };
}

export const defaultConfig: EvalConfig = {
  concurrency: 4,
  instanceTimeoutMs: 2 * 60 * 60 * 1000,
  gracePeriodMs: 30_000,
  commandTimeoutMs: 5 * 60 * 1000,
  execGraceMs: 10_000,
  network: 'bridge',
  limits: {},
  image: {
    baseImage: 'python:3.11',
    buildTimeoutMs: 30 * 60 * 1000,
    negativeTtlMs: 10 * 60 * 1000,
    retry: {maxAttempts: 3, backoffMs: [5000, 30_000]}
  },
  agent: '',
  agents: {},
  tests: {
    workers: 4,
    perTestTimeoutMs: 120_000,
    maxPassToPass: 50,
    command: defaultTestCommand
  },
  patch: {fuzz: 2, maxOffset: 200},
  cleanup: {
    retry: {maxAttempts: 5, backoffMs: [500, 1000, 2000, 4000]}
  }
}

type Fields = Record<string, unknown>

function invalid(path: string, expected: string): ConfigurationError {
  return new ConfigurationError(`Invalid configuration: "${path}" must be ${expected}`)
}

function isFields(value: unknown): value is Fields {
  return isPlainObject(value)
}

function section(parent: Fields, key: string, path: string): Fields {
  const value = parent[key]
  if (!isFields(value)) {
    throw invalid(path, 'an object')
  }

  return value
}

function numberField(parent: Fields, key: string, path: string, options: {min: number; integer?: boolean}): number {
  const value = parent[key]
  if (typeof value !== 'number' || Number.isNaN(value) || value < options.min || (options.integer && !Number.isInteger(value))) {
    throw invalid(path, `${options.integer ? 'an integer' : 'a number'} >= ${options.min}`)
  }

  return value
}

function optionalNumber(parent: Fields, key: string, path: string, options: {min: number; integer?: boolean}): number | undefined {
  return parent[key] === undefined ? undefined : numberField(parent, key, path, options)
}

function stringField(parent: Fields, key: string, path: string): string {
  const value = parent[key]
  if (typeof value !== 'string' || value === '') {
    throw invalid(path, 'a non-empty string')
  }

  return value
}

function optionalString(parent: Fields, key: string, path: string): string | undefined {
  return parent[key] === undefined ? undefined : stringField(parent, key, path)
}

function stringList(value: unknown, path: string, options?: {nonEmpty?: boolean}): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string') || (options?.nonEmpty && value.length === 0)) {
    throw invalid(path, options?.nonEmpty ? 'a non-empty list of strings' : 'a list of strings')
  }

  return value.map(String)
}

function stringRecord(value: unknown, path: string): Record<string, string> {
  if (!isFields(value)) {
    throw invalid(path, 'a map of strings')
  }

  const entries = Object.entries(value).map(([key, item]): [string, string] => {
    if (typeof item !== 'string' && typeof item !== 'number' && typeof item !== 'boolean') {
      throw invalid(`${path}.${key}`, 'a string')
    }

    return [key, String(item)]
  })
  return Object.fromEntries(entries)
}

function retrySettings(parent: Fields, path: string): RetrySettings {
  const retry = section(parent, 'retry', path)
  const backoffMs = retry.backoffMs
  if (!Array.isArray(backoffMs) || !backoffMs.every(item => typeof item === 'number' && item >= 0)) {
    throw invalid(`${path}.backoffMs`, 'a list of non-negative numbers')
  }

  return {
    maxAttempts: numberField(retry, 'maxAttempts', `${path}.maxAttempts`, {min: 1, integer: true}),
    backoffMs: backoffMs.map(Number)
  }
}

function usageFormat(value: unknown, path: string): UsageFormat | undefined {
  if (value === undefined) {
    return undefined
  }

  const format = usageFormats.find(candidate => candidate === value)
  if (!format) {
    throw invalid(path, `one of ${usageFormats.map(candidate => `"${candidate}"`).join(', ')}`)
  }

  return format
}

function agentDefinition(value: unknown, path: string): AgentDefinition {
  if (!isFields(value)) {
    throw invalid(path, 'an object')
  }

  const {mode} = value
  if (mode !== 'container' && mode !== 'local') {
    throw invalid(`${path}.mode`, '"container" or "local"')
  }

  return {
    mode,
    command: stringList(value.command, `${path}.command`, {nonEmpty: true}),
    env: value.env === undefined ? undefined : stringRecord(value.env, `${path}.env`),
    timeoutMs: optionalNumber(value, 'timeoutMs', `${path}.timeoutMs`, {min: 1}),
    setup: value.setup === undefined ? undefined : stringList(value.setup, `${path}.setup`),
    usage: usageFormat(value.usage, `${path}.usage`)
  }
}

/**
 * Checks a merged configuration and returns it typed.
 * @throws ConfigurationError naming the first offending field
 */
export function validateConfig(value: unknown): EvalConfig {
  if (!isFields(value)) {
    throw new ConfigurationError('Invalid configuration: expected an object')
  }

  const {network} = value
  if (network !== 'none' && network !== 'bridge') {
    throw invalid('network', '"none" or "bridge"')
  }

  const limits = section(value, 'limits', 'limits')
  const image = section(value, 'image', 'image')
  const tests = section(value, 'tests', 'tests')
  const patch = section(value, 'patch', 'patch')
  const cleanup = section(value, 'cleanup', 'cleanup')
  const agentsSection = section(value, 'agents', 'agents')

  const agents = Object.fromEntries(Object.entries(agentsSection)
    .map(([name, definition]): [string, AgentDefinition] => [name, agentDefinition(definition, `agents.${name}`)]))
  if (Object.keys(agents).length === 0) {
    throw new ConfigurationError('Invalid configuration: no agent is defined under "agents"')
  }

  const agent = stringField(value, 'agent', 'agent')
  if (!Object.hasOwn(agents, agent)) {
    throw invalid('agent', `one of the defined agents (${Object.keys(agents).join(', ')})`)
  }

  return {
    concurrency: numberField(value, 'concurrency', 'concurrency', {min: 1, integer: true}),
    instanceTimeoutMs: numberField(value, 'instanceTimeoutMs', 'instanceTimeoutMs', {min: 1}),
    gracePeriodMs: numberField(value, 'gracePeriodMs', 'gracePeriodMs', {min: 0}),
    commandTimeoutMs: numberField(value, 'commandTimeoutMs', 'commandTimeoutMs', {min: 1}),
    execGraceMs: numberField(value, 'execGraceMs', 'execGraceMs', {min: 0}),
    network,
    limits: {
      cpus: optionalNumber(limits, 'cpus', 'limits.cpus', {min: 0.01}),
      memory: optionalString(limits, 'memory', 'limits.memory'),
      gpus: optionalString(limits, 'gpus', 'limits.gpus'),
      visibleDevices: limits.visibleDevices === undefined ? undefined : String(limits.visibleDevices)
    },
    image: {
      baseImage: stringField(image, 'baseImage', 'image.baseImage'),
      buildTimeoutMs: numberField(image, 'buildTimeoutMs', 'image.buildTimeoutMs', {min: 1}),
      negativeTtlMs: numberField(image, 'negativeTtlMs', 'image.negativeTtlMs', {min: 0}),
      retry: retrySettings(image, 'image.retry')
    },
    agent,
    agents,
    tests: {
      workers: numberField(tests, 'workers', 'tests.workers', {min: 1, integer: true}),
      perTestTimeoutMs: numberField(tests, 'perTestTimeoutMs', 'tests.perTestTimeoutMs', {min: 1000}),
      maxPassToPass: numberField(tests, 'maxPassToPass', 'tests.maxPassToPass', {min: 0, integer: true}),
      command: stringList(tests.command, 'tests.command', {nonEmpty: true})
    },
    patch: {
      fuzz: numberField(patch, 'fuzz', 'patch.fuzz', {min: 0, integer: true}),
      maxOffset: numberField(patch, 'maxOffset', 'patch.maxOffset', {min: 0, integer: true})
    },
    cleanup: {
      retry: retrySettings(cleanup, 'cleanup.retry')
    }
  }
}

/**
 * Merges configuration layers over the defaults, later layers winning.
 * Lists replace each other instead of merging by index.
 */
export function mergeConfig(...layers: unknown[]): EvalConfig {
  const merged: unknown = mergeWith(
    {},
    defaultConfig,
    ...layers.filter(layer => isFields(layer)),
    (_target: unknown, source: unknown) => Array.isArray(source) ? [...source] : undefined
  )
  return validateConfig(merged)
}
