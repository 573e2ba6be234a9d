import type {Logger} from '../core/logger.js'
import type {EnvironmentManager} from '../engine/environment-manager.js'
import type {ContainerInstance} from '../engine/instance-registry.js'
import type {OnLogLine} from '../engine/runtime.js'
import {writeJsonAtomic, type Workspace} from '../engine/workspace.js'
import type {AgentFailureReason} from '../types.js'
import {parseUsage, type TokenUsage, type UsageFormat} from './usage.js'

export type AgentMode = 'container' | 'local'

/**
 * An agent as declared in the configuration.
 *
 * `command` is an argv template: `{prompt}`, `{workspace}` and `{promptFile}`
 * are substituted in every element.
 */
export type AgentDefinition = {
  mode: AgentMode;
  command: string[];
  env?: Record<string, string>;
  /** Overrides the instance budget for the agent stage */
  timeoutMs?: number;
  /** Shell commands run in the instance before the agent (container mode) */
  setup?: string[];
  /** Format of the token usage the agent prints on stdout */
  usage?: UsageFormat;
}

export type AgentRunRequest = {
  specId: string;
  instance: ContainerInstance;
  prompt: string;
  /** Agent workspace inside the instance */
  workspacePath: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onLogLine?: OnLogLine;
}

export type AgentResult =
  | {ok: true; patch: string; durationMs: number; usage?: TokenUsage}
  | {ok: false; failureReason: AgentFailureReason; detail: string; durationMs: number; usage?: TokenUsage}

/**
 * Capability shared by container and local agents. Failures of the agent
 * itself are results; only cancellation and environment errors are thrown.
 */
export type AgentExecutor = {
  readonly name: string;
  readonly mode: AgentMode;
  readonly timeoutMs?: number;
  run(request: AgentRunRequest): Promise<AgentResult>;
}

export type AgentContext = {
  manager: EnvironmentManager;
  workspace: Workspace;
  /** Timeout of bookkeeping commands (prompt upload, diff collection) */
  commandTimeoutMs: number;
  /** Margin between the in-instance `timeout` and the hard exec timeout */
  graceMs: number;
  logger: Logger;
}

export type AgentLog = {
  specId: string;
  agent: string;
  cmd: string[];
  exitCode?: number;
  durationMs: number;
  timedOut: boolean;
  stdout: string;
  stderr: string;
  usage?: TokenUsage;
}

export type PromptValues = {
  prompt: string;
  workspace: string;
  promptFile: string;
}

const placeholder = /{(prompt|workspace|promptFile)}/g

/**
 * Substitutes placeholders in one pass, so a prompt containing `{workspace}`
 * is passed through as written.
 */
export function renderCommand(template: string[], values: PromptValues): string[] {
  const lookup: Record<string, string> = {...values}
  return template.map(arg => arg.replaceAll(placeholder, (match, key: string) => lookup[key] ?? match))
}

/** Last lines of a process output, for failure details. */
export function outputTail(output: string, lines = 10): string {
  return output.trimEnd().split('\n').slice(-lines).join('\n')
}

/**
 * Token usage in an agent's stdout, when the agent declares a usage format.
 */
export function agentUsage(definition: AgentDefinition, stdout: string): TokenUsage | undefined {
  return definition.usage ? parseUsage(definition.usage, stdout) : undefined
}

export async function writeAgentLog(workspace: Workspace, log: AgentLog): Promise<void> {
  await writeJsonAtomic(workspace.agentLogPath(log.specId), log)
}
