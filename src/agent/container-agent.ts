import {ExecTimeoutError} from '../errors.js'
import {throwIfAborted} from '../core/cancellation.js'
import type {ExecResult} from '../engine/runtime.js'
import type {TokenUsage} from './usage.js'
import {
  agentUsage,
  outputTail,
  renderCommand,
  writeAgentLog,
  type AgentContext,
  type AgentDefinition,
  type AgentExecutor,
  type AgentResult,
  type AgentRunRequest
} from './agent-executor.js'

const promptFile = '/tmp/evalkit-prompt.md'

/**
 * Runs the agent command inside the instance, in the agent workspace, then
 * collects everything it changed (untracked files included) as a diff.
 */
export class ContainerAgent implements AgentExecutor {
  readonly mode = 'container'

  constructor(
    readonly name: string,
    private readonly definition: AgentDefinition,
    private readonly context: AgentContext
  ) {}

  get timeoutMs(): number | undefined {
    return this.definition.timeoutMs
  }

  async run(request: AgentRunRequest): Promise<AgentResult> {
    const {manager} = this.context
    const {instance, workspacePath, signal} = request
    const startedAt = Date.now()
    let usage: TokenUsage | undefined
    const failed = (failureReason: 'Timeout' | 'CrashExit' | 'NoPatchProduced', detail: string): AgentResult =>
      ({ok: false, failureReason, detail, durationMs: Date.now() - startedAt, usage})

    const upload = await manager.exec(instance, ['sh', '-c', 'cat > "$1"', 'sh', promptFile], {
      input: request.prompt,
      timeoutMs: this.context.commandTimeoutMs,
      signal
    })
    if (upload.exitCode !== 0) {
      return failed('CrashExit', `could not write prompt file: ${outputTail(upload.stderr)}`)
    }

    for (const script of this.definition.setup ?? []) {
      const setup = await manager.exec(instance, ['sh', '-c', script], {
        cwd: workspacePath,
        env: this.definition.env,
        timeoutMs: this.context.commandTimeoutMs,
        signal,
        onLogLine: request.onLogLine
      })
      if (setup.exitCode !== 0) {
        return failed('CrashExit', `setup "${script}" exited with ${setup.exitCode}: ${outputTail(setup.stderr)}`)
      }
    }

    const seconds = Math.max(1, Math.ceil(request.timeoutMs / 1000))
    const command = renderCommand(this.definition.command, {prompt: request.prompt, workspace: workspacePath, promptFile})
    const cmd = ['timeout', '--kill-after=10', `${seconds}s`, ...command]

    let result: ExecResult
    try {
      result = await manager.exec(instance, cmd, {
        cwd: workspacePath,
        env: this.definition.env,
        timeoutMs: request.timeoutMs + this.context.graceMs,
        signal,
        onLogLine: request.onLogLine
      })
    } catch (error) {
      if (error instanceof ExecTimeoutError) {
        return failed('Timeout', `agent did not stop within ${request.timeoutMs}ms`)
      }

      throw error
    }

    const timedOut = result.exitCode === 124 || result.exitCode === 137
    usage = agentUsage(this.definition, result.stdout)
    await writeAgentLog(this.context.workspace, {
      specId: request.specId,
      agent: this.name,
      cmd,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      timedOut,
      stdout: result.stdout,
      stderr: result.stderr,
      usage
    })

    if (timedOut) {
      return failed('Timeout', `agent exceeded ${request.timeoutMs}ms`)
    }

    if (result.exitCode !== 0) {
      return failed('CrashExit', `agent exited with ${result.exitCode}: ${outputTail(result.stderr || result.stdout)}`)
    }

    throwIfAborted(signal)
    const diff = await manager.exec(instance, ['sh', '-c', 'git add -A && git diff --cached --no-renames --binary'], {
      cwd: workspacePath,
      timeoutMs: this.context.commandTimeoutMs,
      signal
    })
    if (diff.exitCode !== 0) {
      return failed('CrashExit', `could not collect the agent diff: ${outputTail(diff.stderr)}`)
    }

    if (diff.stdout.trim() === '') {
      return failed('NoPatchProduced', 'agent left the workspace unchanged')
    }

    return {ok: true, patch: diff.stdout, durationMs: Date.now() - startedAt, usage}
  }
}
