import {writeFile} from 'node:fs/promises'
import {execa} from 'execa'
import {cancellationFrom, throwIfAborted} from '../core/cancellation.js'
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

/**
 * Runs the agent as a host process.
 *
 * The agent workspace is copied out of the instance into
 * `agent/<spec>` under the work directory; the agent works there with the
 * host environment (plus its configured `env`) and the diff is collected on
 * the host. The host copy is removed once the diff is collected.
 */
export class LocalAgent implements AgentExecutor {
  readonly mode = 'local'

  constructor(
    readonly name: string,
    private readonly definition: AgentDefinition,
    private readonly context: AgentContext
  ) {}

  get timeoutMs(): number | undefined {
    return this.definition.timeoutMs
  }

  async run(request: AgentRunRequest): Promise<AgentResult> {
    const {workspace} = this.context
    const hostDir = await workspace.prepareAgentDir(request.specId)
    try {
      return await this.runIn(hostDir, request)
    } finally {
      await workspace.discardAgentDir(request.specId)
    }
  }

  private async runIn(hostDir: string, request: AgentRunRequest): Promise<AgentResult> {
    const {manager, workspace, logger} = this.context
    const {signal} = request
    const startedAt = Date.now()
    let usage: TokenUsage | undefined
    const failed = (failureReason: 'Timeout' | 'CrashExit' | 'NoPatchProduced', detail: string): AgentResult =>
      ({ok: false, failureReason, detail, durationMs: Date.now() - startedAt, usage})

    await manager.copyOut(request.instance, request.workspacePath, hostDir)
    const promptFile = workspace.agentPromptPath(request.specId)
    await writeFile(promptFile, request.prompt, 'utf8')
    throwIfAborted(signal)

    const [file, ...args] = renderCommand(this.definition.command, {prompt: request.prompt, workspace: hostDir, promptFile})
    logger.debug({specId: request.specId, agent: this.name, hostDir}, 'starting local agent')

    const proc = execa(file, args, {
      cwd: hostDir,
      env: this.definition.env,
      reject: false,
      timeout: request.timeoutMs,
      cancelSignal: signal
    })

    if (request.onLogLine) {
      const {onLogLine} = request
      await Promise.all((['stdout', 'stderr'] as const).map(async stream => {
        for await (const line of proc.iterable({from: stream})) {
          onLogLine({stream, line: String(line)})
        }
      }))
    }

    const result = await proc
    if (result.isCanceled && signal) {
      throw cancellationFrom(signal)
    }

    usage = agentUsage(this.definition, result.stdout)
    await writeAgentLog(workspace, {
      specId: request.specId,
      agent: this.name,
      cmd: [file, ...args],
      exitCode: result.exitCode,
      durationMs: result.durationMs,
      timedOut: result.timedOut,
      stdout: result.stdout,
      stderr: result.stderr,
      usage
    })

    if (result.timedOut) {
      return failed('Timeout', `agent exceeded ${request.timeoutMs}ms`)
    }

    if (result.exitCode !== 0) {
      const reason = result.exitCode === undefined ? `was killed (${result.signal ?? 'not started'})` : `exited with ${result.exitCode}`
      return failed('CrashExit', `agent ${reason}: ${outputTail(result.stderr || result.stdout)}`)
    }

    const staged = await execa('git', ['add', '-A'], {cwd: hostDir, reject: false, cancelSignal: signal})
    const diff = staged.exitCode === 0
      ? await execa('git', ['diff', '--cached', '--no-renames', '--binary'], {cwd: hostDir, reject: false, stripFinalNewline: false, cancelSignal: signal})
      : staged
    if (diff.isCanceled && signal) {
      throw cancellationFrom(signal)
    }

    if (diff.exitCode !== 0) {
      return failed('CrashExit', `could not collect the agent diff: ${outputTail(diff.stderr)}`)
    }

    if (diff.stdout.trim() === '') {
      return failed('NoPatchProduced', 'agent left the workspace unchanged')
    }

    return {ok: true, patch: diff.stdout, durationMs: Date.now() - startedAt, usage}
  }
}
