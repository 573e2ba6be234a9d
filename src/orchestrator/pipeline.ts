import {posix} from 'node:path'
import {
  BuildFailureError,
  BuildTimeoutError,
  CancellationError,
  EnvironmentFailureError,
  ExecTimeoutError,
  SpecTimeoutError,
  SpecValidationError,
  errorMessage,
  isFatal
} from '../errors.js'
import {anySignal, cancellationFrom, throwIfAborted} from '../core/cancellation.js'
import type {Logger} from '../core/logger.js'
import {silentLogger} from '../core/logger.js'
import type {EvalConfig} from '../config.js'
import type {AgentRegistry} from '../agent/agent-registry.js'
import type {EnvironmentManager} from '../engine/environment-manager.js'
import {defaultWorkdir} from '../engine/image-builder.js'
import type {ImageCache} from '../engine/image-cache.js'
import type {ContainerInstance} from '../engine/instance-registry.js'
import {ContainerWorkingTree} from '../engine/working-tree.js'
import type {PatchAnalyzer} from '../patch/patch-analyzer.js'
import type {TestRunner} from '../testing/test-runner.js'
import type {TestSelector} from '../testing/test-selector.js'
import {checkPreconditions, scoreVerdict} from '../testing/verdict.js'
import type {
  EvaluationSpec,
  FailureKind,
  PatchApplication,
  PipelineState,
  RecordStatus,
  ResultRecord,
  StageName,
  TestPhase,
  TestStatus,
  Verdict
} from '../types.js'
import type {Reporter} from './reporter.js'

export type PipelineContext = {
  runId: string;
  config: EvalConfig;
  images: ImageCache;
  manager: EnvironmentManager;
  agents: AgentRegistry;
  analyzer: PatchAnalyzer;
  selector: TestSelector;
  testRunner: TestRunner;
  reporter: Reporter;
  logger?: Logger;
}

/**
 * `drain` stops a pipeline at the next stage boundary; `abort` cancels the
 * stage in progress.
 */
export type PipelineSignals = {
  drain: AbortSignal;
  abort: AbortSignal;
}

type Outcome = {
  status: RecordStatus;
  verdict: Verdict | null;
  failure?: {kind: FailureKind; message: string};
}

/**
 * Mutable view of one pipeline run, turned into a `ResultRecord` at the end.
 */
class Attempt {
  state: PipelineState = 'Queued'
  image?: string
  agent?: ResultRecord['agent']
  readonly patches: ResultRecord['patches'] = {}
  selection?: ResultRecord['selection']
  readonly tests: Record<TestPhase, Record<string, TestStatus>> = {pre: {}, post: {}}
  readonly timings: Partial<Record<StageName, number>> = {}
  readonly startedAt = new Date()
  private stageStartedAt = Date.now()

  constructor(
    readonly spec: EvaluationSpec,
    readonly sequence: number
  ) {}

  enter(state: StageName | 'Scored'): void {
    this.closeStage()
    this.state = state
    this.stageStartedAt = Date.now()
  }

  closeStage(): void {
    if (this.state !== 'Queued' && this.state !== 'Scored' && this.state !== 'Done'
      && this.state !== 'Aborted' && this.state !== 'Failed') {
      this.timings[this.state] = Date.now() - this.stageStartedAt
    }
  }

  toRecord(runId: string, outcome: Outcome): ResultRecord {
    return {
      specId: this.spec.id,
      sequence: this.sequence,
      runId,
      status: outcome.status,
      verdict: outcome.verdict,
      lastState: this.state,
      image: this.image,
      agent: this.agent,
      patches: this.patches,
      selection: this.selection,
      tests: this.tests,
      timings: this.timings,
      failure: outcome.failure,
      startedAt: this.startedAt.toISOString(),
      finishedAt: new Date().toISOString()
    }
  }
}

function patchFailure(application: PatchApplication): Outcome {
  return {
    status: 'Done',
    verdict: 'Unresolved',
    failure: {
      kind: application.outcome === 'Malformed' ? 'PatchMalformed' : 'PatchConflict',
      message: application.detail ?? application.outcome
    }
  }
}

function failureKind(error: unknown): FailureKind {
  if (error instanceof BuildTimeoutError) {
    return 'BuildTimeout'
  }

  if (error instanceof BuildFailureError) {
    return 'BuildFailure'
  }

  if (error instanceof EnvironmentFailureError || error instanceof ExecTimeoutError) {
    return 'EnvironmentFailure'
  }

  if (error instanceof SpecValidationError) {
    return 'InvalidSpec'
  }

  if (error instanceof CancellationError) {
    return 'Cancelled'
  }

  return 'InternalError'
}

/**
 * Drives one spec through its stages:
 *
 * Queued → ImagePreparing → AgentRunning → PatchValidating → TestingPre →
 * TestingPost → Scored → Done
 *
 * Every stage outcome a spec can end on (agent failure, patch conflict,
 * precondition violation) is a result. Stage errors end the spec `Failed`,
 * cancellation ends it `Aborted`; only fatal errors propagate. The instance
 * is destroyed on every exit path.
 *
 * Inside the instance, the base checkout lives at the image workdir
 * (`/workspace/repo`); the agent works on a copy taken before the test
 * patch (`/workspace/agent`) and the candidate patch is applied to a copy of
 * the test-patched tree (`/workspace/post`), which replaces the checkout for
 * the post-patch phase.
 */
export class SpecPipeline {
  private readonly logger: Logger

  constructor(private readonly context: PipelineContext) {
    this.logger = context.logger ?? silentLogger
  }

  async run(spec: EvaluationSpec, sequence: number, signals: PipelineSignals): Promise<ResultRecord> {
    const attempt = new Attempt(spec, sequence)
    const {config} = this.context

    const budget = new AbortController()
    const timer = setTimeout(() => {
      budget.abort(new SpecTimeoutError(spec.id, config.instanceTimeoutMs))
    }, config.instanceTimeoutMs)
    const deadline = Date.now() + config.instanceTimeoutMs
    const signal = anySignal(signals.abort, budget.signal) ?? budget.signal

    const started: {instance?: ContainerInstance} = {}
    let outcome: Outcome
    try {
      outcome = await this.execute(attempt, signals.drain, signal, deadline, instance => {
        started.instance = instance
      })
    } catch (error) {
      if (isFatal(error)) {
        throw error
      }

      outcome = this.outcomeOf(error, signals.abort, budget.signal)
      if (outcome.status === 'Failed') {
        this.logger.warn({specId: spec.id, state: attempt.state, err: errorMessage(error)}, 'spec failed')
      }
    } finally {
      clearTimeout(timer)
      attempt.closeStage()
      if (started.instance) {
        await this.context.manager.destroy(started.instance)
      }
    }

    return attempt.toRecord(this.context.runId, outcome)
  }

  private outcomeOf(error: unknown, abort: AbortSignal, budget: AbortSignal): Outcome {
    if (abort.aborted || (error instanceof CancellationError && !budget.aborted)) {
      return {status: 'Aborted', verdict: null, failure: {kind: 'Cancelled', message: errorMessage(error)}}
    }

    if (budget.aborted) {
      return {status: 'Failed', verdict: 'Error', failure: {kind: 'Timeout', message: errorMessage(cancellationFrom(budget))}}
    }

    return {status: 'Failed', verdict: 'Error', failure: {kind: failureKind(error), message: errorMessage(error)}}
  }

  private async execute(
    attempt: Attempt,
    drain: AbortSignal,
    signal: AbortSignal,
    deadline: number,
    onInstance: (instance: ContainerInstance) => void
  ): Promise<Outcome> {
    const {config, images, manager, agents, analyzer, selector, testRunner} = this.context
    const {spec} = attempt
    const workdir = spec.environment.workdir ?? defaultWorkdir
    const root = posix.dirname(workdir)
    const agentPath = posix.join(root, 'agent')
    const postPath = posix.join(root, 'post')
    const prePath = posix.join(root, 'pre')

    const stage = (state: StageName | 'Scored') => {
      // A drained spec still gets scored once its tests have run
      if (state !== 'Scored') {
        throwIfAborted(drain)
      }

      throwIfAborted(signal)
      attempt.enter(state)
      this.context.reporter.emit({event: 'SPEC_STATE', runId: this.context.runId, specId: spec.id, sequence: attempt.sequence, state})
    }

    const log = (source: string) => (line: {stream: 'stdout' | 'stderr'; line: string}) => {
      this.context.reporter.emit({event: 'SPEC_LOG', runId: this.context.runId, specId: spec.id, source, ...line})
    }

    const agent = agents.resolve(spec)

    // -- ImagePreparing: image, instance, checkout, agent copy, test patch --
    stage('ImagePreparing')
    const image = await images.acquire({repository: spec.repository, environment: spec.environment}, signal)
    attempt.image = image.tag

    const instance = await manager.start(image.tag, {specId: spec.id, workdir, limits: config.limits, signal})
    onInstance(instance)

    const checkout = await manager.exec(instance, [
      'sh',
      '-c',
      'git -c advice.detachedHead=false checkout -q -f "$1" && git clean -fdq',
      'sh',
      spec.baseCommit
    ], {cwd: workdir, timeoutMs: config.commandTimeoutMs, signal})
    if (checkout.exitCode !== 0) {
      throw new EnvironmentFailureError(`Checkout of ${spec.baseCommit} failed: ${checkout.stderr.trim()}`)
    }

    const tree = new ContainerWorkingTree(manager, instance, workdir, {timeoutMs: config.commandTimeoutMs, signal})
    await tree.fork(agentPath)

    const testPatch = await analyzer.apply(tree, spec.testPatch)
    attempt.patches.test = testPatch
    if (testPatch.outcome === 'Conflict' || testPatch.outcome === 'Malformed') {
      return patchFailure(testPatch)
    }

    // -- AgentRunning --
    stage('AgentRunning')
    const agentTimeoutMs = Math.max(1, Math.min(agent.timeoutMs ?? Number.POSITIVE_INFINITY, deadline - Date.now()))
    const result = await agent.run({
      specId: spec.id,
      instance,
      prompt: spec.prompt,
      workspacePath: agentPath,
      timeoutMs: agentTimeoutMs,
      signal,
      onLogLine: log('agent')
    })
    attempt.agent = {name: agent.name, durationMs: result.durationMs}
    if (result.usage) {
      attempt.agent.usage = result.usage
    }

    if (!result.ok) {
      attempt.agent.failureReason = result.failureReason
      return {status: 'Done', verdict: 'Unresolved', failure: {kind: result.failureReason, message: result.detail}}
    }

    // -- PatchValidating: candidate patch on a copy of the test-patched tree --
    stage('PatchValidating')
    const postTree = await tree.fork(postPath)
    const candidate = await analyzer.apply(postTree, result.patch)
    attempt.patches.candidate = candidate
    if (candidate.outcome === 'Conflict' || candidate.outcome === 'Malformed') {
      return patchFailure(candidate)
    }

    // -- TestingPre --
    stage('TestingPre')
    const selection = await selector.select(spec, tree)
    attempt.selection = selection
    if (selection.failToPass.length === 0 && selection.passToPass.length === 0) {
      return {status: 'Done', verdict: 'Error', failure: {kind: 'NoTestsSelected', message: 'no test relates to the test patch'}}
    }

    const phaseOptions = {
      specId: spec.id,
      cwd: workdir,
      perTestTimeoutMs: config.tests.perTestTimeoutMs,
      workers: config.tests.workers,
      testCommand: spec.environment.testCommand ?? config.tests.command,
      signal,
      onLogLine: (testId: string, line: {stream: 'stdout' | 'stderr'; line: string}) => {
        log(`test ${testId}`)(line)
      }
    }

    const pre = Object.fromEntries(await testRunner.runPhase(instance, [...selection.failToPass, ...selection.passToPass], {...phaseOptions, phase: 'pre'}))
    attempt.tests.pre = pre

    const check = checkPreconditions(selection, pre)
    if (!check.ok) {
      return {status: 'Done', verdict: 'Error', failure: {kind: 'PreconditionViolation', message: check.violations.join('; ')}}
    }

    attempt.selection = check.selection

    // -- TestingPost: the patched copy takes the place of the checkout --
    stage('TestingPost')
    const swap = await manager.exec(instance, ['sh', '-c', 'mv "$1" "$3" && mv "$2" "$1"', 'sh', workdir, postPath, prePath], {
      cwd: root,
      timeoutMs: config.commandTimeoutMs,
      signal
    })
    if (swap.exitCode !== 0) {
      throw new EnvironmentFailureError(`Could not switch to the patched tree: ${swap.stderr.trim()}`)
    }

    const post = Object.fromEntries(await testRunner.runPhase(instance, [...check.selection.failToPass, ...check.selection.passToPass], {...phaseOptions, phase: 'post'}))
    attempt.tests.post = post

    stage('Scored')
    return {status: 'Done', verdict: scoreVerdict(check.selection, pre, post)}
  }
}
