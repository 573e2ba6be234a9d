import pLimit from 'p-limit'
import {CancellationError, errorMessage} from '../errors.js'
import type {Logger} from '../core/logger.js'
import {silentLogger} from '../core/logger.js'
import type {EvalConfig} from '../config.js'
import {AgentRegistry} from '../agent/agent-registry.js'
import {EnvironmentManager} from '../engine/environment-manager.js'
import {ImageBuilder} from '../engine/image-builder.js'
import {ImageCache, type ImageCacheEvent} from '../engine/image-cache.js'
import {InstanceRegistry} from '../engine/instance-registry.js'
import type {ContainerRuntime} from '../engine/runtime.js'
import {Workspace} from '../engine/workspace.js'
import {PatchAnalyzer} from '../patch/patch-analyzer.js'
import {TestRunner} from '../testing/test-runner.js'
import {TestSelector} from '../testing/test-selector.js'
import type {EvaluationSpec, ResultRecord} from '../types.js'
import {SpecPipeline} from './pipeline.js'
import type {ImageBuildEvent, Reporter} from './reporter.js'
import {ResultsLog} from './results-log.js'

export type OrchestratorOptions = {
  config: EvalConfig;
  runtime: ContainerRuntime;
  workspace: Workspace;
  reporter: Reporter;
  runId?: string;
  logger?: Logger;
}

export type RunOptions = {
  /** Skip specs already completed in the work directory's results log */
  resume?: boolean;
}

export type RunSummary = {
  runId: string;
  attempted: number;
  resolved: number;
  unresolved: number;
  errors: number;
  aborted: number;
  skipped: number;
  /** A shutdown was requested before every spec was scheduled */
  interrupted: boolean;
  durationMs: number;
  /** 0 when every attempted spec resolved, 130 after a shutdown, 1 otherwise */
  exitCode: number;
}

type Tally = Pick<RunSummary, 'attempted' | 'resolved' | 'unresolved' | 'errors' | 'aborted' | 'skipped'>

export type SpecSource = AsyncIterable<EvaluationSpec> | Iterable<EvaluationSpec>

/**
 * Runs a sequence of specs with bounded concurrency.
 *
 * ## Scheduling
 *
 * Specs are pulled from the source lazily: a new spec is read only when
 * a slot is free, so an unbounded source never piles up in memory.
 * Results are appended to `results.jsonl` in completion order; each record
 * carries the spec's input position (`sequence`).
 *
 * ## Shutdown
 *
 * `shutdown()` stops scheduling and lets in-flight specs reach their next
 * stage boundary; after `gracePeriodMs` the stage in progress is cancelled.
 * Either way every spec ends with a record and every instance is destroyed
 * before `run()` returns. A second `shutdown()` cancels immediately.
 *
 * ## Fatal errors
 *
 * Errors that make the run meaningless (results log unwritable, instance
 * leak) cancel every in-flight spec and are rethrown once they settle.
 */
export class Orchestrator {
  readonly runId: string
  readonly manager: EnvironmentManager
  readonly images: ImageCache

  private readonly drainController = new AbortController()
  private readonly abortController = new AbortController()
  private readonly logger: Logger
  private readonly pipeline: SpecPipeline
  private graceTimer?: NodeJS.Timeout
  private fatal?: {error: unknown}
  private running = false

  constructor(private readonly options: OrchestratorOptions) {
    const {config, runtime, workspace, reporter} = options
    this.runId = options.runId ?? Workspace.generateRunId()
    this.logger = options.logger ?? silentLogger

    this.manager = new EnvironmentManager(runtime, new InstanceRegistry(), {
      runId: this.runId,
      cleanupRetry: config.cleanup.retry,
      network: config.network,
      logger: this.logger
    })

    const builder = new ImageBuilder(runtime, {baseImage: config.image.baseImage, buildTimeoutMs: config.image.buildTimeoutMs})
    this.images = new ImageCache(builder, {
      indexPath: workspace.imageIndexPath,
      negativeTtlMs: config.image.negativeTtlMs,
      retry: config.image.retry,
      signal: this.abortController.signal,
      logger: this.logger,
      onEvent: event => {
        reporter.emit(this.imageEvent(event))
      },
      onLogLine: (key, log) => {
        this.logger.trace({key, stream: log.stream}, log.line)
      }
    })

    const agents = new AgentRegistry(config.agents, config.agent, {
      manager: this.manager,
      workspace,
      commandTimeoutMs: config.commandTimeoutMs,
      graceMs: config.execGraceMs,
      logger: this.logger
    })

    this.pipeline = new SpecPipeline({
      runId: this.runId,
      config,
      images: this.images,
      manager: this.manager,
      agents,
      analyzer: new PatchAnalyzer(config.patch),
      selector: new TestSelector({maxPassToPass: config.tests.maxPassToPass, patch: config.patch}),
      testRunner: new TestRunner(this.manager, {graceMs: config.execGraceMs, workspace, logger: this.logger}),
      reporter,
      logger: this.logger
    })
  }

  get shuttingDown(): boolean {
    return this.drainController.signal.aborted
  }

  /**
   * Requests a graceful shutdown. Safe to call from a signal handler.
   */
  shutdown(options?: {force?: boolean}): void {
    if (this.drainController.signal.aborted || options?.force) {
      this.abort(new CancellationError('Run cancelled'))
      if (this.drainController.signal.aborted) {
        return
      }
    }

    const {gracePeriodMs} = this.options.config
    this.drainController.abort(new CancellationError('Shutdown requested'))
    this.options.reporter.emit({event: 'RUN_SHUTDOWN', runId: this.runId, gracePeriodMs})
    this.logger.warn({runId: this.runId, gracePeriodMs}, 'shutdown requested, draining in-flight specs')

    if (this.running && !this.abortController.signal.aborted) {
      this.graceTimer = setTimeout(() => {
        this.abort(new CancellationError(`Grace period of ${gracePeriodMs}ms elapsed`))
      }, gracePeriodMs)
    }
  }

  async run(source: SpecSource, options?: RunOptions): Promise<RunSummary> {
    if (this.running) {
      throw new Error('Orchestrator is already running')
    }

    this.running = true
    const {config, runtime, workspace, reporter} = this.options
    const startedAt = Date.now()
    const tally: Tally = {attempted: 0, resolved: 0, unresolved: 0, errors: 0, aborted: 0, skipped: 0}

    await runtime.check()
    await this.manager.cleanupLeftovers()

    const completed = options?.resume ? await ResultsLog.completedSpecIds(workspace.resultsPath) : new Set<string>()
    const log = await ResultsLog.open(workspace.resultsPath)

    reporter.emit({event: 'RUN_START', runId: this.runId, concurrency: config.concurrency, resumed: completed.size})

    const limit = pLimit(config.concurrency)
    const inFlight = new Map<number, Promise<void>>()

    try {
      let sequence = 0
      for await (const spec of source) {
        if (this.stopped) {
          break
        }

        const current = sequence++
        if (completed.has(spec.id)) {
          tally.skipped++
          reporter.emit({event: 'SPEC_SKIPPED', runId: this.runId, specId: spec.id, sequence: current})
          continue
        }

        while (inFlight.size >= config.concurrency) {
          await Promise.race(inFlight.values())
        }

        if (this.stopped) {
          break
        }

        reporter.emit({event: 'SPEC_STATE', runId: this.runId, specId: spec.id, sequence: current, state: 'Queued'})
        const task = (async () => {
          try {
            await limit(async () => this.runSpec(spec, current, log, tally))
          } catch (error: unknown) {
            this.fail(error)
          } finally {
            inFlight.delete(current)
          }
        })()
        inFlight.set(current, task)
      }
    } catch (error: unknown) {
      // Unreadable source: in-flight specs are cancelled, not left running
      this.fail(error)
    }

    await Promise.all(inFlight.values())

    clearTimeout(this.graceTimer)
    try {
      await this.manager.destroyAll()
    } catch (error: unknown) {
      this.fail(error)
    }

    await log.close()
    this.running = false

    if (this.fatal) {
      throw this.fatal.error
    }

    const interrupted = this.drainController.signal.aborted
    const failed = tally.unresolved + tally.errors + tally.aborted
    const summary: RunSummary = {
      runId: this.runId,
      ...tally,
      interrupted,
      durationMs: Date.now() - startedAt,
      exitCode: interrupted ? 130 : (failed === 0 ? 0 : 1)
    }

    reporter.emit({
      event: 'RUN_FINISHED',
      runId: this.runId,
      resolved: summary.resolved,
      unresolved: summary.unresolved,
      errors: summary.errors,
      aborted: summary.aborted,
      skipped: summary.skipped,
      durationMs: summary.durationMs,
      exitCode: summary.exitCode
    })
    return summary
  }

  private get stopped(): boolean {
    return this.drainController.signal.aborted || this.fatal !== undefined
  }

  private async runSpec(spec: EvaluationSpec, sequence: number, log: ResultsLog, tally: Tally): Promise<void> {
    const record = await this.pipeline.run(spec, sequence, {
      drain: this.drainController.signal,
      abort: this.abortController.signal
    })
    await log.append(record)
    this.count(record, tally)

    this.options.reporter.emit({
      event: 'SPEC_FINISHED',
      runId: this.runId,
      specId: spec.id,
      sequence,
      status: record.status,
      verdict: record.verdict,
      failure: record.failure,
      durationMs: Date.parse(record.finishedAt) - Date.parse(record.startedAt)
    })
  }

  private count(record: ResultRecord, tally: Tally): void {
    tally.attempted++
    if (record.status === 'Aborted') {
      tally.aborted++
    } else if (record.verdict === 'Resolved') {
      tally.resolved++
    } else if (record.verdict === 'Unresolved') {
      tally.unresolved++
    } else {
      tally.errors++
    }
  }

  private fail(error: unknown): void {
    if (!this.fatal) {
      this.fatal = {error}
      this.logger.error({runId: this.runId, err: errorMessage(error)}, 'fatal error, cancelling the run')
    }

    this.abort(new CancellationError(`Run aborted: ${errorMessage(error)}`))
  }

  private abort(reason: CancellationError): void {
    clearTimeout(this.graceTimer)
    if (!this.abortController.signal.aborted) {
      this.abortController.abort(reason)
    }
  }

  private imageEvent(event: ImageCacheEvent): ImageBuildEvent {
    const base = {event: 'IMAGE_BUILD' as const, runId: this.runId, tag: event.tag}
    switch (event.type) {
      case 'building': {
        return {...base, phase: event.type, attempt: event.attempt}
      }

      case 'built': {
        return {...base, phase: event.type, durationMs: event.durationMs}
      }

      case 'failed': {
        return {...base, phase: event.type, error: event.error}
      }

      case 'reused': {
        return {...base, phase: event.type}
      }
    }
  }
}
