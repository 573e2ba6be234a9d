/**
 * Library exports for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {DockerCliRuntime, Orchestrator, ConsoleReporter, Workspace, mergeConfig} from 'evalkit'
 *
 * const config = mergeConfig({
 *   agent: 'aider',
 *   agents: {aider: {mode: 'container', command: ['aider', '--yes', '--message-file', '{promptFile}']}}
 * })
 * const orchestrator = new Orchestrator({
 *   config,
 *   runtime: new DockerCliRuntime(),
 *   workspace: await Workspace.create('./workdir'),
 *   reporter: new ConsoleReporter()
 * })
 *
 * const summary = await orchestrator.run(specs, {resume: true})
 * console.log(`${summary.resolved}/${summary.attempted} resolved`)
 * ```
 */

export * from './engine/index.js'

export {Orchestrator, type OrchestratorOptions, type RunOptions, type RunSummary, type SpecSource} from './orchestrator/orchestrator.js'
export {SpecPipeline, type PipelineContext, type PipelineSignals} from './orchestrator/pipeline.js'
export {ResultsLog} from './orchestrator/results-log.js'
export {ConsoleReporter, type Reporter, type RunEvent} from './orchestrator/reporter.js'

export {AgentRegistry} from './agent/agent-registry.js'
export {ContainerAgent} from './agent/container-agent.js'
export {LocalAgent} from './agent/local-agent.js'
export {parseUsage, usageFormats, type TokenUsage, type UsageFormat} from './agent/usage.js'
export {renderCommand, type AgentDefinition, type AgentExecutor, type AgentResult, type AgentRunRequest} from './agent/agent-executor.js'

export {PatchAnalyzer, applyToContent, type PatchOptions} from './patch/patch-analyzer.js'
export {parseDiff, type FilePatch, type ParsedDiff} from './patch/diff-parser.js'
export {TestSelector} from './testing/test-selector.js'
export {TestRunner} from './testing/test-runner.js'
export {classify, defaultTestCommand} from './testing/pytest-parser.js'
export {checkPreconditions, scoreVerdict} from './testing/verdict.js'

export {mergeConfig, validateConfig, defaultConfig, type EvalConfig} from './config.js'
export {withRetry, type RetryPolicy} from './core/retry.js'
export {createLogger, type Logger} from './core/logger.js'
export {formatDuration} from './core/utils.js'

export type {
  EvaluationSpec,
  EnvironmentDescriptor,
  PatchApplication,
  PatchOutcome,
  TestStatus,
  TestPhase,
  TestSelection,
  PipelineState,
  StageName,
  Verdict,
  RecordStatus,
  AgentFailureReason,
  FailureKind,
  ResultRecord,
  ResourceLimits
} from './types.js'

export {
  EvalError,
  RuntimeError,
  DockerNotAvailableError,
  BuildFailureError,
  BuildTimeoutError,
  EnvironmentFailureError,
  ExecTimeoutError,
  ContainerCleanupError,
  CancellationError,
  SpecTimeoutError,
  ConfigurationError,
  SpecValidationError,
  ResultsWriteError
} from './errors.js'
