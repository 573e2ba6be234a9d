import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {mergeConfig} from '../../config.js'
import {createLogger} from '../../core/logger.js'
import {DockerCliRuntime} from '../../engine/docker-runtime.js'
import {Workspace} from '../../engine/workspace.js'
import {Orchestrator} from '../../orchestrator/orchestrator.js'
import {ConsoleReporter} from '../../orchestrator/reporter.js'
import {envOverrides, loadConfig, loadConfigFile, type ConfigLayer} from '../config.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {loadSpecs} from '../spec-loader.js'
import {getGlobalOptions, positiveInteger} from '../utils.js'

type RunCommandOptions = {
  concurrency?: number;
  timeout?: number;
  agent?: string;
  resume?: boolean;
  config?: string;
  verbose?: boolean;
  runId?: string;
}

/**
 * Command-line flags as the last configuration layer.
 */
export function flagOverrides(options: RunCommandOptions): ConfigLayer {
  const layer: ConfigLayer = {}
  if (options.concurrency !== undefined) {
    layer.concurrency = options.concurrency
  }

  if (options.timeout !== undefined) {
    layer.instanceTimeoutMs = options.timeout * 1000
  }

  if (options.agent !== undefined) {
    layer.agent = options.agent
  }

  return layer
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Evaluate every spec of a file')
    .argument('<specs>', 'Spec file (.json, .jsonl, .yml or .yaml)')
    .option('-c, --concurrency <number>', 'Specs evaluated at once', positiveInteger)
    .option('--timeout <seconds>', 'Wall-clock budget of one spec', positiveInteger)
    .option('-a, --agent <name>', 'Default agent (one of the configured agents)')
    .option('--resume', 'Skip specs already completed in the work directory')
    .option('--config <file>', 'Configuration file (default: ./.evalkit.yml)')
    .option('--verbose', 'Stream agent and test output (interactive mode)')
    .option('--run-id <id>', 'Run identifier (default: generated)')
    .action(async (specsFile: string, options: RunCommandOptions, cmd: Command) => {
      const {workdir, json} = getGlobalOptions(cmd)
      const fileLayer = options.config
        ? await loadConfigFile(resolve(options.config))
        : await loadConfig(process.cwd())
      const config = mergeConfig(fileLayer, envOverrides(), flagOverrides(options))
      const specs = await loadSpecs(resolve(specsFile))

      const workspace = await Workspace.create(resolve(workdir))
      const reporter = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
      const orchestrator = new Orchestrator({
        config,
        runtime: new DockerCliRuntime(),
        workspace,
        reporter,
        runId: options.runId,
        logger: createLogger()
      })

      // A second signal cancels in-flight stages without waiting for the grace period
      const onSignal = () => {
        orchestrator.shutdown()
      }

      process.on('SIGINT', onSignal)
      process.on('SIGTERM', onSignal)

      try {
        const summary = await orchestrator.run(specs, {resume: options.resume})
        process.exitCode = summary.exitCode
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
