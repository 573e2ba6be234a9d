import pLimit from 'p-limit'
import {throwIfAborted} from '../core/cancellation.js'
import type {Logger} from '../core/logger.js'
import {silentLogger} from '../core/logger.js'
import type {EnvironmentManager} from '../engine/environment-manager.js'
import type {ContainerInstance} from '../engine/instance-registry.js'
import type {OnLogLine} from '../engine/runtime.js'
import {writeJsonAtomic, type Workspace} from '../engine/workspace.js'
import type {TestPhase, TestStatus} from '../types.js'
import {classify} from './pytest-parser.js'

export type TestRunnerOptions = {
  /** Margin added to the per-test timeout for the hard exec timeout */
  graceMs: number;
  /** Where per-test logs go; no logs are written without it */
  workspace?: Workspace;
  logger?: Logger;
}

export type RunPhaseOptions = {
  specId: string;
  phase: TestPhase;
  /** Checkout the tests run in */
  cwd: string;
  perTestTimeoutMs: number;
  workers: number;
  testCommand: string[];
  signal?: AbortSignal;
  onLogLine?: (testId: string, log: Parameters<OnLogLine>[0]) => void;
}

export type TestLog = {
  specId: string;
  phase: TestPhase;
  testId: string;
  cmd: string[];
  status: TestStatus;
  exitCode: number;
  durationMs: number;
  stdout: string;
  stderr: string;
}

/**
 * Runs selected tests one by one inside an instance.
 *
 * Each test is wrapped in coreutils `timeout` so a slow test is killed in
 * the container and reported `TimedOut` without taking the instance down.
 * The manager's hard timeout (per-test timeout plus `graceMs`) only fires
 * when the instance itself stops responding, and its `ExecTimeoutError`
 * propagates.
 */
export class TestRunner {
  private readonly logger: Logger

  constructor(
    private readonly manager: EnvironmentManager,
    private readonly options: TestRunnerOptions
  ) {
    this.logger = options.logger ?? silentLogger
  }

  async runPhase(instance: ContainerInstance, testIds: string[], options: RunPhaseOptions): Promise<Map<string, TestStatus>> {
    const limit = pLimit(Math.max(1, options.workers))
    const outcomes = new Map<string, TestStatus>()
    const ids = [...new Set(testIds)]

    // The first error stops the tests still queued
    const errors: unknown[] = []
    await Promise.all(ids.map(async testId => limit(async () => {
      if (errors.length > 0) {
        return
      }

      try {
        throwIfAborted(options.signal)
        outcomes.set(testId, await this.runOne(instance, testId, options))
      } catch (error) {
        errors.push(error)
      }
    })))

    if (errors.length > 0) {
      throw errors[0]
    }

    this.logger.debug({specId: options.specId, phase: options.phase, count: ids.length}, 'test phase finished')
    // Input order, whatever order the workers finished in
    return new Map(ids.map((id): [string, TestStatus] => [id, outcomes.get(id) ?? 'Errored']))
  }

  private async runOne(instance: ContainerInstance, testId: string, options: RunPhaseOptions): Promise<TestStatus> {
    const seconds = Math.max(1, Math.ceil(options.perTestTimeoutMs / 1000))
    const cmd = ['timeout', '--kill-after=5', `${seconds}s`, ...options.testCommand, testId]

    const result = await this.manager.exec(instance, cmd, {
      cwd: options.cwd,
      timeoutMs: options.perTestTimeoutMs + this.options.graceMs,
      signal: options.signal,
      onLogLine: options.onLogLine ? log => options.onLogLine?.(testId, log) : undefined
    })

    const status = classify(testId, `${result.stdout}\n${result.stderr}`, result.exitCode)
    if (this.options.workspace) {
      const log: TestLog = {
        specId: options.specId,
        phase: options.phase,
        testId,
        cmd,
        status,
        exitCode: result.exitCode,
        durationMs: result.durationMs,
        stdout: result.stdout,
        stderr: result.stderr
      }
      await writeJsonAtomic(this.options.workspace.testLogPath(options.specId, options.phase, testId), log)
    }

    return status
  }
}
