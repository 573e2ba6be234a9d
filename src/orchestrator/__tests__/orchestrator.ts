import {setTimeout as delay} from 'node:timers/promises'
import test from 'ava'
import {ContainerCleanupError} from '../../errors.js'
import {Workspace} from '../../engine/workspace.js'
import type {EvaluationSpec} from '../../types.js'
import {
  calcRuntime,
  createTmpDir,
  makeSpec,
  recordingReporter,
  testConfig,
  untilAborted
} from '../../__tests__/helpers.js'
import {Orchestrator} from '../orchestrator.js'
import {ResultsLog} from '../results-log.js'

async function setup(options: {config?: Record<string, unknown>; agentPatch?: string; root?: string} = {}) {
  const runtime = calcRuntime(options.agentPatch)
  const workspace = await Workspace.create(options.root ?? await createTmpDir())
  const {reporter, events} = recordingReporter()
  const orchestrator = new Orchestrator({
    config: testConfig(options.config),
    runtime,
    workspace,
    reporter,
    runId: 'run-1'
  })
  return {runtime, workspace, events, orchestrator}
}

function specs(count: number): EvaluationSpec[] {
  return Array.from({length: count}, (_, i) => makeSpec(`calc-${i}`))
}

test('evaluates every spec and logs one record each', async t => {
  const {orchestrator, workspace, runtime, events} = await setup()
  const summary = await orchestrator.run(specs(3))

  t.like(summary, {runId: 'run-1', attempted: 3, resolved: 3, unresolved: 0, errors: 0, aborted: 0, skipped: 0, interrupted: false, exitCode: 0})
  const records = await ResultsLog.read(workspace.resultsPath)
  t.deepEqual(records.map(r => r.sequence).sort(), [0, 1, 2])
  t.true(records.every(r => r.verdict === 'Resolved'))
  t.is(runtime.builds.length, 1)
  t.is(orchestrator.manager.live().length, 0)
  t.is(events[0].event, 'RUN_START')
  t.is(events.at(-1)?.event, 'RUN_FINISHED')
})

test('unresolved specs make the exit code 1', async t => {
  const {orchestrator} = await setup({agentPatch: ''})
  const summary = await orchestrator.run(specs(2))

  t.like(summary, {attempted: 2, resolved: 0, unresolved: 2, exitCode: 1})
})

test('never runs more specs than the concurrency', async t => {
  const {orchestrator, runtime} = await setup({config: {concurrency: 2}})
  let active = 0
  let peak = 0
  runtime.onExec(async ({cmd}) => {
    if (cmd.includes('fake-agent')) {
      active++
      peak = Math.max(peak, active)
      await delay(20)
      active--
    }

    return undefined
  })

  const summary = await orchestrator.run(specs(5))
  t.is(summary.attempted, 5)
  t.true(peak <= 2)
})

test('pulls specs from async sources', async t => {
  const {orchestrator} = await setup()
  async function * source() {
    yield makeSpec('calc-a')
    yield makeSpec('calc-b')
  }

  t.is((await orchestrator.run(source())).resolved, 2)
})

test('resume skips specs completed by a previous run', async t => {
  const root = await createTmpDir()
  const first = await setup({root})
  await first.orchestrator.run([makeSpec('calc-a')])

  const second = await setup({root})
  const summary = await second.orchestrator.run([makeSpec('calc-a'), makeSpec('calc-b')], {resume: true})

  t.like(summary, {attempted: 1, skipped: 1, resolved: 1})
  t.deepEqual(second.events.find(e => e.event === 'SPEC_SKIPPED'), {event: 'SPEC_SKIPPED', runId: 'run-1', specId: 'calc-a', sequence: 0})
  t.deepEqual(second.events[0], {event: 'RUN_START', runId: 'run-1', concurrency: 2, resumed: 1})
})

test('a forced shutdown aborts in-flight specs and schedules no more', async t => {
  const {orchestrator, runtime, workspace} = await setup({config: {concurrency: 3}})
  let started = 0
  runtime.onExec(async ({cmd, signal}) => {
    if (!cmd.includes('fake-agent')) {
      return undefined
    }

    started++
    if (started === 3) {
      orchestrator.shutdown({force: true})
    }

    return untilAborted(signal)
  })

  const summary = await orchestrator.run(specs(5))
  const records = await ResultsLog.read(workspace.resultsPath)

  t.like(summary, {attempted: 3, aborted: 3, interrupted: true, exitCode: 130})
  t.deepEqual(records.map(r => r.status), ['Aborted', 'Aborted', 'Aborted'])
  t.deepEqual(records.map(r => r.sequence).sort(), [0, 1, 2])
  t.is(runtime.created.length, 3)
  t.deepEqual(runtime.removed.sort(), runtime.created.sort())
})

test('a graceful shutdown lets in-flight specs stop at a stage boundary', async t => {
  const {orchestrator, runtime, events} = await setup({config: {concurrency: 1, gracePeriodMs: 60_000}})
  runtime.onExec(({cmd}) => {
    if (cmd.includes('fake-agent')) {
      orchestrator.shutdown()
    }

    return undefined
  })

  const summary = await orchestrator.run(specs(3))
  t.like(summary, {attempted: 1, aborted: 1, interrupted: true, exitCode: 130})
  t.true(events.some(e => e.event === 'RUN_SHUTDOWN'))
})

test('a container that cannot be removed fails the run', async t => {
  const {orchestrator, runtime} = await setup()
  runtime.removeFailures = 1000

  await t.throwsAsync(orchestrator.run(specs(1)), {instanceOf: ContainerCleanupError})
})

test('a failing source cancels the run', async t => {
  const {orchestrator} = await setup()
  async function * source() {
    yield makeSpec('calc-a')
    throw new Error('spec file truncated')
  }

  await t.throwsAsync(orchestrator.run(source()), {message: 'spec file truncated'})
  t.is(orchestrator.manager.live().length, 0)
})
