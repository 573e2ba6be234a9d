import {readFile} from 'node:fs/promises'
import test from 'ava'
import {silentLogger} from '../../core/logger.js'
import {EnvironmentManager} from '../../engine/environment-manager.js'
import {InstanceRegistry} from '../../engine/instance-registry.js'
import type {ExecResult} from '../../engine/runtime.js'
import {Workspace} from '../../engine/workspace.js'
import {FakeRuntime, createTmpDir, type ExecCall} from '../../__tests__/helpers.js'
import type {AgentDefinition, AgentLog} from '../agent-executor.js'
import {ContainerAgent} from '../container-agent.js'

const diffScript = 'git add -A && git diff --cached --no-renames --binary'
const patch = 'diff --git a/calc.py b/calc.py\n--- a/calc.py\n+++ b/calc.py\n@@ -1 +1 @@\n-x = 1\n+x = 2\n'

function isAgent(call: ExecCall): boolean {
  return call.cmd.includes('fake-agent')
}

async function setup(agentAnswer: Partial<ExecResult>, definition: Partial<AgentDefinition> = {}) {
  const runtime = new FakeRuntime()
  runtime.onExec(call => isAgent(call) ? agentAnswer : undefined)
  runtime.onExec(call => call.cmd[2] === diffScript ? {stdout: patch} : undefined)
  const registry = new InstanceRegistry()
  const manager = new EnvironmentManager(runtime, registry, {runId: 'run-1', cleanupRetry: {maxAttempts: 1, backoffMs: []}})
  const workspace = await Workspace.create(await createTmpDir())
  const instance = await manager.start('img', {specId: 'calc-1', workdir: '/workspace/repo'})
  const agent = new ContainerAgent(
    'fake',
    {mode: 'container', command: ['fake-agent', '--prompt-file', '{promptFile}'], ...definition},
    {manager, workspace, commandTimeoutMs: 1000, graceMs: 0, logger: silentLogger}
  )
  const request = {specId: 'calc-1', instance, prompt: 'Fix add()', workspacePath: '/workspace/agent', timeoutMs: 2000}
  return {runtime, registry, manager, workspace, instance, agent, request}
}

test('the agent runs under timeout with the uploaded prompt, and its diff is the patch', async t => {
  const {runtime, instance, agent, request} = await setup({stdout: 'done'})
  const result = await agent.run(request)

  t.deepEqual(result.ok ? result.patch : undefined, patch)
  t.deepEqual(runtime.commands(instance.id), [
    'sh -c cat > "$1" sh /tmp/evalkit-prompt.md',
    'timeout --kill-after=10 2s fake-agent --prompt-file /tmp/evalkit-prompt.md',
    `sh -c ${diffScript}`
  ])
  t.is(runtime.execs[0].input, 'Fix add()')
  t.is(runtime.execs[1].cwd, '/workspace/agent')
  t.is(runtime.execs[1].timeoutMs, 2000)
})

for (const exitCode of [124, 137]) {
  test(`exit code ${exitCode} from the in-container timeout is a timeout`, async t => {
    const {runtime, workspace, agent, request} = await setup({exitCode, stderr: 'Killed'})
    const result = await agent.run(request)

    t.deepEqual(result.ok ? undefined : [result.failureReason, result.detail], ['Timeout', 'agent exceeded 2000ms'])
    t.false(runtime.commands().some(command => command.includes(diffScript)))
    const log: AgentLog = JSON.parse(await readFile(workspace.agentLogPath('calc-1'), 'utf8'))
    t.true(log.timedOut)
    t.is(log.exitCode, exitCode)
    t.deepEqual(runtime.removed, [])
  })
}

test('a hard exec timeout is a timeout and the instance is already gone', async t => {
  const {runtime, registry, manager, instance, agent, request} = await setup({exitCode: -1, timedOut: true})
  const result = await agent.run(request)

  t.deepEqual(result.ok ? undefined : [result.failureReason, result.detail], ['Timeout', 'agent did not stop within 2000ms'])
  t.deepEqual(runtime.removed, [instance.id])
  t.false(registry.has(instance.id))

  await manager.destroy(instance)
  await manager.destroyAll()
  t.deepEqual(runtime.removed, [instance.id])
})

test('a failing setup command is a crash and the agent never starts', async t => {
  const {runtime, agent, request} = await setup({stdout: 'done'}, {setup: ['pip install -e .']})
  runtime.onExec(call => call.cmd[2] === 'pip install -e .' ? {exitCode: 2, stderr: 'pip failed\n'} : undefined)
  const result = await agent.run(request)

  t.deepEqual(result.ok ? undefined : [result.failureReason, result.detail], ['CrashExit', 'setup "pip install -e ." exited with 2: pip failed'])
  t.false(runtime.execs.some(call => isAgent(call)))
})

test('an unchanged workspace produces no patch', async t => {
  const runtime = new FakeRuntime()
  const manager = new EnvironmentManager(runtime, new InstanceRegistry(), {runId: 'run-1', cleanupRetry: {maxAttempts: 1, backoffMs: []}})
  const workspace = await Workspace.create(await createTmpDir())
  const instance = await manager.start('img', {specId: 'calc-1', workdir: '/workspace/repo'})
  const agent = new ContainerAgent('fake', {mode: 'container', command: ['fake-agent']}, {manager, workspace, commandTimeoutMs: 1000, graceMs: 0, logger: silentLogger})
  const result = await agent.run({specId: 'calc-1', instance, prompt: 'Fix add()', workspacePath: '/workspace/agent', timeoutMs: 2000})

  t.deepEqual(result.ok ? undefined : [result.failureReason, result.detail], ['NoPatchProduced', 'agent left the workspace unchanged'])
})

test('token usage in the agent output is reported', async t => {
  const summary = JSON.stringify({type: 'result', usage: {input_tokens: 40, output_tokens: 2}})
  const {agent, request} = await setup({stdout: `thinking\n${summary}\n`}, {usage: 'json-summary'})
  const result = await agent.run(request)

  t.deepEqual(result.usage, {inputTokens: 40, outputTokens: 2, totalTokens: 42})
})
