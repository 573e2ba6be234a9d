import {readFile, readdir, stat, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {Workspace, pathName, writeJsonAtomic} from '../workspace.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('create makes logs/ and agent/ directories', async t => {
  const root = await createTmpDir()
  await Workspace.create(root)
  const entries = await readdir(root)
  t.true(entries.includes('logs'))
  t.true(entries.includes('agent'))
})

test('create keeps existing results', async t => {
  const root = await createTmpDir()
  await writeFile(join(root, 'results.jsonl'), '{}\n')
  const ws = await Workspace.create(root)
  t.is(await readFile(ws.resultsPath, 'utf8'), '{}\n')
})

test('generateRunId returns timestamp-uuid format', t => {
  t.regex(Workspace.generateRunId(), /^\d+-[\da-f]{8}$/)
})

test('paths are derived from slugified spec ids and a hash of the raw id', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root)

  t.is(ws.specLogsPath('Org/Repo#12'), join(root, 'logs', 'org-repo-12-232e50a3'))
  t.is(ws.agentLogPath('calc-1'), join(root, 'logs', 'calc-1-cd76a210', 'agent.json'))
  t.is(
    ws.testLogPath('calc-1', 'pre', 'tests/test_calc.py::test_add'),
    join(root, 'logs', 'calc-1-cd76a210', 'pre', 'tests-test_calc.py.test_add-438b03b7.json')
  )
  t.is(ws.agentPromptPath('calc-1'), join(root, 'agent', 'calc-1-cd76a210.prompt.md'))
})

test('ids sharing a slug get distinct paths', async t => {
  const ws = await Workspace.create(await createTmpDir())

  t.is(pathName('Org/Repo-1'), 'org-repo-1-73202d3c')
  t.is(pathName('org-repo-1'), 'org-repo-1-6062c2de')
  t.not(ws.agentPath('Org/Repo-1'), ws.agentPath('org-repo-1'))
  t.not(ws.testLogPath('calc-1', 'post', 't[a/b]'), ws.testLogPath('calc-1', 'post', 't[a-b]'))
})

test('long ids are cut before the hash', t => {
  const name = pathName(`spec-${'x'.repeat(300)}`)
  t.is(name.length, 189)
  t.regex(name, /^spec-x+-[\da-f]{8}$/)
})

test('prepareAgentDir empties a previous agent workspace', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root)
  const first = await ws.prepareAgentDir('calc-1')
  await writeFile(join(first, 'stale.txt'), 'stale')

  const second = await ws.prepareAgentDir('calc-1')
  t.is(second, first)
  t.deepEqual(await readdir(second), [])
})

test('discardAgentDir removes the workspace and its prompt', async t => {
  const root = await createTmpDir()
  const ws = await Workspace.create(root)
  await ws.prepareAgentDir('calc-1')
  await writeFile(ws.agentPromptPath('calc-1'), 'Fix add()')

  await ws.discardAgentDir('calc-1')
  t.deepEqual(await readdir(join(root, 'agent')), [])
})

test('writeJsonAtomic creates parent directories and leaves no temporary file', async t => {
  const root = await createTmpDir()
  const path = join(root, 'nested', 'value.json')
  await writeJsonAtomic(path, {a: 1})

  t.is(await readFile(path, 'utf8'), '{\n  "a": 1\n}\n')
  t.deepEqual(await readdir(join(root, 'nested')), ['value.json'])
  t.true((await stat(path)).isFile())
})
