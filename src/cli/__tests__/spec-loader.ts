import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {SpecValidationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'
import {loadSpecs, parseSpec} from '../spec-loader.js'

const raw = {
  id: 'calc-1',
  repository: 'example/calc',
  baseCommit: 'abc123',
  environment: {install: ['pip install -e .'], env: {PYTHONHASHSEED: 0}},
  prompt: 'Fix add()',
  testPatch: '--- a/t.py\n+++ b/t.py\n',
  failToPass: ['t.py::test_add']
}

async function specFile(name: string, content: string): Promise<string> {
  const path = join(await createTmpDir(), name)
  await writeFile(path, content, 'utf8')
  return path
}

test('parseSpec returns a frozen spec', t => {
  const spec = parseSpec(raw, 'specs.json#0')

  t.is(spec.id, 'calc-1')
  t.deepEqual(spec.environment.env, {PYTHONHASHSEED: '0'})
  t.deepEqual(spec.failToPass, ['t.py::test_add'])
  t.is(spec.passToPass, undefined)
  t.true(Object.isFrozen(spec))
  t.true(Object.isFrozen(spec.environment.install))
})

test('parseSpec accepts dataset field names', t => {
  const spec = parseSpec({
    instance_id: 'calc__calc-1',
    repo: 'example/calc',
    base_commit: 'abc123',
    environment: {},
    problem_statement: 'Fix add()',
    test_patch: 'diff',
    patch: 'gold',
    FAIL_TO_PASS: '["t.py::test_add"]',
    PASS_TO_PASS: '[]'
  }, 'specs.jsonl:1')

  t.is(spec.id, 'calc__calc-1')
  t.is(spec.goldPatch, 'gold')
  t.deepEqual(spec.failToPass, ['t.py::test_add'])
  t.deepEqual(spec.passToPass, [])
  t.deepEqual(spec.environment.install, [])
})

test('parseSpec names the missing field', t => {
  const {prompt: _prompt, ...withoutPrompt} = raw
  const error = t.throws(() => parseSpec(withoutPrompt, 'specs.jsonl:2'), {instanceOf: SpecValidationError})
  t.is(error?.message, 'specs.jsonl:2: "prompt" must be a non-empty string')
})

test('parseSpec rejects malformed fields', t => {
  t.throws(() => parseSpec({...raw, environment: 'python'}, 'x'), {message: 'x: "environment" must be an object'})
  t.throws(() => parseSpec({...raw, failToPass: 'not json'}, 'x'), {message: 'x: "failToPass" is not a valid JSON list'})
  t.throws(() => parseSpec({...raw, failToPass: [1]}, 'x'), {message: 'x: "failToPass" must be a list of test ids'})
  t.throws(() => parseSpec({...raw, environment: {workdir: 'repo'}}, 'x'), {message: 'x: "environment.workdir" must be an absolute path'})
  t.throws(() => parseSpec([], 'x'), {message: 'x: expected an object'})
})

test('loadSpecs reads JSON lines in order', async t => {
  const path = await specFile('specs.jsonl', `${JSON.stringify(raw)}\n\n${JSON.stringify({...raw, id: 'calc-2'})}\n`)
  t.deepEqual((await loadSpecs(path)).map(spec => spec.id), ['calc-1', 'calc-2'])
})

test('loadSpecs reads JSON and YAML documents', async t => {
  const json = await specFile('specs.json', JSON.stringify(raw))
  t.deepEqual((await loadSpecs(json)).map(spec => spec.id), ['calc-1'])

  const yaml = await specFile('specs.yml', [
    '- id: calc-1',
    '  repository: example/calc',
    '  baseCommit: abc123',
    '  environment:',
    '    install: [pip install -e .]',
    '  prompt: Fix add()',
    '  testPatch: |',
    '    --- a/t.py',
    '    +++ b/t.py',
    ''
  ].join('\n'))
  const [spec] = await loadSpecs(yaml)
  t.is(spec.testPatch, '--- a/t.py\n+++ b/t.py\n')
})

test('loadSpecs locates invalid lines', async t => {
  const path = await specFile('specs.jsonl', `${JSON.stringify(raw)}\n{"id": \n`)
  await t.throwsAsync(loadSpecs(path), {message: `${path}:2: invalid JSON`})
})

test('loadSpecs rejects repeated ids', async t => {
  const path = await specFile('specs.jsonl', `${JSON.stringify(raw)}\n${JSON.stringify(raw)}\n`)
  await t.throwsAsync(loadSpecs(path), {message: `${path}:2: duplicate spec id "calc-1"`})
})
