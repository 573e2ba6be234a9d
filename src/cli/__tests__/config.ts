import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ConfigurationError} from '../../errors.js'
import {createTmpDir} from '../../__tests__/helpers.js'
import {configFilename, envOverrides, loadConfig, loadConfigFile} from '../config.js'

test('loadConfig returns an empty layer without a file', async t => {
  t.deepEqual(await loadConfig(await createTmpDir()), {})
})

test('loadConfig reads .evalkit.yml', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, configFilename), 'concurrency: 3\nagents:\n  fake:\n    mode: container\n    command: [fake]\n')

  t.deepEqual(await loadConfig(dir), {concurrency: 3, agents: {fake: {mode: 'container', command: ['fake']}}})
})

test('an empty file is an empty layer', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, configFilename), '')
  t.deepEqual(await loadConfig(dir), {})
})

test('a file must hold a mapping', async t => {
  const dir = await createTmpDir()
  const path = join(dir, configFilename)
  await writeFile(path, '- a\n- b\n')

  await t.throwsAsync(loadConfig(dir), {instanceOf: ConfigurationError, message: `${path} must contain a mapping`})
})

test('loadConfigFile fails on a missing file', async t => {
  const path = join(await createTmpDir(), 'missing.yml')
  await t.throwsAsync(loadConfigFile(path), {instanceOf: ConfigurationError, message: `Cannot read configuration file ${path}`})
})

test('envOverrides reads EVALKIT_CONCURRENCY', t => {
  t.deepEqual(envOverrides({EVALKIT_CONCURRENCY: '6'}), {concurrency: 6})
  t.deepEqual(envOverrides({}), {})
})
