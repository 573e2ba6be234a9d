import test from 'ava'
import {flagOverrides} from '../commands/run.js'
import {positiveInteger} from '../utils.js'

test('flagOverrides maps flags to configuration fields', t => {
  t.deepEqual(flagOverrides({concurrency: 3, timeout: 90, agent: 'fake'}), {concurrency: 3, instanceTimeoutMs: 90_000, agent: 'fake'})
  t.deepEqual(flagOverrides({resume: true, verbose: true}), {})
})

test('positiveInteger parses option values', t => {
  t.is(positiveInteger('4'), 4)
  t.throws(() => positiveInteger('0'), {message: 'Expected a positive integer, got "0"'})
  t.throws(() => positiveInteger('1.5'))
})
