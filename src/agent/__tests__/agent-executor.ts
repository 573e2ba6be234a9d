import test from 'ava'
import {outputTail, renderCommand} from '../agent-executor.js'

const values = {prompt: 'Fix add()', workspace: '/workspace/agent', promptFile: '/tmp/prompt.md'}

test('renderCommand substitutes every placeholder', t => {
  t.deepEqual(
    renderCommand(['agent', '--cwd={workspace}', '-f', '{promptFile}', '{prompt}', '{unknown}'], values),
    ['agent', '--cwd=/workspace/agent', '-f', '/tmp/prompt.md', 'Fix add()', '{unknown}']
  )
})

test('renderCommand does not expand placeholders found in the prompt', t => {
  t.deepEqual(renderCommand(['{prompt}'], {...values, prompt: 'mention {workspace}'}), ['mention {workspace}'])
})

test('outputTail keeps the last lines', t => {
  t.is(outputTail('a\nb\nc\n', 2), 'b\nc')
  t.is(outputTail(''), '')
})
