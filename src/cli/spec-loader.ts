import {readFile} from 'node:fs/promises'
import {extname} from 'node:path'
import {isPlainObject} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {SpecValidationError} from '../errors.js'
import type {EnvironmentDescriptor, EvaluationSpec} from '../types.js'

type Fields = Record<string, unknown>

/**
 * Alternative field names accepted in spec files, as found in public
 * task datasets (`instance_id`, `problem_statement`, ...).
 */
const aliases: Record<string, keyof EvaluationSpec> = {
  instance_id: 'id',
  repo: 'repository',
  base_commit: 'baseCommit',
  problem_statement: 'prompt',
  test_patch: 'testPatch',
  patch: 'goldPatch',
  gold_patch: 'goldPatch',
  FAIL_TO_PASS: 'failToPass',
  PASS_TO_PASS: 'passToPass'
}

function isFields(value: unknown): value is Fields {
  return isPlainObject(value)
}

function normalize(record: Fields): Fields {
  const normalized: Fields = {}
  for (const [key, value] of Object.entries(record)) {
    const target = Object.hasOwn(aliases, key) ? aliases[key] : key
    normalized[target] ??= value
  }

  return normalized
}

function requireString(record: Fields, key: string, location: string): string {
  const value = record[key]
  if (typeof value !== 'string' || value.trim() === '') {
    throw new SpecValidationError(`${location}: "${key}" must be a non-empty string`)
  }

  return value
}

function optionalString(record: Fields, key: string, location: string): string | undefined {
  return record[key] === undefined || record[key] === null ? undefined : requireString(record, key, location)
}

/**
 * Test id lists may be given as arrays or as JSON-encoded arrays.
 */
function testIds(record: Fields, key: string, location: string): string[] | undefined {
  let value = record[key]
  if (value === undefined || value === null) {
    return undefined
  }

  if (typeof value === 'string') {
    try {
      value = JSON.parse(value)
    } catch (error) {
      throw new SpecValidationError(`${location}: "${key}" is not a valid JSON list`, {cause: error})
    }
  }

  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new SpecValidationError(`${location}: "${key}" must be a list of test ids`)
  }

  return value.map(String)
}

function stringList(value: unknown, path: string, location: string): string[] {
  if (!Array.isArray(value) || !value.every(item => typeof item === 'string')) {
    throw new SpecValidationError(`${location}: "${path}" must be a list of strings`)
  }

  return value.map(String)
}

function environmentOf(record: Fields, location: string): EnvironmentDescriptor {
  const value = record.environment
  if (!isFields(value)) {
    throw new SpecValidationError(`${location}: "environment" must be an object`)
  }

  let env: Record<string, string> | undefined
  if (value.env !== undefined) {
    if (!isFields(value.env)) {
      throw new SpecValidationError(`${location}: "environment.env" must be a map of strings`)
    }

    env = Object.fromEntries(Object.entries(value.env).map(([key, item]) => [key, String(item)]))
  }

  return {
    baseImage: optionalString(value, 'baseImage', location),
    install: value.install === undefined ? [] : stringList(value.install, 'environment.install', location),
    env,
    testCommand: value.testCommand === undefined ? undefined : stringList(value.testCommand, 'environment.testCommand', location),
    workdir: optionalString(value, 'workdir', location)
  }
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const item of Object.values(value)) {
      deepFreeze(item)
    }

    Object.freeze(value)
  }

  return value
}

/**
 * Validates one raw record and returns a frozen spec.
 * @param location Prefix of error messages, e.g. `specs.jsonl:3`
 * @throws SpecValidationError naming the offending field
 */
export function parseSpec(value: unknown, location: string): EvaluationSpec {
  if (!isFields(value)) {
    throw new SpecValidationError(`${location}: expected an object`)
  }

  const record = normalize(value)

  const spec: EvaluationSpec = {
    id: requireString(record, 'id', location),
    repository: requireString(record, 'repository', location),
    baseCommit: requireString(record, 'baseCommit', location),
    environment: environmentOf(record, location),
    prompt: requireString(record, 'prompt', location),
    testPatch: requireString(record, 'testPatch', location),
    goldPatch: optionalString(record, 'goldPatch', location),
    failToPass: testIds(record, 'failToPass', location),
    passToPass: testIds(record, 'passToPass', location),
    agent: optionalString(record, 'agent', location)
  }

  if (spec.environment.workdir !== undefined && !spec.environment.workdir.startsWith('/')) {
    throw new SpecValidationError(`${location}: "environment.workdir" must be an absolute path`)
  }

  return deepFreeze(spec)
}

function parseRecords(path: string, content: string): Array<{value: unknown; location: string}> {
  const extension = extname(path).toLowerCase()

  if (extension === '.jsonl' || extension === '.ndjson') {
    const records: Array<{value: unknown; location: string}> = []
    for (const [index, line] of content.split('\n').entries()) {
      if (line.trim() === '') {
        continue
      }

      const location = `${path}:${index + 1}`
      try {
        records.push({value: JSON.parse(line), location})
      } catch (error) {
        throw new SpecValidationError(`${location}: invalid JSON`, {cause: error})
      }
    }

    return records
  }

  let parsed: unknown
  try {
    parsed = extension === '.json' ? JSON.parse(content) : parseYaml(content)
  } catch (error) {
    throw new SpecValidationError(`${path}: cannot be parsed`, {cause: error})
  }

  const list: unknown[] = Array.isArray(parsed) ? parsed : [parsed]
  return list.map((value, index) => ({value, location: `${path}#${index}`}))
}

/**
 * Loads and validates every spec of a `.json`, `.jsonl` or `.yml`/`.yaml`
 * file, in file order. The whole file is rejected when one record is
 * invalid or an id repeats.
 */
export async function loadSpecs(path: string): Promise<EvaluationSpec[]> {
  const content = await readFile(path, 'utf8')
  const specs: EvaluationSpec[] = []
  const seen = new Set<string>()

  for (const {value, location} of parseRecords(path, content)) {
    const spec = parseSpec(value, location)
    if (seen.has(spec.id)) {
      throw new SpecValidationError(`${location}: duplicate spec id "${spec.id}"`)
    }

    seen.add(spec.id)
    specs.push(spec)
  }

  return specs
}
