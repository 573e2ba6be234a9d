import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {isPlainObject} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {ConfigurationError} from '../errors.js'

export const configFilename = '.evalkit.yml'

export type ConfigLayer = Record<string, unknown>

function isLayer(value: unknown): value is ConfigLayer {
  return isPlainObject(value)
}

function parseLayer(content: string, path: string): ConfigLayer {
  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ConfigurationError(`Cannot parse ${path}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isLayer(parsed)) {
    throw new ConfigurationError(`${path} must contain a mapping`)
  }

  return {...parsed}
}

/**
 * Reads an explicit configuration file (`--config`).
 */
export async function loadConfigFile(path: string): Promise<ConfigLayer> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(`Cannot read configuration file ${path}`, {cause: error})
  }

  return parseLayer(content, path)
}

/**
 * Loads the project-level `.evalkit.yml` configuration from a directory.
 * Returns an empty layer when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<ConfigLayer> {
  const path = join(dir, configFilename)
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  return parseLayer(content, path)
}

/**
 * Configuration values taken from the environment (`.env` included).
 */
export function envOverrides(env: NodeJS.ProcessEnv = process.env): ConfigLayer {
  const layer: ConfigLayer = {}
  if (env.EVALKIT_CONCURRENCY) {
    layer.concurrency = Number(env.EVALKIT_CONCURRENCY)
  }

  return layer
}
