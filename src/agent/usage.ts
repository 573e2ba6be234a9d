import {isPlainObject} from 'lodash-es'
import {stripAnsi} from '../core/utils.js'

export type TokenUsage = {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

/**
 * How an agent reports token usage on stdout:
 * - `json-summary`: a final JSON line with `usage.input_tokens` / `usage.output_tokens`
 * - `json-events`: one JSON event per line, usage summed over every event
 *   carrying a `usage`, `metrics` or `token_usage` object
 * - `model-stats`: a JSON object with `stats.models.<model>.tokens`
 *   (`input`, `candidates`, `total`), or flat counters on `stats`
 */
export type UsageFormat = 'json-summary' | 'json-events' | 'model-stats'

export const usageFormats: readonly UsageFormat[] = ['json-summary', 'json-events', 'model-stats']

type Fields = Record<string, unknown>

function isFields(value: unknown): value is Fields {
  return isPlainObject(value)
}

function count(value: unknown): number | undefined {
  const number = typeof value === 'string' && value.trim() !== '' ? Number(value) : value
  return typeof number === 'number' && Number.isInteger(number) && number >= 0 ? number : undefined
}

function pick(fields: Fields, keys: string[]): number | undefined {
  for (const key of keys) {
    const value = count(fields[key])
    if (value !== undefined) {
      return value
    }
  }

  return undefined
}

function withTotal(inputTokens: number | undefined, outputTokens: number | undefined, totalTokens?: number): TokenUsage | undefined {
  if (inputTokens === undefined && outputTokens === undefined && totalTokens === undefined) {
    return undefined
  }

  const usage: TokenUsage = {}
  if (inputTokens !== undefined) {
    usage.inputTokens = inputTokens
  }

  if (outputTokens !== undefined) {
    usage.outputTokens = outputTokens
  }

  usage.totalTokens = totalTokens ?? (inputTokens ?? 0) + (outputTokens ?? 0)
  return usage
}

function parseFields(text: string): Fields | undefined {
  try {
    const value: unknown = JSON.parse(text)
    return isFields(value) ? value : undefined
  } catch {
    return undefined
  }
}

/** JSON objects found on their own line, in output order. */
function jsonLines(output: string): Fields[] {
  const objects: Fields[] = []
  for (const raw of stripAnsi(output).split('\n')) {
    const line = raw.trim()
    const value = line.startsWith('{') ? parseFields(line) : undefined
    if (value) {
      objects.push(value)
    }
  }

  return objects
}

function summaryUsage(output: string): TokenUsage | undefined {
  for (const event of jsonLines(output).reverse()) {
    const {usage} = event
    if (isFields(usage)) {
      const found = withTotal(count(usage.input_tokens), count(usage.output_tokens))
      if (found) {
        return found
      }
    }
  }

  return undefined
}

function eventsUsage(output: string): TokenUsage | undefined {
  let inputTotal = 0
  let outputTotal = 0
  let found = false
  for (const event of jsonLines(output)) {
    for (const key of ['usage', 'metrics', 'token_usage']) {
      const usage = event[key]
      if (!isFields(usage)) {
        continue
      }

      const inputTokens = pick(usage, ['prompt_tokens', 'input_tokens', 'total_input_tokens'])
      const outputTokens = pick(usage, ['completion_tokens', 'output_tokens', 'total_output_tokens'])
      if (inputTokens !== undefined || outputTokens !== undefined) {
        found = true
        inputTotal += inputTokens ?? 0
        outputTotal += outputTokens ?? 0
        break
      }
    }
  }

  return found ? {inputTokens: inputTotal, outputTokens: outputTotal, totalTokens: inputTotal + outputTotal} : undefined
}

/**
 * The `stats` object of a report printed either pretty (possibly after
 * progress text) or on a single line.
 */
function findStats(output: string): Fields | undefined {
  const clean = stripAnsi(output).trim()
  const block = clean.search(/^{/m)
  const reports = [
    parseFields(clean),
    block > 0 ? parseFields(clean.slice(block)) : undefined,
    ...jsonLines(clean).reverse()
  ]
  for (const report of reports) {
    const stats = report?.stats
    if (isFields(stats)) {
      return stats
    }
  }

  return undefined
}

function statsUsage(output: string): TokenUsage | undefined {
  const stats = findStats(output)
  if (!stats) {
    return undefined
  }

  const {models} = stats
  if (isFields(models) && Object.keys(models).length > 0) {
    let input = 0
    let candidates = 0
    let total = 0
    for (const model of Object.values(models)) {
      const tokens = isFields(model) ? model.tokens : undefined
      if (isFields(tokens)) {
        input += count(tokens.input) ?? 0
        candidates += count(tokens.candidates) ?? 0
        total += count(tokens.total) ?? 0
      }
    }

    return withTotal(input || undefined, candidates || undefined, total || undefined)
  }

  return withTotal(
    pick(stats, ['inputTokenCount', 'inputTokens', 'input_tokens']),
    pick(stats, ['outputTokenCount', 'outputTokens', 'output_tokens', 'candidatesTokenCount']),
    pick(stats, ['totalTokenCount', 'totalTokens', 'total_tokens'])
  )
}

/**
 * Token usage reported in an agent's output, or undefined when the output
 * carries none in the given format.
 */
export function parseUsage(format: UsageFormat, output: string): TokenUsage | undefined {
  switch (format) {
    case 'json-summary': {
      return summaryUsage(output)
    }

    case 'json-events': {
      return eventsUsage(output)
    }

    case 'model-stats': {
      return statsUsage(output)
    }
  }
}
