import {createHash} from 'node:crypto'

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(item => canonical(item))
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort((a, b) => a[0].localeCompare(b[0]))
        .map(([k, v]) => [k, canonical(v)])
    )
  }

  return value
}

/**
 * SHA256 of the canonical JSON form of `value` (object keys sorted,
 * undefined members dropped).
 */
export function fingerprint(value: unknown): string {
  return createHash('sha256').update(JSON.stringify(canonical(value))).digest('hex')
}
