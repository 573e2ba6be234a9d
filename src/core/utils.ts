import {deburr} from 'lodash-es'

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remaining = Math.round(seconds % 60)
  return `${minutes}m ${remaining}s`
}

/** Convert a free-form name into a lowercase identifier usable in tags and paths. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w.-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^[-.]/, '')
    .replace(/[-.]$/, '')
}

/** Strip ANSI colour sequences from tool output. */
export function stripAnsi(text: string): string {
  // eslint-disable-next-line no-control-regex
  return text.replaceAll(/\u001B\[[\d;]*[A-Za-z]/g, '')
}
