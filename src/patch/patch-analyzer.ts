import type {PatchApplication} from '../types.js'
import type {WorkingTree} from '../engine/working-tree.js'
import {parseDiff, type FilePatch, type Hunk} from './diff-parser.js'

export type PatchOptions = {
  /** Leading/trailing context lines a hunk may drop to match (GNU patch fuzz) */
  fuzz: number;
  /** How far from its recorded position a hunk is searched for */
  maxOffset: number;
}

export const defaultPatchOptions: PatchOptions = {fuzz: 2, maxOffset: 200}

export type ContentResult =
  | {ok: true; content: string | undefined}
  | {ok: false; detail: string}

type SplitContent = {
  lines: string[];
  trailingNewline: boolean;
}

function split(content: string): SplitContent {
  if (content === '') {
    return {lines: [], trailingNewline: false}
  }

  const lines = content.split('\n')
  const trailingNewline = lines.at(-1) === ''
  if (trailingNewline) {
    lines.pop()
  }

  return {lines, trailingNewline}
}

function join({lines, trailingNewline}: SplitContent): string {
  if (lines.length === 0) {
    return ''
  }

  return lines.join('\n') + (trailingNewline ? '\n' : '')
}

type HunkSides = {
  before: string[];
  after: string[];
  leadingContext: number;
  trailingContext: number;
  /** Whether the old/new side declares "No newline at end of file" */
  oldNoNewline: boolean;
  newNoNewline: boolean;
}

function sides(hunk: Hunk): HunkSides {
  const before: string[] = []
  const after: string[] = []
  let oldNoNewline = false
  let newNoNewline = false
  let previous = ''

  for (const line of hunk.lines) {
    const marker = line[0]
    const text = line.slice(1)
    if (marker === ' ') {
      before.push(text)
      after.push(text)
    } else if (marker === '-') {
      before.push(text)
    } else if (marker === '+') {
      after.push(text)
    } else if (marker === '\\') {
      if (previous === ' ' || previous === '-') {
        oldNoNewline = true
      }

      if (previous === ' ' || previous === '+') {
        newNoNewline = true
      }
    }

    if (marker !== '\\') {
      previous = marker
    }
  }

  const markers = hunk.lines.filter(line => !line.startsWith('\\')).map(line => line[0])
  const leadingContext = markers.findIndex(marker => marker !== ' ')
  const lastChange = markers.findLastIndex(marker => marker !== ' ')

  return {
    before,
    after,
    leadingContext: leadingContext === -1 ? markers.length : leadingContext,
    trailingContext: lastChange === -1 ? 0 : markers.length - 1 - lastChange,
    oldNoNewline,
    newNoNewline
  }
}

function matchesAt(lines: string[], expected: string[], at: number): boolean {
  if (at < 0 || at + expected.length > lines.length) {
    return false
  }

  return expected.every((line, i) => lines[at + i] === line)
}

/**
 * Finds where a hunk applies: the recorded position first, then alternating
 * offsets up to `maxOffset`, then the same search with up to `fuzz` context
 * lines dropped on each side.
 */
function locate(
  lines: string[],
  hunk: HunkSides,
  expected: number,
  minStart: number,
  options: PatchOptions
): {start: number; dropLeading: number; dropTrailing: number} | undefined {
  for (let fuzz = 0; fuzz <= options.fuzz; fuzz++) {
    const dropLeading = Math.min(fuzz, hunk.leadingContext)
    const dropTrailing = Math.min(fuzz, hunk.trailingContext)
    if (fuzz > 0 && dropLeading + dropTrailing === 0) {
      break
    }

    const before = hunk.before.slice(dropLeading, hunk.before.length - dropTrailing)
    for (let offset = 0; offset <= options.maxOffset; offset++) {
      for (const candidate of offset === 0 ? [expected] : [expected - offset, expected + offset]) {
        const start = candidate + dropLeading
        if (start >= minStart && matchesAt(lines, before, start)) {
          return {start, dropLeading, dropTrailing}
        }
      }
    }
  }

  return undefined
}

function applyHunks(content: SplitContent, hunks: Hunk[], options: PatchOptions): {ok: true; content: SplitContent} | {ok: false; detail: string} {
  const lines = [...content.lines]
  let {trailingNewline} = content
  // Shift between recorded and actual positions, carried from hunk to hunk
  let delta = 0
  // Hunks apply in order and never overlap
  let minStart = 0

  for (const [index, hunk] of hunks.entries()) {
    const parts = sides(hunk)
    // Zero-length ranges are already shifted by one when parsed
    const recorded = hunk.oldStart - 1
    const found = locate(lines, parts, recorded + delta, minStart, options)
    if (!found) {
      return {ok: false, detail: `hunk #${index + 1} (-${hunk.oldStart},${hunk.oldLines}) does not match`}
    }

    const removed = parts.before.length - found.dropLeading - found.dropTrailing
    const inserted = parts.after.slice(found.dropLeading, parts.after.length - found.dropTrailing)
    const touchesEnd = found.start + removed === lines.length
    lines.splice(found.start, removed, ...inserted)

    if (touchesEnd && parts.newNoNewline) {
      trailingNewline = false
    } else if (touchesEnd && parts.oldNoNewline) {
      trailingNewline = true
    }

    delta = found.start - found.dropLeading - recorded + parts.after.length - parts.before.length
    minStart = found.start + inserted.length
  }

  if (lines.length > 0 && content.lines.length === 0 && !content.trailingNewline) {
    trailingNewline = !hunks.some(hunk => sides(hunk).newNoNewline)
  }

  return {ok: true, content: {lines, trailingNewline}}
}

function reversed(file: FilePatch): FilePatch {
  return {
    oldPath: file.newPath,
    newPath: file.oldPath,
    path: file.path,
    hunks: file.hunks.map(hunk => ({
      ...hunk,
      oldStart: hunk.newStart,
      oldLines: hunk.newLines,
      newStart: hunk.oldStart,
      newLines: hunk.oldLines,
      lines: hunk.lines.map(line => {
        if (line.startsWith('+')) {
          return '-' + line.slice(1)
        }

        return line.startsWith('-') ? '+' + line.slice(1) : line
      })
    }))
  }
}

/**
 * Applies one file section to in-memory content. `undefined` stands for a
 * missing file, both as input and as result (deletion).
 */
export function applyToContent(content: string | undefined, file: FilePatch, options: PatchOptions = defaultPatchOptions): ContentResult {
  if (file.oldPath === undefined) {
    if (content !== undefined) {
      return {ok: false, detail: `${file.path} already exists`}
    }

    const created = applyHunks({lines: [], trailingNewline: false}, file.hunks, options)
    return created.ok ? {ok: true, content: join(created.content)} : created
  }

  if (content === undefined) {
    return {ok: false, detail: `${file.oldPath} does not exist`}
  }

  const result = applyHunks(split(content), file.hunks, options)
  if (!result.ok) {
    return {ok: false, detail: `${file.path}: ${result.detail}`}
  }

  if (file.newPath === undefined) {
    if (result.content.lines.length > 0) {
      return {ok: false, detail: `${file.oldPath} is not empty after deletion hunks`}
    }

    return {ok: true, content: undefined}
  }

  return {ok: true, content: join(result.content)}
}

/**
 * Whether a file section's post-image is already present.
 */
function alreadyApplied(current: Map<string, string | undefined>, file: FilePatch, options: PatchOptions): boolean {
  if (file.newPath === undefined) {
    return file.oldPath !== undefined && current.get(file.oldPath) === undefined
  }

  if (file.oldPath !== undefined && file.oldPath !== file.newPath && current.get(file.oldPath) !== undefined) {
    return false
  }

  const present = current.get(file.newPath)
  if (present === undefined) {
    return false
  }

  if (file.oldPath === undefined) {
    const created = applyToContent(undefined, file, options)
    return created.ok && created.content === present
  }

  // The reversed hunks must match without fuzz
  const back = applyToContent(present, reversed(file), {...options, fuzz: 0})
  return back.ok
}

/**
 * Validates and applies unified diffs to working trees.
 *
 * Application is all-or-nothing: every file is patched in memory first and
 * the tree is only written once every hunk of every file has matched.
 */
export class PatchAnalyzer {
  constructor(private readonly options: PatchOptions = defaultPatchOptions) {}

  async apply(tree: WorkingTree, diff: string): Promise<PatchApplication> {
    const parsed = parseDiff(diff)
    if (!parsed.ok) {
      return {outcome: 'Malformed', filesChanged: [], detail: parsed.detail}
    }

    const paths = new Set<string>()
    for (const file of parsed.files) {
      for (const path of [file.oldPath, file.newPath]) {
        if (path !== undefined) {
          paths.add(path)
        }
      }
    }

    const original = new Map<string, string | undefined>()
    for (const path of paths) {
      original.set(path, await tree.readFile(path))
    }

    const staged = new Map(original)
    const conflicts: string[] = []
    let appliedSections = 0
    let satisfiedSections = 0

    for (const file of parsed.files) {
      const source = file.oldPath === undefined ? undefined : staged.get(file.oldPath)
      const result = applyToContent(source, file, this.options)
      if (result.ok) {
        if (file.oldPath !== undefined && file.oldPath !== file.newPath) {
          staged.set(file.oldPath, undefined)
        }

        if (file.newPath !== undefined) {
          staged.set(file.newPath, result.content)
        }

        appliedSections++
      } else if (alreadyApplied(staged, file, this.options)) {
        satisfiedSections++
      } else {
        conflicts.push(result.detail)
      }
    }

    if (conflicts.length > 0) {
      return {outcome: 'Conflict', filesChanged: [], detail: conflicts.join('; ')}
    }

    const changed = [...paths].filter(path => staged.get(path) !== original.get(path)).sort()

    if (satisfiedSections > 0 && appliedSections > 0 && changed.length > 0) {
      return {outcome: 'Conflict', filesChanged: [], detail: 'patch is partially applied already'}
    }

    if (changed.length === 0) {
      return {outcome: 'NoOp', filesChanged: []}
    }

    for (const path of changed) {
      const content = staged.get(path)
      await (content === undefined ? tree.deleteFile(path) : tree.writeFile(path, content))
    }

    return {outcome: 'Applied', filesChanged: changed}
  }
}
