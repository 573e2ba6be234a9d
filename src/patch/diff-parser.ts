import {parsePatch, type Hunk} from 'diff'
import {normalizeTreePath} from '../engine/working-tree.js'

export type {Hunk} from 'diff'

/**
 * One file section of a unified diff, with `a/` and `b/` prefixes removed.
 */
export type FilePatch = {
  /** Undefined for created files */
  oldPath?: string;
  /** Undefined for deleted files */
  newPath?: string;
  /** Path the section is reported under (new path, else old path) */
  path: string;
  hunks: Hunk[];
}

export type ParsedDiff =
  | {ok: true; files: FilePatch[]}
  | {ok: false; detail: string}

const testFilePatterns = [/(^|\/)test[^/]*\.py$/, /_test\.py$/, /(^|\/)tests?\//, /(^|\/)testing\//]

/**
 * Whether a repository path holds tests (pytest naming conventions).
 */
export function isTestFile(path: string): boolean {
  return testFilePatterns.some(pattern => pattern.test(path))
}

function stripPrefix(fileName: string | undefined): string | undefined {
  if (fileName === undefined || fileName === '/dev/null') {
    return undefined
  }

  return fileName.replace(/^[ab]\//, '')
}

function hunkCounts(hunk: Hunk): {old: number; new: number} {
  let oldCount = 0
  let newCount = 0
  for (const line of hunk.lines) {
    switch (line[0]) {
      case ' ': {
        oldCount++
        newCount++
        break
      }

      case '-': {
        oldCount++
        break
      }

      case '+': {
        newCount++
        break
      }

      default: {
        break
      }
    }
  }

  return {old: oldCount, new: newCount}
}

type Section = {
  oldFileName?: string;
  newFileName?: string;
  hunks: Hunk[];
}

type FileResult = {ok: true; file: FilePatch} | {ok: false; detail: string}

function parseSections(text: string): {ok: true; sections: Section[]} | {ok: false; detail: string} {
  try {
    return {ok: true, sections: parsePatch(text)}
  } catch (error) {
    return {ok: false, detail: error instanceof Error ? error.message : String(error)}
  }
}

function filePatch(oldPath: string | undefined, newPath: string | undefined, section: Section): FileResult {
  const path = newPath ?? oldPath
  if (path === undefined) {
    return {ok: false, detail: 'file section without a path'}
  }

  for (const candidate of [oldPath, newPath]) {
    if (candidate !== undefined && normalizeTreePath(candidate) !== candidate) {
      return {ok: false, detail: `unsafe path: ${candidate}`}
    }
  }

  // Blank lines inside a hunk are context lines whose leading space was trimmed
  const hunks = section.hunks.map(hunk => ({...hunk, lines: hunk.lines.map(line => line === '' ? ' ' : line)}))
  for (const hunk of hunks) {
    if (![hunk.oldStart, hunk.oldLines, hunk.newStart, hunk.newLines].every(n => Number.isInteger(n) && n >= 0)) {
      return {ok: false, detail: `invalid hunk header in ${path}`}
    }

    const counts = hunkCounts(hunk)
    if (counts.old !== hunk.oldLines || counts.new !== hunk.newLines) {
      return {
        ok: false,
        detail: `hunk at -${hunk.oldStart} in ${path} has ${counts.old}/${counts.new} lines, header says ${hunk.oldLines}/${hunk.newLines}`
      }
    }
  }

  return {ok: true, file: {oldPath, newPath, path, hunks}}
}

const gitHeader = 'diff --git '

/**
 * Paths of a `diff --git a/<old> b/<new>` line. When both sides are equal the
 * line is split in its middle, so paths containing spaces are read whole.
 */
function gitHeaderPaths(line: string): {oldPath: string; newPath: string} | undefined {
  const rest = line.slice(gitHeader.length)
  const half = (rest.length - 1) / 2
  if (Number.isInteger(half)) {
    const left = rest.slice(0, half)
    const right = rest.slice(half + 1)
    if (left.startsWith('a/') && right.startsWith('b/') && left.slice(2) === right.slice(2)) {
      return {oldPath: left.slice(2), newPath: right.slice(2)}
    }
  }

  const match = /^a\/(\S+) b\/(\S+)$/.exec(rest)
  return match ? {oldPath: match[1], newPath: match[2]} : undefined
}

type GitMetadata = {
  created: boolean;
  deleted: boolean;
  copied: boolean;
  modeChanged: boolean;
  binary: boolean;
  renameFrom?: string;
  renameTo?: string;
}

function gitMetadata(lines: string[]): GitMetadata {
  const metadata: GitMetadata = {created: false, deleted: false, copied: false, modeChanged: false, binary: false}
  for (const line of lines.slice(1)) {
    if (line.startsWith('Binary files ') || line === 'GIT binary patch') {
      metadata.binary = true
      break
    }

    if (line.startsWith('--- ') || line.startsWith('@@')) {
      break
    }

    if (line.startsWith('new file mode ')) {
      metadata.created = true
    } else if (line.startsWith('deleted file mode ')) {
      metadata.deleted = true
    } else if (line.startsWith('old mode ') || line.startsWith('new mode ')) {
      metadata.modeChanged = true
    } else if (line.startsWith('rename from ')) {
      metadata.renameFrom = line.slice('rename from '.length)
    } else if (line.startsWith('rename to ')) {
      metadata.renameTo = line.slice('rename to '.length)
    } else if (line.startsWith('copy from ') || line.startsWith('copy to ')) {
      metadata.copied = true
    }
  }

  return metadata
}

/**
 * One `diff --git` section. Creations, deletions and renames are read from
 * the extended header, so sections without hunks (an empty new file, a pure
 * rename) are kept. Changes a working tree cannot hold (binary content,
 * file modes, copies) reject the section.
 */
function parseGitSection(lines: string[]): FileResult {
  const header = gitHeaderPaths(lines[0])
  const metadata = gitMetadata(lines)
  const label = header?.newPath ?? lines[0].slice(gitHeader.length)

  if (metadata.binary) {
    return {ok: false, detail: `binary change to ${label} cannot be applied`}
  }

  if (metadata.copied) {
    return {ok: false, detail: `copy to ${label} cannot be applied`}
  }

  const parsed = parseSections(lines.join('\n'))
  if (!parsed.ok) {
    return parsed
  }

  const section: Section = parsed.sections[0] ?? {hunks: []}
  if (parsed.sections.length > 1) {
    return {ok: false, detail: `unexpected content in the section of ${label}`}
  }

  const oldPath = metadata.created ? undefined : metadata.renameFrom ?? stripPrefix(section.oldFileName) ?? header?.oldPath
  const newPath = metadata.deleted ? undefined : metadata.renameTo ?? stripPrefix(section.newFileName) ?? header?.newPath

  if (section.hunks.length === 0 && !metadata.created && !metadata.deleted && oldPath === newPath) {
    return {ok: false, detail: metadata.modeChanged ? `mode change of ${label} cannot be applied` : `no hunks for ${label}`}
  }

  return filePatch(oldPath, newPath, section)
}

/**
 * Plain unified diff sections (no `diff --git` line).
 */
function parsePlainSections(text: string): {ok: true; files: FilePatch[]} | {ok: false; detail: string} {
  const parsed = parseSections(text)
  if (!parsed.ok) {
    return parsed
  }

  const files: FilePatch[] = []
  for (const section of parsed.sections) {
    const hasHeader = section.oldFileName !== undefined || section.newFileName !== undefined
    if (!hasHeader && section.hunks.length === 0) {
      // Text around the diff
      continue
    }

    if (!hasHeader) {
      return {ok: false, detail: 'hunk without file header'}
    }

    const oldPath = stripPrefix(section.oldFileName)
    const newPath = stripPrefix(section.newFileName)
    if (section.hunks.length === 0 && oldPath === newPath) {
      return {ok: false, detail: `no hunks for ${newPath ?? 'unnamed file'}`}
    }

    const result = filePatch(oldPath, newPath, section)
    if (!result.ok) {
      return result
    }

    files.push(result.file)
  }

  return {ok: true, files}
}

/**
 * Parses and validates a git-style unified diff.
 *
 * The diff is rejected when it has no file section, when a section cannot
 * be represented as a text change, when hunk line counts disagree with
 * their header, or when a path is absolute or leaves the tree.
 */
export function parseDiff(diff: string): ParsedDiff {
  const lines = diff.split('\n')
  const firstGit = lines.findIndex(line => line.startsWith(gitHeader))
  const preamble = firstGit === -1 ? lines : lines.slice(0, firstGit)

  const plain = parsePlainSections(preamble.join('\n'))
  if (!plain.ok) {
    return plain
  }

  const files = [...plain.files]
  if (firstGit !== -1) {
    let start = firstGit
    while (start < lines.length) {
      let end = start + 1
      while (end < lines.length && !lines[end].startsWith(gitHeader)) {
        end++
      }

      const result = parseGitSection(lines.slice(start, end))
      if (!result.ok) {
        return result
      }

      files.push(result.file)
      start = end
    }
  }

  if (files.length === 0) {
    return {ok: false, detail: 'no file sections'}
  }

  return {ok: true, files}
}

/**
 * Post-image line ranges (1-based, inclusive) touched by each file section.
 * A pure deletion is reported as the single line following it.
 */
export function changedRanges(file: FilePatch): Array<[number, number]> {
  const ranges: Array<[number, number]> = []
  for (const hunk of file.hunks) {
    let line = hunk.newStart
    let start: number | undefined
    let end = 0
    const close = () => {
      if (start !== undefined) {
        ranges.push([start, end])
        start = undefined
      }
    }

    for (const text of hunk.lines) {
      const marker = text[0]
      if (marker === '+') {
        start ??= line
        end = line
        line++
      } else if (marker === '-') {
        start ??= line
        end = Math.max(end, line)
      } else if (marker === ' ') {
        close()
        line++
      }
    }

    close()
  }

  return ranges
}
