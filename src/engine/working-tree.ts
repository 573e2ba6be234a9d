import {Buffer} from 'node:buffer'
import {cp, mkdir, readFile, readdir, rm, writeFile} from 'node:fs/promises'
import {dirname, join, posix, relative, sep} from 'node:path'
import {EnvironmentFailureError} from '../errors.js'
import type {EnvironmentManager} from './environment-manager.js'
import type {ContainerInstance} from './instance-registry.js'

/**
 * File access to a checkout, wherever it lives.
 * Paths are relative to the tree root, with forward slashes.
 */
export type WorkingTree = {
  readonly root: string;
  /** Returns undefined when the file does not exist */
  readFile(path: string): Promise<string | undefined>;
  writeFile(path: string, content: string): Promise<void>;
  deleteFile(path: string): Promise<void>;
  /** Tracked and untracked (non-ignored) files */
  listFiles(): Promise<string[]>;
  /** Copies the whole tree to `target` and returns the copy */
  fork(target: string): Promise<WorkingTree>;
}

/**
 * Rejects absolute paths and paths escaping the root.
 */
export function normalizeTreePath(path: string): string | undefined {
  const normalized = posix.normalize(path.replaceAll('\\', '/'))
  if (normalized.startsWith('/') || normalized === '..' || normalized.startsWith('../') || normalized === '.') {
    return undefined
  }

  return normalized
}

function checkedPath(path: string): string {
  const normalized = normalizeTreePath(path)
  if (!normalized) {
    throw new EnvironmentFailureError(`Path escapes working tree: ${path}`)
  }

  return normalized
}

/**
 * Working tree on the host filesystem.
 */
export class LocalWorkingTree implements WorkingTree {
  constructor(readonly root: string) {}

  async readFile(path: string): Promise<string | undefined> {
    try {
      return await readFile(join(this.root, checkedPath(path)), 'utf8')
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined
      }

      throw error
    }
  }

  async writeFile(path: string, content: string): Promise<void> {
    const target = join(this.root, checkedPath(path))
    await mkdir(dirname(target), {recursive: true})
    await writeFile(target, content, 'utf8')
  }

  async deleteFile(path: string): Promise<void> {
    await rm(join(this.root, checkedPath(path)), {force: true})
  }

  async listFiles(): Promise<string[]> {
    const entries = await readdir(this.root, {recursive: true, withFileTypes: true})
    return entries
      .filter(entry => entry.isFile())
      .map(entry => relative(this.root, join(entry.parentPath, entry.name)).split(sep).join('/'))
      .filter(path => path !== '.git' && !path.startsWith('.git/'))
      .sort()
  }

  async fork(target: string): Promise<WorkingTree> {
    await rm(target, {recursive: true, force: true})
    await cp(this.root, target, {recursive: true})
    return new LocalWorkingTree(target)
  }
}

export type ContainerWorkingTreeOptions = {
  timeoutMs: number;
  signal?: AbortSignal;
}

/**
 * Working tree inside a running instance, accessed through `docker exec`.
 * File contents travel base64-encoded.
 */
export class ContainerWorkingTree implements WorkingTree {
  constructor(
    private readonly manager: EnvironmentManager,
    private readonly instance: ContainerInstance,
    readonly root: string,
    private readonly options: ContainerWorkingTreeOptions
  ) {}

  async readFile(path: string): Promise<string | undefined> {
    const result = await this.sh('if [ -f "$1" ]; then base64 "$1"; else exit 3; fi', [checkedPath(path)])
    if (result.exitCode === 3) {
      return undefined
    }

    this.assertOk(result, `read ${path}`)
    return Buffer.from(result.stdout.replaceAll(/\s/g, ''), 'base64').toString('utf8')
  }

  async writeFile(path: string, content: string): Promise<void> {
    const result = await this.sh(
      'mkdir -p "$(dirname "$1")" && base64 -d > "$1"',
      [checkedPath(path)],
      Buffer.from(content, 'utf8').toString('base64')
    )
    this.assertOk(result, `write ${path}`)
  }

  async deleteFile(path: string): Promise<void> {
    const result = await this.sh('rm -f -- "$1"', [checkedPath(path)])
    this.assertOk(result, `delete ${path}`)
  }

  async listFiles(): Promise<string[]> {
    const result = await this.sh('git ls-files --cached --others --exclude-standard', [])
    this.assertOk(result, 'list files')
    return [...new Set(result.stdout.split('\n').filter(Boolean))].sort()
  }

  async fork(target: string): Promise<WorkingTree> {
    const result = await this.sh('mkdir -p "$2" && cp -a "$1"/. "$2"/', [this.root, target])
    this.assertOk(result, `fork to ${target}`)
    return new ContainerWorkingTree(this.manager, this.instance, target, this.options)
  }

  private async sh(script: string, args: string[], input?: string) {
    return this.manager.exec(this.instance, ['sh', '-c', script, 'sh', ...args], {
      cwd: this.root,
      input,
      timeoutMs: this.options.timeoutMs,
      signal: this.options.signal
    })
  }

  private assertOk(result: {exitCode: number; stderr: string}, action: string): void {
    if (result.exitCode !== 0) {
      throw new EnvironmentFailureError(`Failed to ${action} in ${this.root}: ${result.stderr.trim() || `exit ${result.exitCode}`}`)
    }
  }
}
