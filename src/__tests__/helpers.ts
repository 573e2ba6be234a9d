import {Buffer} from 'node:buffer'
import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join, posix} from 'node:path'
import {mergeConfig, type EvalConfig} from '../config.js'
import {cancellationFrom, throwIfAborted} from '../core/cancellation.js'
import {
  ContainerRuntime,
  type BuildImageRequest,
  type CreateContainerRequest,
  type ExecRequest,
  type ExecResult
} from '../engine/runtime.js'
import type {Reporter, RunEvent} from '../orchestrator/reporter.js'
import type {EvaluationSpec} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'evalkit-test-'))
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: RunEvent[]} {
  const events: RunEvent[] = []
  const reporter: Reporter = {
    emit(event: RunEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Settles only by rejecting with `CancellationError` once `signal` fires.
 */
export async function untilAborted(signal?: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (!signal) {
      return
    }

    if (signal.aborted) {
      reject(cancellationFrom(signal))
      return
    }

    signal.addEventListener('abort', () => {
      reject(cancellationFrom(signal))
    }, {once: true})
  })
}

export type ExecCall = {
  container: string;
  cmd: string[];
  cwd?: string;
  input?: string;
  env?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
}

export type ExecHandler = (call: ExecCall) => Partial<ExecResult> | undefined | Promise<Partial<ExecResult> | undefined>

// Scripts issued by ContainerWorkingTree and the pipeline, emulated on the in-memory file system
const readScript = 'if [ -f "$1" ]; then base64 "$1"; else exit 3; fi'
const writeScript = 'mkdir -p "$(dirname "$1")" && base64 -d > "$1"'
const deleteScript = 'rm -f -- "$1"'
const listScript = 'git ls-files --cached --others --exclude-standard'
const forkScript = 'mkdir -p "$2" && cp -a "$1"/. "$2"/'
const swapScript = 'mv "$1" "$3" && mv "$2" "$1"'

function under(path: string, root: string): string | undefined {
  const prefix = root.endsWith('/') ? root : `${root}/`
  return path.startsWith(prefix) ? path.slice(prefix.length) : undefined
}

/**
 * In-process stand-in for a container runtime.
 *
 * Every container gets its own copy of `seed` (absolute path → content) as
 * file system; the file-access scripts of working trees run against it.
 * Other commands go through the handlers registered with `onExec` (first
 * non-undefined answer wins), and succeed silently when none answers.
 */
export class FakeRuntime extends ContainerRuntime {
  readonly seed = new Map<string, string>()
  readonly images = new Set<string>()
  readonly builds: BuildImageRequest[] = []
  readonly created: string[] = []
  readonly removed: string[] = []
  readonly execs: ExecCall[] = []
  readonly filesystems = new Map<string, Map<string, string>>()
  buildHandler?: (request: BuildImageRequest) => Promise<void>
  /** Removal attempts that fail before removals start to succeed */
  removeFailures = 0
  leftovers = 0

  private readonly handlers: ExecHandler[] = []

  onExec(handler: ExecHandler): this {
    this.handlers.push(handler)
    return this
  }

  files(container: string): Map<string, string> {
    let files = this.filesystems.get(container)
    if (!files) {
      files = new Map()
      this.filesystems.set(container, files)
    }

    return files
  }

  async check(): Promise<void> {
    // Always available
  }

  async imageExists(tag: string): Promise<boolean> {
    return this.images.has(tag)
  }

  async buildImage(request: BuildImageRequest): Promise<void> {
    throwIfAborted(request.signal)
    this.builds.push(request)
    await this.buildHandler?.(request)
    this.images.add(request.tag)
  }

  async createContainer(request: CreateContainerRequest): Promise<void> {
    this.created.push(request.name)
    this.filesystems.set(request.name, new Map(this.seed))
  }

  async startContainer(_name: string): Promise<void> {
    // Started on creation
  }

  async exec(name: string, request: ExecRequest): Promise<ExecResult> {
    throwIfAborted(request.signal)
    const call: ExecCall = {
      container: name,
      cmd: request.cmd,
      cwd: request.cwd,
      input: request.input,
      env: request.env,
      timeoutMs: request.timeoutMs,
      signal: request.signal
    }
    this.execs.push(call)

    for (const handler of this.handlers) {
      const answer = await handler(call)
      if (answer) {
        return {exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false, ...answer}
      }
    }

    return {exitCode: 0, stdout: '', stderr: '', durationMs: 1, timedOut: false, ...this.builtin(call)}
  }

  async copyFromContainer(name: string, containerPath: string, hostPath: string): Promise<void> {
    for (const [path, content] of this.files(name)) {
      const relative = under(path, containerPath)
      if (relative !== undefined) {
        const target = join(hostPath, relative)
        await mkdir(dirname(target), {recursive: true})
        await writeFile(target, content, 'utf8')
      }
    }
  }

  async removeContainer(name: string): Promise<void> {
    if (this.removeFailures > 0) {
      this.removeFailures--
      throw new Error(`removal of ${name} failed`)
    }

    this.removed.push(name)
  }

  async cleanupContainers(_labels: Record<string, string>): Promise<number> {
    const removed = this.leftovers
    this.leftovers = 0
    return removed
  }

  /** Commands run in a container, joined with spaces. */
  commands(container?: string): string[] {
    return this.execs
      .filter(call => container === undefined || call.container === container)
      .map(call => call.cmd.join(' '))
  }

  private builtin(call: ExecCall): Partial<ExecResult> {
    const [shell, flag, script, , ...args] = call.cmd
    if (shell !== 'sh' || flag !== '-c' || script === undefined) {
      return {}
    }

    const files = this.files(call.container)
    const cwd = call.cwd ?? '/'
    const resolve = (path: string) => posix.resolve(cwd, path)

    switch (script) {
      case readScript: {
        const content = files.get(resolve(args[0]))
        return content === undefined ? {exitCode: 3} : {stdout: Buffer.from(content, 'utf8').toString('base64')}
      }

      case writeScript: {
        files.set(resolve(args[0]), Buffer.from(call.input ?? '', 'base64').toString('utf8'))
        return {}
      }

      case deleteScript: {
        files.delete(resolve(args[0]))
        return {}
      }

      case listScript: {
        const listed = [...files.keys()].map(path => under(path, cwd)).filter(path => path !== undefined)
        return {stdout: listed.join('\n')}
      }

      case forkScript: {
        const [source, target] = args.map(path => resolve(path))
        for (const [path, content] of [...files]) {
          const relative = under(path, source)
          if (relative !== undefined) {
            files.set(posix.join(target, relative), content)
          }
        }

        return {}
      }

      case swapScript: {
        const [current, next, previous] = args.map(path => resolve(path))
        const moved = new Map<string, string>()
        for (const [path, content] of files) {
          const fromCurrent = under(path, current)
          const fromNext = under(path, next)
          if (fromCurrent !== undefined) {
            moved.set(posix.join(previous, fromCurrent), content)
          } else if (fromNext !== undefined) {
            moved.set(posix.join(current, fromNext), content)
          } else {
            moved.set(path, content)
          }
        }

        files.clear()
        for (const [path, content] of moved) {
          files.set(path, content)
        }

        return {}
      }

      default: {
        return {}
      }
    }
  }
}

/**
 * Configuration with one container agent (`fake-agent`), no retry delays
 * and no grace period.
 */
export function testConfig(overrides: Record<string, unknown> = {}): EvalConfig {
  return mergeConfig({
    concurrency: 2,
    gracePeriodMs: 0,
    execGraceMs: 0,
    agent: 'fake',
    agents: {fake: {mode: 'container', command: ['fake-agent', '{promptFile}']}},
    image: {retry: {maxAttempts: 1, backoffMs: []}},
    tests: {workers: 1, perTestTimeoutMs: 1000},
    cleanup: {retry: {maxAttempts: 3, backoffMs: [0]}}
  }, overrides)
}

export const testFile = 'tests/test_calc.py'

/** Test patch creating `tests/test_calc.py` with two tests. */
export const createTestsPatch = [
  'diff --git a/tests/test_calc.py b/tests/test_calc.py',
  'new file mode 100644',
  '--- /dev/null',
  '+++ b/tests/test_calc.py',
  '@@ -0,0 +1,7 @@',
  '+from calc import add',
  '+',
  '+def test_add():',
  '+    assert add(1, 2) == 3',
  '+',
  '+def test_zero():',
  '+    assert add(0, 0) == 0',
  ''
].join('\n')

/** Candidate patch fixing `calc.py`. */
export const fixCalcPatch = [
  'diff --git a/calc.py b/calc.py',
  '--- a/calc.py',
  '+++ b/calc.py',
  '@@ -1,2 +1,2 @@',
  ' def add(a, b):',
  '-    return a - b',
  '+    return a + b',
  ''
].join('\n')

export const brokenCalc = 'def add(a, b):\n    return a - b\n'
export const fixedCalc = 'def add(a, b):\n    return a + b\n'

export function makeSpec(id: string, overrides: Partial<EvaluationSpec> = {}): EvaluationSpec {
  return {
    id,
    repository: 'example/calc',
    baseCommit: 'abc123',
    environment: {install: ['pip install -e .']},
    prompt: 'Fix add()',
    testPatch: createTestsPatch,
    failToPass: [`${testFile}::test_add`],
    passToPass: [`${testFile}::test_zero`],
    ...overrides
  }
}

/**
 * Runtime whose checkout holds a broken `calc.py`. `test_add` passes once
 * `calc.py` is fixed, `test_zero` always passes, and the diff collected
 * from the agent workspace is `agentPatch`.
 */
export function calcRuntime(agentPatch = fixCalcPatch): FakeRuntime {
  const runtime = new FakeRuntime()
  runtime.seed.set('/workspace/repo/calc.py', brokenCalc)
  return runtime.onExec(({container, cmd}) => {
    if (cmd.join(' ') === 'sh -c git add -A && git diff --cached --no-renames --binary') {
      return {stdout: agentPatch}
    }

    if (cmd[0] === 'timeout' && cmd.includes('pytest')) {
      const testId = cmd.at(-1)
      const fixed = runtime.files(container).get('/workspace/repo/calc.py') === fixedCalc
      return testId === `${testFile}::test_add` && !fixed
        ? {exitCode: 1, stdout: `FAILED ${testId} - assert -1 == 3\n`}
        : {exitCode: 0, stdout: `PASSED ${testId}\n`}
    }

    return undefined
  })
}
