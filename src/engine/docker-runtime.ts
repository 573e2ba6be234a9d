import process from 'node:process'
import {execa} from 'execa'
import {
  BuildFailureError,
  BuildTimeoutError,
  DockerNotAvailableError,
  EnvironmentFailureError
} from '../errors.js'
import {cancellationFrom, throwIfAborted} from '../core/cancellation.js'
import {
  ContainerRuntime,
  type BuildImageRequest,
  type CreateContainerRequest,
  type ExecRequest,
  type ExecResult,
  type OnLogLine
} from './runtime.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept so that host secrets
 * (API keys, tokens, credentials) never reach a container.
 */
function dockerCliEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

function labelArgs(labels: Record<string, string>): string[] {
  return Object.entries(labels).flatMap(([key, value]) => ['--label', `${key}=${value}`])
}

/**
 * Stream stdout/stderr lines of a subprocess.
 */
async function streamLogs(stdout: AsyncIterable<unknown>, stderr: AsyncIterable<unknown>, onLogLine: OnLogLine): Promise<void> {
  await Promise.all([
    (async () => {
      for await (const line of stdout) {
        onLogLine({stream: 'stdout', line: String(line)})
      }
    })(),
    (async () => {
      for await (const line of stderr) {
        onLogLine({stream: 'stderr', line: String(line)})
      }
    })()
  ])
}

export class DockerCliRuntime extends ContainerRuntime {
  private readonly env = dockerCliEnv()

  async check(): Promise<void> {
    try {
      await execa('docker', ['version', '--format', '{{.Server.Version}}'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new DockerNotAvailableError({cause: error})
    }
  }

  async imageExists(tag: string): Promise<boolean> {
    const result = await execa('docker', ['image', 'inspect', '--format', '{{.Id}}', tag], {
      env: this.env,
      extendEnv: false,
      reject: false
    })
    return result.exitCode === 0
  }

  async buildImage(request: BuildImageRequest): Promise<void> {
    throwIfAborted(request.signal)
    const args = ['build', '--tag', request.tag, ...labelArgs(request.labels ?? {}), '-']
    const proc = execa('docker', args, {
      env: {...this.env, DOCKER_BUILDKIT: '1'},
      extendEnv: false,
      input: request.dockerfile,
      reject: false,
      timeout: request.timeoutMs,
      cancelSignal: request.signal
    })

    if (request.onLogLine) {
      await streamLogs(proc.iterable({from: 'stdout'}), proc.iterable({from: 'stderr'}), request.onLogLine)
    }

    const result = await proc
    if (result.isCanceled && request.signal) {
      throw cancellationFrom(request.signal)
    }

    if (result.timedOut) {
      throw new BuildTimeoutError(request.tag, request.timeoutMs)
    }

    if (result.exitCode !== 0) {
      const tail = result.stderr.split('\n').slice(-5).join('\n')
      throw new BuildFailureError(request.tag, tail || `exit code ${String(result.exitCode)}`)
    }
  }

  async createContainer(request: CreateContainerRequest): Promise<void> {
    const args = [
      'create',
      '--name',
      request.name,
      '--network',
      request.network,
      ...labelArgs(request.labels)
    ]

    const {limits} = request
    if (limits?.cpus !== undefined) {
      args.push('--cpus', String(limits.cpus))
    }

    if (limits?.memory) {
      args.push('--memory', limits.memory)
    }

    if (limits?.gpus) {
      args.push('--gpus', limits.gpus)
    }

    const env = {...request.env}
    if (limits?.visibleDevices) {
      env.CUDA_VISIBLE_DEVICES = limits.visibleDevices
    }

    for (const [key, value] of Object.entries(env)) {
      args.push('-e', `${key}=${value}`)
    }

    if (request.workdir) {
      args.push('--workdir', request.workdir)
    }

    // Keep the container alive; every command runs through `docker exec`
    args.push('--entrypoint', 'sleep', request.image, 'infinity')

    const result = await execa('docker', args, {env: this.env, extendEnv: false, reject: false})
    if (result.exitCode !== 0) {
      throw new EnvironmentFailureError(`docker create failed for ${request.name}: ${result.stderr.trim()}`)
    }
  }

  async startContainer(name: string): Promise<void> {
    const result = await execa('docker', ['start', name], {env: this.env, extendEnv: false, reject: false})
    if (result.exitCode !== 0) {
      throw new EnvironmentFailureError(`docker start failed for ${name}: ${result.stderr.trim()}`)
    }
  }

  async exec(name: string, request: ExecRequest): Promise<ExecResult> {
    throwIfAborted(request.signal)
    const args = ['exec']
    if (request.input !== undefined) {
      args.push('--interactive')
    }

    if (request.cwd) {
      args.push('--workdir', request.cwd)
    }

    for (const [key, value] of Object.entries(request.env ?? {})) {
      args.push('-e', `${key}=${value}`)
    }

    args.push(name, ...request.cmd)

    const startedAt = Date.now()
    const proc = execa('docker', args, {
      env: this.env,
      extendEnv: false,
      input: request.input,
      reject: false,
      stripFinalNewline: false,
      timeout: request.timeoutMs,
      cancelSignal: request.signal
    })

    if (request.onLogLine) {
      await streamLogs(proc.iterable({from: 'stdout'}), proc.iterable({from: 'stderr'}), request.onLogLine)
    }

    const result = await proc
    if (result.isCanceled && request.signal) {
      throw cancellationFrom(request.signal)
    }

    return {
      exitCode: result.exitCode ?? -1,
      stdout: result.stdout,
      stderr: result.stderr,
      durationMs: Date.now() - startedAt,
      timedOut: result.timedOut
    }
  }

  async copyFromContainer(name: string, containerPath: string, hostPath: string): Promise<void> {
    const result = await execa('docker', ['cp', `${name}:${containerPath}/.`, hostPath], {
      env: this.env,
      extendEnv: false,
      reject: false
    })
    if (result.exitCode !== 0) {
      throw new EnvironmentFailureError(`docker cp from ${name}:${containerPath} failed: ${result.stderr.trim()}`)
    }
  }

  async removeContainer(name: string): Promise<void> {
    const result = await execa('docker', ['rm', '--force', '--volumes', name], {
      env: this.env,
      extendEnv: false,
      reject: false
    })
    if (result.exitCode !== 0 && !/no such container/i.test(result.stderr)) {
      throw new EnvironmentFailureError(`docker rm failed for ${name}: ${result.stderr.trim()}`)
    }
  }

  async cleanupContainers(labels: Record<string, string>): Promise<number> {
    const filters = Object.entries(labels).flatMap(([key, value]) => ['--filter', `label=${key}=${value}`])
    const {stdout} = await execa('docker', ['ps', '--all', '--quiet', ...filters], {env: this.env, extendEnv: false})
    const ids = stdout.trim().split('\n').filter(Boolean)
    if (ids.length > 0) {
      await execa('docker', ['rm', '--force', '--volumes', ...ids], {env: this.env, extendEnv: false})
    }

    return ids.length
  }

}
