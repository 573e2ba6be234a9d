import {randomUUID} from 'node:crypto'
import {
  CancellationError,
  ContainerCleanupError,
  EnvironmentFailureError,
  ExecTimeoutError,
  errorMessage
} from '../errors.js'
import {throwIfAborted} from '../core/cancellation.js'
import type {Logger} from '../core/logger.js'
import {silentLogger} from '../core/logger.js'
import {withRetry, type RetryPolicy} from '../core/retry.js'
import {slugify} from '../core/utils.js'
import type {ResourceLimits} from '../types.js'
import type {ContainerRuntime, ExecResult, OnLogLine} from './runtime.js'
import type {ContainerInstance, InstanceRegistry} from './instance-registry.js'

export const runLabel = 'evalkit.run'

export type EnvironmentManagerOptions = {
  runId: string;
  cleanupRetry: RetryPolicy;
  network?: 'none' | 'bridge';
  logger?: Logger;
}

export type StartOptions = {
  specId: string;
  workdir: string;
  env?: Record<string, string>;
  limits?: ResourceLimits;
  signal?: AbortSignal;
}

export type ExecOptions = {
  cwd?: string;
  env?: Record<string, string>;
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onLogLine?: OnLogLine;
}

/**
 * Creates, runs commands in, and tears down container instances.
 *
 * Every started instance is tracked in the shared `InstanceRegistry`
 * until it is destroyed. `destroy()` issues exactly one runtime removal
 * per instance, whatever the number of callers.
 */
export class EnvironmentManager {
  private readonly destroying = new Map<string, Promise<void>>()
  private readonly logger: Logger

  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly registry: InstanceRegistry,
    private readonly options: EnvironmentManagerOptions
  ) {
    this.logger = options.logger ?? silentLogger
  }

  get runId(): string {
    return this.options.runId
  }

  /**
   * Remove containers left over by a crashed process with the same run id.
   */
  async cleanupLeftovers(): Promise<number> {
    const removed = await this.runtime.cleanupContainers({evalkit: 'true', [runLabel]: this.options.runId})
    if (removed > 0) {
      this.logger.warn({runId: this.options.runId, removed}, 'removed leftover containers')
    }

    return removed
  }

  async start(image: string, options: StartOptions): Promise<ContainerInstance> {
    throwIfAborted(options.signal)
    const instance: ContainerInstance = {
      id: `evalkit-${slugify(this.options.runId)}-${slugify(options.specId).slice(0, 40)}-${randomUUID().slice(0, 8)}`,
      image,
      specId: options.specId,
      workdir: options.workdir,
      createdAt: new Date(),
      state: 'Created'
    }

    // Registered before creation so a partially created container is still torn down
    this.registry.register(instance)

    try {
      await this.runtime.createContainer({
        name: instance.id,
        image,
        labels: {evalkit: 'true', [runLabel]: this.options.runId, 'evalkit.spec': options.specId},
        env: options.env,
        limits: options.limits,
        workdir: options.workdir,
        network: this.options.network ?? 'bridge'
      })
      await this.runtime.startContainer(instance.id)
      instance.state = 'Running'
      throwIfAborted(options.signal)
    } catch (error) {
      if (error instanceof CancellationError) {
        await this.destroy(instance)
        throw error
      }

      instance.state = 'Crashed'
      await this.destroy(instance)
      throw new EnvironmentFailureError(`Failed to start instance for ${options.specId}: ${errorMessage(error)}`, {cause: error})
    }

    this.logger.debug({instance: instance.id, image}, 'instance started')
    return instance
  }

  /**
   * Runs a command inside a running instance with a hard wall-clock timeout.
   * On timeout the instance is destroyed and `ExecTimeoutError` is thrown.
   */
  async exec(instance: ContainerInstance, cmd: string[], options: ExecOptions): Promise<ExecResult> {
    if (instance.state !== 'Running') {
      throw new EnvironmentFailureError(`Instance ${instance.id} is not running (${instance.state})`)
    }

    let result: ExecResult
    try {
      result = await this.runtime.exec(instance.id, {cmd, ...options})
    } catch (error) {
      if (error instanceof CancellationError) {
        throw error
      }

      instance.state = 'Crashed'
      throw new EnvironmentFailureError(`exec failed in ${instance.id}: ${errorMessage(error)}`, {cause: error})
    }

    if (result.timedOut) {
      instance.state = 'TimedOut'
      await this.destroy(instance)
      throw new ExecTimeoutError(instance.id, options.timeoutMs)
    }

    return result
  }

  /**
   * Copies a directory of the instance to the host.
   */
  async copyOut(instance: ContainerInstance, containerPath: string, hostPath: string): Promise<void> {
    try {
      await this.runtime.copyFromContainer(instance.id, containerPath, hostPath)
    } catch (error) {
      throw new EnvironmentFailureError(`Failed to copy ${containerPath} out of ${instance.id}`, {cause: error})
    }
  }

  /**
   * Idempotent and concurrent-safe teardown.
   * @throws ContainerCleanupError when removal keeps failing
   */
  async destroy(instance: ContainerInstance): Promise<void> {
    const pending = this.destroying.get(instance.id)
    if (pending) {
      return pending
    }

    if (!this.registry.has(instance.id)) {
      return
    }

    // Kept after a failed removal, so later callers see the same failure
    const removal = this.remove(instance).then(() => {
      this.destroying.delete(instance.id)
    })
    this.destroying.set(instance.id, removal)
    return removal
  }

  /**
   * Destroys every live instance. Used on shutdown before results are flushed.
   */
  async destroyAll(): Promise<void> {
    const results = await Promise.allSettled(this.registry.live().map(async instance => this.destroy(instance)))
    const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected')
    if (failure) {
      throw failure.reason
    }
  }

  live(): ContainerInstance[] {
    return this.registry.live()
  }

  private async remove(instance: ContainerInstance): Promise<void> {
    try {
      await withRetry(async () => this.runtime.removeContainer(instance.id), {
        ...this.options.cleanupRetry,
        isRetryable: () => true
      }, {
        onRetry: (error, attempt) => {
          this.logger.warn({instance: instance.id, attempt, err: errorMessage(error)}, 'container removal failed, retrying')
        }
      })
    } catch (error) {
      this.logger.error({instance: instance.id, err: errorMessage(error)}, 'container removal failed')
      throw new ContainerCleanupError(instance.id, {cause: error})
    }

    instance.state = 'Destroyed'
    this.registry.unregister(instance.id)
  }
}
