import type {ResourceLimits} from '../types.js'

/**
 * Log line from a build or an exec.
 */
export type LogLine = {
  stream: 'stdout' | 'stderr';
  line: string;
}

export type OnLogLine = (log: LogLine) => void

export type BuildImageRequest = {
  tag: string;
  /** Dockerfile content, built without a context directory */
  dockerfile: string;
  labels?: Record<string, string>;
  timeoutMs: number;
  signal?: AbortSignal;
  onLogLine?: OnLogLine;
}

export type CreateContainerRequest = {
  name: string;
  image: string;
  labels: Record<string, string>;
  env?: Record<string, string>;
  limits?: ResourceLimits;
  workdir?: string;
  network: 'none' | 'bridge';
}

export type ExecRequest = {
  cmd: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Written to the command's stdin */
  input?: string;
  timeoutMs: number;
  signal?: AbortSignal;
  onLogLine?: OnLogLine;
}

export type ExecResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  durationMs: number;
  timedOut: boolean;
}

/**
 * Abstract container driver.
 *
 * Implementations:
 * - `DockerCliRuntime`: Uses Docker CLI
 *
 * Drivers are stateless with regard to instance lifecycle: the
 * `EnvironmentManager` owns registration, timeouts and teardown.
 */
export abstract class ContainerRuntime {
  /**
   * Verifies that the runtime is available.
   * @throws DockerNotAvailableError when it is not
   */
  abstract check(): Promise<void>

  abstract imageExists(tag: string): Promise<boolean>

  /**
   * Builds an image.
   * @throws BuildFailureError, BuildTimeoutError or CancellationError
   */
  abstract buildImage(request: BuildImageRequest): Promise<void>

  abstract createContainer(request: CreateContainerRequest): Promise<void>

  abstract startContainer(name: string): Promise<void>

  /**
   * Runs a command in a started container. A command that outlives
   * `timeoutMs` is reported with `timedOut: true`, not thrown.
   * @throws CancellationError when `signal` fires
   */
  abstract exec(name: string, request: ExecRequest): Promise<ExecResult>

  /** Copies a directory of a container to the host. */
  abstract copyFromContainer(name: string, containerPath: string, hostPath: string): Promise<void>

  /** Force-removes a container. Throws when removal fails. */
  abstract removeContainer(name: string): Promise<void>

  /**
   * Removes leftover containers matching every label.
   * @returns Number of containers removed
   */
  abstract cleanupContainers(labels: Record<string, string>): Promise<number>
}
