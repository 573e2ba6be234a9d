export class EvalError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'EvalError'
  }

  /** Transient errors are eligible for retry by `withRetry`. */
  get transient(): boolean {
    return false
  }

  /** Fatal errors abort the whole run instead of failing a single spec. */
  get fatal(): boolean {
    return false
  }
}

// -- Runtime errors ----------------------------------------------------------

export class RuntimeError extends EvalError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RuntimeError'
  }
}

export class DockerNotAvailableError extends RuntimeError {
  constructor(options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', 'Docker CLI not found. Please install Docker.', options)
    this.name = 'DockerNotAvailableError'
  }

  override get fatal(): boolean {
    return true
  }
}

export class BuildFailureError extends RuntimeError {
  constructor(readonly tag: string, message: string, options?: {cause?: unknown}) {
    super('BUILD_FAILED', `Failed to build image "${tag}": ${message}`, options)
    this.name = 'BuildFailureError'
  }

  override get transient(): boolean {
    return true
  }
}

export class BuildTimeoutError extends RuntimeError {
  constructor(readonly tag: string, timeoutMs: number, options?: {cause?: unknown}) {
    super('BUILD_TIMEOUT', `Build of image "${tag}" exceeded ${timeoutMs}ms`, options)
    this.name = 'BuildTimeoutError'
  }
}

export class EnvironmentFailureError extends RuntimeError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ENVIRONMENT_FAILURE', message, options)
    this.name = 'EnvironmentFailureError'
  }
}

export class ExecTimeoutError extends RuntimeError {
  constructor(readonly instanceId: string, timeoutMs: number, options?: {cause?: unknown}) {
    super('EXEC_TIMEOUT', `Command in ${instanceId} exceeded ${timeoutMs}ms`, options)
    this.name = 'ExecTimeoutError'
  }
}

export class ContainerCleanupError extends RuntimeError {
  constructor(readonly instanceId: string, options?: {cause?: unknown}) {
    super('CONTAINER_CLEANUP_FAILED', `Failed to clean up container ${instanceId}`, options)
    this.name = 'ContainerCleanupError'
  }

  override get fatal(): boolean {
    return true
  }
}

// -- Run control -------------------------------------------------------------

export class CancellationError extends EvalError {
  constructor(message = 'Operation cancelled', options?: {cause?: unknown}) {
    super('CANCELLED', message, options)
    this.name = 'CancellationError'
  }
}

export class SpecTimeoutError extends EvalError {
  constructor(readonly specId: string, timeoutMs: number, options?: {cause?: unknown}) {
    super('SPEC_TIMEOUT', `Spec ${specId} exceeded its budget of ${timeoutMs}ms`, options)
    this.name = 'SpecTimeoutError'
  }
}

// -- Input / output errors ---------------------------------------------------

export class ConfigurationError extends EvalError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('CONFIGURATION_ERROR', message, options)
    this.name = 'ConfigurationError'
  }

  override get fatal(): boolean {
    return true
  }
}

export class SpecValidationError extends EvalError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('SPEC_INVALID', message, options)
    this.name = 'SpecValidationError'
  }
}

export class ResultsWriteError extends EvalError {
  constructor(path: string, options?: {cause?: unknown}) {
    super('RESULTS_WRITE_FAILED', `Failed to append to results log ${path}`, options)
    this.name = 'ResultsWriteError'
  }

  override get fatal(): boolean {
    return true
  }
}

export function isFatal(error: unknown): boolean {
  return error instanceof EvalError && error.fatal
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
