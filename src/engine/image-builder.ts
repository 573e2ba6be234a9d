import {fingerprint} from '../core/fingerprint.js'
import {slugify} from '../core/utils.js'
import type {EnvironmentDescriptor} from '../types.js'
import type {ContainerRuntime, OnLogLine} from './runtime.js'

export const defaultWorkdir = '/workspace/repo'

export type ImageRequest = {
  repository: string;
  environment: EnvironmentDescriptor;
}

export type ImageBuilderOptions = {
  baseImage: string;
  buildTimeoutMs: number;
}

/**
 * Expands `owner/name` to a GitHub clone URL; full URLs are kept.
 */
export function repositoryUrl(repository: string): string {
  if (/^[\w.-]+\/[\w.-]+$/.test(repository)) {
    return `https://github.com/${repository}.git`
  }

  return repository
}

function quote(value: string): string {
  return JSON.stringify(value)
}

/**
 * Renders Dockerfiles from environment descriptors and builds them.
 */
export class ImageBuilder {
  constructor(
    private readonly runtime: ContainerRuntime,
    private readonly options: ImageBuilderOptions
  ) {}

  fingerprint(request: ImageRequest): string {
    const {environment} = request
    return fingerprint({
      repository: request.repository,
      baseImage: environment.baseImage ?? this.options.baseImage,
      install: environment.install,
      env: environment.env,
      workdir: environment.workdir ?? defaultWorkdir
    })
  }

  tagFor(request: ImageRequest, imageFingerprint = this.fingerprint(request)): string {
    const name = slugify(request.repository.replace(/\.git$/, '').split('/').slice(-2).join('-')) || 'repo'
    return `evalkit/${name}:${imageFingerprint.slice(0, 12)}`
  }

  render(request: ImageRequest): string {
    const {environment} = request
    const workdir = environment.workdir ?? defaultWorkdir
    const lines = [`FROM ${environment.baseImage ?? this.options.baseImage}`]

    for (const [key, value] of Object.entries(environment.env ?? {})) {
      lines.push(`ENV ${key}=${quote(value)}`)
    }

    lines.push(
      'RUN git config --global --add safe.directory "*"',
      `RUN git clone --quiet ${quote(repositoryUrl(request.repository))} ${quote(workdir)}`,
      `WORKDIR ${workdir}`
    )

    for (const command of environment.install) {
      lines.push(`RUN ${command}`)
    }

    return lines.join('\n') + '\n'
  }

  async build(tag: string, request: ImageRequest, options?: {signal?: AbortSignal; onLogLine?: OnLogLine}): Promise<void> {
    await this.runtime.buildImage({
      tag,
      dockerfile: this.render(request),
      labels: {evalkit: 'true', 'evalkit.repository': request.repository},
      timeoutMs: this.options.buildTimeoutMs,
      signal: options?.signal,
      onLogLine: options?.onLogLine
    })
  }

  async exists(tag: string): Promise<boolean> {
    return this.runtime.imageExists(tag)
  }
}
