import {readFile} from 'node:fs/promises'
import {BuildFailureError, CancellationError, EvalError, errorMessage} from '../errors.js'
import {abortable} from '../core/cancellation.js'
import {KeyLock} from '../core/key-lock.js'
import type {Logger} from '../core/logger.js'
import {silentLogger} from '../core/logger.js'
import {withRetry, type RetryPolicy} from '../core/retry.js'
import type {ImageBuilder, ImageRequest} from './image-builder.js'
import type {OnLogLine} from './runtime.js'
import {writeJsonAtomic} from './workspace.js'

export type CachedImage = {
  key: string;
  tag: string;
  fingerprint: string;
  repository: string;
  builtAt: string;
}

function isCachedImage(value: unknown): value is CachedImage {
  if (value === null || typeof value !== 'object') {
    return false
  }

  const record: Record<string, unknown> = {...value}
  return ['key', 'tag', 'fingerprint', 'repository', 'builtAt'].every(field => typeof record[field] === 'string')
}

type CacheEntry =
  | {state: 'Building'; promise: Promise<CachedImage>}
  | {state: 'Ready'; image: CachedImage}
  | {state: 'Failed'; error: EvalError; expiresAt: number}

export type ImageCacheEvent =
  | {type: 'reused'; key: string; tag: string}
  | {type: 'building'; key: string; tag: string; attempt: number}
  | {type: 'built'; key: string; tag: string; durationMs: number}
  | {type: 'failed'; key: string; tag: string; error: string}

export type ImageCacheOptions = {
  /** Persisted index of built images; omitted for an in-memory cache */
  indexPath?: string;
  negativeTtlMs: number;
  retry: RetryPolicy;
  /** Process-wide signal that cancels builds in flight */
  signal?: AbortSignal;
  logger?: Logger;
  now?: () => number;
  onEvent?: (event: ImageCacheEvent) => void;
  onLogLine?: (key: string, log: Parameters<OnLogLine>[0]) => void;
}

/**
 * Single-flight cache of execution images, keyed by repository and
 * environment fingerprint.
 *
 * All concurrent `acquire()` calls for a key share one build. A failed
 * build is remembered for `negativeTtlMs`; callers within that window get
 * the cached error without a rebuild.
 */
export class ImageCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly lock = new KeyLock()
  private readonly logger: Logger
  private readonly now: () => number
  private index?: Promise<Record<string, CachedImage>>

  constructor(
    private readonly builder: ImageBuilder,
    private readonly options: ImageCacheOptions
  ) {
    this.logger = options.logger ?? silentLogger
    this.now = options.now ?? Date.now
  }

  keyFor(request: ImageRequest): string {
    return `${request.repository}@${this.builder.fingerprint(request)}`
  }

  /**
   * Returns a ready image, building it when needed.
   * `signal` only cancels this caller's wait, never the shared build.
   */
  async acquire(request: ImageRequest, signal?: AbortSignal): Promise<CachedImage> {
    const key = this.keyFor(request)
    const entry = this.entries.get(key)

    if (entry?.state === 'Ready') {
      return entry.image
    }

    if (entry?.state === 'Building') {
      return abortable(entry.promise, signal)
    }

    if (entry?.state === 'Failed' && entry.expiresAt > this.now()) {
      throw entry.error
    }

    const promise = this.track(key, request)
    this.entries.set(key, {state: 'Building', promise})
    return abortable(promise, signal)
  }

  private async track(key: string, request: ImageRequest): Promise<CachedImage> {
    try {
      const image = await this.resolve(key, request)
      this.entries.set(key, {state: 'Ready', image})
      return image
    } catch (error) {
      if (error instanceof CancellationError) {
        this.entries.delete(key)
      } else {
        const cached = error instanceof EvalError
          ? error
          : new BuildFailureError(this.builder.tagFor(request), errorMessage(error), {cause: error})
        this.entries.set(key, {state: 'Failed', error: cached, expiresAt: this.now() + this.options.negativeTtlMs})
      }

      throw error
    }
  }

  private async resolve(key: string, request: ImageRequest): Promise<CachedImage> {
    const imageFingerprint = this.builder.fingerprint(request)
    const tag = this.builder.tagFor(request, imageFingerprint)

    const indexed = (await this.loadIndex())[key]
    if (indexed && await this.builder.exists(indexed.tag)) {
      this.logger.debug({key, tag: indexed.tag}, 'reusing indexed image')
      this.options.onEvent?.({type: 'reused', key, tag: indexed.tag})
      return indexed
    }

    const startedAt = this.now()
    try {
      await withRetry(async attempt => {
        this.options.onEvent?.({type: 'building', key, tag, attempt})
        await this.builder.build(tag, request, {
          signal: this.options.signal,
          onLogLine: this.options.onLogLine ? log => this.options.onLogLine?.(key, log) : undefined
        })
      }, this.options.retry, {
        signal: this.options.signal,
        onRetry: (error, attempt, delayMs) => {
          this.logger.warn({key, attempt, delayMs, err: errorMessage(error)}, 'image build failed, retrying')
        }
      })
    } catch (error) {
      this.options.onEvent?.({type: 'failed', key, tag, error: errorMessage(error)})
      throw error
    }

    const image: CachedImage = {
      key,
      tag,
      fingerprint: imageFingerprint,
      repository: request.repository,
      builtAt: new Date(this.now()).toISOString()
    }
    this.options.onEvent?.({type: 'built', key, tag, durationMs: this.now() - startedAt})
    try {
      await this.record(image)
    } catch (error) {
      this.logger.warn({key, tag, err: errorMessage(error)}, 'could not record the image in the index')
    }
    return image
  }

  private async loadIndex(): Promise<Record<string, CachedImage>> {
    this.index ??= this.readIndex()
    return this.index
  }

  private async readIndex(): Promise<Record<string, CachedImage>> {
    if (!this.options.indexPath) {
      return {}
    }

    try {
      const parsed: unknown = JSON.parse(await readFile(this.options.indexPath, 'utf8'))
      if (parsed === null || typeof parsed !== 'object' || Array.isArray(parsed)) {
        return {}
      }

      return Object.fromEntries(Object.entries(parsed).filter((entry): entry is [string, CachedImage] => isCachedImage(entry[1])))
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT' || error instanceof SyntaxError) {
        return {}
      }

      throw error
    }
  }

  private async record(image: CachedImage): Promise<void> {
    const {indexPath} = this.options
    if (!indexPath) {
      return
    }

    await this.lock.run(indexPath, async () => {
      const index = await this.loadIndex()
      index[image.key] = image
      await writeJsonAtomic(indexPath, index)
    })
  }
}
