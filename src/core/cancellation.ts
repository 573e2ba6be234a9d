import {setTimeout as delay} from 'node:timers/promises'
import {CancellationError} from '../errors.js'

function reasonMessage(signal: AbortSignal): string {
  const reason: unknown = signal.reason
  if (reason instanceof Error) {
    return reason.message
  }

  return typeof reason === 'string' ? reason : 'Operation cancelled'
}

export function cancellationFrom(signal: AbortSignal): CancellationError {
  const reason: unknown = signal.reason
  if (reason instanceof CancellationError) {
    return reason
  }

  return new CancellationError(reasonMessage(signal), {cause: reason})
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancellationFrom(signal)
  }
}

export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError'
}

/**
 * Abortable sleep. Rejects with `CancellationError` when `signal` fires.
 */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal)
  try {
    await delay(ms, undefined, {signal})
  } catch (error) {
    if (signal?.aborted && isAbortError(error)) {
      throw cancellationFrom(signal)
    }

    throw error
  }
}

/**
 * Wait for `promise`, giving up with `CancellationError` when `signal` fires.
 * The underlying work is not cancelled, only this wait.
 */
export async function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise
  }

  throwIfAborted(signal)
  let onAbort: (() => void) | undefined
  const aborted = new Promise<never>((_resolve, reject) => {
    onAbort = () => {
      reject(cancellationFrom(signal))
    }

    signal.addEventListener('abort', onAbort, {once: true})
  })

  try {
    return await Promise.race([promise, aborted])
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort)
    }
  }
}

/**
 * Combine optional signals; undefined entries are ignored.
 */
export function anySignal(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((s): s is AbortSignal => s !== undefined)
  if (present.length === 0) {
    return undefined
  }

  return present.length === 1 ? present[0] : AbortSignal.any(present)
}
