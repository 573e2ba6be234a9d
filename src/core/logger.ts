import process from 'node:process'
import pino, {type Logger} from 'pino'

export type {Logger} from 'pino'

export function createLogger(options?: {level?: string; name?: string}): Logger {
  return pino({
    name: options?.name ?? 'evalkit',
    level: options?.level ?? process.env.EVALKIT_LOG_LEVEL ?? 'info'
  })
}

export const silentLogger: Logger = pino({level: 'silent'})
