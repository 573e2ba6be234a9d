import {open, readFile, type FileHandle} from 'node:fs/promises'
import {ResultsWriteError} from '../errors.js'
import {KeyLock} from '../core/key-lock.js'
import type {RecordStatus, ResultRecord, Verdict} from '../types.js'

const statuses: ReadonlySet<unknown> = new Set<RecordStatus>(['Done', 'Failed', 'Aborted'])
const verdicts: ReadonlySet<unknown> = new Set<Verdict>(['Resolved', 'Unresolved', 'Error'])

function isResultRecord(value: unknown): value is ResultRecord {
  if (value === null || typeof value !== 'object') {
    return false
  }

  const record: Record<string, unknown> = {...value}
  return typeof record.specId === 'string'
    && typeof record.sequence === 'number'
    && statuses.has(record.status)
    && (record.verdict === null || verdicts.has(record.verdict))
}

/**
 * Append-only results log of a run directory (`results.jsonl`).
 *
 * ## Format
 *
 * One JSON `ResultRecord` per line. A spec attempted several times (an
 * aborted run resumed later) has several records; the last one wins.
 *
 * ## Durability
 *
 * Each record is written with a single append followed by an fsync, under
 * an exclusive lock, so a crash loses at most the records still in flight.
 * A torn last line left by a crash is ignored when reading.
 */
export class ResultsLog {
  /**
   * Opens (or creates) a results log for appending.
   * @throws ResultsWriteError when the file cannot be opened
   */
  static async open(path: string): Promise<ResultsLog> {
    try {
      return new ResultsLog(path, await open(path, 'a'))
    } catch (error) {
      throw new ResultsWriteError(path, {cause: error})
    }
  }

  /**
   * Reads every well-formed record of a results log, in file order.
   * A missing file reads as an empty log.
   */
  static async read(path: string): Promise<ResultRecord[]> {
    let content: string
    try {
      content = await readFile(path, 'utf8')
    } catch (error: unknown) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return []
      }

      throw error
    }

    const records: ResultRecord[] = []
    for (const line of content.split('\n')) {
      if (line.trim() === '') {
        continue
      }

      let parsed: unknown
      try {
        parsed = JSON.parse(line)
      } catch {
        // Torn write of a crashed run
        continue
      }

      if (isResultRecord(parsed)) {
        records.push(parsed)
      }
    }

    return records
  }

  /**
   * Last record of every spec, keyed by spec id.
   */
  static latest(records: ResultRecord[]): Map<string, ResultRecord> {
    const latest = new Map<string, ResultRecord>()
    for (const record of records) {
      latest.set(record.specId, record)
    }

    return latest
  }

  /**
   * Spec ids whose last record is `Done`. These are skipped on resume;
   * failed, aborted and never-attempted specs run again.
   */
  static async completedSpecIds(path: string): Promise<Set<string>> {
    const latest = ResultsLog.latest(await ResultsLog.read(path))
    return new Set([...latest.values()].filter(record => record.status === 'Done').map(record => record.specId))
  }

  private readonly lock = new KeyLock()
  private closed = false
  private written = 0

  private constructor(
    readonly path: string,
    private readonly handle: FileHandle
  ) {}

  get recordCount(): number {
    return this.written
  }

  /**
   * Appends one record.
   * @throws ResultsWriteError when the write or the flush fails
   */
  async append(record: ResultRecord): Promise<void> {
    await this.lock.run(this.path, async () => {
      if (this.closed) {
        throw new ResultsWriteError(this.path, {cause: new Error('results log is closed')})
      }

      try {
        await this.handle.appendFile(JSON.stringify(record) + '\n', 'utf8')
        await this.handle.sync()
      } catch (error) {
        throw new ResultsWriteError(this.path, {cause: error})
      }

      this.written++
    })
  }

  /**
   * Waits for pending appends, then closes the file. Idempotent.
   */
  async close(): Promise<void> {
    await this.lock.run(this.path, async () => {
      if (this.closed) {
        return
      }

      this.closed = true
      await this.handle.close()
    })
  }
}
