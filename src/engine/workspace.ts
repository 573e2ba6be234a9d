import {createHash, randomUUID} from 'node:crypto'
import {mkdir, rename, rm, writeFile} from 'node:fs/promises'
import {dirname, join} from 'node:path'
import {slugify} from '../core/utils.js'
import type {TestPhase} from '../types.js'

/**
 * File name for an id: its slug, cut to 180 characters, and a short hash of
 * the raw id, so ids with the same slug keep distinct paths.
 */
export function pathName(id: string, display = id): string {
  const hash = createHash('sha256').update(id).digest('hex').slice(0, 8)
  return `${slugify(display).slice(0, 180)}-${hash}`
}

/**
 * Host-side directory of an evaluation run.
 *
 * Layout:
 * - **results.jsonl**: append-only results log (one record per attempted spec)
 * - **images.json**: index of built images, reused across runs
 * - **logs/{spec}/{phase}/{test}.json**: per-test execution logs
 * - **logs/{spec}/agent.json**: agent command, exit code and output
 * - **agent/{spec}/**: host copies of agent workspaces (local agents only)
 *
 * The directory is stable across invocations so an interrupted run can be
 * resumed by pointing at the same work directory.
 */
export class Workspace {
  /**
   * Generates a run identifier.
   * @returns Run ID in format: `{timestamp}-{uuid-prefix}`
   */
  static generateRunId(): string {
    return `${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  static async create(root: string): Promise<Workspace> {
    await mkdir(join(root, 'logs'), {recursive: true})
    await mkdir(join(root, 'agent'), {recursive: true})
    return new Workspace(root)
  }

  private constructor(readonly root: string) {}

  get resultsPath(): string {
    return join(this.root, 'results.jsonl')
  }

  get imageIndexPath(): string {
    return join(this.root, 'images.json')
  }

  specLogsPath(specId: string): string {
    return join(this.root, 'logs', pathName(specId))
  }

  testLogPath(specId: string, phase: TestPhase, testId: string): string {
    return join(this.specLogsPath(specId), phase, `${pathName(testId, testId.replaceAll('::', '.'))}.json`)
  }

  /** Agent output of a spec, whatever the agent mode */
  agentLogPath(specId: string): string {
    return join(this.specLogsPath(specId), 'agent.json')
  }

  agentPath(specId: string): string {
    return join(this.root, 'agent', pathName(specId))
  }

  /** Prompt handed to a local agent, kept beside (not inside) its checkout */
  agentPromptPath(specId: string): string {
    return `${this.agentPath(specId)}.prompt.md`
  }

  /**
   * Creates an empty host directory for a local agent workspace.
   */
  async prepareAgentDir(specId: string): Promise<string> {
    const path = this.agentPath(specId)
    await rm(path, {recursive: true, force: true})
    await mkdir(path, {recursive: true})
    return path
  }

  async discardAgentDir(specId: string): Promise<void> {
    await rm(this.agentPath(specId), {recursive: true, force: true})
    await rm(this.agentPromptPath(specId), {force: true})
  }
}

/**
 * Writes JSON through a temporary file and a rename, so readers never
 * observe a partial file.
 */
export async function writeJsonAtomic(path: string, value: unknown): Promise<void> {
  await mkdir(dirname(path), {recursive: true})
  const temporary = `${path}.${randomUUID().slice(0, 8)}.tmp`
  await writeFile(temporary, JSON.stringify(value, null, 2) + '\n', 'utf8')
  await rename(temporary, path)
}
