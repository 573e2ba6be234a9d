import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import {formatDuration} from '../core/utils.js'
import type {Reporter, RunEvent, SpecFinishedEvent} from '../orchestrator/reporter.js'

const stateLabels: Record<string, string> = {
  Queued: 'queued',
  ImagePreparing: 'preparing image',
  AgentRunning: 'agent running',
  PatchValidating: 'applying patch',
  TestingPre: 'testing before patch',
  TestingPost: 'testing after patch',
  Scored: 'scoring'
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * One spinner per in-flight spec.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly specSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: RunEvent): void {
    switch (event.event) {
      case 'RUN_START': {
        const resumed = event.resumed > 0 ? chalk.gray(` (resuming, ${event.resumed} already done)`) : ''
        console.log(chalk.bold(`\n▶ Run: ${chalk.cyan(event.runId)}, concurrency ${event.concurrency}${resumed}\n`))
        break
      }

      case 'SPEC_SKIPPED': {
        console.log(`  ${chalk.gray('⊙')} ${chalk.gray(`${event.specId} (done in a previous run)`)}`)
        break
      }

      case 'SPEC_STATE': {
        const text = `${event.specId} ${chalk.gray(stateLabels[event.state] ?? event.state)}`
        const spinner = this.specSpinners.get(event.specId)
        if (spinner) {
          spinner.text = text
        } else {
          this.specSpinners.set(event.specId, ora({text, prefixText: ' '}).start())
        }

        break
      }

      case 'SPEC_LOG': {
        this.handleLog(event.specId, event.source, event.stream, event.line)
        break
      }

      case 'SPEC_FINISHED': {
        this.handleSpecFinished(event)
        break
      }

      case 'IMAGE_BUILD': {
        if (event.phase === 'built' && event.durationMs !== undefined) {
          this.print(chalk.gray(`  ⚙ built ${event.tag} in ${formatDuration(event.durationMs)}`))
        } else if (event.phase === 'failed') {
          this.print(chalk.red(`  ⚙ build of ${event.tag} failed: ${event.error ?? 'unknown error'}`))
        } else if (event.phase === 'building' && event.attempt !== undefined && event.attempt > 1) {
          this.print(chalk.yellow(`  ⚙ retrying build of ${event.tag} (attempt ${event.attempt})`))
        }

        break
      }

      case 'RUN_SHUTDOWN': {
        this.print(chalk.yellow(`\n⚠ Shutting down, in-flight specs get ${formatDuration(event.gracePeriodMs)} to finish\n`))
        break
      }

      case 'RUN_FINISHED': {
        const parts = [
          chalk.green(`${event.resolved} resolved`),
          chalk.yellow(`${event.unresolved} unresolved`),
          chalk.red(`${event.errors} errors`)
        ]
        if (event.aborted > 0) {
          parts.push(chalk.red(`${event.aborted} aborted`))
        }

        if (event.skipped > 0) {
          parts.push(chalk.gray(`${event.skipped} skipped`))
        }

        const symbol = event.exitCode === 0 ? chalk.bold.green('✓') : chalk.bold.red('✗')
        console.log(`\n${symbol} ${parts.join(', ')} ${chalk.gray(`in ${formatDuration(event.durationMs)}`)}\n`)
        break
      }
    }
  }

  private print(line: string): void {
    const spinners = [...this.specSpinners.values()]
    for (const spinner of spinners) {
      spinner.clear()
    }

    console.log(line)
    for (const spinner of spinners) {
      spinner.render()
    }
  }

  private handleLog(specId: string, source: string, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      this.print(`${chalk.gray(`  [${specId} ${source}]`)} ${line}`)
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(specId)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(specId, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handleSpecFinished(event: SpecFinishedEvent): void {
    const failure = event.failure ? ` ${event.failure.kind}: ${event.failure.message}` : ''
    const text = `${event.specId} (${formatDuration(event.durationMs)})`
    const persist = (symbol: string, color: (text: string) => string, detail: string) => {
      const spinner = this.specSpinners.get(event.specId)
      const rendered = color(`${text}${detail}`)
      if (spinner) {
        spinner.stopAndPersist({symbol, text: rendered})
        this.specSpinners.delete(event.specId)
      } else {
        console.log(`  ${symbol} ${rendered}`)
      }
    }

    if (event.status === 'Aborted') {
      persist(chalk.gray('⊘'), chalk.gray, ' aborted')
    } else if (event.verdict === 'Resolved') {
      persist(chalk.green('✓'), chalk.green, '')
    } else if (event.verdict === 'Unresolved') {
      persist(chalk.yellow('✗'), chalk.yellow, failure)
    } else {
      persist(chalk.red('✗'), chalk.red, failure)
      this.printStderr(event.specId)
    }

    this.stderrBuffers.delete(event.specId)
  }

  private printStderr(specId: string): void {
    const stderr = this.stderrBuffers.get(specId)
    if (stderr?.length) {
      console.log(chalk.red(`  ── ${specId} stderr ──`))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }
  }
}
