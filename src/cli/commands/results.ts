import process from 'node:process'
import {join, resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {formatDuration} from '../../core/utils.js'
import {ResultsLog} from '../../orchestrator/results-log.js'
import type {ResultRecord} from '../../types.js'
import {getGlobalOptions} from '../utils.js'

export type ResultRow = {
  specId: string;
  sequence: number;
  status: ResultRecord['status'];
  verdict: string;
  duration: string;
  failure: string;
}

/**
 * One row per spec (its latest record), in input order.
 */
export function resultRows(records: ResultRecord[]): ResultRow[] {
  return [...ResultsLog.latest(records).values()]
    .sort((a, b) => a.sequence - b.sequence)
    .map(record => ({
      specId: record.specId,
      sequence: record.sequence,
      status: record.status,
      verdict: record.verdict ?? '-',
      duration: formatDuration(Date.parse(record.finishedAt) - Date.parse(record.startedAt)),
      failure: record.failure ? `${record.failure.kind}: ${record.failure.message.split('\n')[0]}` : ''
    }))
}

function colorVerdict(row: ResultRow): (text: string) => string {
  if (row.status === 'Aborted') {
    return chalk.gray
  }

  if (row.verdict === 'Resolved') {
    return chalk.green
  }

  return row.verdict === 'Unresolved' ? chalk.yellow : chalk.red
}

export function registerResultsCommand(program: Command): void {
  program
    .command('results')
    .description('Show the latest result of every spec of a work directory')
    .argument('[workdir]', 'Work directory (default: --workdir)')
    .action(async (workdirArg: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const {workdir, json} = getGlobalOptions(cmd)
      const path = join(resolve(workdirArg ?? workdir), 'results.jsonl')
      const rows = resultRows(await ResultsLog.read(path))

      if (json) {
        console.log(JSON.stringify(rows, null, 2))
        return
      }

      if (rows.length === 0) {
        console.log(chalk.gray(`No results found in ${path}.`))
        process.exitCode = 1
        return
      }

      const specWidth = Math.max('SPEC'.length, ...rows.map(r => r.specId.length))
      const verdictWidth = Math.max('VERDICT'.length, ...rows.map(r => r.verdict.length))
      const durationWidth = Math.max('DURATION'.length, ...rows.map(r => r.duration.length))

      console.log(chalk.bold(`${'SPEC'.padEnd(specWidth)}  ${'VERDICT'.padEnd(verdictWidth)}  ${'DURATION'.padStart(durationWidth)}  FAILURE`))
      for (const row of rows) {
        const label = row.status === 'Aborted' ? 'Aborted' : row.verdict
        const verdict = colorVerdict(row)(label.padEnd(verdictWidth))
        console.log(`${row.specId.padEnd(specWidth)}  ${verdict}  ${row.duration.padStart(durationWidth)}  ${chalk.gray(row.failure)}`)
      }

      const resolved = rows.filter(r => r.verdict === 'Resolved').length
      console.log(chalk.bold(`\n${resolved}/${rows.length} resolved`))
    })
}
