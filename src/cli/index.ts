#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {errorMessage} from '../errors.js'
import {registerResultsCommand} from './commands/results.js'
import {registerRunCommand} from './commands/run.js'

async function main() {
  const program = new Command()

  program
    .name('evalkit')
    .description('Containerized evaluation of coding agents on repository tasks')
    .version('0.1.0')
    .option('--workdir <path>', 'Work directory (results, logs, image index)', process.env.EVALKIT_WORKDIR ?? './workdir')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerResultsCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error(chalk.red(`Fatal error: ${errorMessage(error)}`))
  process.exitCode = 2
}
