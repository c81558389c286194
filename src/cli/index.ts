#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {Command} from 'commander'
import {createLogger} from '../core/logger.js'
import {parsePort, type CliOptions} from './options.js'
import {run} from './run.js'

async function main() {
  const program = new Command()

  program
    .name('restoredb')
    .description('Restore a PostgreSQL dump, whatever it is compressed or archived with')
    .version('1.1.0')
    .helpOption('--help', 'Display help for command')
    .argument('[dump]', 'Dump file (default: standard input)')
    .option('-d, --dbname <name>', 'Database to restore into (default: SQL on standard output)')
    .option('-h, --host <host>', 'Database server host or socket directory')
    .option('-p, --port <port>', 'Database server port', parsePort)
    .option('-U, --username <name>', 'Connect as this user')
    .option('-O, --no-owner', 'Skip restoration of object ownership')
    .option('-x, --no-privileges', 'Skip restoration of access privileges (grant/revoke)')
    .option('--no-acl', 'Same as --no-privileges')
    .option('-c, --clean', 'Drop database objects before recreating them')
    .option('-C, --create', 'Create the database before restoring into it')
    .option('--no-header', 'Do not print the archive header')
    .option('--debug', 'Print debug traces on standard error')
    .action(async (dump: string | undefined, options: CliOptions) => {
      const logger = createLogger({debug: options.debug})
      process.exitCode = await run(dump, options, {
        stdin: process.stdin,
        stdout: process.stdout,
        stderr: process.stderr,
        logger,
        cwd: process.cwd()
      })
    })

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  console.error('Fatal error:', error)
  throw error
}
