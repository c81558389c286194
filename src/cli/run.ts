import type {Readable, Writable} from 'node:stream'
import chalk from 'chalk'
import type {Logger} from 'pino'
import {createEngineConfig, loadConfig} from '../core/config.js'
import {restoreToDatabase, restoreToStdout} from '../core/consumer.js'
import {openDump} from '../core/guesser.js'
import {UsageError} from '../errors.js'
import type {Source} from '../types.js'
import {formatHeader} from './header.js'
import {toConnection, toEngineInput, type CliOptions} from './options.js'

export type RunContext = {
  stdin: Readable;
  stdout: Writable & {isTTY?: boolean};
  stderr: Writable;
  logger: Logger;
  /** Directory holding `.restoredb.yml`. */
  cwd: string;
}

/**
 * Restores `dump` (standard input when absent or `-`) and returns the exit
 * code: psql's own when restoring into a database, 1 on any failure.
 */
export async function run(dump: string | undefined, options: CliOptions, context: RunContext): Promise<number> {
  const {logger} = context
  try {
    const project = await loadConfig(context.cwd)
    const config = createEngineConfig(toEngineInput(options, project))
    const connection = toConnection(options)
    if (!connection && context.stdout.isTTY) {
      throw new UsageError('Refusing to write SQL to a terminal: pass --dbname or redirect the output')
    }

    const source: Source = dump && dump !== '-' ? {path: dump} : {stream: context.stdin, name: '-'}
    const stage = await openDump(source, {config, logger})
    logger.debug({compressions: stage.compressions}, 'dump detected')

    if (options.header && stage.header) {
      context.stderr.write(formatHeader(stage.header))
    }

    if (!connection) {
      await restoreToStdout(stage, context.stdout)
      return 0
    }

    return await restoreToDatabase(stage, {config, connection, logger})
  } catch (error: unknown) {
    logger.debug({err: error}, 'restore failed')
    const message = error instanceof Error ? error.message : String(error)
    context.stderr.write(`${chalk.red(message)}\n`)
    return 1
  }
}
