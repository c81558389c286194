import {Buffer} from 'node:buffer'
import type {Writable} from 'node:stream'
import type {Options, ResultPromise} from 'execa'
import type {Logger} from 'pino'
import type {Stage} from '../engine/stage.js'
import {spawnCommand, waitForSpawn} from '../engine/external-stage.js'
import {BrokenPipeError, isBrokenPipe} from '../errors.js'
import {psqlCommand, type Connection, type EngineConfig} from './config.js'

export type FeedResult =
  | {completed: true}
  | {completed: false; error: unknown}

export type FeedOptions = {
  /** End the sink once every line is written. Defaults to true. */
  end?: boolean;
}

const empty = Buffer.alloc(0)

/** Resolves on `event`, or as soon as the sink fails or closes. */
async function waitFor(sink: Writable, event: 'drain' | 'finish'): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      sink.off(event, done)
      sink.off('error', done)
      sink.off('close', done)
      resolve()
    }

    sink.on(event, done)
    sink.on('error', done)
    sink.on('close', done)
  })
}

/**
 * Writes `lines` into `sink` one at a time, waiting for `drain` whenever the
 * sink is full.
 *
 * Stops at the first failure of the sink (error event, or close before the
 * end) and reports it instead of throwing. Failures of `lines` itself
 * propagate.
 */
export async function feedLines(
  lines: AsyncIterable<Buffer>,
  sink: Writable,
  options: FeedOptions = {}
): Promise<FeedResult> {
  let failure: unknown
  let finished = false
  const onError = (error: Error) => {
    failure ??= error
  }

  const onClose = () => {
    if (!finished) {
      failure ??= new BrokenPipeError()
    }
  }

  const onFinish = () => {
    finished = true
  }

  sink.on('error', onError)
  sink.on('close', onClose)
  sink.on('finish', onFinish)

  try {
    if (sink.destroyed) {
      failure = new BrokenPipeError()
    }

    for await (const line of lines) {
      if (failure !== undefined) {
        break
      }

      if (!sink.write(line) && failure === undefined) {
        await waitFor(sink, 'drain')
      }

      if (failure !== undefined) {
        break
      }
    }

    if (failure === undefined) {
      if (options.end ?? true) {
        const ended = waitFor(sink, 'finish')
        sink.end()
        await ended
      } else {
        // Callbacks run in write order: this one fires once every line is flushed
        await new Promise<void>(resolve => {
          sink.write(empty, () => {
            resolve()
          })
        })
      }
    }
  } finally {
    sink.off('error', onError)
    sink.off('close', onClose)
    sink.off('finish', onFinish)
  }

  return failure === undefined ? {completed: true} : {completed: false, error: failure}
}

/**
 * Streams the SQL of `stage` to `stdout` and closes the chain.
 * A reader that went away surfaces as `BrokenPipeError` once the chain is closed.
 */
export async function restoreToStdout(stage: Stage, stdout: Writable): Promise<void> {
  let result: FeedResult
  try {
    result = await feedLines(stage.lines(), stdout, {end: false})
  } catch (error) {
    await Promise.allSettled([stage.close()])
    throw error
  }

  await stage.close()
  if (!result.completed) {
    if (isBrokenPipe(result.error)) {
      throw new BrokenPipeError({cause: result.error})
    }

    throw result.error
  }
}

export type DatabaseOptions = {
  config: EngineConfig;
  connection: Connection;
  logger: Logger;
}

const psqlOptions = {
  stdin: 'pipe',
  stdout: 'ignore',
  stderr: 'inherit',
  buffer: false,
  reject: false
} as const satisfies Options

/**
 * Streams the SQL of `stage` into psql and returns psql's exit code.
 * When psql stops reading early, feeding stops and the chain is closed;
 * psql's own status is still what is returned.
 */
export async function restoreToDatabase(stage: Stage, options: DatabaseOptions): Promise<number> {
  const {config, connection, logger} = options
  const command = psqlCommand(config, connection)
  logger.debug({command}, 'spawning psql')

  let psql: ResultPromise<typeof psqlOptions>
  try {
    psql = spawnCommand(command, psqlOptions)
    await waitForSpawn(psql, command)
  } catch (error) {
    await Promise.allSettled([stage.close()])
    throw error
  }

  let result: FeedResult
  try {
    result = await feedLines(stage.lines(), psql.stdin)
  } catch (error) {
    psql.kill()
    await Promise.allSettled([psql, stage.close()])
    throw error
  }

  if (!result.completed) {
    logger.debug({err: result.error}, 'psql stopped reading')
    psql.stdin.destroy()
  }

  let exitCode: number | undefined
  try {
    await stage.close()
  } finally {
    const outcome = await psql
    exitCode = outcome.exitCode
    logger.debug({exitCode, signal: outcome.signal}, 'psql exited')
  }

  if (!result.completed && !isBrokenPipe(result.error)) {
    throw result.error
  }

  return exitCode ?? 1
}
