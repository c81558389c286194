import type {Logger} from 'pino'
import {createDumpRegistry, PLAIN_SQL, PlainSqlStage} from '../descriptors/pgdump/index.js'
import type {Registry} from '../engine/registry.js'
import {SourceStage, type Stage} from '../engine/stage.js'
import {LayerLimitError, UnsupportedFormatError} from '../errors.js'
import type {Source} from '../types.js'
import type {EngineConfig} from './config.js'

export type OpenOptions = {
  registry: Registry;
  config: EngineConfig;
  logger: Logger;
}

async function closeAfterFailure(stage: Stage, logger: Logger): Promise<void> {
  try {
    await stage.close()
  } catch (error) {
    // The failure that interrupted the chain is the one reported
    logger.debug({stage: stage.name, err: error}, 'failed to close chain')
  }
}

/**
 * Peels layers off `source` until no descriptor recognizes the head of the
 * last stage, and returns that terminal stage.
 *
 * On failure every stage opened so far is closed before the error propagates.
 */
export async function open(source: Source, options: OpenOptions): Promise<Stage> {
  const {registry, config, logger} = options
  let stage: Stage = await SourceStage.open(source, logger)
  let depth = 0

  try {
    for (;;) {
      const descriptor = await registry.resolve(stage, {peekWindow: config.peekWindow, logger})
      if (!descriptor) {
        logger.debug({stage: stage.name, compressions: stage.compressions}, 'terminal stage')
        return stage
      }

      if (depth >= config.maxDepth) {
        throw new LayerLimitError(stage.compressions, config.maxDepth)
      }

      stage = await descriptor.construct(stage, {config, logger})
      depth++
    }
  } catch (error) {
    await closeAfterFailure(stage, logger)
    throw error
  }
}

export type OpenDumpOptions = Omit<OpenOptions, 'registry'> & {
  registry?: Registry;
}

/**
 * Opens `source` as a PostgreSQL dump: the detected stack must end with
 * plain SQL. Anything else is closed and rejected with the stack it showed.
 */
export async function openDump(source: Source, options: OpenDumpOptions): Promise<PlainSqlStage> {
  const stage = await open(source, {...options, registry: options.registry ?? createDumpRegistry()})
  if (stage instanceof PlainSqlStage && stage.compressions.at(-1) === PLAIN_SQL) {
    return stage
  }

  await stage.close()
  throw new UnsupportedFormatError(stage.compressions)
}
