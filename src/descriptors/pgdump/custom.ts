import type {Buffer} from 'node:buffer'
import type {Logger} from 'pino'
import {restoreCommand} from '../../core/config.js'
import {ExternalStage, type ExternalStageOptions, type Subprocess, waitForSpawn} from '../../engine/external-stage.js'
import {accept, reject} from '../../engine/registry.js'
import {deriveName, type Stage} from '../../engine/stage.js'
import {OCTET_STREAM} from '../../engine/mime.js'
import {HeaderError} from '../../errors.js'
import type {Descriptor, Recognition, StageContext} from '../../types.js'
import {DUMP_MAGIC, readDumpHeader, type DumpHeader} from './header.js'

export type DumpStageOptions = ExternalStageOptions & {
  header?: DumpHeader;
}

/**
 * pg_restore turning an archive into SQL. Keeps the archive header, when it
 * could be read, for display.
 */
export class DumpStage extends ExternalStage {
  readonly header?: DumpHeader

  protected constructor(subprocess: Subprocess, options: DumpStageOptions) {
    super(subprocess, options)
    this.header = options.header
  }

  static override async spawn(options: DumpStageOptions): Promise<DumpStage> {
    const subprocess = DumpStage.launch(options)
    await waitForSpawn(subprocess, options.command)
    return new DumpStage(subprocess, options)
  }
}

/** True when the signature sits at `offset` in the window. */
export function hasDumpMagic(window: Buffer, offset: number): boolean {
  return window.subarray(offset, offset + DUMP_MAGIC.length).toString('latin1') === DUMP_MAGIC
}

/**
 * Header for display only: a malformed one is logged and dropped.
 */
export function tryReadHeader(window: Buffer, offset: number, logger: Logger): DumpHeader | undefined {
  try {
    return readDumpHeader(window.subarray(offset))
  } catch (error) {
    if (error instanceof HeaderError) {
      logger.debug({err: error}, 'archive header skipped')
      return undefined
    }

    throw error
  }
}

/**
 * Builds a dump stage over `parent`, reading the header at `offset` of its
 * head (0 for a bare archive, 512 for `toc.dat` inside a tar).
 */
export async function constructDumpStage(
  parent: Stage,
  context: StageContext,
  options: {label: string; offset: number; extensions: readonly string[]}
): Promise<DumpStage> {
  const window = await parent.peek(context.config.peekWindow)
  return DumpStage.spawn({
    parent,
    label: options.label,
    name: deriveName(parent.name, options.extensions),
    command: restoreCommand(context.config),
    header: tryReadHeader(window, options.offset, context.logger),
    logger: context.logger
  })
}

export function recognizeDump(window: Buffer, offset: number): Recognition {
  return hasDumpMagic(window, offset) ? accept() : reject('no PGDMP signature')
}

const customExtensions = ['pgdump', 'dump', 'backup']

export const pgCustomDump: Descriptor = Object.freeze({
  name: 'pgdmp_custom',
  priority: 0,
  mimes: [OCTET_STREAM],
  extensions: customExtensions,
  tryRecognize: probe => recognizeDump(probe.window, 0),
  async construct(parent, context) {
    return constructDumpStage(parent, context, {label: 'pgdmp_custom', offset: 0, extensions: customExtensions})
  }
} satisfies Descriptor)
