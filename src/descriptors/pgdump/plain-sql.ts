import type {Logger} from 'pino'
import {accept} from '../../engine/registry.js'
import {deriveName, Stage} from '../../engine/stage.js'
import {TEXT_PLAIN} from '../../engine/mime.js'
import type {Descriptor} from '../../types.js'
import {DumpStage} from './custom.js'
import type {DumpHeader} from './header.js'

export const PLAIN_SQL = 'sql'

/**
 * Terminal SQL text. Reads its parent's bytes unchanged; when the parent is
 * pg_restore, the archive header travels along for display.
 */
export class PlainSqlStage extends Stage {
  readonly header?: DumpHeader

  constructor(parent: Stage, logger: Logger) {
    super(Stage.sourceOf(parent), {
      parent,
      label: PLAIN_SQL,
      name: deriveName(parent.name, ['sql']),
      logger
    })
    this.header = parent instanceof DumpStage ? parent.header : undefined
  }
}

export const plainSql: Descriptor = Object.freeze({
  name: PLAIN_SQL,
  priority: 0,
  mimes: [TEXT_PLAIN],
  extensions: ['sql'],
  nonRepeatable: true,
  tryRecognize: accept,
  async construct(parent, context) {
    return new PlainSqlStage(parent, context.logger)
  }
} satisfies Descriptor)
