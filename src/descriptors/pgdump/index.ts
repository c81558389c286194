import {Registry} from '../../engine/registry.js'
import type {Descriptor} from '../../types.js'
import {builtinDescriptors} from '../builtin/index.js'
import {pgCustomDump} from './custom.js'
import {plainSql} from './plain-sql.js'
import {pgTarDump} from './tar.js'

export {DumpStage, pgCustomDump, hasDumpMagic, tryReadHeader, type DumpStageOptions} from './custom.js'
export {pgTarDump} from './tar.js'
export {PlainSqlStage, plainSql, PLAIN_SQL} from './plain-sql.js'
export {readDumpHeader, dumpFormats, DUMP_MAGIC, type DumpHeader, type DumpFormat, type DumpVersion} from './header.js'

export const pgDumpDescriptors: readonly Descriptor[] = Object.freeze([pgTarDump, pgCustomDump, plainSql])

/**
 * Generic layers followed by the PostgreSQL dump formats.
 */
export function createDumpRegistry(): Registry {
  return new Registry({builtins: builtinDescriptors, extra: pgDumpDescriptors})
}
