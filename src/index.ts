/**
 * Detection and decoding layer for programmatic use.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {createEngineConfig, createLogger, openDump, restoreToStdout} from 'restoredb'
 *
 * const config = createEngineConfig({restore: {noOwner: true}})
 * const stage = await openDump({path: 'nightly.pgdump.xz'}, {config, logger: createLogger()})
 *
 * console.error(stage.compressions) // ['xz', 'pgdmp_custom', 'sql']
 * await restoreToStdout(stage, process.stdout)
 * ```
 */

export {
  PeekableSource,
  Stage,
  SourceStage,
  ExternalStage,
  Registry,
  accept,
  reject,
  deriveName,
  sniffMime,
  type StageOptions,
  type ExternalStageOptions,
  type RegistryOptions,
  type ResolveOptions
} from './engine/index.js'

export * from './core/index.js'

export {
  builtinDescriptors,
  externalDecompressor,
  ExtractStage,
  pgDumpDescriptors,
  createDumpRegistry,
  DumpStage,
  PlainSqlStage,
  PLAIN_SQL,
  readDumpHeader,
  type DumpHeader,
  type DumpFormat,
  type DumpVersion
} from './descriptors/index.js'

export type {Descriptor, Probe, Recognition, StageContext, Source} from './types.js'

export {
  RestoreError,
  DetectionError,
  UnsupportedFormatError,
  DuplicateDescriptorError,
  LayerLimitError,
  StreamedArchiveError,
  ProcessError,
  ProcessSpawnError,
  ProcessExitError,
  StreamError,
  BrokenPipeError,
  StageConsumedError,
  SourceError,
  HeaderError,
  MalformedHeaderError,
  ConfigError,
  InvalidConfigError,
  UsageError,
  isBrokenPipe
} from './errors.js'
