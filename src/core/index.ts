export {open, openDump, type OpenOptions, type OpenDumpOptions} from './guesser.js'
export {
  feedLines,
  restoreToStdout,
  restoreToDatabase,
  type FeedResult,
  type FeedOptions,
  type DatabaseOptions
} from './consumer.js'
export {
  createEngineConfig,
  restoreCommand,
  psqlCommand,
  loadConfig,
  parseProjectConfig,
  defaultTools,
  toolNames,
  DEFAULT_PEEK_WINDOW,
  DEFAULT_MAX_DEPTH,
  type EngineConfig,
  type EngineConfigInput,
  type ProjectConfig,
  type RestoreFlags,
  type Connection,
  type ToolName,
  type ToolCommands
} from './config.js'
export {createLogger, silentLogger, type LoggerOptions} from './logger.js'
