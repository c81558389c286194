import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {InvalidConfigError} from '../errors.js'

export const toolNames = ['gzip', 'bzip2', 'xz', 'zstd', 'lz4', 'funzip', '7z', 'pg_restore', 'psql'] as const

export type ToolName = typeof toolNames[number]

/** Argv of every external program the engine may start. */
export type ToolCommands = Readonly<Record<ToolName, readonly string[]>>

export const defaultTools: ToolCommands = {
  gzip: ['gzip', '-dc'],
  bzip2: ['bzip2', '-dc'],
  xz: ['xz', '-dc'],
  zstd: ['zstd', '-dc'],
  lz4: ['lz4', '-dc'],
  funzip: ['funzip'],
  '7z': ['7z', 'x', '-so'],
  pg_restore: ['pg_restore'],
  psql: ['psql']
}

/** Flags forwarded verbatim to pg_restore. */
export type RestoreFlags = {
  noOwner: boolean;
  noPrivileges: boolean;
  clean: boolean;
  create: boolean;
}

export type Connection = {
  dbname: string;
  host?: string;
  port?: number;
  username?: string;
}

export type EngineConfig = {
  readonly tools: ToolCommands;
  readonly restore: Readonly<RestoreFlags>;
  /** Bytes peeked at each layer. */
  readonly peekWindow: number;
  /** Most layers peeled before giving up. */
  readonly maxDepth: number;
}

export const DEFAULT_PEEK_WINDOW = 32 * 1024
export const DEFAULT_MAX_DEPTH = 16

/** Content of `.restoredb.yml`. */
export type ProjectConfig = {
  tools?: Partial<Record<ToolName, string[]>>;
  peekWindow?: number;
}

export type EngineConfigInput = {
  tools?: Partial<Record<ToolName, readonly string[]>>;
  restore?: Partial<RestoreFlags>;
  peekWindow?: number;
  maxDepth?: number;
}

/**
 * Builds the immutable configuration handed to every stage.
 */
export function createEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  const tools: Record<ToolName, readonly string[]> = {...defaultTools}
  for (const name of toolNames) {
    const command = input.tools?.[name]
    if (command) {
      tools[name] = Object.freeze([...command])
    }
  }

  return Object.freeze({
    tools: Object.freeze(tools),
    restore: Object.freeze({
      noOwner: input.restore?.noOwner ?? false,
      noPrivileges: input.restore?.noPrivileges ?? false,
      clean: input.restore?.clean ?? false,
      create: input.restore?.create ?? false
    }),
    peekWindow: input.peekWindow ?? DEFAULT_PEEK_WINDOW,
    maxDepth: input.maxDepth ?? DEFAULT_MAX_DEPTH
  })
}

/** pg_restore argv, writing SQL to its stdout. */
export function restoreCommand(config: EngineConfig): string[] {
  const command = [...config.tools.pg_restore]
  if (config.restore.noOwner) {
    command.push('--no-owner')
  }

  if (config.restore.noPrivileges) {
    command.push('--no-privileges')
  }

  if (config.restore.clean) {
    command.push('--clean')
  }

  if (config.restore.create) {
    command.push('--create')
  }

  return command
}

/** psql argv, reading SQL from its stdin. */
export function psqlCommand(config: EngineConfig, connection: Connection): string[] {
  const command = [...config.tools.psql, '--dbname', connection.dbname]
  if (connection.host) {
    command.push('--host', connection.host)
  }

  if (connection.port !== undefined) {
    command.push('--port', String(connection.port))
  }

  if (connection.username) {
    command.push('--username', connection.username)
  }

  return command
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isToolName(name: string): name is ToolName {
  return toolNames.some(toolName => toolName === name)
}

function parseCommand(value: unknown, path: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new InvalidConfigError(`${path} must be a non-empty list of strings`)
  }

  return value.map((item: unknown, index) => {
    if (typeof item !== 'string') {
      throw new InvalidConfigError(`${path}[${index}] must be a string`)
    }

    return item
  })
}

/**
 * Checks the shape of a parsed `.restoredb.yml`.
 */
export function parseProjectConfig(value: unknown): ProjectConfig {
  if (value === null || value === undefined) {
    return {}
  }

  if (!isRecord(value)) {
    throw new InvalidConfigError('.restoredb.yml must be a mapping')
  }

  const config: ProjectConfig = {}

  if (value.tools !== undefined) {
    if (!isRecord(value.tools)) {
      throw new InvalidConfigError('tools must be a mapping')
    }

    const tools: Partial<Record<ToolName, string[]>> = {}
    for (const [name, command] of Object.entries(value.tools)) {
      if (!isToolName(name)) {
        throw new InvalidConfigError(`Unknown tool "${name}". Known tools: ${toolNames.join(', ')}`)
      }

      tools[name] = parseCommand(command, `tools.${name}`)
    }

    config.tools = tools
  }

  if (value.peekWindow !== undefined) {
    if (typeof value.peekWindow !== 'number' || !Number.isInteger(value.peekWindow) || value.peekWindow < 512) {
      throw new InvalidConfigError('peekWindow must be an integer of at least 512')
    }

    config.peekWindow = value.peekWindow
  }

  return config
}

/**
 * Loads the project-level `.restoredb.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<ProjectConfig> {
  let content: string
  try {
    content = await readFile(join(dir, '.restoredb.yml'), 'utf8')
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new InvalidConfigError('.restoredb.yml is not valid YAML', {cause: error})
  }

  return parseProjectConfig(parsed)
}
