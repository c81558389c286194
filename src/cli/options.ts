import {InvalidArgumentError} from 'commander'
import type {Connection, EngineConfigInput, ProjectConfig} from '../core/config.js'

/** Parsed command line. `--no-*` flags land as negated booleans. */
export type CliOptions = {
  dbname?: string;
  host?: string;
  port?: number;
  username?: string;
  owner: boolean;
  privileges: boolean;
  acl: boolean;
  clean?: boolean;
  create?: boolean;
  header: boolean;
  debug?: boolean;
}

export function parsePort(value: string): number {
  const port = Number(value)
  if (!Number.isInteger(port) || port < 1 || port > 65_535) {
    throw new InvalidArgumentError('Not a valid port number.')
  }

  return port
}

/** Engine settings from the command line, over the project file. */
export function toEngineInput(options: CliOptions, project: ProjectConfig): EngineConfigInput {
  return {
    tools: project.tools,
    peekWindow: project.peekWindow,
    restore: {
      noOwner: !options.owner,
      noPrivileges: !options.privileges || !options.acl,
      clean: options.clean ?? false,
      create: options.create ?? false
    }
  }
}

/** Target database, or undefined when the SQL goes to stdout. */
export function toConnection(options: CliOptions): Connection | undefined {
  if (!options.dbname || options.dbname === '-') {
    return undefined
  }

  return {
    dbname: options.dbname,
    host: options.host,
    port: options.port,
    username: options.username
  }
}
