import pino, {type Logger} from 'pino'

export type LoggerOptions = {
  debug?: boolean;
}

/**
 * Structured logs go to stderr: stdout may be carrying the restored SQL.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  return pino(
    {name: 'restoredb', level: options.debug ? 'debug' : 'warn'},
    pino.destination({dest: 2, sync: true})
  )
}

export const silentLogger: Logger = pino({level: 'silent'})
