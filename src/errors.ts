export class RestoreError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'RestoreError'
  }
}

// -- Detection errors --------------------------------------------------------

export class DetectionError extends RestoreError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DetectionError'
  }
}

export class UnsupportedFormatError extends DetectionError {
  constructor(
    readonly compressions: readonly string[],
    options?: {cause?: unknown}
  ) {
    const stack = compressions.length > 0 ? compressions.join(', ') : 'unknown format'
    super('UNSUPPORTED_FORMAT', `Not a PostgreSQL dump (${stack})`, options)
    this.name = 'UnsupportedFormatError'
  }
}

export class DuplicateDescriptorError extends DetectionError {
  constructor(descriptorName: string, options?: {cause?: unknown}) {
    super('DUPLICATE_DESCRIPTOR', `Descriptor "${descriptorName}" is already registered`, options)
    this.name = 'DuplicateDescriptorError'
  }
}

export class LayerLimitError extends DetectionError {
  constructor(
    readonly compressions: readonly string[],
    maxDepth: number,
    options?: {cause?: unknown}
  ) {
    super('LAYER_LIMIT', `Gave up after ${maxDepth} layers (${compressions.join(', ')})`, options)
    this.name = 'LayerLimitError'
  }
}

export class StreamedArchiveError extends DetectionError {
  constructor(readonly format: string, options?: {cause?: unknown}) {
    super('STREAMED_ARCHIVE', `${format} archives cannot be read from a stream: pass the file path instead`, options)
    this.name = 'StreamedArchiveError'
  }
}

// -- Process errors ----------------------------------------------------------

export class ProcessError extends RestoreError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ProcessError'
  }
}

export class ProcessSpawnError extends ProcessError {
  constructor(
    readonly command: readonly string[],
    options?: {cause?: unknown}
  ) {
    super('PROCESS_SPAWN_FAILED', `Failed to start "${command[0] ?? ''}"`, options)
    this.name = 'ProcessSpawnError'
  }
}

export class ProcessExitError extends ProcessError {
  constructor(
    readonly command: readonly string[],
    readonly exitCode: number | undefined,
    readonly signal?: string,
    options?: {cause?: unknown}
  ) {
    const status = exitCode === undefined ? `signal ${signal ?? 'unknown'}` : `exit code ${exitCode}`
    super('PROCESS_EXIT_FAILED', `"${command[0] ?? ''}" failed with ${status}`, options)
    this.name = 'ProcessExitError'
  }
}

// -- Stream errors -----------------------------------------------------------

export class StreamError extends RestoreError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'StreamError'
  }
}

export class BrokenPipeError extends StreamError {
  constructor(options?: {cause?: unknown}) {
    super('BROKEN_PIPE', 'Broken pipe', options)
    this.name = 'BrokenPipeError'
  }
}

export class StageConsumedError extends StreamError {
  constructor(options?: {cause?: unknown}) {
    super('STAGE_CONSUMED', 'Stage has already been consumed', options)
    this.name = 'StageConsumedError'
  }
}

export class SourceError extends StreamError {
  constructor(path: string, options?: {cause?: unknown}) {
    super('SOURCE_UNREADABLE', `Cannot read "${path}"`, options)
    this.name = 'SourceError'
  }
}

// -- Header errors -----------------------------------------------------------

export class HeaderError extends RestoreError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'HeaderError'
  }
}

export class MalformedHeaderError extends HeaderError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('MALFORMED_HEADER', message, options)
    this.name = 'MalformedHeaderError'
  }
}

// -- Config errors -----------------------------------------------------------

export class ConfigError extends RestoreError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ConfigError'
  }
}

export class InvalidConfigError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'InvalidConfigError'
  }
}

export class UsageError extends ConfigError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('USAGE', message, options)
    this.name = 'UsageError'
  }
}

const brokenPipeCodes = new Set(['EPIPE', 'ERR_STREAM_PREMATURE_CLOSE', 'ERR_STREAM_DESTROYED', 'ECONNRESET'])

/**
 * True when the error means the other end of a pipe went away.
 */
export function isBrokenPipe(error: unknown): boolean {
  if (error instanceof BrokenPipeError) {
    return true
  }

  return error instanceof Error && 'code' in error && typeof error.code === 'string' && brokenPipeCodes.has(error.code)
}
