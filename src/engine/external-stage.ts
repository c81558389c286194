import {once} from 'node:events'
import {pipeline} from 'node:stream/promises'
import {execa, type Options, type ResultPromise} from 'execa'
import {isBrokenPipe, ProcessExitError, ProcessSpawnError, StreamError} from '../errors.js'
import {PeekableSource} from './peekable.js'
import {Stage, type StageOptions} from './stage.js'

const spawnOptions = {
  stdin: 'pipe',
  stdout: 'pipe',
  stderr: 'pipe',
  buffer: false,
  reject: false
} as const satisfies Options

export type Subprocess = ResultPromise<typeof spawnOptions>

export type ExternalStageOptions = StageOptions & {
  parent: Stage;
  /** Executable followed by its arguments. */
  command: readonly string[];
  /** Pipe the parent's bytes into the process. Off for tools reading the file themselves. */
  feedParent?: boolean;
}

/**
 * Starts `command`. The result is execa's subprocess, itself a promise of the
 * outcome: hand it around synchronously, never return it from an async function.
 */
export function spawnCommand<OptionsType extends Options>(
  command: readonly string[],
  options: OptionsType
): ResultPromise<{} & OptionsType> {
  const [file, ...args] = command
  if (!file) {
    throw new ProcessSpawnError(command, {cause: new Error('empty command')})
  }

  return execa(file, args, options)
}

/**
 * Waits until the OS reports `subprocess` running.
 * A missing executable surfaces here, before any byte is moved.
 */
export async function waitForSpawn(
  subprocess: ResultPromise,
  command: readonly string[]
): Promise<void> {
  try {
    await once(subprocess, 'spawn')
  } catch (error) {
    // The result carries the same spawn error
    await Promise.allSettled([subprocess])
    throw new ProcessSpawnError(command, {cause: error})
  }
}

/**
 * Stage backed by an external process: the parent's bytes go to its stdin,
 * its stdout is the stage's content.
 *
 * The exit status is checked on close, and only when the consumer read the
 * whole output. A stage closed before that is detached: the process is
 * terminated and whatever it exits with is ignored.
 *
 * The tool's stderr lines are logged as warnings, and only at debug level
 * once the stage is detached.
 */
export class ExternalStage extends Stage {
  readonly command: readonly string[]
  private readonly feeding: Promise<void>
  private readonly diagnostics: Promise<void>
  private feedError?: unknown
  private drained = false
  private detached = false

  protected constructor(
    private readonly subprocess: Subprocess,
    options: ExternalStageOptions
  ) {
    super(new PeekableSource(subprocess.stdout), options)
    this.command = options.command
    if (options.feedParent ?? true) {
      this.feeding = pipeline(options.parent.readable(), subprocess.stdin).then(
        () => undefined,
        (error: unknown) => {
          this.feedError = error
          this.logger.debug({stage: this.name, err: error}, 'feeding stopped early')
        }
      )
    } else {
      subprocess.stdin.end()
      this.feeding = Promise.resolve()
    }

    this.diagnostics = this.relayStderr().catch((error: unknown) => {
      this.logger.debug({stage: this.name, err: error}, 'stderr relay stopped')
    })
  }

  static async spawn(options: ExternalStageOptions): Promise<ExternalStage> {
    const subprocess = ExternalStage.launch(options)
    await waitForSpawn(subprocess, options.command)
    return new ExternalStage(subprocess, options)
  }

  protected static launch(options: ExternalStageOptions): Subprocess {
    options.logger.debug({stage: options.name, command: options.command}, 'spawning')
    return spawnCommand(options.command, spawnOptions)
  }

  private async relayStderr(): Promise<void> {
    const tool = this.command[0]
    for await (const line of this.subprocess.iterable({from: 'stderr'})) {
      if (this.detached) {
        this.logger.debug({stage: this.name, tool}, line)
      } else {
        this.logger.warn({stage: this.name, tool}, line)
      }
    }
  }

  protected override async release(): Promise<void> {
    this.drained = this.source.exhausted
    if (!this.drained) {
      this.detached = true
      this.subprocess.kill()
    }

    this.subprocess.stdin.destroy()
    this.source.destroy()

    const result = await this.subprocess
    this.logger.debug({stage: this.name, exitCode: result.exitCode, signal: result.signal, drained: this.drained}, 'process ended')
    if (this.drained && result.exitCode !== 0) {
      throw new ProcessExitError(this.command, result.exitCode, result.signal)
    }
  }

  protected override async settle(): Promise<void> {
    await Promise.all([this.feeding, this.diagnostics])
    if (this.drained && this.feedError !== undefined && !isBrokenPipe(this.feedError)) {
      throw new StreamError('FEED_FAILED', `Failed to feed "${this.command[0] ?? ''}"`, {cause: this.feedError})
    }
  }
}
