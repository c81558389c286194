import {Buffer} from 'node:buffer'
import {open, type FileHandle} from 'node:fs/promises'
import {basename} from 'node:path'
import {Readable} from 'node:stream'
import type {Logger} from 'pino'
import {SourceError} from '../errors.js'
import type {Source} from '../types.js'
import {PeekableSource} from './peekable.js'

export type StageOptions = {
  parent?: Stage;
  /** Descriptor that produced the stage. */
  label?: string;
  /** Keep the parent's compressions stack instead of pushing `label`. */
  transparent?: boolean;
  name: string;
  /** File on disk holding the stage's bytes, for the source stage of a path. */
  path?: string;
  logger: Logger;
}

const newline = 0x0A

/**
 * One node of the decode chain.
 *
 * A stage owns its parent: closing a stage closes the whole chain above it,
 * exactly once, whatever the order of calls.
 */
export class Stage {
  readonly parent?: Stage
  readonly label?: string
  readonly name: string
  readonly path?: string
  /** Formats peeled so far, outermost first. */
  readonly compressions: readonly string[]
  protected readonly logger: Logger
  private closing?: Promise<void>

  constructor(
    protected readonly source: PeekableSource,
    options: StageOptions
  ) {
    this.parent = options.parent
    this.label = options.label
    this.name = options.name
    this.path = options.path
    this.logger = options.logger

    const inherited = options.parent?.compressions ?? []
    this.compressions = options.label && !options.transparent
      ? [...inherited, options.label]
      : inherited
  }

  get consumed(): boolean {
    return this.source.consumed
  }

  async peek(size: number): Promise<Buffer> {
    return this.source.peek(size)
  }

  chunks(): AsyncGenerator<Buffer, void, undefined> {
    return this.source.chunks()
  }

  /** Raw bytes of the stage, for piping into another process. */
  readable(): Readable {
    return Readable.from(this.chunks(), {objectMode: false})
  }

  /**
   * Lines of the stage, each ending with its newline (except possibly the last).
   * Lazy and single-pass.
   */
  async * lines(): AsyncGenerator<Buffer, void, undefined> {
    let pending: Buffer[] = []
    for await (const chunk of this.chunks()) {
      let start = 0
      let index = chunk.indexOf(newline, start)
      while (index !== -1) {
        pending.push(chunk.subarray(start, index + 1))
        yield pending.length === 1 ? pending[0] : Buffer.concat(pending)
        pending = []
        start = index + 1
        index = chunk.indexOf(newline, start)
      }

      if (start < chunk.length) {
        pending.push(chunk.subarray(start))
      }
    }

    if (pending.length > 0) {
      yield Buffer.concat(pending)
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<Buffer, void, undefined> {
    return this.lines()
  }

  /** Source of another stage, for stages that re-label their parent's bytes. */
  protected static sourceOf(stage: Stage): PeekableSource {
    return stage.source
  }

  async close(): Promise<void> {
    this.closing ??= this.teardown()
    return this.closing
  }

  /** Frees what the stage itself holds. Runs before the parent is closed. */
  protected async release(): Promise<void> {
    this.source.destroy()
  }

  /** Waits for background work once the parent is closed. */
  protected async settle(): Promise<void> {
    // Nothing by default
  }

  private async teardown(): Promise<void> {
    const failures: unknown[] = []
    const attempt = async (step: () => Promise<void>) => {
      try {
        await step()
      } catch (error) {
        failures.push(error)
      }
    }

    await attempt(async () => this.release())
    if (this.parent) {
      const {parent} = this
      await attempt(async () => parent.close())
    }

    await attempt(async () => this.settle())

    if (failures.length > 1) {
      this.logger.debug({stage: this.name, failures: failures.slice(1)}, 'additional failures while closing')
    }

    if (failures.length > 0) {
      throw failures[0]
    }
  }
}

/**
 * First stage of a chain, reading the raw input.
 */
export class SourceStage extends Stage {
  static async open(source: Source, logger: Logger): Promise<SourceStage> {
    if ('path' in source) {
      let handle: FileHandle
      try {
        handle = await open(source.path, 'r')
      } catch (error) {
        throw new SourceError(source.path, {cause: error})
      }

      const stream = handle.createReadStream()
      return new SourceStage(new PeekableSource(stream), {name: basename(source.path), path: source.path, logger})
    }

    return new SourceStage(new PeekableSource(source.stream), {name: source.name ?? '-', logger})
  }
}

/**
 * Strips the first matching extension from a stage name:
 * `dump.sql.gz` becomes `dump.sql` for a `gz` descriptor.
 */
export function deriveName(name: string, extensions: readonly string[]): string {
  for (const extension of extensions) {
    const suffix = `.${extension}`
    if (name.length > suffix.length && name.toLowerCase().endsWith(suffix)) {
      return name.slice(0, -suffix.length)
    }
  }

  return name
}
