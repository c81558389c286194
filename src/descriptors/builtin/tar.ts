import {once} from 'node:events'
import {PassThrough} from 'node:stream'
import type {Logger} from 'pino'
import {Parser, type ReadEntry} from 'tar'
import {PeekableSource} from '../../engine/peekable.js'
import {accept} from '../../engine/registry.js'
import {deriveName, Stage} from '../../engine/stage.js'
import {TAR} from '../../engine/mime.js'
import type {Descriptor} from '../../types.js'

const fileTypes = new Set(['File', 'OldFile', 'ContiguousFile'])

/**
 * Stage exposing the first regular file of a tar stream.
 * The archive is parsed in process; members after the first are skipped.
 */
export class ExtractStage extends Stage {
  /** Path of the extracted member, once the parser reached it. */
  member?: string
  private readonly abort = new AbortController()
  private readonly feeding: Promise<void>

  constructor(parent: Stage, logger: Logger) {
    const output = new PassThrough()
    super(new PeekableSource(output), {
      parent,
      label: 'tar',
      transparent: true,
      name: deriveName(parent.name, ['tar']),
      logger
    })

    const parser = new Parser({
      strict: true,
      onReadEntry: (entry: ReadEntry) => {
        if (this.member === undefined && fileTypes.has(entry.type)) {
          this.member = entry.path
          logger.debug({stage: this.name, member: entry.path}, 'extracting member')
          entry.pipe(output)
        } else {
          entry.resume()
        }
      }
    })

    parser.on('error', (error: Error) => {
      output.destroy(error)
    })
    parser.on('end', () => {
      if (this.member === undefined) {
        output.end()
      }
    })

    this.feeding = this.feed(parent, parser).catch((error: unknown) => {
      if (!this.abort.signal.aborted) {
        output.destroy(error instanceof Error ? error : new Error(String(error)))
      }
    })
  }

  protected override async release(): Promise<void> {
    this.abort.abort()
    this.source.destroy()
  }

  protected override async settle(): Promise<void> {
    await this.feeding
  }

  private async feed(parent: Stage, parser: Parser): Promise<void> {
    const {signal} = this.abort
    for await (const chunk of parent.chunks()) {
      if (signal.aborted) {
        return
      }

      if (!parser.write(chunk)) {
        await once(parser, 'drain', {signal})
      }
    }

    parser.end()
  }
}

export const tarDescriptor: Descriptor = Object.freeze({
  name: 'tar',
  priority: 0,
  mimes: [TAR],
  extensions: ['tar'],
  transparent: true,
  tryRecognize: accept,
  async construct(parent, context) {
    return new ExtractStage(parent, context.logger)
  }
} satisfies Descriptor)
