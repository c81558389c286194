import {Buffer} from 'node:buffer'
import type {Readable} from 'node:stream'
import {StageConsumedError, StreamError} from '../errors.js'

const empty = Buffer.alloc(0)

function toBuffer(chunk: unknown): Buffer {
  if (Buffer.isBuffer(chunk)) {
    return chunk
  }

  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk.buffer, chunk.byteOffset, chunk.byteLength)
  }

  if (typeof chunk === 'string') {
    return Buffer.from(chunk)
  }

  throw new StreamError('INVALID_CHUNK', `Expected a byte chunk, got ${typeof chunk}`)
}

/**
 * Single-pass byte source with look-ahead.
 *
 * `peek(n)` grows a front buffer until it holds `n` bytes (or the stream
 * ends) and returns a view of it without moving the read position.
 * `chunks()` hands out the front buffer first, then the rest of the stream.
 * It can be called once.
 */
export class PeekableSource {
  private front: Buffer = empty
  private ended = false
  private started = false
  private destroyed = false
  private completed = false
  private readonly iterator: AsyncIterator<unknown>

  constructor(private readonly stream: Readable) {
    this.iterator = stream[Symbol.asyncIterator]()
  }

  /** True once every byte of the underlying stream was handed out by `chunks()`. */
  get exhausted(): boolean {
    return this.completed
  }

  get consumed(): boolean {
    return this.started
  }

  async peek(size: number): Promise<Buffer> {
    if (this.started) {
      throw new StageConsumedError()
    }

    while (this.front.length < size && !this.ended) {
      const next = await this.iterator.next()
      if (next.done) {
        this.ended = true
        break
      }

      this.front = this.front.length === 0 ? toBuffer(next.value) : Buffer.concat([this.front, toBuffer(next.value)])
    }

    return this.front.subarray(0, size)
  }

  async * chunks(): AsyncGenerator<Buffer, void, undefined> {
    if (this.started) {
      throw new StageConsumedError()
    }

    this.started = true
    try {
      if (this.front.length > 0) {
        const front = this.front
        this.front = empty
        yield front
      }

      while (!this.ended) {
        const next = await this.iterator.next()
        if (next.done) {
          this.ended = true
          break
        }

        yield toBuffer(next.value)
      }

      this.completed = !this.destroyed
    } finally {
      if (!this.ended) {
        this.destroy()
      }
    }
  }

  /**
   * Releases the underlying stream. Safe to call more than once.
   * A read pending on the stream fails with a premature close.
   */
  destroy(): void {
    if (this.destroyed) {
      return
    }

    this.destroyed = true
    this.front = empty
    this.ended = true
    this.stream.destroy()
  }
}
