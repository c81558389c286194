import type {Buffer} from 'node:buffer'
import {MalformedHeaderError} from '../../errors.js'

export const DUMP_MAGIC = 'PGDMP'

export const dumpFormats = ['UNKNOWN', 'CUSTOM', 'FILES', 'TAR', 'NULL', 'DIRECTORY'] as const

export type DumpFormat = typeof dumpFormats[number]

const compressionAlgorithms = ['none', 'gzip', 'lz4', 'zstd'] as const

export type DumpVersion = {
  major: number;
  minor: number;
  revision: number;
}

/** Archive header written by pg_dump at the start of a custom dump (or of `toc.dat`). */
export type DumpHeader = {
  version: DumpVersion;
  intSize: number;
  offSize: number;
  format: DumpFormat;
  /** Algorithm name from archive 1.15, compression level before. */
  compression: string;
  createdAt?: Date;
  dbname?: string;
  /** Version of the server the dump was taken from. */
  serverVersion?: string;
  /** Version of pg_dump that wrote the archive. */
  dumpVersion?: string;
  /** Number of TOC entries, when the window reaches that far. */
  tocCount?: number;
}

function versionOf(major: number, minor: number, revision = 0): number {
  return (((major * 256) + minor) * 256) + revision
}

const oldest = versionOf(1, 0)

/**
 * Cursor over the header bytes. Every read past the end throws.
 */
class HeaderReader {
  private position = 0
  version = oldest
  intSize = 4

  constructor(private readonly buffer: Buffer) {}

  get remaining(): number {
    return this.buffer.length - this.position
  }

  byte(): number {
    if (this.remaining < 1) {
      throw new MalformedHeaderError('Archive header is truncated')
    }

    const value = this.buffer[this.position]
    this.position++
    return value
  }

  bytes(length: number): Buffer {
    if (this.remaining < length) {
      throw new MalformedHeaderError('Archive header is truncated')
    }

    const value = this.buffer.subarray(this.position, this.position + length)
    this.position += length
    return value
  }

  /** Sign byte (after archive 1.0), then `intSize` little-endian bytes. */
  int(): number {
    const negative = this.version > oldest ? this.byte() !== 0 : false
    let value = 0
    let factor = 1
    for (const byte of this.bytes(this.intSize)) {
      value += byte * factor
      factor *= 256
    }

    return negative ? -value : value
  }

  /** Length-prefixed string; a negative length stands for null. */
  string(): string | undefined {
    const length = this.int()
    if (length < 0) {
      return undefined
    }

    return this.bytes(length).toString('utf8')
  }
}

function readCompression(reader: HeaderReader): string {
  const {version} = reader
  if (version >= versionOf(1, 15)) {
    const code = reader.byte()
    const algorithm = compressionAlgorithms[code]
    if (algorithm === undefined) {
      throw new MalformedHeaderError(`Unknown compression algorithm ${code}`)
    }

    return algorithm
  }

  if (version >= versionOf(1, 2)) {
    const level = version < versionOf(1, 4) ? reader.byte() : reader.int()
    return String(level)
  }

  return '-1'
}

/**
 * Parses a pg_dump archive header from the start of `buffer`.
 * Throws `MalformedHeaderError` for anything truncated or unsupported.
 */
export function readDumpHeader(buffer: Buffer): DumpHeader {
  const reader = new HeaderReader(buffer)
  if (reader.bytes(DUMP_MAGIC.length).toString('latin1') !== DUMP_MAGIC) {
    throw new MalformedHeaderError('Missing PGDMP signature')
  }

  const major = reader.byte()
  const minor = reader.byte()
  const revision = major > 1 || (major === 1 && minor > 0) ? reader.byte() : 0
  reader.version = versionOf(major, minor, revision)
  if (major !== 1 || minor > 16) {
    throw new MalformedHeaderError(`Unsupported archive version ${major}.${minor}-${revision}`)
  }

  const intSize = reader.byte()
  if (intSize < 1 || intSize > 8) {
    throw new MalformedHeaderError(`Unsupported integer size ${intSize}`)
  }

  reader.intSize = intSize
  const offSize = reader.version >= versionOf(1, 7) ? reader.byte() : intSize

  const formatCode = reader.byte()
  const format = dumpFormats[formatCode]
  if (format === undefined) {
    throw new MalformedHeaderError(`Unknown archive format ${formatCode}`)
  }

  const header: DumpHeader = {
    version: {major, minor, revision},
    intSize,
    offSize,
    format,
    compression: readCompression(reader)
  }

  if (reader.version >= versionOf(1, 4)) {
    const [sec, min, hour, mday, mon, year] = [
      reader.int(), reader.int(), reader.int(), reader.int(), reader.int(), reader.int()
    ]
    reader.int() // Isdst
    header.createdAt = new Date(year + 1900, mon, mday, hour, min, sec)
    header.dbname = reader.string()
  }

  if (reader.version >= versionOf(1, 10)) {
    header.serverVersion = reader.string()
    header.dumpVersion = reader.string()
  }

  const tocWidth = reader.version > oldest ? intSize + 1 : intSize
  if (reader.remaining >= tocWidth) {
    header.tocCount = reader.int()
  }

  return header
}
