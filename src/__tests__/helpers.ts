import {Buffer} from 'node:buffer'
import {mkdir, mkdtemp, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {dirname, join} from 'node:path'
import process from 'node:process'
import type {PassThrough} from 'node:stream'
import {buffer as streamToBuffer} from 'node:stream/consumers'
import pino, {type Logger} from 'pino'
import * as tar from 'tar'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'restoredb-test-'))
}

/**
 * Argv running `script` with the current node, standing in for an external
 * tool. Arguments appended by the engine land in `process.argv.slice(1)`.
 */
export function nodeTool(script: string): string[] {
  return [process.execPath, '-e', script, '--']
}

/** Stand-in for `gzip -dc`. */
export const gunzipTool = nodeTool('process.stdin.pipe(require("node:zlib").createGunzip()).pipe(process.stdout)')

/**
 * Stand-in for pg_restore: swallows the archive, then prints its own
 * arguments as a JSON line followed by one statement.
 */
export const pgRestoreTool = nodeTool([
  'process.stdin.resume()',
  'process.stdin.on("end", () => {',
  '  process.stdout.write(JSON.stringify(process.argv.slice(1)) + "\\n" + "SELECT 1;\\n")',
  '})'
].join('\n'))

export const missingTool = ['restoredb-test-no-such-tool']

/** Stand-in for a decompressor: drops the first `count` bytes of its input. */
export function dropTool(count: number): string[] {
  return nodeTool([
    'const chunks = []',
    'process.stdin.on("data", chunk => chunks.push(chunk))',
    `process.stdin.on("end", () => process.stdout.write(Buffer.concat(chunks).subarray(${count})))`
  ].join('\n'))
}

/** Stand-in for `funzip`: prints the data of the first stored member. */
export const funzipTool = nodeTool([
  'const chunks = []',
  'process.stdin.on("data", chunk => chunks.push(chunk))',
  'process.stdin.on("end", () => {',
  '  const zip = Buffer.concat(chunks)',
  '  const start = 30 + zip.readUInt16LE(26) + zip.readUInt16LE(28)',
  '  process.stdout.write(zip.subarray(start, start + zip.readUInt32LE(18)))',
  '})'
].join('\n'))

/** Stand-in for `7z x -so <file>`: prints the file past its 32-byte signature header. */
export const sevenZipTool = nodeTool([
  'const file = process.argv[process.argv.length - 1]',
  'process.stdout.write(require("node:fs").readFileSync(file).subarray(32))'
].join('\n'))

/** Bytes that are neither text nor any known format. */
export function opaqueBytes(size: number): Buffer {
  return Buffer.alloc(size, 0x07)
}

// -- Magic-prefixed fixtures -------------------------------------------------

export const bzip2Magic = Buffer.from('BZh91AY&SY', 'latin1')
export const xzMagic = Buffer.from([0xFD, 0x37, 0x7A, 0x58, 0x5A, 0x00])
export const zstdMagic = Buffer.from([0x28, 0xB5, 0x2F, 0xFD])
export const lz4Magic = Buffer.from([0x04, 0x22, 0x4D, 0x18])
export const lz4LegacyMagic = Buffer.from([0x02, 0x21, 0x4C, 0x18])

/** 7z signature header: magic, version 0.4, then zeroed start header. */
export function sevenZipHeader(): Buffer {
  return Buffer.concat([Buffer.from([0x37, 0x7A, 0xBC, 0xAF, 0x27, 0x1C, 0x00, 0x04]), Buffer.alloc(24)])
}

/**
 * Zip archive holding one stored (uncompressed) member. The CRC is left at
 * zero: nothing in the tests verifies it.
 */
export function makeZip(path: string, content: string): Buffer {
  const name = Buffer.from(path, 'utf8')
  const data = Buffer.from(content, 'utf8')

  const local = Buffer.alloc(30)
  local.writeUInt32LE(0x04_03_4B_50, 0)
  local.writeUInt16LE(20, 4)
  local.writeUInt32LE(data.length, 18)
  local.writeUInt32LE(data.length, 22)
  local.writeUInt16LE(name.length, 26)

  const central = Buffer.alloc(46)
  central.writeUInt32LE(0x02_01_4B_50, 0)
  central.writeUInt16LE(20, 4)
  central.writeUInt16LE(20, 6)
  central.writeUInt32LE(data.length, 20)
  central.writeUInt32LE(data.length, 24)
  central.writeUInt16LE(name.length, 28)

  const centralOffset = local.length + name.length + data.length
  const end = Buffer.alloc(22)
  end.writeUInt32LE(0x06_05_4B_50, 0)
  end.writeUInt16LE(1, 8)
  end.writeUInt16LE(1, 10)
  end.writeUInt32LE(central.length + name.length, 12)
  end.writeUInt32LE(centralOffset, 16)

  return Buffer.concat([local, name, data, central, name, end])
}

// -- Logs --------------------------------------------------------------------

export type LogRecord = {
  level: number;
  msg: string;
  tool?: string;
}

/** Debug-level logger keeping every record in memory. */
export function recordingLogger(): {logger: Logger; records: LogRecord[]} {
  const records: LogRecord[] = []
  const logger = pino({level: 'debug'}, {
    write(message: string) {
      const record: unknown = JSON.parse(message)
      if (typeof record === 'object' && record !== null) {
        records.push({
          level: 'level' in record ? Number(record.level) : 0,
          msg: 'msg' in record ? String(record.msg) : '',
          tool: 'tool' in record ? String(record.tool) : undefined
        })
      }
    }
  })

  return {logger, records}
}

/** Concatenates an async sequence of byte chunks. */
export async function collect(chunks: AsyncIterable<Buffer>): Promise<Buffer> {
  const parts: Buffer[] = []
  for await (const chunk of chunks) {
    parts.push(chunk)
  }

  return Buffer.concat(parts)
}

/** Records everything written to `stream`. */
export function capture(stream: PassThrough): () => string {
  const parts: Buffer[] = []
  stream.on('data', (chunk: Buffer) => {
    parts.push(chunk)
  })
  return () => Buffer.concat(parts).toString('utf8')
}

export type TarEntry = {
  path: string;
  content: string | Buffer;
}

/**
 * Builds a tar archive holding `entries`, in order.
 */
export async function makeTar(entries: TarEntry[]): Promise<Buffer> {
  const dir = await createTmpDir()
  for (const entry of entries) {
    const path = join(dir, entry.path)
    await mkdir(dirname(path), {recursive: true})
    await writeFile(path, entry.content)
  }

  return streamToBuffer(tar.c({cwd: dir, portable: true}, entries.map(entry => entry.path)))
}

// -- pg_dump archive headers -------------------------------------------------

export type DumpHeaderFixture = {
  minor?: number;
  format?: number;
  /** Level before archive 1.15, algorithm code from 1.15. */
  compression?: number;
  /** `null` is written as a null string. */
  dbname?: string | null;
  serverVersion?: string | null;
  dumpVersion?: string | null;
  tocCount?: number;
}

function dumpInt(value: number): Buffer {
  const buffer = Buffer.alloc(5)
  buffer[0] = value < 0 ? 1 : 0
  buffer.writeUInt32LE(Math.abs(value), 1)
  return buffer
}

function dumpString(value: string | null): Buffer {
  if (value === null) {
    return dumpInt(-1)
  }

  const bytes = Buffer.from(value, 'utf8')
  return Buffer.concat([dumpInt(bytes.length), bytes])
}

/**
 * Archive header as pg_dump writes it, with 4-byte integers and 8-byte
 * offsets, created on Mon Jan 2 03:04:05 2023 (local time).
 */
export function buildDumpHeader(fixture: DumpHeaderFixture = {}): Buffer {
  const minor = fixture.minor ?? 14
  const compression = minor >= 15
    ? Buffer.from([fixture.compression ?? 0])
    : dumpInt(fixture.compression ?? -1)

  const parts = [
    Buffer.from('PGDMP', 'latin1'),
    Buffer.from([1, minor, 0, 4, 8, fixture.format ?? 1]),
    compression,
    ...[5, 4, 3, 2, 0, 123, 0].map(value => dumpInt(value)),
    dumpString(fixture.dbname === undefined ? 'shop' : fixture.dbname),
    dumpString(fixture.serverVersion === undefined ? '15.4' : fixture.serverVersion),
    dumpString(fixture.dumpVersion === undefined ? '16.1' : fixture.dumpVersion)
  ]

  if (fixture.tocCount !== undefined) {
    parts.push(dumpInt(fixture.tocCount))
  }

  return Buffer.concat(parts)
}

/** `count` numbered SQL lines. */
export function sqlLines(count: number): string {
  let sql = ''
  for (let index = 0; index < count; index++) {
    sql += `INSERT INTO items VALUES (${index}, 'item ${index}');\n`
  }

  return sql
}
