import {Buffer} from 'node:buffer'
import {writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {Readable} from 'node:stream'
import {gzipSync} from 'node:zlib'
import test from 'ava'
import {builtinDescriptors} from '../../descriptors/builtin/index.js'
import {plainSql} from '../../descriptors/pgdump/index.js'
import {Registry} from '../../engine/registry.js'
import {LayerLimitError, ProcessSpawnError, StreamedArchiveError, UnsupportedFormatError} from '../../errors.js'
import {createEngineConfig, type EngineConfigInput} from '../config.js'
import {open, openDump} from '../guesser.js'
import {silentLogger} from '../logger.js'
import {
  buildDumpHeader,
  bzip2Magic,
  collect,
  createTmpDir,
  dropTool,
  funzipTool,
  gunzipTool,
  lz4LegacyMagic,
  lz4Magic,
  makeTar,
  makeZip,
  missingTool,
  opaqueBytes,
  pgRestoreTool,
  sevenZipHeader,
  sevenZipTool,
  sqlLines,
  xzMagic,
  zstdMagic
} from '../../__tests__/helpers.js'

function configOf(input: EngineConfigInput = {}) {
  return createEngineConfig({
    ...input,
    tools: {
      gzip: gunzipTool,
      bzip2: dropTool(bzip2Magic.length),
      xz: dropTool(xzMagic.length),
      zstd: dropTool(zstdMagic.length),
      lz4: dropTool(lz4Magic.length),
      funzip: funzipTool,
      '7z': sevenZipTool,
      pg_restore: pgRestoreTool,
      ...input.tools
    }
  })
}

function streamOf(content: Buffer | string): {stream: Readable; name: string} {
  return {stream: Readable.from([Buffer.from(content)]), name: 'input'}
}

function gzipTimes(content: Buffer | string, times: number): Buffer {
  let bytes = Buffer.from(content)
  for (let index = 0; index < times; index++) {
    bytes = gzipSync(bytes)
  }

  return bytes
}

// -- stacks ------------------------------------------------------------------

test('plain SQL', async t => {
  const stage = await openDump(streamOf('SELECT 1;\n'), {config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['sql'])
  t.is(stage.header, undefined)
  await stage.close()
})

test('Latin-1 SQL is plain SQL', async t => {
  const sql = Buffer.from('INSERT INTO villes VALUES (\'Besançon\');\n', 'latin1')
  const stage = await openDump(streamOf(sql), {config: configOf(), logger: silentLogger})

  t.deepEqual(stage.compressions, ['sql'])
  t.deepEqual(await collect(stage.lines()), sql)
  await stage.close()
})

const framed = [
  {name: 'bzip2', magic: bzip2Magic},
  {name: 'xz', magic: xzMagic},
  {name: 'zstd', magic: zstdMagic},
  {name: 'lz4', magic: lz4Magic}
]

for (const {name, magic} of framed) {
  test(`${name} layer`, async t => {
    const stage = await openDump(streamOf(Buffer.concat([magic, Buffer.from('SELECT 1;\n')])), {config: configOf(), logger: silentLogger})
    t.deepEqual(stage.compressions, [name, 'sql'])
    t.is((await collect(stage.lines())).toString(), 'SELECT 1;\n')
    await stage.close()
  })
}

test('legacy lz4 layer', async t => {
  const config = configOf({tools: {lz4: dropTool(lz4LegacyMagic.length)}})
  const stage = await openDump(streamOf(Buffer.concat([lz4LegacyMagic, Buffer.from('SELECT 1;\n')])), {config, logger: silentLogger})
  t.deepEqual(stage.compressions, ['lz4', 'sql'])
  await collect(stage.lines())
  await stage.close()
})

test('zip is transparent', async t => {
  const stage = await openDump(streamOf(makeZip('dump.sql', 'SELECT 1;\n')), {config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['sql'])
  t.is((await collect(stage.lines())).toString(), 'SELECT 1;\n')
  await stage.close()
})

test('7z file is read by the tool itself', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'nightly.7z')
  await writeFile(path, Buffer.concat([sevenZipHeader(), gzipSync('SELECT 1;\n')]))

  const stage = await openDump({path}, {config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['gzip', 'sql'])
  t.is(stage.name, 'nightly')
  t.is((await collect(stage.lines())).toString(), 'SELECT 1;\n')
  await stage.close()
})

test('7z on a stream is refused', async t => {
  const bytes = Buffer.concat([sevenZipHeader(), Buffer.from('SELECT 1;\n')])
  const error = await t.throwsAsync(
    openDump(streamOf(bytes), {config: configOf(), logger: silentLogger}),
    {instanceOf: StreamedArchiveError}
  )
  t.is(error?.message, '7z archives cannot be read from a stream: pass the file path instead')
})

test('nested generic layers only grow the head of the stack', async t => {
  for (const times of [1, 2, 3]) {
    const stage = await openDump(streamOf(gzipTimes('SELECT 1;\n', times)), {config: configOf(), logger: silentLogger})
    t.is(stage.compressions.length, times + 1)
    t.is(stage.compressions.at(-1), 'sql')
    t.deepEqual(stage.compressions.slice(0, -1), Array.from({length: times}, () => 'gzip'))
    await collect(stage.lines())
    await stage.close()
  }
})

test('gzip over a tar holding SQL shows only two labels', async t => {
  const archive = await makeTar([{path: 'dump.sql', content: 'SELECT 1;\n'}])
  const stage = await openDump(streamOf(gzipSync(archive)), {config: configOf(), logger: silentLogger})

  t.deepEqual(stage.compressions, ['gzip', 'sql'])
  t.is((await collect(stage.lines())).toString(), 'SELECT 1;\n')
  await stage.close()
})

test('custom dump', async t => {
  const stage = await openDump(streamOf(buildDumpHeader({tocCount: 3})), {config: configOf(), logger: silentLogger})

  t.deepEqual(stage.compressions, ['pgdmp_custom', 'sql'])
  t.is(stage.header?.tocCount, 3)
  t.is((await collect(stage.lines())).toString(), '[]\nSELECT 1;\n')
  await stage.close()
})

test('compressed custom dump', async t => {
  const stage = await openDump(streamOf(gzipSync(buildDumpHeader())), {config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['gzip', 'pgdmp_custom', 'sql'])
  await collect(stage.lines())
  await stage.close()
})

test('tar dump goes whole to pg_restore', async t => {
  const archive = await makeTar([
    {path: 'toc.dat', content: buildDumpHeader({format: 3})},
    {path: '3001.dat', content: '1\tone\n'}
  ])
  const stage = await openDump(streamOf(archive), {config: configOf(), logger: silentLogger})

  t.deepEqual(stage.compressions, ['pgdmp_tar', 'sql'])
  t.is(stage.header?.format, 'TAR')
  await collect(stage.lines())
  await stage.close()
})

test('custom dump inside a generic tar reaches the same terminal label', async t => {
  const archive = await makeTar([{path: 'shop.pgdump', content: buildDumpHeader()}])
  const stage = await openDump(streamOf(archive), {config: configOf(), logger: silentLogger})

  t.deepEqual(stage.compressions, ['pgdmp_custom', 'sql'])
  await collect(stage.lines())
  await stage.close()
})

test('restore flags reach pg_restore', async t => {
  const config = configOf({restore: {noOwner: true, create: true}})
  const stage = await openDump(streamOf(buildDumpHeader()), {config, logger: silentLogger})
  t.is((await collect(stage.lines())).toString(), '["--no-owner","--create"]\nSELECT 1;\n')
  await stage.close()
})

test('round trip through several layers keeps every byte', async t => {
  const sql = sqlLines(10_000)
  const archive = await makeTar([{path: 'dump.sql', content: sql}])
  const stage = await openDump(streamOf(gzipSync(gzipSync(archive))), {config: configOf(), logger: silentLogger})

  t.is((await collect(stage.lines())).toString(), sql)
  await t.notThrowsAsync(stage.close())
})

test('opens a file by path', async t => {
  const dir = await createTmpDir()
  const path = join(dir, 'nightly.sql.gz')
  await writeFile(path, gzipSync('SELECT 1;\n'))

  const stage = await openDump({path}, {config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['gzip', 'sql'])
  t.is(stage.name, 'nightly')
  await collect(stage.lines())
  await stage.close()
})

// -- rejections --------------------------------------------------------------

test('unknown bytes are not a dump', async t => {
  const error = await t.throwsAsync(
    openDump(streamOf(opaqueBytes(256)), {config: configOf(), logger: silentLogger}),
    {instanceOf: UnsupportedFormatError}
  )
  t.is(error?.message, 'Not a PostgreSQL dump (unknown format)')
})

test('the rejection names the whole stack and never starts pg_restore', async t => {
  const config = configOf({tools: {pg_restore: missingTool}})
  const error = await t.throwsAsync(
    openDump(streamOf(gzipSync(opaqueBytes(256))), {config, logger: silentLogger}),
    {instanceOf: UnsupportedFormatError}
  )
  t.deepEqual(error?.compressions, ['gzip'])
  t.is(error?.message, 'Not a PostgreSQL dump (gzip)')
})

test('a missing tool fails the open', async t => {
  const config = configOf({tools: {gzip: missingTool}})
  await t.throwsAsync(openDump(streamOf(gzipSync('SELECT 1;\n')), {config, logger: silentLogger}), {instanceOf: ProcessSpawnError})
})

test('layers beyond maxDepth are refused', async t => {
  const config = configOf({maxDepth: 1})
  const error = await t.throwsAsync(
    openDump(streamOf(gzipTimes('SELECT 1;\n', 2)), {config, logger: silentLogger}),
    {instanceOf: LayerLimitError}
  )
  t.deepEqual(error?.compressions, ['gzip'])
})

// -- custom registries -------------------------------------------------------

test('open with an empty registry returns the source itself', async t => {
  const stage = await open(streamOf('no layers here\n'), {registry: new Registry(), config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, [])
  t.is((await collect(stage.chunks())).toString(), 'no layers here\n')
  await stage.close()
})

test('open follows caller descriptors', async t => {
  const registry = new Registry({builtins: builtinDescriptors, extra: [plainSql]})
  const stage = await open(streamOf(gzipSync('SELECT 1;\n')), {registry, config: configOf(), logger: silentLogger})
  t.deepEqual(stage.compressions, ['gzip', 'sql'])
  await collect(stage.lines())
  await stage.close()
})

test('openDump rejects a chain that does not end with SQL', async t => {
  const registry = new Registry({builtins: builtinDescriptors})
  const error = await t.throwsAsync(
    openDump(streamOf(gzipSync('SELECT 1;\n')), {registry, config: configOf(), logger: silentLogger}),
    {instanceOf: UnsupportedFormatError}
  )
  t.deepEqual(error?.compressions, ['gzip'])
})
