import {Header} from 'tar'
import {reject} from '../../engine/registry.js'
import {TAR} from '../../engine/mime.js'
import type {Descriptor} from '../../types.js'
import {constructDumpStage, recognizeDump} from './custom.js'

const blockSize = 512
const tocMember = 'toc.dat'

/**
 * Tar-format archive from `pg_dump -Ft`: its first member is always the
 * table of contents. Probed before the generic tar extractor, so the whole
 * tar goes to pg_restore instead of its first member only.
 */
export const pgTarDump: Descriptor = Object.freeze({
  name: 'pgdmp_tar',
  priority: -10,
  mimes: [TAR],
  extensions: ['tar'],
  tryRecognize(probe) {
    if (probe.window.length < blockSize) {
      return reject('shorter than a tar block')
    }

    const header = new Header(probe.window.subarray(0, blockSize))
    if (header.path !== tocMember) {
      return reject(`first member is ${header.path ?? 'unnamed'}, not ${tocMember}`)
    }

    return recognizeDump(probe.window, blockSize)
  },
  async construct(parent, context) {
    return constructDumpStage(parent, context, {label: 'pgdmp_tar', offset: blockSize, extensions: ['tar']})
  }
} satisfies Descriptor)
