import type {Descriptor} from '../../types.js'
import {bzip2Descriptor, gzipDescriptor, lz4Descriptor, xzDescriptor, zstdDescriptor} from './compression.js'
import {sevenZipDescriptor} from './seven-zip.js'
import {tarDescriptor} from './tar.js'
import {zipDescriptor} from './zip.js'

export {externalDecompressor, bzip2Descriptor, gzipDescriptor, lz4Descriptor, xzDescriptor, zstdDescriptor} from './compression.js'
export {sevenZipDescriptor} from './seven-zip.js'
export {ExtractStage, tarDescriptor} from './tar.js'
export {zipDescriptor} from './zip.js'

/** Generic layers, in registration order. */
export const builtinDescriptors: readonly Descriptor[] = Object.freeze([
  gzipDescriptor,
  bzip2Descriptor,
  xzDescriptor,
  zstdDescriptor,
  lz4Descriptor,
  tarDescriptor,
  zipDescriptor,
  sevenZipDescriptor
])
