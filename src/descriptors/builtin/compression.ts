import type {ToolName} from '../../core/config.js'
import {ExternalStage} from '../../engine/external-stage.js'
import {LZ4} from '../../engine/mime.js'
import {accept} from '../../engine/registry.js'
import {deriveName} from '../../engine/stage.js'
import type {Descriptor} from '../../types.js'

type DecompressorSpec = {
  name: string;
  tool: ToolName;
  mimes: readonly string[];
  extensions: readonly string[];
}

/**
 * Generic stream decompressor: the mime gate is the whole recognition, the
 * decoding is done by the configured external tool.
 */
export function externalDecompressor(spec: DecompressorSpec): Descriptor {
  return Object.freeze({
    name: spec.name,
    priority: 0,
    mimes: spec.mimes,
    extensions: spec.extensions,
    tryRecognize: accept,
    async construct(parent, context) {
      return ExternalStage.spawn({
        parent,
        label: spec.name,
        name: deriveName(parent.name, spec.extensions),
        command: context.config.tools[spec.tool],
        logger: context.logger
      })
    }
  } satisfies Descriptor)
}

export const gzipDescriptor = externalDecompressor({
  name: 'gzip',
  tool: 'gzip',
  mimes: ['application/gzip', 'application/x-gzip'],
  extensions: ['gz', 'gzip']
})

export const bzip2Descriptor = externalDecompressor({
  name: 'bzip2',
  tool: 'bzip2',
  mimes: ['application/x-bzip2'],
  extensions: ['bz2', 'bzip2']
})

export const xzDescriptor = externalDecompressor({
  name: 'xz',
  tool: 'xz',
  mimes: ['application/x-xz'],
  extensions: ['xz']
})

export const zstdDescriptor = externalDecompressor({
  name: 'zstd',
  tool: 'zstd',
  mimes: ['application/zstd'],
  extensions: ['zst', 'zstd']
})

export const lz4Descriptor = externalDecompressor({
  name: 'lz4',
  tool: 'lz4',
  mimes: [LZ4],
  extensions: ['lz4']
})
