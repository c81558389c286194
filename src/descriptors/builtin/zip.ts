import {ExternalStage} from '../../engine/external-stage.js'
import {accept} from '../../engine/registry.js'
import {deriveName} from '../../engine/stage.js'
import type {Descriptor} from '../../types.js'

/**
 * Zip archive, unpacked by `funzip` which streams the first member.
 * Transparent: only the member's own format shows on the stack.
 */
export const zipDescriptor: Descriptor = Object.freeze({
  name: 'zip',
  priority: 0,
  mimes: ['application/zip'],
  extensions: ['zip'],
  transparent: true,
  tryRecognize: accept,
  async construct(parent, context) {
    return ExternalStage.spawn({
      parent,
      label: 'zip',
      transparent: true,
      name: deriveName(parent.name, ['zip']),
      command: context.config.tools.funzip,
      logger: context.logger
    })
  }
} satisfies Descriptor)
