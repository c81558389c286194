import {ExternalStage} from '../../engine/external-stage.js'
import {SEVEN_ZIP} from '../../engine/mime.js'
import {accept} from '../../engine/registry.js'
import {deriveName} from '../../engine/stage.js'
import {StreamedArchiveError} from '../../errors.js'
import type {Descriptor} from '../../types.js'

/**
 * 7z archive, unpacked by `7z x -so <file>` which streams its single member.
 *
 * 7z keeps its index at the end of the archive, so the tool needs the file
 * itself: an archive arriving on a pipe, or inside another layer, is refused.
 * Transparent, like zip.
 */
export const sevenZipDescriptor: Descriptor = Object.freeze({
  name: '7z',
  priority: 0,
  mimes: [SEVEN_ZIP],
  extensions: ['7z'],
  transparent: true,
  tryRecognize: accept,
  async construct(parent, context) {
    if (parent.path === undefined) {
      throw new StreamedArchiveError('7z')
    }

    return ExternalStage.spawn({
      parent,
      label: '7z',
      transparent: true,
      name: deriveName(parent.name, ['7z']),
      command: [...context.config.tools['7z'], parent.path],
      feedParent: false,
      logger: context.logger
    })
  }
} satisfies Descriptor)
