import type {Buffer} from 'node:buffer'
import {fileTypeFromBuffer} from 'file-type'
import {Header} from 'tar'

export const OCTET_STREAM = 'application/octet-stream'
export const TEXT_PLAIN = 'text/plain'
export const EMPTY = 'application/x-empty'
export const TAR = 'application/x-tar'
export const LZ4 = 'application/x-lz4'
export const SEVEN_ZIP = 'application/x-7z-compressed'

const tarBlockSize = 512

function isTarHeader(window: Buffer): boolean {
  if (window.length < tarBlockSize) {
    return false
  }

  try {
    return new Header(window.subarray(0, tarBlockSize)).cksumValid
  } catch {
    return false
  }
}

// Control bytes found in text files: tab, line feed, form feed, carriage return, escape
const textControls = new Set([0x09, 0x0A, 0x0C, 0x0D, 0x1B])

/**
 * UTF-8 and single-byte encodings (LATIN1, WIN1252, ...) alike: any byte from
 * 0x20 up, plus the usual whitespace controls.
 */
function isText(window: Buffer): boolean {
  for (const byte of window) {
    if (byte < 0x20 && !textControls.has(byte)) {
      return false
    }
  }

  return true
}

type MagicProbe = (window: Buffer) => string | undefined

function magic(mime: string, ...signature: number[]): MagicProbe {
  return window => window.length >= signature.length && signature.every((byte, index) => window[index] === byte)
    ? mime
    : undefined
}

/** Signatures file-type does not know. */
const magicProbes: MagicProbe[] = [
  // LZ4 frame, then the legacy frame written by `lz4 -l`
  magic(LZ4, 0x04, 0x22, 0x4D, 0x18),
  magic(LZ4, 0x02, 0x21, 0x4C, 0x18)
]

function probeByMagic(window: Buffer): string | undefined {
  for (const probe of magicProbes) {
    const mime = probe(window)
    if (mime) {
      return mime
    }
  }

  return undefined
}

/**
 * Content type of a peek window, used to gate descriptors.
 *
 * Magic numbers come first; a window with none is tar when its first block
 * checksums as a tar header, text when it holds no control byte other than
 * whitespace and escape, opaque bytes otherwise.
 */
export async function sniffMime(window: Buffer): Promise<string> {
  if (window.length === 0) {
    return EMPTY
  }

  const known = probeByMagic(window)
  if (known) {
    return known
  }

  const type = await fileTypeFromBuffer(window)
  if (type) {
    return type.mime
  }

  if (isTarHeader(window)) {
    return TAR
  }

  return isText(window) ? TEXT_PLAIN : OCTET_STREAM
}
