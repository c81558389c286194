import type {Logger} from 'pino'
import {DuplicateDescriptorError} from '../errors.js'
import type {Descriptor, Probe, Recognition} from '../types.js'
import {sniffMime} from './mime.js'
import type {Stage} from './stage.js'

export function accept(): Recognition {
  return {accepted: true}
}

export function reject(reason: string): Recognition {
  return {accepted: false, reason}
}

type Entry = {
  descriptor: Descriptor;
  builtin: boolean;
}

export type RegistryOptions = {
  /** Generic descriptors, registered first. */
  builtins?: readonly Descriptor[];
  /** Caller-supplied descriptors, registered after the builtins. */
  extra?: readonly Descriptor[];
}

export type ResolveOptions = {
  peekWindow: number;
  logger: Logger;
}

/**
 * Ordered set of descriptors.
 *
 * Probe order depends only on priority and registration order: a descriptor
 * goes after every descriptor of lower or equal priority already registered.
 */
export class Registry {
  private readonly entries: Entry[] = []

  constructor(options: RegistryOptions = {}) {
    for (const descriptor of options.builtins ?? []) {
      this.register(descriptor, {builtin: true})
    }

    for (const descriptor of options.extra ?? []) {
      this.register(descriptor)
    }
  }

  /** Descriptors in probe order. */
  get descriptors(): Descriptor[] {
    return this.entries.map(entry => entry.descriptor)
  }

  get builtins(): Descriptor[] {
    return this.entries.filter(entry => entry.builtin).map(entry => entry.descriptor)
  }

  get extra(): Descriptor[] {
    return this.entries.filter(entry => !entry.builtin).map(entry => entry.descriptor)
  }

  has(name: string): boolean {
    return this.entries.some(entry => entry.descriptor.name === name)
  }

  register(descriptor: Descriptor, options: {builtin?: boolean} = {}): void {
    if (this.has(descriptor.name)) {
      throw new DuplicateDescriptorError(descriptor.name)
    }

    const index = this.entries.findIndex(entry => entry.descriptor.priority > descriptor.priority)
    const entry: Entry = {descriptor, builtin: options.builtin ?? false}
    if (index === -1) {
      this.entries.push(entry)
    } else {
      this.entries.splice(index, 0, entry)
    }
  }

  /**
   * Finds the descriptor of the next layer of `stage`, or `undefined` when the
   * stage is terminal. The stage is peeked, never read.
   */
  async resolve(stage: Stage, options: ResolveOptions): Promise<Descriptor | undefined> {
    const {logger} = options
    const window = await stage.peek(options.peekWindow)
    const probe: Probe = {window, mime: await sniffMime(window), name: stage.name}
    logger.debug({stage: stage.name, mime: probe.mime, size: window.length}, 'probing')

    for (const descriptor of this.descriptors) {
      const outcome = this.probe(descriptor, stage, probe)
      if (outcome.accepted) {
        logger.debug({stage: stage.name, descriptor: descriptor.name}, 'layer recognized')
        return descriptor
      }

      logger.debug({stage: stage.name, descriptor: descriptor.name, reason: outcome.reason}, 'rejected')
    }

    return undefined
  }

  private probe(descriptor: Descriptor, stage: Stage, probe: Probe): Recognition {
    if (descriptor.nonRepeatable && stage.label === descriptor.name) {
      return reject(`${descriptor.name} does not apply onto itself`)
    }

    if (descriptor.mimes.length > 0 && !descriptor.mimes.includes(probe.mime)) {
      return reject(`${probe.mime} is not one of ${descriptor.mimes.join(', ')}`)
    }

    try {
      return descriptor.tryRecognize(probe)
    } catch (error) {
      return reject(error instanceof Error ? error.message : String(error))
    }
  }
}
