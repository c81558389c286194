// ---------------------------------------------------------------------------
// Shared detection types.
//
// A descriptor recognizes one format from the head of a stage and knows how
// to build the stage that decodes it. The registry probes descriptors in
// order; the driver chains the stages they build.
// ---------------------------------------------------------------------------

import type {Buffer} from 'node:buffer'
import type {Readable} from 'node:stream'
import type {Logger} from 'pino'
import type {EngineConfig} from './core/config.js'
import type {Stage} from './engine/stage.js'

/** What a descriptor gets to look at. */
export type Probe = {
  /** Head of the stage, at most `peekWindow` bytes. Never consumed. */
  window: Buffer;
  /** Sniffed content type of the window. */
  mime: string;
  /** Name of the stage being probed (usually a file name). */
  name: string;
}

export type Recognition =
  | {accepted: true}
  | {accepted: false; reason: string}

/** Everything a descriptor needs to build its stage. */
export type StageContext = {
  config: EngineConfig;
  logger: Logger;
}

export type Descriptor = {
  /** Canonical label, unique within a registry. Pushed on the compressions stack. */
  name: string;
  /** Lower is probed first. Ties keep registration order. */
  priority: number;
  /** Content types this descriptor is probed for. Empty means any. */
  mimes: readonly string[];
  /** Conventional file extensions, stripped from the name of the produced stage. */
  extensions: readonly string[];
  /** Never re-applied onto a stage this descriptor produced. */
  nonRepeatable?: boolean;
  /** The produced stage keeps its parent's compressions stack. */
  transparent?: boolean;
  tryRecognize(probe: Probe): Recognition;
  construct(parent: Stage, context: StageContext): Promise<Stage>;
}

/** Input of a pipeline: a file on disk, or an already open stream. */
export type Source =
  | {path: string}
  | {stream: Readable; name?: string}
