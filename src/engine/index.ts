export {PeekableSource} from './peekable.js'
export {Stage, SourceStage, deriveName, type StageOptions} from './stage.js'
export {ExternalStage, spawnCommand, waitForSpawn, type ExternalStageOptions, type Subprocess} from './external-stage.js'
export {Registry, accept, reject, type RegistryOptions, type ResolveOptions} from './registry.js'
export {sniffMime, OCTET_STREAM, TEXT_PLAIN, EMPTY, TAR} from './mime.js'
