export {Workspace, writeJsonAtomic} from './workspace.js'
export {
  ContainerRuntime,
  type LogLine,
  type OnLogLine,
  type BuildImageRequest,
  type CreateContainerRequest,
  type ExecRequest,
  type ExecResult
} from './runtime.js'
export {DockerCliRuntime} from './docker-runtime.js'
export {InstanceRegistry, type ContainerInstance, type InstanceState} from './instance-registry.js'
export {EnvironmentManager, type EnvironmentManagerOptions, type ExecOptions, type StartOptions} from './environment-manager.js'
export {ImageBuilder, repositoryUrl, defaultWorkdir, type ImageRequest} from './image-builder.js'
export {ImageCache, type CachedImage, type ImageCacheEvent, type ImageCacheOptions} from './image-cache.js'
export {LocalWorkingTree, ContainerWorkingTree, type WorkingTree} from './working-tree.js'
