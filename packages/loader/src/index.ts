export { Asset } from "./assets/asset.js";
export type {
  AssetRuntime,
  LoadListener,
  LoadOutcome,
  UnloadListener,
  UnloadOutcome,
} from "./assets/asset.js";
export type {
  AssetContentSource,
  AssetDefinition,
  AssetSnapshot,
  ContentLoadContext,
  ContentUnloadContext,
  LoadState,
  LoadedDependency,
} from "./assets/types.js";
export { AssetRegistry } from "./registry.js";
export type {
  AssetRegistryOptions,
  LoadOptions,
  SettledUnloadOutcome,
  UnknownAssetsPolicy,
} from "./registry.js";
export { CompletionDispatcher } from "./dispatcher.js";
export type { ListenerErrorHandler } from "./dispatcher.js";
export {
  AssetLoaderError,
  CircularDependencyError,
  ContentLoadFailedError,
  ContentTimeoutError,
  ContentUnloadFailedError,
  DependencyLoadFailedError,
  DuplicateAssetError,
  UnknownAssetError,
  UnloadRefusedError,
} from "./errors.js";
export type { ContentOperation, UnloadRefusalReason } from "./errors.js";
export { findDependencyCycle, findMissingDependencies } from "./graph.js";
export type { DependencyNode, MissingDependency } from "./graph.js";
export {
  checkManifest,
  manifestBaseDir,
  manifestDefinitions,
  parseManifest,
  readManifest,
} from "./manifest.js";
export type { AssetManifest, ManifestEntry, ManifestReport, ManifestSource } from "./manifest.js";
export {
  FileContentSource,
  InlineContentSource,
  TextContentSource,
  createContentSource,
} from "./sources.js";
export { withTimeout } from "./timeout.js";
