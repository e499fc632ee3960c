import type { AssetId } from "@depload/ids";
import type { Logger } from "@depload/observability";

export type LoadState = "unloaded" | "waiting" | "loading" | "loaded" | "unloading";

export interface LoadedDependency {
  id: AssetId;
  content: unknown;
}

export interface ContentLoadContext {
  assetId: AssetId;
  /** Registered dependencies in declaration order, all loaded. */
  dependencies: readonly LoadedDependency[];
  signal: AbortSignal;
  logger: Logger;
}

export interface ContentUnloadContext<TContent> {
  assetId: AssetId;
  content: TContent;
  signal: AbortSignal;
  logger: Logger;
}

/**
 * Produces and releases an asset's content. The loader only decides when
 * these run; a rejected promise becomes a load or unload failure.
 */
export interface AssetContentSource<TContent = unknown> {
  load(context: ContentLoadContext): Promise<TContent>;
  unload(context: ContentUnloadContext<TContent>): Promise<void>;
}

export interface AssetDefinition<TContent = unknown> {
  id: AssetId;
  dependencyIds: readonly AssetId[];
  source: AssetContentSource<TContent>;
}

export interface AssetSnapshot {
  id: AssetId;
  state: LoadState;
  internalRefCount: number;
  externallyHeld: boolean;
  dependencyIds: readonly AssetId[];
}
