import type { AssetId } from "@depload/ids";

export interface AssetLoaderErrorOptions {
  cause?: unknown;
}

export class AssetLoaderError extends Error {
  readonly assetId: AssetId;

  constructor(message: string, assetId: AssetId, options: AssetLoaderErrorOptions = {}) {
    super(message, options);
    this.name = this.constructor.name;
    this.assetId = assetId;
  }
}

export class UnknownAssetError extends AssetLoaderError {
  constructor(assetId: AssetId) {
    super(`Unknown asset id: ${assetId}`, assetId);
  }
}

export class DuplicateAssetError extends AssetLoaderError {
  constructor(assetId: AssetId) {
    super(`Asset id already registered: ${assetId}`, assetId);
  }
}

export type UnloadRefusalReason = "referenced" | "externally_held" | "in_flight";

export class UnloadRefusedError extends AssetLoaderError {
  readonly reason: UnloadRefusalReason;
  readonly internalRefCount: number;

  constructor(assetId: AssetId, params: { reason: UnloadRefusalReason; internalRefCount: number }) {
    super(`Unload of asset ${assetId} refused: ${params.reason}`, assetId);
    this.reason = params.reason;
    this.internalRefCount = params.internalRefCount;
  }
}

export class ContentLoadFailedError extends AssetLoaderError {
  constructor(assetId: AssetId, options: AssetLoaderErrorOptions = {}) {
    super(`Content load failed for asset ${assetId}`, assetId, options);
  }
}

export class ContentUnloadFailedError extends AssetLoaderError {
  constructor(assetId: AssetId, options: AssetLoaderErrorOptions = {}) {
    super(`Content unload failed for asset ${assetId}`, assetId, options);
  }
}

export class DependencyLoadFailedError extends AssetLoaderError {
  readonly dependencyId: AssetId;

  constructor(assetId: AssetId, dependencyId: AssetId, options: AssetLoaderErrorOptions = {}) {
    super(`Dependency ${dependencyId} of asset ${assetId} failed to load`, assetId, options);
    this.dependencyId = dependencyId;
  }
}

export class CircularDependencyError extends AssetLoaderError {
  readonly cycle: readonly AssetId[];

  constructor(assetId: AssetId, cycle: readonly AssetId[]) {
    super(`Circular dependency: ${cycle.join(" -> ")}`, assetId);
    this.cycle = cycle;
  }
}

export type ContentOperation = "load" | "unload";

export class ContentTimeoutError extends Error {
  readonly operation: ContentOperation;
  readonly timeoutMs: number;

  constructor(operation: ContentOperation, timeoutMs: number) {
    super(`Content ${operation} timed out after ${timeoutMs}ms`);
    this.name = this.constructor.name;
    this.operation = operation;
    this.timeoutMs = timeoutMs;
  }
}
