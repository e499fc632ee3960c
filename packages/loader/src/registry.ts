import type { AssetId } from "@depload/ids";
import type { Logger } from "@depload/observability";
import {
  Asset,
  type AssetRuntime,
  type LoadListener,
  type UnloadListener,
  type UnloadOutcome,
} from "./assets/asset.js";
import type { AssetDefinition, AssetSnapshot } from "./assets/types.js";
import { CompletionDispatcher, type ListenerErrorHandler } from "./dispatcher.js";
import { CircularDependencyError, DuplicateAssetError, UnknownAssetError } from "./errors.js";
import { findDependencyCycle } from "./graph.js";

export type UnknownAssetsPolicy = "ignore" | "error";

export interface AssetRegistryOptions {
  logger: Logger;
  loadTimeoutMs?: number | null;
  unloadTimeoutMs?: number | null;
  /** `ignore` drops requests for unknown ids without a callback; `error` reports `UnknownAssetError`. */
  unknownAssets?: UnknownAssetsPolicy;
  onListenerError?: ListenerErrorHandler;
}

export interface LoadOptions {
  /** Aborting withdraws this caller's interest; the load itself keeps going. */
  signal?: AbortSignal;
}

export type SettledUnloadOutcome = Exclude<UnloadOutcome, { status: "failed" }>;

const ignoreOutcome = (): void => undefined;

export class AssetRegistry implements AssetRuntime {
  readonly dispatcher: CompletionDispatcher;
  readonly logger: Logger;
  readonly loadTimeoutMs: number | null;
  readonly unloadTimeoutMs: number | null;
  private readonly unknownAssets: UnknownAssetsPolicy;
  private readonly assets = new Map<AssetId, Asset>();

  constructor(options: AssetRegistryOptions) {
    this.logger = options.logger;
    this.loadTimeoutMs = options.loadTimeoutMs ?? null;
    this.unloadTimeoutMs = options.unloadTimeoutMs ?? null;
    this.unknownAssets = options.unknownAssets ?? "ignore";
    this.dispatcher = new CompletionDispatcher({
      onListenerError:
        options.onListenerError ??
        ((error) => {
          this.logger.error({ error }, "Asset completion listener threw");
        }),
    });
  }

  get size(): number {
    return this.assets.size;
  }

  has(id: AssetId): boolean {
    return this.assets.has(id);
  }

  getAsset(id: AssetId): Asset | null {
    return this.assets.get(id) ?? null;
  }

  requireAsset(id: AssetId): Asset {
    const asset = this.assets.get(id);
    if (!asset) {
      throw new UnknownAssetError(id);
    }
    return asset;
  }

  /**
   * Adds a single asset. Its dependencies may be registered later, so no cycle
   * check happens here; a cycle surfaces as a failed load instead.
   */
  register(definition: AssetDefinition): Asset {
    if (this.assets.has(definition.id)) {
      throw new DuplicateAssetError(definition.id);
    }
    const asset = new Asset(definition, this);
    this.assets.set(asset.id, asset);
    return asset;
  }

  /** Adds a batch of assets after checking the resulting graph for duplicates and cycles. */
  populate(definitions: Iterable<AssetDefinition>): Asset[] {
    const batch = Array.from(definitions);
    const seen = new Set<AssetId>();
    for (const definition of batch) {
      if (this.assets.has(definition.id) || seen.has(definition.id)) {
        throw new DuplicateAssetError(definition.id);
      }
      seen.add(definition.id);
    }

    const cycle = findDependencyCycle([
      ...Array.from(this.assets.values()),
      ...batch,
    ]);
    const [first] = cycle ?? [];
    if (cycle && first !== undefined) {
      throw new CircularDependencyError(first, cycle);
    }

    const added = batch.map((definition) => this.register(definition));
    this.logger.info({ asset_count: added.length, total: this.assets.size }, "Assets registered");
    return added;
  }

  loadAsync(id: AssetId, onComplete: LoadListener = ignoreOutcome): void {
    const asset = this.assets.get(id);
    if (!asset) {
      this.reportUnknown(id, (error) => onComplete({ status: "failed", error }));
      return;
    }

    asset.setExternallyHeld(true);
    if (asset.state === "loaded") {
      this.dispatcher.enqueue(() => onComplete({ status: "loaded", asset }));
      return;
    }
    asset.loadAsync(onComplete);
  }

  unloadAsync(id: AssetId, onComplete: UnloadListener = ignoreOutcome): void {
    const asset = this.assets.get(id);
    if (!asset) {
      this.reportUnknown(id, (error) => onComplete({ status: "failed", error }));
      return;
    }

    asset.setExternallyHeld(false);
    if (asset.state === "unloaded") {
      this.dispatcher.enqueue(() => onComplete({ status: "unloaded", asset }));
      return;
    }
    asset.unloadAsync(onComplete);
  }

  /** Promise form of `loadAsync`. Unknown ids reject under either policy. */
  load(id: AssetId, options: LoadOptions = {}): Promise<Asset> {
    return new Promise<Asset>((resolve, reject) => {
      if (!this.assets.has(id)) {
        reject(new UnknownAssetError(id));
        return;
      }

      const signal = options.signal;
      let settled = false;
      const withdraw = (): void => {
        if (settled || !signal) return;
        settled = true;
        this.logger.debug({ asset_id: id }, "Load interest withdrawn");
        reject(signal.reason);
      };
      if (signal) {
        if (signal.aborted) {
          withdraw();
          return;
        }
        signal.addEventListener("abort", withdraw, { once: true });
      }

      this.loadAsync(id, (outcome) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", withdraw);
        if (outcome.status === "loaded") {
          resolve(outcome.asset);
        } else {
          reject(outcome.error);
        }
      });
    });
  }

  /** Promise form of `unloadAsync`; rejects only when the content unload fails. */
  unload(id: AssetId): Promise<SettledUnloadOutcome> {
    return new Promise<SettledUnloadOutcome>((resolve, reject) => {
      if (!this.assets.has(id)) {
        reject(new UnknownAssetError(id));
        return;
      }

      this.unloadAsync(id, (outcome) => {
        if (outcome.status === "failed") {
          reject(outcome.error);
        } else {
          resolve(outcome);
        }
      });
    });
  }

  snapshot(): AssetSnapshot[] {
    return Array.from(this.assets.values())
      .map((asset) => asset.snapshot())
      .sort((a, b) => a.id - b.id);
  }

  private reportUnknown(id: AssetId, notify: (error: UnknownAssetError) => void): void {
    if (this.unknownAssets === "ignore") {
      this.logger.warn({ asset_id: id }, "Request for unknown asset ignored");
      return;
    }
    const error = new UnknownAssetError(id);
    this.dispatcher.enqueue(() => notify(error));
  }
}
