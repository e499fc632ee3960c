import type { AssetId } from "@depload/ids";
import type { Logger } from "@depload/observability";
import type { CompletionDispatcher } from "../dispatcher.js";
import {
  type AssetLoaderError,
  CircularDependencyError,
  ContentLoadFailedError,
  ContentUnloadFailedError,
  DependencyLoadFailedError,
  type UnloadRefusalReason,
  UnloadRefusedError,
} from "../errors.js";
import { withTimeout } from "../timeout.js";
import { assertNever } from "../utils/assert_never.js";
import type {
  AssetContentSource,
  AssetDefinition,
  AssetSnapshot,
  LoadState,
  LoadedDependency,
} from "./types.js";

export type LoadOutcome =
  | { status: "loaded"; asset: Asset }
  | { status: "failed"; error: AssetLoaderError };

export type UnloadOutcome =
  | { status: "unloaded"; asset: Asset }
  | { status: "refused"; error: UnloadRefusedError }
  | { status: "failed"; error: AssetLoaderError };

export type LoadListener = (outcome: LoadOutcome) => void;
export type UnloadListener = (outcome: UnloadOutcome) => void;

/** What an asset needs from the registry that owns it. */
export interface AssetRuntime {
  readonly dispatcher: CompletionDispatcher;
  readonly logger: Logger;
  readonly loadTimeoutMs: number | null;
  readonly unloadTimeoutMs: number | null;
  getAsset(id: AssetId): Asset | null;
}

const ignoreOutcome = (): void => undefined;

/**
 * A loadable unit with a fixed id and dependency list.
 *
 * Dependencies are held by id and resolved through the runtime on every scan.
 * `internalRefCount` counts the load cycles of other assets that currently hold
 * this one; `externallyHeld` is managed by the registry. Unload is honored only
 * when both are clear.
 */
export class Asset {
  readonly id: AssetId;
  readonly dependencyIds: readonly AssetId[];
  private readonly source: AssetContentSource;
  private readonly runtime: AssetRuntime;
  private readonly logger: Logger;
  private loadState: LoadState = "unloaded";
  private loadedContent: unknown = null;
  private references = 0;
  private held = false;
  // Bumped per load cycle so continuations left on dependencies by an earlier
  // cycle are ignored.
  private generation = 0;
  private heldDependencies: Asset[] = [];
  private unloadDeferred = false;
  private loadListeners: LoadListener[] = [];
  private unloadListeners: UnloadListener[] = [];

  constructor(definition: AssetDefinition, runtime: AssetRuntime) {
    this.id = definition.id;
    this.dependencyIds = Object.freeze([...definition.dependencyIds]);
    this.source = definition.source;
    this.runtime = runtime;
    this.logger = runtime.logger.child({ asset_id: definition.id });
  }

  get state(): LoadState {
    return this.loadState;
  }

  get content(): unknown {
    return this.loadedContent;
  }

  get internalRefCount(): number {
    return this.references;
  }

  get externallyHeld(): boolean {
    return this.held;
  }

  snapshot(): AssetSnapshot {
    return {
      id: this.id,
      state: this.loadState,
      internalRefCount: this.references,
      externallyHeld: this.held,
      dependencyIds: this.dependencyIds,
    };
  }

  /** Set by the registry when an outside caller starts or stops wanting this asset. */
  setExternallyHeld(held: boolean): void {
    this.held = held;
  }

  /**
   * Loads this asset and, first, its dependencies. `onComplete` runs exactly
   * once: before this call returns when the asset is already loaded, otherwise
   * when the in-flight load settles. Concurrent calls share one content load.
   */
  loadAsync(onComplete: LoadListener = ignoreOutcome): void {
    this.runtime.dispatcher.run(() => this.requestLoad(onComplete, []));
  }

  /**
   * Unloads this asset when nothing holds it, then releases its dependencies.
   * A request that cannot be honored leaves the state untouched and reports
   * `refused`.
   */
  unloadAsync(onComplete: UnloadListener = ignoreOutcome): void {
    this.runtime.dispatcher.run(() => this.requestUnload(onComplete));
  }

  private requestLoad(listener: LoadListener, chain: readonly AssetId[]): void {
    switch (this.loadState) {
      case "loaded":
        this.notifyLoaded(listener);
        return;
      case "waiting":
      case "loading":
        this.loadListeners.push(listener);
        return;
      case "unloading":
        this.unloadListeners.push(() => this.requestLoad(listener, chain));
        return;
      case "unloaded":
        this.beginLoad(listener, chain);
        return;
      default:
        assertNever(this.loadState);
    }
  }

  private beginLoad(listener: LoadListener, chain: readonly AssetId[]): void {
    this.generation += 1;
    const generation = this.generation;
    const path = [...chain, this.id];
    this.loadListeners.push(listener);

    let ready = true;
    for (const dependencyId of this.dependencyIds) {
      const dependency = this.runtime.getAsset(dependencyId);
      if (!dependency) {
        this.logger.warn({ dependency_id: dependencyId }, "Dependency not registered; skipping");
        continue;
      }
      if (path.includes(dependencyId)) {
        this.failLoad(new CircularDependencyError(this.id, [...path, dependencyId]));
        return;
      }

      dependency.references += 1;
      this.heldDependencies.push(dependency);
      if (dependency.loadState !== "loaded") {
        ready = false;
        dependency.requestLoad(
          (outcome) => this.onDependencySettled(generation, dependency, outcome),
          path,
        );
      }
    }

    if (ready) {
      this.startContentLoad(generation);
      return;
    }
    this.loadState = "waiting";
    this.logger.debug("Asset waiting on dependencies");
  }

  private onDependencySettled(generation: number, dependency: Asset, outcome: LoadOutcome): void {
    if (generation !== this.generation || this.loadState !== "waiting") return;

    if (outcome.status === "failed") {
      this.failLoad(
        new DependencyLoadFailedError(this.id, dependency.id, { cause: outcome.error }),
      );
      return;
    }

    // Only what this cycle holds: an id registered after the scan was never requested.
    const ready = this.heldDependencies.every((held) => held.loadState === "loaded");
    if (ready) this.startContentLoad(generation);
  }

  private startContentLoad(generation: number): void {
    this.loadState = "loading";
    this.logger.debug("Asset content load started");
    const dependencies: LoadedDependency[] = this.heldDependencies.map((dependency) => ({
      id: dependency.id,
      content: dependency.loadedContent,
    }));
    void this.runContentLoad(generation, dependencies);
  }

  private async runContentLoad(
    generation: number,
    dependencies: readonly LoadedDependency[],
  ): Promise<void> {
    let content: unknown;
    try {
      content = await withTimeout({
        operation: "load",
        timeoutMs: this.runtime.loadTimeoutMs,
        run: (signal) =>
          this.source.load({ assetId: this.id, dependencies, signal, logger: this.logger }),
      });
    } catch (error) {
      this.runtime.dispatcher.run(() => {
        if (generation !== this.generation) return;
        this.failLoad(new ContentLoadFailedError(this.id, { cause: error }));
      });
      return;
    }
    this.runtime.dispatcher.run(() => this.completeLoad(generation, content));
  }

  private completeLoad(generation: number, content: unknown): void {
    if (generation !== this.generation || this.loadState !== "loading") return;

    this.loadedContent = content;
    this.loadState = "loaded";
    this.logger.debug("Asset loaded");

    const listeners = this.loadListeners;
    this.loadListeners = [];
    for (const listener of listeners) {
      this.notifyLoaded(listener);
    }
  }

  private failLoad(error: AssetLoaderError): void {
    this.loadState = "unloaded";
    this.loadedContent = null;
    this.held = false;
    this.releaseDependencies();
    this.logger.error({ error }, "Asset load failed");

    const listeners = this.loadListeners;
    this.loadListeners = [];
    for (const listener of listeners) {
      this.runtime.dispatcher.enqueue(() => listener({ status: "failed", error }));
    }
  }

  private notifyLoaded(listener: LoadListener): void {
    this.runtime.dispatcher.enqueue(() => listener({ status: "loaded", asset: this }));
  }

  private requestUnload(listener: UnloadListener): void {
    switch (this.loadState) {
      case "unloaded":
        this.runtime.dispatcher.enqueue(() => listener({ status: "unloaded", asset: this }));
        return;
      case "unloading":
        this.unloadListeners.push(listener);
        return;
      case "waiting":
      case "loading":
        this.refuseUnload(listener, "in_flight");
        return;
      case "loaded":
        if (this.references > 0) {
          this.refuseUnload(listener, "referenced");
          return;
        }
        if (this.held) {
          this.refuseUnload(listener, "externally_held");
          return;
        }
        this.beginUnload(listener);
        return;
      default:
        assertNever(this.loadState);
    }
  }

  private refuseUnload(listener: UnloadListener, reason: UnloadRefusalReason): void {
    const error = new UnloadRefusedError(this.id, {
      reason,
      internalRefCount: this.references,
    });
    this.logger.debug({ reason, internal_ref_count: this.references }, "Asset unload refused");
    this.runtime.dispatcher.enqueue(() => listener({ status: "refused", error }));
  }

  private beginUnload(listener: UnloadListener): void {
    this.unloadListeners.push(listener);
    this.loadState = "unloading";
    this.logger.debug("Asset unload started");
    const released = this.releaseDependencies();
    void this.runContentUnload(this.loadedContent, released);
  }

  private async runContentUnload(content: unknown, released: readonly Asset[]): Promise<void> {
    try {
      await withTimeout({
        operation: "unload",
        timeoutMs: this.runtime.unloadTimeoutMs,
        run: (signal) =>
          this.source.unload({ assetId: this.id, content, signal, logger: this.logger }),
      });
    } catch (error) {
      this.runtime.dispatcher.run(() =>
        this.failUnload(new ContentUnloadFailedError(this.id, { cause: error }), released),
      );
      return;
    }
    this.runtime.dispatcher.run(() => this.completeUnload());
  }

  private completeUnload(): void {
    this.loadedContent = null;
    this.loadState = "unloaded";
    this.logger.debug("Asset unloaded");
    this.drainUnloadListeners({ status: "unloaded", asset: this });
  }

  private failUnload(error: ContentUnloadFailedError, released: readonly Asset[]): void {
    this.loadState = "loaded";
    this.logger.error({ error }, "Asset unload failed");

    // Back to loaded: take the dependencies again, reloading any that left
    // `loaded` while this unload was in flight.
    for (const dependency of released) {
      dependency.references += 1;
      this.heldDependencies.push(dependency);
      if (dependency.loadState !== "loaded") {
        dependency.requestLoad(ignoreOutcome, [this.id]);
      }
    }
    this.drainUnloadListeners({ status: "failed", error });
  }

  private drainUnloadListeners(outcome: UnloadOutcome): void {
    const listeners = this.unloadListeners;
    this.unloadListeners = [];
    for (const listener of listeners) {
      this.runtime.dispatcher.enqueue(() => listener(outcome));
    }
  }

  private releaseDependencies(): Asset[] {
    const released = this.heldDependencies;
    this.heldDependencies = [];
    for (const dependency of released) {
      dependency.references -= 1;
      dependency.unloadWhenUnused();
    }
    return released;
  }

  private unloadWhenUnused(): void {
    switch (this.loadState) {
      case "loaded":
        this.requestUnload(ignoreOutcome);
        return;
      case "waiting":
      case "loading":
        if (this.unloadDeferred) return;
        this.unloadDeferred = true;
        this.loadListeners.push(() => {
          this.unloadDeferred = false;
          this.unloadWhenUnused();
        });
        return;
      case "unloading":
      case "unloaded":
        return;
      default:
        assertNever(this.loadState);
    }
  }
}
