import { describe, expect, it, vi } from "vitest";
import { AssetId } from "@depload/ids";
import { createLogger } from "@depload/observability";
import {
  CircularDependencyError,
  ContentLoadFailedError,
  ContentTimeoutError,
  ContentUnloadFailedError,
  DependencyLoadFailedError,
} from "../errors.js";
import {
  ControlledSource,
  createTestRegistry,
  define,
  settle,
} from "../test_helpers.js";
import { AssetRegistry } from "../registry.js";
import type { UnloadOutcome } from "./asset.js";

async function captureRejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}

describe("Asset load failures", () => {
  it("returns to unloaded when the content load rejects", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 1)]);
    const asset = registry.requireAsset(AssetId(1));
    const disk = new Error("disk unavailable");

    const loading = captureRejection(registry.load(AssetId(1)));
    source.rejectLoad(1, disk);
    const error = await loading;

    expect(error).toBeInstanceOf(ContentLoadFailedError);
    if (error instanceof ContentLoadFailedError) {
      expect(error.assetId).toBe(1);
      expect(error.cause).toBe(disk);
    }
    expect(asset.state).toBe("unloaded");
    expect(asset.content).toBeNull();
    expect(asset.externallyHeld).toBe(false);
  });

  it("fails a waiting dependent and releases what it held", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3), define(source, 1, [3])]);
    const dependent = registry.requireAsset(AssetId(1));
    const dependency = registry.requireAsset(AssetId(3));

    const loading = captureRejection(registry.load(AssetId(1)));
    expect(dependency.internalRefCount).toBe(1);
    source.rejectLoad(3, new Error("corrupt"));
    const error = await loading;

    expect(error).toBeInstanceOf(DependencyLoadFailedError);
    if (error instanceof DependencyLoadFailedError) {
      expect(error.dependencyId).toBe(3);
      expect(error.cause).toBeInstanceOf(ContentLoadFailedError);
    }
    expect(dependent.state).toBe("unloaded");
    expect(dependency.state).toBe("unloaded");
    expect(dependency.internalRefCount).toBe(0);
  });

  it("loads again cleanly after a failed attempt", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3), define(source, 1, [3])]);

    const failed = captureRejection(registry.load(AssetId(1)));
    source.rejectLoad(3, new Error("corrupt"));
    await failed;

    const retried = registry.load(AssetId(1));
    source.resolveLoad(3);
    await settle();
    source.resolveLoad(1);
    const asset = await retried;

    expect(asset.state).toBe("loaded");
    expect(registry.requireAsset(AssetId(3)).internalRefCount).toBe(1);
    expect(source.calls).toEqual(["load:3", "load:3", "load:1"]);
  });

  it("unloads a sibling dependency once its in-flight load settles", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 2), define(source, 3), define(source, 1, [2, 3])]);
    const sibling = registry.requireAsset(AssetId(2));

    const loading = captureRejection(registry.load(AssetId(1)));
    source.rejectLoad(3, new Error("corrupt"));
    await loading;

    expect(sibling.internalRefCount).toBe(0);
    expect(sibling.state).toBe("loading");

    source.resolveLoad(2);
    await settle();

    expect(sibling.state).toBe("unloading");
    expect(source.calls).toEqual(["load:2", "load:3", "unload:2"]);

    source.resolveUnload(2);
    await settle();
    expect(sibling.state).toBe("unloaded");
  });

  it("defers one unload of an in-flight dependency across repeated failed attempts", async () => {
    const lines: string[] = [];
    const registry = new AssetRegistry({
      logger: createLogger(
        { env: "test", level: "debug", service: "loader-test" },
        { write: (line: string) => void lines.push(line) },
      ),
    });
    const source = new ControlledSource();
    registry.populate([define(source, 2), define(source, 3), define(source, 1, [2, 3])]);
    const shared = registry.requireAsset(AssetId(2));
    registry.loadAsync(AssetId(2));

    for (let attempt = 0; attempt < 3; attempt += 1) {
      const loading = captureRejection(registry.load(AssetId(1)));
      source.rejectLoad(3, new Error("corrupt"));
      expect(await loading).toBeInstanceOf(DependencyLoadFailedError);
    }
    expect(shared.internalRefCount).toBe(0);

    source.resolveLoad(2);
    await settle();

    const refusals = lines.filter(
      (line) => line.includes('"asset_id":2,') && line.includes('"msg":"Asset unload refused"'),
    );
    expect(refusals).toHaveLength(1);
    expect(shared.state).toBe("loaded");
    expect(source.calls).toEqual(["load:2", "load:3", "load:3", "load:3"]);
  });

  it("ignores a content load that settles after its timeout", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry({ loadTimeoutMs: 20 });
    registry.populate([define(source, 1)]);
    const asset = registry.requireAsset(AssetId(1));

    const error = await captureRejection(registry.load(AssetId(1)));

    expect(error).toBeInstanceOf(ContentLoadFailedError);
    if (error instanceof ContentLoadFailedError) {
      expect(error.cause).toBeInstanceOf(ContentTimeoutError);
      expect(error.cause).toHaveProperty("operation", "load");
    }
    expect(source.pendingLoad(1).context.signal.aborted).toBe(true);

    source.resolveLoad(1);
    await settle();
    expect(asset.state).toBe("unloaded");
    expect(asset.content).toBeNull();
  });
});

describe("Asset unload failures", () => {
  it("stays loaded and takes its dependencies back", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3), define(source, 1, [3])]);
    const dependent = registry.requireAsset(AssetId(1));
    const dependency = registry.requireAsset(AssetId(3));

    const loading = registry.load(AssetId(1));
    source.resolveLoad(3);
    await settle();
    source.resolveLoad(1);
    await loading;

    const unloading = captureRejection(registry.unload(AssetId(1)));
    expect(source.calls.slice(2)).toEqual(["unload:3", "unload:1"]);
    source.rejectUnload(1, new Error("busy"));
    const error = await unloading;

    expect(error).toBeInstanceOf(ContentUnloadFailedError);
    expect(dependent.state).toBe("loaded");
    expect(dependent.content).toBe("content-1");
    expect(dependency.internalRefCount).toBe(1);
    expect(dependency.state).toBe("unloading");

    source.resolveUnload(3);
    await settle();
    expect(dependency.state).toBe("loading");

    source.resolveLoad(3, "content-3-again");
    await settle();
    expect(dependency.state).toBe("loaded");
    expect(dependency.content).toBe("content-3-again");
  });

  it("completes a load queued behind a failed unload without reloading", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3)]);
    const loaded = registry.load(AssetId(3));
    source.resolveLoad(3);
    await loaded;

    const unloading = captureRejection(registry.unload(AssetId(3)));
    const reloading = registry.load(AssetId(3));
    source.rejectUnload(3, new Error("busy"));

    expect(await unloading).toBeInstanceOf(ContentUnloadFailedError);
    const asset = await reloading;
    expect(asset.state).toBe("loaded");
    expect(source.calls).toEqual(["load:3", "unload:3"]);
  });

  it("reports a timed out unload as a failure", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry({ unloadTimeoutMs: 20 });
    registry.populate([define(source, 1)]);
    const loaded = registry.load(AssetId(1));
    source.resolveLoad(1);
    await loaded;

    const error = await captureRejection(registry.unload(AssetId(1)));

    expect(error).toBeInstanceOf(ContentUnloadFailedError);
    if (error instanceof ContentUnloadFailedError) {
      expect(error.cause).toBeInstanceOf(ContentTimeoutError);
      expect(error.cause).toHaveProperty("operation", "unload");
    }
    expect(registry.requireAsset(AssetId(1)).state).toBe("loaded");
  });
});

describe("Asset unload requests", () => {
  it("continues a load requested mid-unload once the unload finishes", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3)]);
    const loaded = registry.load(AssetId(3));
    source.resolveLoad(3);
    await loaded;

    const unloading = registry.unload(AssetId(3));
    const reloading = registry.load(AssetId(3));
    expect(registry.requireAsset(AssetId(3)).state).toBe("unloading");

    source.resolveUnload(3);
    await expect(unloading).resolves.toMatchObject({ status: "unloaded" });
    await settle();
    source.resolveLoad(3, "fresh");
    const asset = await reloading;

    expect(asset.content).toBe("fresh");
    expect(asset.externallyHeld).toBe(true);
    expect(source.calls).toEqual(["load:3", "unload:3", "load:3"]);
  });

  it("coalesces concurrent unloads onto one content unload", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3)]);
    const loaded = registry.load(AssetId(3));
    source.resolveLoad(3);
    await loaded;
    const first = vi.fn<(outcome: UnloadOutcome) => void>();
    const second = vi.fn<(outcome: UnloadOutcome) => void>();

    registry.unloadAsync(AssetId(3), first);
    registry.unloadAsync(AssetId(3), second);
    source.resolveUnload(3);
    await settle();

    expect(first.mock.calls[0]?.[0].status).toBe("unloaded");
    expect(second.mock.calls[0]?.[0].status).toBe("unloaded");
    expect(source.calls).toEqual(["load:3", "unload:3"]);
  });

  it("refuses an unload while the asset is still loading", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3)]);
    const loaded = registry.load(AssetId(3));
    const onUnload = vi.fn<(outcome: UnloadOutcome) => void>();

    registry.unloadAsync(AssetId(3), onUnload);

    const outcome = onUnload.mock.calls[0]?.[0];
    expect(outcome?.status).toBe("refused");
    if (outcome?.status === "refused") {
      expect(outcome.error.reason).toBe("in_flight");
    }

    source.resolveLoad(3);
    const asset = await loaded;
    expect(asset.state).toBe("loaded");
  });

  it("refuses a direct unload of an externally held asset", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.populate([define(source, 3)]);
    const loaded = registry.load(AssetId(3));
    source.resolveLoad(3);
    const asset = await loaded;
    const onUnload = vi.fn<(outcome: UnloadOutcome) => void>();

    asset.unloadAsync(onUnload);

    const outcome = onUnload.mock.calls[0]?.[0];
    expect(outcome?.status).toBe("refused");
    if (outcome?.status === "refused") {
      expect(outcome.error.reason).toBe("externally_held");
      expect(outcome.error.message).toBe("Unload of asset 3 refused: externally_held");
    }
    expect(asset.state).toBe("loaded");
  });
});

describe("Asset dependency cycles", () => {
  it("fails a load that walks back into its own chain", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.register(define(source, 1, [2]));
    registry.register(define(source, 2, [1]));

    const error = await captureRejection(registry.load(AssetId(1)));

    expect(error).toBeInstanceOf(DependencyLoadFailedError);
    const cause = error instanceof Error ? error.cause : undefined;
    expect(cause).toBeInstanceOf(CircularDependencyError);
    if (cause instanceof CircularDependencyError) {
      expect(cause.cycle).toEqual([1, 2, 1]);
    }
    expect(registry.requireAsset(AssetId(2)).internalRefCount).toBe(0);
    expect(source.calls).toEqual([]);
  });

  it("fails an asset that lists itself as a dependency", async () => {
    const source = new ControlledSource();
    const registry = createTestRegistry();
    registry.register(define(source, 5, [5]));

    const error = await captureRejection(registry.load(AssetId(5)));

    expect(error).toBeInstanceOf(CircularDependencyError);
    if (error instanceof CircularDependencyError) {
      expect(error.cycle).toEqual([5, 5]);
    }
    const asset = registry.requireAsset(AssetId(5));
    expect(asset.state).toBe("unloaded");
    expect(asset.internalRefCount).toBe(0);
  });
});
