import { Command, Flags } from "@oclif/core";
import { loadLoaderEnv } from "@depload/config";
import type { AssetRegistry } from "@depload/loader";
import {
  createLoggerFromEnv,
  createRegistryFromManifest,
  resolveManifestPath,
} from "../../lib/context.js";
import { parseAssetIdCsv } from "../../lib/parsers.js";
import { formatFailure, formatSnapshot } from "../../lib/report.js";

export default class AssetsLoad extends Command {
  static override description = "Load assets from the manifest, print their state, and optionally unload them.";

  static override flags = {
    ids: Flags.string({
      description: "Comma-separated asset ids to load.",
      required: true,
    }),
    unload: Flags.boolean({
      description: "Unload the requested assets afterwards and print the state again.",
      default: false,
    }),
    manifest: Flags.string({
      description: "Manifest path (defaults to the configured manifest).",
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(AssetsLoad);
    const ids = parseAssetIdCsv(flags.ids, "ids");

    const env = loadLoaderEnv();
    const logger = createLoggerFromEnv(env);
    const registry = await createRegistryFromManifest({
      env,
      logger,
      manifestPath: resolveManifestPath(env, flags.manifest),
    });

    const loads = await Promise.allSettled(ids.map((id) => registry.load(id)));
    let failed = 0;
    loads.forEach((result, index) => {
      const id = ids[index];
      if (result.status === "rejected" && id !== undefined) {
        failed += 1;
        this.log(formatFailure(id, result.reason));
      }
    });
    this.printSnapshot(registry);

    if (flags.unload) {
      const unloads = await Promise.allSettled(ids.map((id) => registry.unload(id)));
      unloads.forEach((result, index) => {
        const id = ids[index];
        if (id === undefined) return;
        if (result.status === "rejected") {
          failed += 1;
          this.log(formatFailure(id, result.reason));
        } else if (result.value.status === "refused") {
          this.log(`refused asset=${id} reason=${result.value.error.reason}`);
        }
      });
      this.printSnapshot(registry);
    }

    if (failed > 0) {
      this.error(`${failed} asset operation(s) failed`, { exit: 1 });
    }
  }

  private printSnapshot(registry: AssetRegistry): void {
    for (const snapshot of registry.snapshot()) {
      this.log(formatSnapshot(snapshot));
    }
  }
}
