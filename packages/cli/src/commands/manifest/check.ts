import { Command, Flags } from "@oclif/core";
import { loadLoaderEnv } from "@depload/config";
import { checkManifest, readManifest } from "@depload/loader";
import { resolveManifestPath } from "../../lib/context.js";
import { formatManifestReport } from "../../lib/report.js";

export default class ManifestCheck extends Command {
  static override description = "Validate an asset manifest and report missing dependencies and cycles.";

  static override flags = {
    manifest: Flags.string({
      description: "Manifest path (defaults to the configured manifest).",
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ManifestCheck);
    const env = loadLoaderEnv();
    const manifestPath = resolveManifestPath(env, flags.manifest);

    const report = checkManifest(await readManifest(manifestPath));
    for (const line of formatManifestReport(report)) {
      this.log(line);
    }
    if (report.cycle) {
      this.error(`cycle ${report.cycle.join(" -> ")}`, { exit: 2 });
    }
  }
}
