import path from "node:path";
import type { LoaderEnv } from "@depload/config";
import {
  AssetRegistry,
  manifestBaseDir,
  manifestDefinitions,
  readManifest,
} from "@depload/loader";
import { createLogger } from "@depload/observability";
import type { Logger } from "@depload/observability";

export function createLoggerFromEnv(env: { DEPLOY_ENV: string; LOG_LEVEL: string }): Logger {
  return createLogger({ env: env.DEPLOY_ENV, level: env.LOG_LEVEL, service: "cli" });
}

/** A `--manifest` flag wins over the configured path; both end up absolute. */
export function resolveManifestPath(env: LoaderEnv, override: string | undefined): string {
  return override ? path.resolve(override) : env.loader.manifestPath;
}

export async function createRegistryFromManifest(params: {
  env: LoaderEnv;
  logger: Logger;
  manifestPath: string;
}): Promise<AssetRegistry> {
  const manifest = await readManifest(params.manifestPath);
  const registry = new AssetRegistry({
    logger: params.logger,
    loadTimeoutMs: params.env.loader.loadTimeoutMs,
    unloadTimeoutMs: params.env.loader.unloadTimeoutMs,
    unknownAssets: params.env.loader.unknownAssets,
  });
  registry.populate(manifestDefinitions(manifest, manifestBaseDir(params.manifestPath)));
  return registry;
}
