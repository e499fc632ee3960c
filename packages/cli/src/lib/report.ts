import type { AssetSnapshot, ManifestReport } from "@depload/loader";

export function formatSnapshot(snapshot: AssetSnapshot): string {
  return [
    `id=${snapshot.id}`,
    `state=${snapshot.state}`,
    `refs=${snapshot.internalRefCount}`,
    `held=${String(snapshot.externallyHeld)}`,
  ].join(" ");
}

export function formatManifestReport(report: ManifestReport): string[] {
  return [
    `assets=${report.assetCount} edges=${report.edgeCount} missing=${report.missing.length}`,
    ...report.missing.map(
      (entry) => `missing asset=${entry.assetId} dependency=${entry.dependencyId}`,
    ),
  ];
}

export function formatFailure(id: number, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `failed asset=${id} error=${JSON.stringify(message)}`;
}
