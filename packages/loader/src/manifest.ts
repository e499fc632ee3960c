import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { AssetId, isUnsignedSafeInteger } from "@depload/ids";
import type { AssetDefinition } from "./assets/types.js";
import { findDependencyCycle, findMissingDependencies, type MissingDependency } from "./graph.js";
import { createContentSource } from "./sources.js";

const assetIdSchema = z
  .number()
  .int()
  .refine(isUnsignedSafeInteger, { message: "Expected an unsigned safe integer asset id" })
  .transform((value) => AssetId(value));

const sourceSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("file"), path: z.string().min(1) }).strict(),
  z.object({ kind: z.literal("text"), path: z.string().min(1) }).strict(),
  z.object({ kind: z.literal("inline"), value: z.unknown() }).strict(),
]);

const manifestEntrySchema = z
  .object({
    id: assetIdSchema,
    dependencies: z.array(assetIdSchema).default([]),
    source: sourceSchema,
  })
  .strict();

const manifestSchema = z
  .object({
    assets: z.array(manifestEntrySchema),
  })
  .strict()
  .superRefine((manifest, ctx) => {
    const seen = new Set<number>();
    manifest.assets.forEach((entry, index) => {
      if (seen.has(entry.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["assets", index, "id"],
          message: `Duplicate asset id ${entry.id}`,
        });
      }
      seen.add(entry.id);
    });
  });

export type ManifestSource = z.infer<typeof sourceSchema>;
export type ManifestEntry = z.infer<typeof manifestEntrySchema>;
export type AssetManifest = z.infer<typeof manifestSchema>;

export interface ManifestReport {
  assetCount: number;
  edgeCount: number;
  missing: MissingDependency[];
  cycle: AssetId[] | null;
}

export function parseManifest(text: string, label: string): AssetManifest {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (error) {
    throw new Error(`Failed to parse asset manifest: ${label}`, { cause: error });
  }

  const result = manifestSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new Error(`Invalid asset manifest ${label}: ${result.error.message}`);
  }
  return result.data;
}

export async function readManifest(filePath: string): Promise<AssetManifest> {
  let contents: string;
  try {
    contents = await readFile(filePath, "utf8");
  } catch (error) {
    throw new Error(`Failed to read asset manifest: ${filePath}`, { cause: error });
  }
  return parseManifest(contents, filePath);
}

function toNodes(manifest: AssetManifest) {
  return manifest.assets.map((entry) => ({ id: entry.id, dependencyIds: entry.dependencies }));
}

export function checkManifest(manifest: AssetManifest): ManifestReport {
  const nodes = toNodes(manifest);
  return {
    assetCount: nodes.length,
    edgeCount: nodes.reduce((total, node) => total + node.dependencyIds.length, 0),
    missing: findMissingDependencies(nodes),
    cycle: findDependencyCycle(nodes),
  };
}

/** Registry definitions with stock sources; relative paths resolve against `baseDir`. */
export function manifestDefinitions(manifest: AssetManifest, baseDir: string): AssetDefinition[] {
  return manifest.assets.map((entry) => ({
    id: entry.id,
    dependencyIds: entry.dependencies,
    source: createContentSource(entry.source, baseDir),
  }));
}

export function manifestBaseDir(manifestPath: string): string {
  return path.dirname(path.resolve(manifestPath));
}
