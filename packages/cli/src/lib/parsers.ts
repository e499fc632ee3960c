import type { AssetId } from "@depload/ids";
import { AssetId as AssetIdBrand, parseUnsignedId } from "@depload/ids";

export function parseAssetIdCsv(value: string, label: string): AssetId[] {
  const parts = value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
  if (parts.length === 0) {
    throw new Error(`${label} must contain at least one id`);
  }
  const ids = parts.map((part, index) => AssetIdBrand(parseUnsignedId(part, `${label}[${index}]`)));
  return Array.from(new Set(ids));
}
