declare const brandSymbol: unique symbol;

export type Brand<T, B extends string> = T & { readonly [brandSymbol]: B };

function asBrand<T, B extends string>(value: T): Brand<T, B> {
  return value as Brand<T, B>;
}

export function isUnsignedSafeInteger(value: number): boolean {
  return Number.isSafeInteger(value) && value >= 0;
}

export function parseUnsignedId(value: string, label: string): number {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    throw new Error(`${label} must be a non-empty unsigned integer`);
  }
  if (!/^\d+$/.test(trimmed)) {
    throw new Error(`Invalid ${label}: ${value}`);
  }
  const parsed = Number(trimmed);
  if (!Number.isSafeInteger(parsed)) {
    throw new Error(`${label} must be a safe integer: ${value}`);
  }
  return parsed;
}

export type AssetId = Brand<number, "AssetId">;
export function AssetId(value: number): AssetId {
  if (!isUnsignedSafeInteger(value)) {
    throw new Error(`AssetId must be an unsigned safe integer: ${value}`);
  }
  return asBrand(value);
}
export function isAssetIdValue(value: unknown): value is AssetId {
  return typeof value === "number" && isUnsignedSafeInteger(value);
}
export function parseAssetId(value: string): AssetId {
  return AssetId(parseUnsignedId(value, "AssetId"));
}
