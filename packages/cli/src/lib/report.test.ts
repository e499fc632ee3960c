import { describe, expect, it } from "vitest";
import { AssetId } from "@depload/ids";
import { formatFailure, formatManifestReport, formatSnapshot } from "./report.js";

describe("formatSnapshot", () => {
  it("prints one key=value line per asset", () => {
    expect(
      formatSnapshot({
        id: AssetId(2),
        state: "loaded",
        internalRefCount: 1,
        externallyHeld: false,
        dependencyIds: [AssetId(3)],
      }),
    ).toBe("id=2 state=loaded refs=1 held=false");
  });
});

describe("formatManifestReport", () => {
  it("prints a summary and one line per missing edge", () => {
    expect(
      formatManifestReport({
        assetCount: 4,
        edgeCount: 5,
        missing: [{ assetId: AssetId(4), dependencyId: AssetId(99) }],
        cycle: null,
      }),
    ).toEqual(["assets=4 edges=5 missing=1", "missing asset=4 dependency=99"]);
  });
});

describe("formatFailure", () => {
  it("quotes the error message", () => {
    expect(formatFailure(7, new Error("Unknown asset id: 7"))).toBe(
      'failed asset=7 error="Unknown asset id: 7"',
    );
  });
});
