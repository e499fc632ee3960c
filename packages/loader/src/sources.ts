import { readFile } from "node:fs/promises";
import path from "node:path";
import type { AssetContentSource, ContentLoadContext } from "./assets/types.js";
import type { ManifestSource } from "./manifest.js";
import { assertNever } from "./utils/assert_never.js";

// Stock content is plain memory; the asset dropping its reference is the unload.
const releaseNothing = (): Promise<void> => Promise.resolve();

export class FileContentSource implements AssetContentSource<Buffer> {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(context: ContentLoadContext): Promise<Buffer> {
    context.logger.debug({ file_path: this.filePath }, "Reading asset file");
    return readFile(this.filePath, { signal: context.signal });
  }

  unload(): Promise<void> {
    return releaseNothing();
  }
}

export class TextContentSource implements AssetContentSource<string> {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  load(context: ContentLoadContext): Promise<string> {
    context.logger.debug({ file_path: this.filePath }, "Reading asset text");
    return readFile(this.filePath, { encoding: "utf8", signal: context.signal });
  }

  unload(): Promise<void> {
    return releaseNothing();
  }
}

export class InlineContentSource<TContent> implements AssetContentSource<TContent> {
  readonly value: TContent;

  constructor(value: TContent) {
    this.value = value;
  }

  load(): Promise<TContent> {
    return Promise.resolve(this.value);
  }

  unload(): Promise<void> {
    return releaseNothing();
  }
}

export function createContentSource(source: ManifestSource, baseDir: string): AssetContentSource {
  switch (source.kind) {
    case "file":
      return new FileContentSource(path.resolve(baseDir, source.path));
    case "text":
      return new TextContentSource(path.resolve(baseDir, source.path));
    case "inline":
      return new InlineContentSource(source.value);
    default:
      return assertNever(source);
  }
}
