import { createReadStream, type Dirent } from "node:fs";
import { readdir, readFile, stat } from "node:fs/promises";
import path from "node:path";
import { createHash } from "node:crypto";
import picomatch from "picomatch";
import type { LocalAsset, LocalCatalog } from "../types/sync-types";
import type { LocalIndexer, ScanOptions } from "../types/interfaces";
import { CatalogError, errorMessage } from "../types/errors";
import { runParallel } from "../core/run-parallel";
import { parseSidecar } from "./sidecar";
import {
  baseIdentityKey,
  classifyVariant,
  mediaTypeForExtension,
  normalizeStem,
  splitFileName,
} from "./variants";

const toPosix = (value: string): string => value.split(path.sep).join("/");

export type ReadDirectory = (dir: string) => Promise<Dirent[]>;

type MediaFile = {
  path: string;
  // names of the files next to it, for sidecar lookup
  siblings: string[];
};

type Listing = {
  files: MediaFile[];
  errors: CatalogError[];
};

export class ExportTreeIndexer implements LocalIndexer {
  private readDirectory: ReadDirectory;

  constructor(readDirectory: ReadDirectory = (dir) => readdir(dir, { withFileTypes: true })) {
    this.readDirectory = readDirectory;
  }

  async scan(exportRoot: string, options: ScanOptions): Promise<LocalCatalog> {
    const root = path.resolve(exportRoot);
    try {
      const info = await stat(root);
      if (!info.isDirectory()) {
        throw new CatalogError(`Export root is not a directory: ${root}`, root);
      }
    } catch (error) {
      if (error instanceof CatalogError) {
        throw error;
      }
      throw new CatalogError(`Export root is missing or unreadable: ${root} (${errorMessage(error)})`, root);
    }

    const listing = await this.listMediaFiles(root, root, options.ignorePatterns);
    const rootError = listing.errors.find((error) => error.path === "");
    if (rootError) {
      throw new CatalogError(`Export root is unreadable: ${root} (${rootError.message})`, root);
    }
    const maxFileSizeBytes =
      options.maxFileSizeMB !== undefined ? options.maxFileSizeMB * 1024 * 1024 : Infinity;

    const results = await runParallel(
      listing.files.map((file) => () => this.indexFile(root, file, maxFileSizeBytes)),
      options.concurrency
    );

    const assets: LocalAsset[] = [];
    const errors: CatalogError[] = [...listing.errors];
    for (const result of results) {
      if (result instanceof CatalogError) {
        errors.push(result);
      } else if (result) {
        assets.push(result);
      }
    }

    assets.sort((a, b) => a.relativePath.localeCompare(b.relativePath));
    errors.sort((a, b) => a.path.localeCompare(b.path));
    return { assets, errors };
  }

  async computeChecksum(filePath: string): Promise<string> {
    const hash = createHash("sha1");
    for await (const chunk of createReadStream(filePath)) {
      hash.update(chunk);
    }
    return hash.digest("base64");
  }

  private async indexFile(
    root: string,
    media: MediaFile,
    maxFileSizeBytes: number
  ): Promise<LocalAsset | CatalogError> {
    const file = media.path;
    const relativePath = toPosix(path.relative(root, file));
    try {
      const info = await stat(file);
      if (info.size > maxFileSizeBytes) {
        return new CatalogError(
          `File too large: ${(info.size / 1024 / 1024).toFixed(2)}MB exceeds ${(maxFileSizeBytes / 1024 / 1024).toFixed(0)}MB limit`,
          relativePath
        );
      }

      const fileName = path.basename(file);
      const { stem, ext } = splitFileName(fileName);
      const mediaType = mediaTypeForExtension(ext);
      if (!mediaType) {
        return new CatalogError(`Unsupported media type: ${ext}`, relativePath);
      }

      const sidecarPath = this.findSidecar(file, media.siblings);
      if (!sidecarPath) {
        return new CatalogError("Missing XMP sidecar", relativePath);
      }

      const sidecar = parseSidecar(await readFile(sidecarPath, "utf8"));
      const { variant, baseStem } = classifyVariant(stem, sidecar);
      const relativeDir = toPosix(path.dirname(relativePath));

      return {
        path: file,
        relativePath,
        sidecarPath,
        fileName,
        stem: normalizeStem(stem),
        checksum: await this.computeChecksum(file),
        capturedAt: sidecar.capturedAt,
        offsetMinutes: sidecar.offsetMinutes,
        wallClock: sidecar.wallClock,
        variant,
        baseKey: baseIdentityKey(mediaType, relativeDir, baseStem),
        size: info.size,
        mediaType,
      };
    } catch (error) {
      return new CatalogError(errorMessage(error), relativePath);
    }
  }

  // "<name>.<ext>.xmp" first, then "<name>.xmp".
  private findSidecar(file: string, siblings: string[]): string | null {
    const fileName = path.basename(file);
    const { stem } = splitFileName(fileName);
    const wanted = [`${fileName}.xmp`.toLowerCase(), `${stem}.xmp`.toLowerCase()];
    for (const candidate of wanted) {
      const found = siblings.find((entry) => entry.toLowerCase() === candidate);
      if (found) {
        return path.join(path.dirname(file), found);
      }
    }
    return null;
  }

  private async listMediaFiles(root: string, dir: string, ignorePatterns: string[]): Promise<Listing> {
    const relativeDir = toPosix(path.relative(root, dir));
    let entries: Dirent[];
    try {
      entries = await this.readDirectory(dir);
    } catch (error) {
      // An unreadable folder is reported and the rest of the tree is still scanned.
      return {
        files: [],
        errors: [new CatalogError(`Cannot read directory: ${errorMessage(error)}`, relativeDir)],
      };
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));
    const siblings = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    const listing: Listing = { files: [], errors: [] };

    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      const relative = toPosix(path.relative(root, full));
      if (entry.isDirectory()) {
        if (this.isIgnored(`${relative}/`, ignorePatterns)) {
          continue;
        }
        const nested = await this.listMediaFiles(root, full, ignorePatterns);
        listing.files.push(...nested.files);
        listing.errors.push(...nested.errors);
        continue;
      }

      if (!entry.isFile() || this.isIgnored(relative, ignorePatterns)) {
        continue;
      }

      if (mediaTypeForExtension(splitFileName(entry.name).ext)) {
        listing.files.push({ path: full, siblings });
      }
    }

    return listing;
  }

  private isIgnored(relativePath: string, ignorePatterns: string[]): boolean {
    if (ignorePatterns.length === 0) {
      return false;
    }

    for (const pattern of ignorePatterns) {
      const trimmed = pattern.trim();
      if (!trimmed) {
        continue;
      }

      // Directory patterns (ending with /) match everything beneath them
      if (trimmed.endsWith("/")) {
        if (relativePath.startsWith(trimmed) || relativePath === trimmed.slice(0, -1)) {
          return true;
        }
        continue;
      }

      const target = relativePath.endsWith("/") ? relativePath.slice(0, -1) : relativePath;
      const isMatch = picomatch(trimmed, { dot: true });
      if (isMatch(target)) {
        return true;
      }
    }

    return false;
  }
}
