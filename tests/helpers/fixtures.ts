import { createHash } from "node:crypto";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { LocalAsset, RemoteAsset, RemoteIndex } from "../../src/types/sync-types";
import { addToIndex } from "../../src/indexers/remote-indexer";

export const WINDOW_MS = 2000;

// 2024-05-01 10:00:00 local time at +02:00
export const BASE_WALL_CLOCK = Date.UTC(2024, 4, 1, 10, 0, 0);
export const BASE_INSTANT = Date.UTC(2024, 4, 1, 8, 0, 0);

export const sha1 = (data: string | Buffer): string => createHash("sha1").update(data).digest("base64");

export function localAsset(overrides: Partial<LocalAsset> & { relativePath: string }): LocalAsset {
  const fileName = overrides.relativePath.split("/").pop() ?? overrides.relativePath;
  const stem = fileName.replace(/\.[^.]+$/, "").toLowerCase();
  return {
    path: `/export/${overrides.relativePath}`,
    sidecarPath: `/export/${overrides.relativePath}.xmp`,
    fileName,
    stem,
    checksum: sha1(overrides.relativePath),
    capturedAt: BASE_INSTANT,
    offsetMinutes: 120,
    wallClock: BASE_WALL_CLOCK,
    variant: "original",
    baseKey: `image:${stem}`,
    size: 1000,
    mediaType: "image",
    ...overrides,
  };
}

export function remoteAsset(overrides: Partial<RemoteAsset> & { id: string }): RemoteAsset {
  return {
    checksum: sha1(overrides.id),
    fileName: "IMG_0001.JPG",
    stem: "img_0001",
    capturedAt: BASE_INSTANT,
    wallClock: BASE_WALL_CLOCK,
    mediaType: "image",
    size: 1000,
    albumIds: [],
    isFavorite: false,
    provenance: "unknown",
    stack: null,
    deviceId: "",
    deviceAssetId: "",
    ...overrides,
  };
}

export function buildIndex(assets: RemoteAsset[], timeWindowMs = WINDOW_MS): RemoteIndex {
  const index: RemoteIndex = {
    assets: {},
    byChecksum: {},
    byNameAndTime: {},
    albumNames: {},
    timeWindowMs,
  };
  for (const asset of assets) {
    addToIndex(index, asset);
  }
  return index;
}

export function xmp(options: { date?: string; offset?: string; derivedFrom?: boolean } = {}): string {
  const date = options.date ?? "2024-05-01T10:00:00+02:00";
  const offset = options.offset ? `\n      exif:OffsetTimeOriginal="${options.offset}"` : "";
  const derived = options.derivedFrom ? `\n      <xmpMM:DerivedFrom stRef:documentID="xmp.did:1234"/>` : "";
  return `<?xml version="1.0" encoding="UTF-8"?>
<x:xmpmeta xmlns:x="adobe:ns:meta/">
  <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">
    <rdf:Description rdf:about=""
      xmlns:exif="http://ns.adobe.com/exif/1.0/"
      xmlns:xmpMM="http://ns.adobe.com/xap/1.0/mm/"
      xmlns:stRef="http://ns.adobe.com/xap/1.0/sType/ResourceRef#"
      exif:DateTimeOriginal="${date}"${offset}>${derived}
    </rdf:Description>
  </rdf:RDF>
</x:xmpmeta>
`;
}

/** A throwaway export tree under the OS temp directory. */
export class ExportTree {
  constructor(readonly root: string) {}

  static async create(): Promise<ExportTree> {
    return new ExportTree(await mkdtemp(path.join(os.tmpdir(), "reexport-sync-")));
  }

  async addFile(relativePath: string, contents: string | Buffer): Promise<string> {
    const full = path.join(this.root, relativePath);
    await mkdir(path.dirname(full), { recursive: true });
    await writeFile(full, contents);
    return full;
  }

  /** Writes a media file and its `<file>.xmp` sidecar. */
  async addAsset(relativePath: string, contents: string, sidecar: string = xmp()): Promise<string> {
    const full = await this.addFile(relativePath, contents);
    await this.addFile(`${relativePath}.xmp`, sidecar);
    return full;
  }

  async cleanup(): Promise<void> {
    await rm(this.root, { recursive: true, force: true });
  }
}
