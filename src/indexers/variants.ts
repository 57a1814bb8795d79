import type { MediaType, VariantKind } from "../types/sync-types";

export const PHOTO_EXTENSIONS = new Set([".heic", ".jpg", ".jpeg", ".png", ".dng", ".raf", ".cr2", ".arw"]);
export const VIDEO_EXTENSIONS = new Set([".mov", ".mp4", ".m4v"]);

export const EDITED_SUFFIX = "_edited";
export const DERIVATIVE_SUFFIX = "_derivative";

export function mediaTypeForExtension(ext: string): MediaType | null {
  const lower = ext.toLowerCase();
  if (PHOTO_EXTENSIONS.has(lower)) {
    return "image";
  }
  if (VIDEO_EXTENSIONS.has(lower)) {
    return "video";
  }
  return null;
}

export function mediaTypeForRemote(type: string): MediaType | null {
  const upper = type.toUpperCase();
  if (upper === "IMAGE") {
    return "image";
  }
  if (upper === "VIDEO") {
    return "video";
  }
  return null;
}

export function splitFileName(fileName: string): { stem: string; ext: string } {
  const dotIndex = fileName.lastIndexOf(".");
  if (dotIndex <= 0) {
    return { stem: fileName, ext: "" };
  }
  return { stem: fileName.slice(0, dotIndex), ext: fileName.slice(dotIndex) };
}

/** Stems are compared case-insensitively and in NFC, as file systems disagree on both. */
export function normalizeStem(stem: string): string {
  return stem.normalize("NFC").trim().toLowerCase();
}

export function classifyVariant(
  stem: string,
  sidecar: { derivedFrom: boolean }
): { variant: VariantKind; baseStem: string } {
  const lower = stem.toLowerCase();
  if (lower.endsWith(EDITED_SUFFIX)) {
    return { variant: "edited", baseStem: stem.slice(0, -EDITED_SUFFIX.length) };
  }

  if (lower.endsWith(DERIVATIVE_SUFFIX)) {
    return { variant: "derivative", baseStem: stem.slice(0, -DERIVATIVE_SUFFIX.length) };
  }

  if (sidecar.derivedFrom) {
    return { variant: "derivative", baseStem: stem };
  }

  return { variant: "original", baseStem: stem };
}

export function baseIdentityKey(mediaType: MediaType, relativeDir: string, baseStem: string): string {
  const dir = relativeDir === "." ? "" : relativeDir.replace(/\\/g, "/");
  const prefix = dir ? `${dir}/` : "";
  return `${mediaType}:${prefix}${normalizeStem(baseStem)}`;
}
