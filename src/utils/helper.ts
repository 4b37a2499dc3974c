import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { imageExtensions, videoExtensions } from "@/constants";
import type { MediaFile, MediaKind } from "@/types";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string) {
  try {
    return (await stat(p)).isDirectory();
  } catch {
    return false;
  }
}

export function toArray(v: string | string[] | undefined): string[] {
  if (v === undefined) return [];
  return Array.isArray(v) ? v : [v];
}

export function baseOf(p: string) {
  return path.basename(p, path.extname(p));
}

export function kindOf(p: string): MediaKind | undefined {
  const ext = path.extname(p).toLowerCase();
  if (videoExtensions.some((e) => e === ext)) return "video";
  if (imageExtensions.some((e) => e === ext)) return "image";
  return undefined;
}

export function toMediaFile(p: string, kind: MediaKind): MediaFile {
  return {
    path: p,
    baseName: baseOf(p),
    extension: path.extname(p),
    kind,
  };
}
