import path from "node:path";

import { classifyExtension } from "@/constants";
import type { PhotoFile, PhotoGroup } from "@/types";

import type {
  PhotoGroupResult,
  PhotoGroupingService,
} from "./PhotoGroupingService";

/**
 * 拆出分組用的檔名與副檔名。
 * 例如：
 * - IMG_0001.CR2      → IMG_0001 + .CR2
 * - IMG_0001.CR2.xmp  → IMG_0001 + .CR2.xmp（darktable 式 sidecar）
 * - IMG_0001.xmp      → IMG_0001 + .xmp
 */
export function splitFileName(fileName: string): { stem: string; ext: string } {
  const ext = path.extname(fileName);
  const stem = path.basename(fileName, ext);
  const classified = classifyExtension(ext);
  if (classified?.role === "sidecar") {
    const innerExt = path.extname(stem);
    const inner = innerExt ? classifyExtension(innerExt) : undefined;
    if (inner && inner.role !== "sidecar") {
      return { stem: path.basename(stem, innerExt), ext: innerExt + ext };
    }
  }
  return { stem, ext };
}

export function hasImageMember(group: Pick<PhotoGroup, "files">): boolean {
  return group.files.some((f) => f.role === "primary" || f.role === "raw");
}

export class PhotoGroupingServiceDefault implements PhotoGroupingService {
  group(filePaths: string[]): PhotoGroupResult {
    const groupMap = new Map<string, { key: string; directory: string; files: PhotoFile[] }>();
    const unsupported: string[] = [];

    for (const filePath of filePaths) {
      const fullPath = path.resolve(filePath);
      const { stem, ext } = splitFileName(path.basename(fullPath));
      const classified = classifyExtension(path.extname(fullPath));
      if (!classified || stem === "") {
        unsupported.push(fullPath);
        continue;
      }

      const directory = path.dirname(fullPath);
      const mapKey = `${directory}\u0000${stem}`;
      let entry = groupMap.get(mapKey);
      if (!entry) {
        entry = { key: stem, directory, files: [] };
        groupMap.set(mapKey, entry);
      }
      entry.files.push({
        path: fullPath,
        role: classified.role,
        format: classified.format,
        extension: ext,
      });
    }

    const groups = Array.from(groupMap.values()).map(
      (g): PhotoGroup => ({
        key: g.key,
        directory: g.directory,
        files: g.files,
        metadata: {},
        valid: hasImageMember(g),
      })
    );

    return { groups, unsupported };
  }
}
