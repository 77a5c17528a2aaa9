import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? true;
    const includeHidden = options?.includeHidden ?? false;
    const lowerExts = allowExts.map((e) => {
      if (e.startsWith(".")) return e.toLowerCase();
      return `.${e.toLowerCase()}`;
    });
    const allowExtsSet = new Set(lowerExts);
    const root = path.resolve(rootPath);
    try {
      const files = await readdir(root, {
        recursive: isRecursive,
        withFileTypes: true,
      });
      const fullPaths = files
        .filter((d) => {
          if (!d.isFile()) return false;
          if (!includeHidden && isHidden(root, d.parentPath, d.name))
            return false;
          if (allowExts.length === 0) return true;
          const ext = path.extname(d.name).toLowerCase();
          return allowExtsSet.has(ext);
        })
        .map((d) => ({ dir: d.parentPath, name: d.name }))
        .sort((a, b) => compare(a.dir, b.dir) || compare(a.name, b.name))
        .map((d) => path.join(d.dir, d.name));
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
        rootPath: root,
      });
    }
  }
}

function isHidden(root: string, dir: string, name: string) {
  if (name.startsWith(".")) return true;
  const rel = path.relative(root, dir);
  if (rel === "") return false;
  return rel.split(path.sep).some((segment) => segment.startsWith("."));
}

/** 以 code point 比較，不受系統語系影響 */
function compare(a: string, b: string) {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
