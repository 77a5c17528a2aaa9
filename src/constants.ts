import type { FileFormat, FileRole } from "@/types";

export const rawExtensions = [
  ".cr2",
  ".cr3",
  ".crw",
  ".nef",
  ".nrw",
  ".arw",
  ".srf",
  ".sr2",
  ".raf",
  ".orf",
  ".rw2",
  ".pef",
  ".ptx",
  ".rwl",
  ".dcr",
  ".kdc",
  ".mrw",
  ".srw",
  ".3fr",
  ".mef",
  ".iiq",
  ".x3f",
  ".dng",
  ".raw",
] as const;

export const jpgExtensions = [".jpg", ".jpeg"] as const;

export const heicExtensions = [".heic", ".heif", ".hif"] as const;

export const otherImageExtensions = [
  ".png",
  ".gif",
  ".bmp",
  ".tif",
  ".tiff",
  ".webp",
] as const;

/** Live Photo 的影片部分 */
export const livePhotoExtensions = [".mov"] as const;

export const sidecarExtensions = [
  ".xmp",
  ".xml",
  ".thm",
  ".pp3",
  ".dop",
  ".pto",
] as const;

export type FormatClassification = { role: FileRole; format: FileFormat };

const registry = new Map<string, FormatClassification>([
  ...rawExtensions.map(
    (e) => [e, { role: "raw", format: "raw" }] as const
  ),
  ...jpgExtensions.map(
    (e) => [e, { role: "primary", format: "jpeg" }] as const
  ),
  ...heicExtensions.map(
    (e) => [e, { role: "primary", format: "heic" }] as const
  ),
  ...otherImageExtensions.map(
    (e) => [e, { role: "primary", format: "other" }] as const
  ),
  ...livePhotoExtensions.map(
    (e) => [e, { role: "sidecar", format: "live_photo" }] as const
  ),
  ...sidecarExtensions.map(
    (e) => [e, { role: "sidecar", format: "sidecar" }] as const
  ),
]);

function normalizeExt(ext: string) {
  const lower = ext.toLowerCase();
  return lower.startsWith(".") ? lower : `.${lower}`;
}

/**
 * 依副檔名判斷檔案角色，不支援的副檔名回傳 undefined。
 */
export function classifyExtension(
  ext: string
): FormatClassification | undefined {
  return registry.get(normalizeExt(ext));
}
