import exifr from "exifr";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Metadata, PhotoFile } from "@/types";

import type { ExtractError, MetadataStrategy } from "./MetadataStrategy";
import {
  compactMetadata,
  firstOf,
  toCaptureTime,
  toNumber,
  toShutterSpeed,
  toText,
} from "./MetadataValueHelper";

/**
 * exifr 只解析 TIFF 結構的 IFD0 / EXIF 區段；
 * CR3、RAF、RW2、X3F 等非 TIFF 結構的 RAW 不支援。
 */
const supportedExtensions = new Set([
  ".jpg",
  ".jpeg",
  ".thm",
  ".heic",
  ".heif",
  ".hif",
  ".tif",
  ".tiff",
  ".png",
  ".nef",
  ".nrw",
  ".cr2",
  ".dng",
  ".arw",
  ".srf",
  ".sr2",
  ".pef",
  ".srw",
  ".3fr",
  ".iiq",
  ".dcr",
  ".kdc",
  ".mef",
]);

/**
 * 以 exifr 讀取最上層的標籤，比 ExifTool 快，但讀不到 maker notes 與 XMP。
 */
export class MetadataStrategyExifr implements MetadataStrategy {
  readonly name = "exifr";

  supports(file: PhotoFile): boolean {
    return supportedExtensions.has(path.extname(file.path).toLowerCase());
  }

  async extract(filePath: string): Promise<Result<Metadata, ExtractError>> {
    let output: unknown;
    try {
      output = await exifr.parse(filePath, {
        tiff: true,
        exif: true,
        gps: false,
        xmp: false,
        icc: false,
        iptc: false,
        reviveValues: false,
      });
    } catch (e) {
      return err({
        type: "PARSE_FAILED",
        message: `exifr 解析失敗: ${e instanceof Error ? e.message : String(e)}`,
      });
    }

    if (typeof output !== "object" || output === null) {
      return err({
        type: "NO_METADATA",
        message: `exifr 找不到 EXIF 區段: ${filePath}`,
      });
    }

    const tags = new Map<string, unknown>(Object.entries(output));
    const metadata = compactMetadata({
      captureTime: firstOf(tags, ["DateTimeOriginal", "CreateDate"], toCaptureTime),
      cameraMake: firstOf(tags, ["Make"], toText),
      cameraModel: firstOf(tags, ["Model"], toText),
      lensModel: firstOf(tags, ["LensModel"], toText),
      serialNumber: firstOf(tags, ["BodySerialNumber", "SerialNumber"], toText),
      iso: firstOf(tags, ["ISO", "ISOSpeedRatings"], toNumber),
      aperture: firstOf(tags, ["FNumber"], toNumber),
      focalLength: firstOf(tags, ["FocalLength"], toNumber),
      shutterSpeed: firstOf(tags, ["ExposureTime"], toShutterSpeed),
    });

    if (Object.keys(metadata).length === 0) {
      return err({
        type: "NO_METADATA",
        message: `exifr 讀不到可用的標籤: ${filePath}`,
      });
    }
    return ok(metadata);
  }
}
