import { ExifDateTime, type ExifTool } from "exiftool-vendored";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Metadata, PhotoFile } from "@/types";

import type { ExtractError, MetadataStrategy } from "./MetadataStrategy";
import {
  captureTimeFromParts,
  compactMetadata,
  firstOf,
  toCaptureTime,
  toNumber,
  toShutterSpeed,
  toText,
} from "./MetadataValueHelper";

/** 只有處理參數、沒有拍攝資訊的 sidecar */
const unsupportedExtensions = new Set([".pp3", ".dop", ".pto"]);

/**
 * 拍攝時間候選標籤，越前面越可信。
 * SubSecDateTimeOriginal 是 exiftool 由 EXIF 子 IFD 與 maker notes 合成的 composite 標籤。
 */
const captureTimeTags = [
  "SubSecDateTimeOriginal",
  "DateTimeOriginal",
  "CreationDate",
  "SubSecCreateDate",
  "CreateDate",
  "DateCreated",
];

/**
 * 將 ExifDateTime 轉為拍攝時間字串。
 * 規則：
 * 1) rawValue 為 "YYYY:MM:DD HH:mm:ss" 時直接取用數字（不做時區換算）。
 * 2) 否則使用解析後的年月日時分秒欄位。
 */
export function fromExifDateTime(time: ExifDateTime): string | undefined {
  const fromRaw = toCaptureTime(time.rawValue);
  if (fromRaw) return fromRaw;
  return captureTimeFromParts(
    time.year,
    time.month,
    time.day,
    time.hour,
    time.minute,
    time.second
  );
}

function toCaptureTimeTag(value: unknown): string | undefined {
  if (value instanceof ExifDateTime) return fromExifDateTime(value);
  return toCaptureTime(value);
}

/**
 * 透過 ExifTool 完整讀取所有標籤群組（EXIF 子 IFD、maker notes、XMP、QuickTime）。
 */
export class MetadataStrategyExifTool implements MetadataStrategy, AsyncDisposable {
  readonly name = "exiftool";

  constructor(private readonly tool: ExifTool) {}

  supports(file: PhotoFile): boolean {
    return !unsupportedExtensions.has(path.extname(file.path).toLowerCase());
  }

  async extract(filePath: string): Promise<Result<Metadata, ExtractError>> {
    let tags: Map<string, unknown>;
    try {
      tags = new Map(Object.entries(await this.tool.read(filePath)));
    } catch (e) {
      return err({
        type: "READ_FAILED",
        message: `ExifTool 讀取失敗: ${e instanceof Error ? e.message : String(e)}`,
      });
    }

    const metadata = compactMetadata({
      captureTime: firstOf(tags, captureTimeTags, toCaptureTimeTag),
      cameraMake: firstOf(tags, ["Make"], toText),
      cameraModel: firstOf(tags, ["Model"], toText),
      lensModel: firstOf(tags, ["LensModel", "Lens", "LensID"], toText),
      serialNumber: firstOf(
        tags,
        ["SerialNumber", "BodySerialNumber", "InternalSerialNumber"],
        toText
      ),
      iso: firstOf(tags, ["ISO"], toNumber),
      aperture: firstOf(tags, ["FNumber", "Aperture"], toNumber),
      focalLength: firstOf(tags, ["FocalLength"], toNumber),
      shutterSpeed: firstOf(tags, ["ExposureTime", "ShutterSpeed"], toShutterSpeed),
    });

    if (Object.keys(metadata).length === 0) {
      return err({
        type: "NO_METADATA",
        message: `ExifTool 找不到可用的標籤: ${filePath}`,
      });
    }
    return ok(metadata);
  }

  async [Symbol.asyncDispose]() {
    await this.tool.end();
  }
}
