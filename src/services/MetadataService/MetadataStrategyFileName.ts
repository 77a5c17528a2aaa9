import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import type { Metadata, PhotoFile } from "@/types";

import { splitFileName } from "../PhotoGroupingServiceDefault";
import type { ExtractError, MetadataStrategy } from "./MetadataStrategy";
import { captureTimeFromParts } from "./MetadataValueHelper";

/**
 * 檔名中的 yyyyMMdd[_-]HHmmss，例如：
 * - IMG_20240315_102030.jpg
 * - PXL_20240315_102030123.jpg
 * - 20240315-102030.heic
 * - IMG-20240315-WA0001.jpg（只有日期，時間視為 00:00:00）
 */
const FILE_NAME_DATE_RE =
  /(?:^|\D)((?:18|19|20)\d{2})(\d{2})(\d{2})(?:[_-]?(\d{2})(\d{2})(\d{2}))?/;

/**
 * 從檔名推測拍攝時間，只提供 captureTime，作為最後手段。
 */
export class MetadataStrategyFileName implements MetadataStrategy {
  readonly name = "filename";

  supports(_file: PhotoFile): boolean {
    return true;
  }

  async extract(filePath: string): Promise<Result<Metadata, ExtractError>> {
    const captureTime = parseFileNameDate(splitFileName(path.basename(filePath)).stem);
    if (!captureTime) {
      return err({
        type: "NO_METADATA",
        message: `檔名不含日期: ${path.basename(filePath)}`,
      });
    }
    return ok({ captureTime });
  }
}

export function parseFileNameDate(stem: string): string | undefined {
  const m = FILE_NAME_DATE_RE.exec(stem);
  if (!m) return undefined;
  const [, year, month, day, hour, minute, second] = m;
  return captureTimeFromParts(
    Number(year),
    Number(month),
    Number(day),
    hour === undefined ? 0 : Number(hour),
    minute === undefined ? 0 : Number(minute),
    second === undefined ? 0 : Number(second)
  );
}
