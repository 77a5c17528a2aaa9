import type { Result } from "~shared/utils/Result";

import type { MetadataField, MoveFile, PhotoGroup } from "@/types";

import type { NamingScheme, SchemeValidationError } from "./NamingScheme";

export type InvalidPolicy = "skip" | "include";

export type RenamePlanOptions = {
  /** 目標根目錄 */
  destination: string;
  /** `{sequence}` 未指定位數時使用，1 到 6 */
  sequenceDigits?: number;
  /** skip：略過缺少欄位或沒有影像檔的群組；include：缺少的欄位以 unknown 代替 */
  invalidPolicy?: InvalidPolicy;
};

export type RenamePlanEntry = {
  group: PhotoGroup;
  /** 相對於目標根目錄、不含副檔名的路徑 */
  relativePath: string;
  sequence?: number;
  /** 只包含仍存在的檔案 */
  operations: MoveFile[];
  /** 資料庫中有、磁碟上已不存在的檔案 */
  missingFiles: string[];
};

export type SkipReason = "FILES_MISSING" | "NO_IMAGE" | "MISSING_FIELDS";

export type SkippedGroup = {
  group: PhotoGroup;
  reason: SkipReason;
  message: string;
  missingFields?: MetadataField[];
};

export type RenamePlan = {
  scheme: NamingScheme;
  destination: string;
  entries: RenamePlanEntry[];
  skipped: SkippedGroup[];
};

export interface RenamePlanService {
  /**
   * 計算每個群組的目標路徑並分配序號。只讀取檔案是否存在，不會修改檔案系統。
   */
  plan(
    groups: readonly PhotoGroup[],
    scheme: NamingScheme,
    options: RenamePlanOptions
  ): Promise<Result<RenamePlan, SchemeValidationError>>;
}
