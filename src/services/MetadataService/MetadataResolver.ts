import type { Result } from "~shared/utils/Result";

import type { Metadata, MetadataSource, PhotoGroup } from "@/types";

export type ExtractionAttempt = {
  backend: string;
  reason: string;
};

/**
 * 整個後端鏈都沒有取得拍攝時間。
 * 非致命錯誤：群組照樣寫入資料庫，metadata 為空。
 */
export type ExtractionFailure = {
  type: "EXTRACTION_FAILED";
  key: string;
  directory: string;
  /** 被選為中繼資料來源的檔案 */
  sourcePath: string;
  attempts: ExtractionAttempt[];
  message: string;
};

export type Resolution = {
  metadata: Metadata;
  source: MetadataSource;
};

export interface MetadataResolver {
  /**
   * 選出群組中最可信的檔案（RAW > primary > sidecar），
   * 依序嘗試每個後端，第一個帶有拍攝時間的結果勝出。
   */
  resolve(group: PhotoGroup): Promise<Result<Resolution, ExtractionFailure>>;
}
