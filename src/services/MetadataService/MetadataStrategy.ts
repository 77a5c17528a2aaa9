import type { Result } from "~shared/utils/Result";

import type { Metadata, PhotoFile } from "@/types";

export type ExtractError =
  | { type: "FILE_NOT_FOUND"; message: string }
  | { type: "READ_FAILED"; message: string }
  | { type: "PARSE_FAILED"; message: string }
  | { type: "NO_METADATA"; message: string };

/**
 * 單一中繼資料後端。
 * 後端只負責「讀得到什麼就回傳什麼」，是否採用由 MetadataResolver 決定。
 */
export interface MetadataStrategy {
  readonly name: string;

  /**
   * 是否支援此檔案格式。不支援時 resolver 會直接跳過，不會呼叫 extract。
   */
  supports(file: PhotoFile): boolean;

  extract(filePath: string): Promise<Result<Metadata, ExtractError>>;
}
