import type { PhotoGroup } from "@/types";

export interface PhotoGroupingService {
  /**
   * 依「同目錄 + 同檔名」將檔案分組；輸入順序即發現順序。
   */
  group(filePaths: string[]): PhotoGroupResult;
}

export interface PhotoGroupResult {
  groups: PhotoGroup[];
  /** 不支援的副檔名，只計數不分組 */
  unsupported: string[];
}
