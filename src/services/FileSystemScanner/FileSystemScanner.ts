import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
  rootPath: string;
};

export type ScanOptions = {
  /** 預設 true */
  recursive?: boolean;
  /** 限定副檔名（不分大小寫）；空陣列代表不限 */
  allowExts?: readonly string[];
  /** 是否包含 `.` 開頭的檔案與資料夾，預設 false */
  includeHidden?: boolean;
};

export interface FileSystemScanner {
  /**
   * 列出 rootPath 底下的檔案（絕對路徑），依目錄再依檔名排序。
   */
  scan(rootPath: string, options?: ScanOptions): Promise<Result<string[], ScanError>>;
}
