import type { Result } from "~shared/utils/Result";

import type { ScanError } from "./FileSystemScanner";

export type DateCheckStatus = "OK" | "MISMATCH" | "UNKNOWN";

export type DateCheckRow = {
  key: string;
  directory: string;
  /** 檔名開頭的日期 yyyy-MM-dd */
  fileNameDate?: string;
  /** 中繼資料的拍攝日期 yyyy-MM-dd */
  metadataDate?: string;
  status: DateCheckStatus;
};

export type DateCheckReport = {
  rows: DateCheckRow[];
  ok: number;
  mismatch: number;
  unknown: number;
};

export interface FileNameDateCheckService {
  /**
   * 比對已整理過的檔名（`20240315_...`、`2024-03-15_...`）與中繼資料中的拍攝日期。
   */
  check(
    root: string,
    options?: { recursive?: boolean; errorsOnly?: boolean }
  ): Promise<Result<DateCheckReport, ScanError>>;
}
