import type { Result } from "~shared/utils/Result";

import type { DatabaseError } from "./GroupDatabaseStore";
import type { SchemeValidationError } from "./NamingScheme";
import type { RelocationMode, RelocationReport } from "./RelocationExecutor";
import type { InvalidPolicy, RenamePlan } from "./RenamePlanService";

export type PhotoRenameOptions = {
  databasePath: string;
  destination: string;
  scheme: string;
  sequenceDigits?: number;
  mode: RelocationMode;
  dryRun: boolean;
  invalidPolicy: InvalidPolicy;
};

export type PhotoRenameResult = {
  plan: RenamePlan;
  report: RelocationReport;
  /** 是否已把新路徑與操作紀錄寫回資料庫 */
  databaseUpdated: boolean;
  /** 檔案已處理但資料庫寫入失敗 */
  databaseError?: DatabaseError;
};

export type PhotoRenameError = DatabaseError | SchemeValidationError;

export interface PhotoRenameService {
  /**
   * 讀取資料庫 → 解析命名規則 → 規劃 → 執行；非試跑時更新資料庫。
   * 規劃失敗時不會動到任何檔案。檔案處理後才發生的資料庫錯誤放在結果的 databaseError。
   */
  rename(options: PhotoRenameOptions): Promise<Result<PhotoRenameResult, PhotoRenameError>>;
}
