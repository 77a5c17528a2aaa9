import type { PhotoGroup } from "@/types";

import type { RenamePlan } from "./RenamePlanService";

export type RelocationMode = "copy" | "move";

export type RelocationErrorType =
  | "SOURCE_MISSING"
  | "DESTINATION_EXISTS"
  | "MKDIR_FAILED"
  | "COPY_FAILED"
  | "MOVE_FAILED"
  | "VERIFY_FAILED";

export type RelocationError = {
  type: RelocationErrorType;
  from: string;
  to: string;
  message: string;
};

/**
 * - done：所有檔案都已複製或搬移
 * - planned：dry run，預檢通過
 * - failed：預檢失敗或至少一個檔案操作失敗
 * - unchanged：目的地就是來源，不需處理
 */
export type GroupRelocationStatus = "done" | "planned" | "failed" | "unchanged";

export type GroupRelocationResult = {
  group: PhotoGroup;
  relativePath: string;
  status: GroupRelocationStatus;
  /** 實際完成（或 dry run 時預計執行）的操作 */
  completed: { from: string; to: string }[];
  errors: RelocationError[];
};

export type RelocationReport = {
  mode: RelocationMode;
  dryRun: boolean;
  results: GroupRelocationResult[];
  succeeded: number;
  failed: number;
  /** unchanged 加上規劃時略過的群組 */
  skipped: number;
};

export interface RelocationExecutor {
  /**
   * 逐一處理計畫中的群組。單一檔案失敗只記錄，不中斷整批，也不回滾已完成的操作。
   */
  execute(
    plan: RenamePlan,
    options: { mode: RelocationMode; dryRun: boolean }
  ): Promise<RelocationReport>;
}
