import { type Static, Type as t } from "@sinclair/typebox";

import type { Result } from "~shared/utils/Result";

import { photoGroupSchema } from "@/types";

export const groupDatabaseSchema = t.Object(
  {
    version: t.Literal(1),
    /** 建立時間 (ISO 8601) */
    createdAt: t.String(),
    /** build 時掃描的根目錄 */
    root: t.String(),
    groups: t.Array(photoGroupSchema),
  },
  { additionalProperties: false }
);

export type GroupDatabase = Static<typeof groupDatabaseSchema>;

export type DatabaseError =
  | { type: "DATABASE_NOT_FOUND"; path: string; message: string }
  | { type: "DATABASE_READ_FAILED"; path: string; message: string }
  | { type: "DATABASE_INVALID"; path: string; message: string; issues: string[] }
  | { type: "DATABASE_WRITE_FAILED"; path: string; message: string };

/**
 * build 與 rename 之間的群組快照。整份讀寫，不做部分更新。
 */
export interface GroupDatabaseStore {
  /** 讀取並驗證資料庫；舊格式（只有群組陣列）視為 version 1 */
  load(path: string): Promise<Result<GroupDatabase, DatabaseError>>;

  save(path: string, db: GroupDatabase): Promise<Result<void, DatabaseError>>;
}
