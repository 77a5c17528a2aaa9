import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import fs from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { photoGroupSchema } from "@/types";
import { errorCode, errorMessage } from "@/utils/helper";

import {
  type DatabaseError,
  type GroupDatabase,
  type GroupDatabaseStore,
  groupDatabaseSchema,
} from "./GroupDatabaseStore";

const legacyDatabaseSchema = t.Array(photoGroupSchema);

export class GroupDatabaseStoreJson implements GroupDatabaseStore {
  async load(filePath: string): Promise<Result<GroupDatabase, DatabaseError>> {
    let text: string;
    let modifiedAt: Date;
    try {
      text = await fs.readFile(filePath, "utf8");
      modifiedAt = (await fs.stat(filePath)).mtime;
    } catch (error) {
      if (errorCode(error) === "ENOENT") {
        return err({
          type: "DATABASE_NOT_FOUND",
          path: filePath,
          message: `找不到資料庫檔案: ${filePath}`,
        });
      }
      return err({
        type: "DATABASE_READ_FAILED",
        path: filePath,
        message: `讀取資料庫失敗: ${errorMessage(error)}`,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      return err({
        type: "DATABASE_INVALID",
        path: filePath,
        message: `資料庫不是合法的 JSON: ${errorMessage(error)}`,
        issues: [],
      });
    }

    if (Value.Check(legacyDatabaseSchema, raw)) {
      return ok({
        version: 1,
        createdAt: modifiedAt.toISOString(),
        root: "",
        groups: raw,
      });
    }

    if (!Value.Check(groupDatabaseSchema, raw)) {
      const schema = Array.isArray(raw) ? legacyDatabaseSchema : groupDatabaseSchema;
      const issues = [...Value.Errors(schema, raw)]
        .slice(0, 20)
        .map((e) => `${e.path || "/"}: ${e.message}`);
      return err({
        type: "DATABASE_INVALID",
        path: filePath,
        message: `資料庫格式不正確: ${filePath}`,
        issues,
      });
    }

    return ok(raw);
  }

  async save(filePath: string, db: GroupDatabase): Promise<Result<void, DatabaseError>> {
    try {
      await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
      await fs.writeFile(filePath, `${JSON.stringify(db, null, 2)}\n`, "utf8");
      return ok();
    } catch (error) {
      return err({
        type: "DATABASE_WRITE_FAILED",
        path: filePath,
        message: `寫入資料庫失敗: ${errorMessage(error)}`,
      });
    }
  }
}
