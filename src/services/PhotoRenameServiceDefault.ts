import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import type { FileHistoryEntry, PhotoFile, PhotoGroup } from "@/types";

import type { GroupDatabase, GroupDatabaseStore } from "./GroupDatabaseStore";
import { parseNamingScheme } from "./NamingScheme";
import type {
  PhotoRenameError,
  PhotoRenameOptions,
  PhotoRenameResult,
  PhotoRenameService,
} from "./PhotoRenameService";
import type { RelocationExecutor, RelocationReport } from "./RelocationExecutor";
import type { RenamePlanService } from "./RenamePlanService";

/**
 * 把執行結果寫回群組：搬移會更新路徑，搬移與複製都在檔案的 history 留下紀錄。
 * 群組的所有檔案都搬走時，directory 改為新的目錄。
 */
export function applyMovesToDatabase(
  db: GroupDatabase,
  report: RelocationReport,
  at: string = new Date().toISOString()
): { database: GroupDatabase; moved: number; copied: number } {
  const operations = new Map<string, FileHistoryEntry>();
  for (const result of report.results) {
    for (const { from, to } of result.completed) {
      operations.set(from, { operation: report.mode, from, to, at });
    }
  }

  let moved = 0;
  let copied = 0;
  const groups = db.groups.map((group): PhotoGroup => {
    let movedInGroup = 0;
    const files = group.files.map((file): PhotoFile => {
      const entry = operations.get(file.path);
      if (!entry) return file;
      const history = [...(file.history ?? []), entry];
      if (entry.operation === "copy") {
        copied++;
        return { ...file, history };
      }
      moved++;
      movedInGroup++;
      return { ...file, path: entry.to, history };
    });
    if (movedInGroup === 0) return { ...group, files };

    const sourceEntry = group.metadataSource && operations.get(group.metadataSource.path);
    return {
      ...group,
      files,
      directory:
        movedInGroup === files.length ? path.dirname(files[0].path) : group.directory,
      ...(group.metadataSource && sourceEntry
        ? { metadataSource: { ...group.metadataSource, path: sourceEntry.to } }
        : {}),
    };
  });
  return { database: { ...db, groups }, moved, copied };
}

export class PhotoRenameServiceDefault implements PhotoRenameService {
  private readonly store: GroupDatabaseStore;
  private readonly planService: RenamePlanService;
  private readonly executor: RelocationExecutor;
  private readonly logger: Logger;

  constructor(deps: {
    store: GroupDatabaseStore;
    planService: RenamePlanService;
    executor: RelocationExecutor;
    logger: Logger;
  }) {
    this.store = deps.store;
    this.planService = deps.planService;
    this.executor = deps.executor;
    this.logger = deps.logger.extend("PhotoRenameServiceDefault");
  }

  async rename(
    options: PhotoRenameOptions
  ): Promise<Result<PhotoRenameResult, PhotoRenameError>> {
    const logger = this.logger.extend("rename", { database: options.databasePath });

    const scheme = parseNamingScheme(options.scheme);
    if (isErr(scheme)) return scheme;

    const loaded = await this.store.load(options.databasePath);
    if (isErr(loaded)) return loaded;
    logger.info({
      emoji: "📂",
    })`已讀取 ${loaded.value.groups.length} 個群組`;

    const plan = await this.planService.plan(loaded.value.groups, scheme.value, {
      destination: options.destination,
      sequenceDigits: options.sequenceDigits,
      invalidPolicy: options.invalidPolicy,
    });
    if (isErr(plan)) return plan;

    const report = await this.executor.execute(plan.value, {
      mode: options.mode,
      dryRun: options.dryRun,
    });

    if (options.dryRun) {
      return ok({ plan: plan.value, report, databaseUpdated: false });
    }

    const { database, moved, copied } = applyMovesToDatabase(loaded.value, report);
    if (moved + copied === 0) {
      return ok({ plan: plan.value, report, databaseUpdated: false });
    }
    const saved = await this.store.save(options.databasePath, database);
    if (isErr(saved)) {
      logger.error({
        error: saved.error,
      })`檔案已${options.mode === "move" ? "搬移" : "複製"}，但資料庫更新失敗: ${saved.error.message}`;
      return ok({ plan: plan.value, report, databaseUpdated: false, databaseError: saved.error });
    }
    logger.info({ emoji: "💾", moved, copied })`已更新資料庫：搬移 ${moved}、複製 ${copied} 個檔案`;
    return ok({ plan: plan.value, report, databaseUpdated: true });
  }
}
