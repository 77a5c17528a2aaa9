import type { CAC } from "cac";
import path from "node:path";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { FileOperatorNode } from "@/services/FileOperatorNode";
import { GroupDatabaseStoreJson } from "@/services/GroupDatabaseStoreJson";
import { DEFAULT_SEQUENCE_DIGITS } from "@/services/NamingScheme";
import { PhotoRenameServiceDefault } from "@/services/PhotoRenameServiceDefault";
import type { PhotoRenameError } from "@/services/PhotoRenameService";
import { RelocationExecutorDefault } from "@/services/RelocationExecutorDefault";
import type { RelocationReport } from "@/services/RelocationExecutor";
import { RenamePlanServiceDefault } from "@/services/RenamePlanServiceDefault";
import { expandHome } from "@/utils/helper";

import { type VerboseOption, commandLogger } from "./AppContext";

type RenameOptions = VerboseOption & {
  scheme?: string;
  sequenceDigits: number | string;
  dryRun: boolean;
  copy: boolean;
  skipInvalid: boolean;
  includeInvalid: boolean;
};

export function registerRename(cli: CAC, baseLogger: Logger) {
  cli
    .command(
      "rename <database> <destination>",
      "依命名規則把資料庫中的群組複製或搬移到目標目錄"
    )
    .option("-s, --scheme <text>", "命名規則，例如 {year}/{date}_{camera_model}_{sequence}")
    .option("--sequence-digits <n>", "序號位數 (1-6)", {
      default: DEFAULT_SEQUENCE_DIGITS,
    })
    .option("--dry-run", "只列出計畫，不動任何檔案", { default: false })
    .option("--copy", "複製而非搬移", { default: false })
    .option("--skip-invalid", "略過缺少欄位的群組（預設，優先於 --include-invalid）", { default: false })
    .option("--include-invalid", "缺少的欄位以 unknown 代替", { default: false })
    .option("-v, --verbose", "顯示除錯訊息", { default: false })
    .example("rename photo_database.json ~/Pictures/library --scheme '{year}/{date}_{sequence}'")
    .action(async (database: string, destination: string, options: RenameOptions) => {
      const logger = commandLogger(baseLogger, "rename", options);
      if (!options.scheme) {
        logger.error()`缺少 --scheme`;
        process.exitCode = 1;
        return;
      }

      const config = getAppConfig();
      const fileOperator = new FileOperatorNode({ logger });
      const store = new GroupDatabaseStoreJson();
      const service = new PhotoRenameServiceDefault({
        store,
        planService: new RenamePlanServiceDefault({ fileOperator, logger }),
        executor: new RelocationExecutorDefault({ fileOperator, logger }),
        logger,
      });
      const writer = new DumpWriterDefault(logger, config.REPORT_DIR);

      const result = await service.rename({
        databasePath: expandHome(database),
        destination: expandHome(destination),
        scheme: options.scheme,
        sequenceDigits: Number(options.sequenceDigits),
        mode: options.copy ? "copy" : "move",
        dryRun: options.dryRun,
        invalidPolicy: options.includeInvalid && !options.skipInvalid ? "include" : "skip",
      });
      if (isErr(result)) {
        logRenameError(logger, result.error);
        process.exitCode = 1;
        return;
      }

      const { plan, report, databaseUpdated, databaseError } = result.value;
      for (const skipped of plan.skipped) {
        logger.debug({ reason: skipped.reason })`${skipped.message}`;
      }
      if (report.dryRun) {
        await writer.dump(
          "命名計畫",
          plan.entries.map((entry) => ({
            group: path.join(entry.group.directory, entry.group.key),
            relativePath: entry.relativePath,
            operations: entry.operations,
          }))
        );
      }
      if (report.failed > 0) {
        await writer.dump("命名失敗", failureReport(report));
      }
      if (databaseUpdated) {
        logger.info({ emoji: "💾" })`資料庫已更新 ${database}`;
      }
      if (databaseError) {
        logger.error({ error: databaseError })`資料庫未更新，已完成的操作記錄在報告中`;
        await writer.dump(
          "資料庫未更新",
          report.results.flatMap((r) => r.completed)
        );
      }
      if (report.failed > 0 && report.succeeded === 0) {
        process.exitCode = 1;
      }
    });
}

function logRenameError(logger: Logger, error: PhotoRenameError) {
  switch (error.type) {
    case "UNRESOLVED_COLLISION":
      logger.error({ emoji: "💥" })`${error.message}`;
      for (const collision of error.collisions) {
        logger.error({ groups: collision.groups })`撞名: ${collision.path}`;
      }
      return;
    case "DATABASE_INVALID":
      logger.error({ issues: error.issues })`${error.message}`;
      return;
    default:
      logger.error({ error })`${error.message}`;
  }
}

function failureReport(report: RelocationReport) {
  return report.results
    .filter((result) => result.status === "failed")
    .map((result) => ({
      group: path.join(result.group.directory, result.group.key),
      relativePath: result.relativePath,
      completed: result.completed,
      errors: result.errors,
    }));
}
