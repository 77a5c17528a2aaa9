import type { CAC } from "cac";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { FileNameDateCheckServiceDefault } from "@/services/FileNameDateCheckServiceDefault";
import { expandHome } from "@/utils/helper";

import { type VerboseOption, commandLogger, createLibraryContext } from "./AppContext";

type ValidateOptions = VerboseOption & {
  errorsOnly: boolean;
  recursive: boolean;
};

const statusEmoji = { OK: "✅", MISMATCH: "❗", UNKNOWN: "❔" } as const;

export function registerValidate(cli: CAC, baseLogger: Logger) {
  cli
    .command("validate <root>", "檢查已整理的檔名日期是否與拍攝日期一致")
    .option("--errors-only", "只列出不符或無法判斷的群組", { default: false })
    .option("--no-recursive", "只檢查最上層目錄")
    .option("-v, --verbose", "顯示除錯訊息", { default: false })
    .action(async (root: string, options: ValidateOptions) => {
      const logger = commandLogger(baseLogger, "validate", options);
      const context = createLibraryContext(logger);
      try {
        const service = new FileNameDateCheckServiceDefault({
          scanner: context.scanner,
          groupingService: context.groupingService,
          resolver: context.resolver,
          logger,
        });
        const result = await service.check(expandHome(root), {
          recursive: options.recursive,
          errorsOnly: options.errorsOnly,
        });
        if (isErr(result)) {
          logger.error({ error: result.error })`掃描失敗: ${result.error.message}`;
          process.exitCode = 1;
          return;
        }

        const report = result.value;
        for (const row of report.rows) {
          logger.info({
            emoji: statusEmoji[row.status],
          })`${row.status} ${path.join(row.directory, row.key)} 檔名=${row.fileNameDate ?? "-"} 拍攝=${row.metadataDate ?? "-"}`;
        }
        if (report.mismatch > 0) {
          await context.writer.dump("檔名日期檢查", report);
        }
      } finally {
        await dispose(context.chain);
      }
    });
}
