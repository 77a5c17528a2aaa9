import type { CAC } from "cac";

import type { Logger } from "~shared/Logger";
import { dispose } from "~shared/utils/Disposeable";
import { isErr } from "~shared/utils/Result";

import { GroupDatabaseStoreJson } from "@/services/GroupDatabaseStoreJson";
import { LibraryBuildServiceDefault } from "@/services/LibraryBuildServiceDefault";
import { expandHome } from "@/utils/helper";

import { type VerboseOption, commandLogger, createLibraryContext } from "./AppContext";

type BuildOptions = VerboseOption & {
  output?: string;
  recursive: boolean;
  includeHidden: boolean;
};

export function registerBuild(cli: CAC, baseLogger: Logger) {
  cli
    .command("build <directory>", "掃描目錄、分組並讀取中繼資料，輸出群組資料庫")
    .option("-o, --output <path>", "資料庫輸出路徑，預設為 PHOTO_DB_PATH")
    .option("--no-recursive", "只掃描最上層目錄")
    .option("--include-hidden", "包含 . 開頭的檔案與資料夾", { default: false })
    .option("-v, --verbose", "顯示除錯訊息", { default: false })
    .action(async (directory: string, options: BuildOptions) => {
      const logger = commandLogger(baseLogger, "build", options);
      const context = createLibraryContext(logger);
      try {
        const service = new LibraryBuildServiceDefault({
          scanner: context.scanner,
          groupingService: context.groupingService,
          resolver: context.resolver,
          logger,
        });
        const result = await service.build(expandHome(directory), {
          recursive: options.recursive,
          includeHidden: options.includeHidden,
        });
        if (isErr(result)) {
          logger.error({ error: result.error })`掃描失敗: ${result.error.message}`;
          process.exitCode = 1;
          return;
        }

        const { database, summary, failures } = result.value;
        if (database.groups.length === 0) {
          logger.warn({ emoji: "🫙" })`${summary.root} 沒有找到任何相片`;
        }

        const output = expandHome(options.output ?? context.config.PHOTO_DB_PATH);
        const saved = await new GroupDatabaseStoreJson().save(output, database);
        if (isErr(saved)) {
          logger.error({ error: saved.error })`${saved.error.message}`;
          process.exitCode = 1;
          return;
        }
        logger.info({ emoji: "💾" })`已寫入資料庫 ${output}`;

        if (failures.length > 0) {
          await context.writer.dump("中繼資料讀取失敗", failures);
        }
        logger.info({
          emoji: "📊",
          formats: summary.formats,
          metadataByBackend: summary.metadataByBackend,
        })`檔案 ${summary.files}，群組 ${summary.groups}（有效 ${summary.valid}、無效 ${summary.invalid}），多格式群組 ${summary.multiFormatGroups}，不支援 ${summary.unsupported}，缺少中繼資料 ${summary.metadataMissing}`;
      } finally {
        await dispose(context.chain);
      }
    });
}
