import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import type {
  DateCheckReport,
  DateCheckRow,
  FileNameDateCheckService,
} from "./FileNameDateCheckService";
import type { FileSystemScanner, ScanError } from "./FileSystemScanner";
import { captureTimeFromParts } from "./MetadataService/MetadataValueHelper";
import type { MetadataResolver } from "./MetadataService";
import type { PhotoGroupingService } from "./PhotoGroupingService";

const LEADING_DATE_RE = /^((?:18|19|20)\d{2})-?(\d{2})-?(\d{2})(?!\d)/;

/**
 * 取出檔名開頭的日期，例如 `20240315_EOS R5_001`、`2024-03-15_001`。
 */
export function leadingFileNameDate(key: string): string | undefined {
  const m = LEADING_DATE_RE.exec(key);
  if (!m) return undefined;
  return captureTimeFromParts(Number(m[1]), Number(m[2]), Number(m[3]))?.slice(0, 10);
}

export class FileNameDateCheckServiceDefault implements FileNameDateCheckService {
  private readonly scanner: FileSystemScanner;
  private readonly groupingService: PhotoGroupingService;
  private readonly resolver: MetadataResolver;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    groupingService: PhotoGroupingService;
    resolver: MetadataResolver;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.groupingService = deps.groupingService;
    this.resolver = deps.resolver;
    this.logger = deps.logger.extend("FileNameDateCheckServiceDefault");
  }

  async check(
    rootPath: string,
    options: { recursive?: boolean; errorsOnly?: boolean } = {}
  ): Promise<Result<DateCheckReport, ScanError>> {
    const root = path.resolve(rootPath);
    const logger = this.logger.extend("check", { root });

    const scanned = await this.scanner.scan(root, {
      recursive: options.recursive ?? true,
    });
    if (isErr(scanned)) return scanned;
    const { groups } = this.groupingService.group(scanned.value);
    logger.info({ event: "start" })`檢查 ${groups.length} 個群組`;

    const rows: DateCheckRow[] = [];
    for (const group of groups) {
      const resolved = await this.resolver.resolve(group);
      const fileNameDate = leadingFileNameDate(group.key);
      const metadataDate = isErr(resolved)
        ? undefined
        : resolved.value.metadata.captureTime?.slice(0, 10);

      let status: DateCheckRow["status"] = "UNKNOWN";
      if (fileNameDate && metadataDate) {
        status = fileNameDate === metadataDate ? "OK" : "MISMATCH";
      }
      if (status === "MISMATCH") {
        logger.warn({
          key: group.key,
        })`檔名日期 ${fileNameDate} 與拍攝日期 ${metadataDate} 不符`;
      }
      rows.push({
        key: group.key,
        directory: group.directory,
        ...(fileNameDate ? { fileNameDate } : {}),
        ...(metadataDate ? { metadataDate } : {}),
        status,
      });
    }

    const count = (status: DateCheckRow["status"]) =>
      rows.filter((row) => row.status === status).length;
    const report: DateCheckReport = {
      rows: options.errorsOnly ? rows.filter((row) => row.status !== "OK") : rows,
      ok: count("OK"),
      mismatch: count("MISMATCH"),
      unknown: count("UNKNOWN"),
    };
    logger.info({
      event: "done",
    })`OK ${report.ok}，不符 ${report.mismatch}，無法判斷 ${report.unknown}`;
    return ok(report);
  }
}
