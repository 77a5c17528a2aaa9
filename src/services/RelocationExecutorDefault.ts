import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { MoveFile } from "@/types";
import { errorCode, errorMessage } from "@/utils/helper";

import type { FileOperator } from "./FileOperator";
import type {
  GroupRelocationResult,
  RelocationError,
  RelocationExecutor,
  RelocationMode,
  RelocationReport,
} from "./RelocationExecutor";
import type { RenamePlan, RenamePlanEntry } from "./RenamePlanService";

function sameFile(a: string, b: string) {
  return path.resolve(a) === path.resolve(b);
}

/**
 * 一次執行中，前面群組已搬走或已佔用的路徑。
 * 試跑與實際執行都以它判斷檔案是否存在，兩者的結果才會一致。
 */
class PathView {
  private readonly vacated = new Set<string>();
  private readonly claimed = new Set<string>();

  constructor(private readonly fileOperator: FileOperator) {}

  async exists(filePath: string): Promise<boolean> {
    const key = path.resolve(filePath);
    if (this.claimed.has(key)) return true;
    if (this.vacated.has(key)) return false;
    return this.fileOperator.exists(filePath);
  }

  record(operations: MoveFile[], mode: RelocationMode) {
    for (const { from, to } of operations) {
      const target = path.resolve(to);
      this.vacated.delete(target);
      this.claimed.add(target);
      if (mode === "move") {
        const source = path.resolve(from);
        this.claimed.delete(source);
        this.vacated.add(source);
      }
    }
  }
}

export class RelocationExecutorDefault implements RelocationExecutor {
  private readonly fileOperator: FileOperator;
  private readonly logger: Logger;

  constructor(deps: { fileOperator: FileOperator; logger: Logger }) {
    this.fileOperator = deps.fileOperator;
    this.logger = deps.logger.extend("RelocationExecutorDefault");
  }

  async execute(
    plan: RenamePlan,
    options: { mode: RelocationMode; dryRun: boolean }
  ): Promise<RelocationReport> {
    const logger = this.logger.extend("execute", {
      mode: options.mode,
      dryRun: options.dryRun,
    });
    logger.info({
      event: "start",
    })`開始${options.dryRun ? "試跑" : "處理"} ${plan.entries.length} 個群組`;

    const results: GroupRelocationResult[] = [];
    const view = new PathView(this.fileOperator);
    let processed = 0;
    for (const entry of plan.entries) {
      const result = await this.executeEntry(entry, options, view);
      view.record(result.completed, options.mode);
      results.push(result);
      processed++;
      if (result.status === "failed") {
        logger.warn({
          key: entry.group.key,
          errors: result.errors.map((e) => e.type),
        })`${entry.relativePath} 處理失敗: ${result.errors[0]?.message ?? ""}`;
      } else {
        logger.debug({ status: result.status })`(${processed}/${plan.entries.length}) ${entry.relativePath}`;
      }
    }

    const succeeded = results.filter(
      (r) => r.status === "done" || r.status === "planned"
    ).length;
    const failed = results.filter((r) => r.status === "failed").length;
    const unchanged = results.filter((r) => r.status === "unchanged").length;

    const report: RelocationReport = {
      mode: options.mode,
      dryRun: options.dryRun,
      results,
      succeeded,
      failed,
      skipped: unchanged + plan.skipped.length,
    };
    logger.info({
      event: "done",
      succeeded,
      failed,
      skipped: report.skipped,
    })`完成：成功 ${succeeded}，失敗 ${failed}，略過 ${report.skipped}`;
    return report;
  }

  private async executeEntry(
    entry: RenamePlanEntry,
    options: { mode: RelocationMode; dryRun: boolean },
    view: PathView
  ): Promise<GroupRelocationResult> {
    const base = { group: entry.group, relativePath: entry.relativePath };
    const pending = entry.operations.filter((op) => !sameFile(op.from, op.to));
    if (pending.length === 0) {
      return { ...base, status: "unchanged", completed: [], errors: [] };
    }

    const preflightErrors = await this.preflight(pending, view);
    if (preflightErrors.length > 0) {
      return { ...base, status: "failed", completed: [], errors: preflightErrors };
    }
    if (options.dryRun) {
      return { ...base, status: "planned", completed: pending, errors: [] };
    }

    const completed: MoveFile[] = [];
    const errors: RelocationError[] = [];
    for (const operation of pending) {
      const error = await this.apply(operation, options.mode);
      if (error) errors.push(error);
      else completed.push(operation);
    }
    return {
      ...base,
      status: errors.length > 0 ? "failed" : "done",
      completed,
      errors,
    };
  }

  /**
   * 動手前先確認整個群組：來源存在、目的地沒有其他檔案。
   */
  private async preflight(operations: MoveFile[], view: PathView): Promise<RelocationError[]> {
    const errors: RelocationError[] = [];
    for (const { from, to } of operations) {
      if (!(await view.exists(from))) {
        errors.push({ type: "SOURCE_MISSING", from, to, message: `來源不存在: ${from}` });
        continue;
      }
      if (await view.exists(to)) {
        errors.push({
          type: "DESTINATION_EXISTS",
          from,
          to,
          message: `目的地已有檔案: ${to}`,
        });
      }
    }
    return errors;
  }

  private async apply(
    operation: MoveFile,
    mode: RelocationMode
  ): Promise<RelocationError | undefined> {
    const { from, to } = operation;
    try {
      await this.fileOperator.makeDirs(path.dirname(to));
    } catch (error) {
      return { type: "MKDIR_FAILED", from, to, message: `建立目錄失敗: ${errorMessage(error)}` };
    }

    try {
      if (mode === "copy") await this.fileOperator.copy(from, to);
      else await this.fileOperator.move(from, to);
      return undefined;
    } catch (error) {
      switch (errorCode(error)) {
        case "EEXIST":
          return { type: "DESTINATION_EXISTS", from, to, message: `目的地已有檔案: ${to}` };
        case "ENOENT":
          if (!(await this.fileOperator.exists(from))) {
            return { type: "SOURCE_MISSING", from, to, message: `來源不存在: ${from}` };
          }
          break;
        case "EVERIFY":
          return { type: "VERIFY_FAILED", from, to, message: errorMessage(error) };
      }
      return {
        type: mode === "copy" ? "COPY_FAILED" : "MOVE_FAILED",
        from,
        to,
        message: `${mode === "copy" ? "複製" : "搬移"}失敗: ${errorMessage(error)}`,
      };
    }
  }
}
