import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, isErr, ok } from "~shared/utils/Result";

import type { FileFormat, PhotoGroup } from "@/types";

import type { FileSystemScanner, ScanError } from "./FileSystemScanner";
import type { BuildResult, BuildSummary, LibraryBuildService } from "./LibraryBuildService";
import {
  type ExtractionFailure,
  type MetadataResolver,
  applyResolution,
} from "./MetadataService";
import type { PhotoGroupingService } from "./PhotoGroupingService";

function emptyFormatCounts(): Record<FileFormat, number> {
  return { jpeg: 0, heic: 0, other: 0, raw: 0, live_photo: 0, sidecar: 0 };
}

export function summarizeGroups(
  root: string,
  groups: readonly PhotoGroup[],
  totalFiles: number,
  unsupported: number
): BuildSummary {
  const formats = emptyFormatCounts();
  const metadataByBackend: Record<string, number> = {};
  let multiFormatGroups = 0;
  let metadataMissing = 0;

  for (const group of groups) {
    const groupFormats = new Set<FileFormat>();
    for (const file of group.files) {
      formats[file.format]++;
      groupFormats.add(file.format);
    }
    if (groupFormats.size > 1) multiFormatGroups++;
    if (group.metadataSource) {
      const backend = group.metadataSource.backend;
      metadataByBackend[backend] = (metadataByBackend[backend] ?? 0) + 1;
    } else {
      metadataMissing++;
    }
  }

  const valid = groups.filter((g) => g.valid).length;
  return {
    root,
    files: totalFiles,
    groups: groups.length,
    valid,
    invalid: groups.length - valid,
    unsupported,
    formats,
    multiFormatGroups,
    metadataByBackend,
    metadataMissing,
  };
}

export class LibraryBuildServiceDefault implements LibraryBuildService {
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
    this.logger = deps.logger.extend("LibraryBuildServiceDefault");
  }

  async build(
    rootPath: string,
    options: { recursive?: boolean; includeHidden?: boolean } = {}
  ): Promise<Result<BuildResult, ScanError>> {
    const root = path.resolve(rootPath);
    const logger = this.logger.extend("build", { root });
    logger.info({ event: "start" })`開始掃描 ${root}`;

    const scanned = await this.scanner.scan(root, {
      recursive: options.recursive ?? true,
      includeHidden: options.includeHidden ?? false,
    });
    if (isErr(scanned)) return scanned;

    const { groups, unsupported } = this.groupingService.group(scanned.value);
    logger.info({
      emoji: "🗂️",
      files: scanned.value.length,
    })`找到 ${groups.length} 個群組，${unsupported.length} 個不支援的檔案`;
    for (const file of unsupported) {
      logger.debug()`不支援的檔案: ${file}`;
    }

    const resolved: PhotoGroup[] = [];
    const failures: ExtractionFailure[] = [];
    for (const group of groups) {
      const result = await this.resolver.resolve(group);
      if (isErr(result)) {
        failures.push(result.error);
        logger.debug({ key: group.key })`無法取得中繼資料: ${result.error.message}`;
      }
      resolved.push(applyResolution(group, result));
      logger.info({
        emoji: "📷",
        count: resolved.length,
      })`已讀取 ${resolved.length}/${groups.length} 個群組的中繼資料...`;
    }

    const summary = summarizeGroups(
      root,
      resolved,
      scanned.value.length,
      unsupported.length
    );
    logger.info({
      event: "done",
      valid: summary.valid,
      invalid: summary.invalid,
      failures: failures.length,
    })`完成，共 ${summary.groups} 個群組`;

    return ok({
      database: {
        version: 1,
        createdAt: new Date().toISOString(),
        root,
        groups: resolved,
      },
      summary,
      failures,
    });
  }
}
