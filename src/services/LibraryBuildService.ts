import type { Result } from "~shared/utils/Result";

import type { FileFormat } from "@/types";

import type { ScanError } from "./FileSystemScanner";
import type { GroupDatabase } from "./GroupDatabaseStore";
import type { ExtractionFailure } from "./MetadataService";

export type BuildSummary = {
  root: string;
  /** 掃描到的檔案數（含不支援的副檔名） */
  files: number;
  groups: number;
  valid: number;
  invalid: number;
  unsupported: number;
  formats: Record<FileFormat, number>;
  /** 含兩種以上格式的群組，例如 RAW + JPEG */
  multiFormatGroups: number;
  metadataByBackend: Record<string, number>;
  metadataMissing: number;
};

export type BuildResult = {
  database: GroupDatabase;
  summary: BuildSummary;
  failures: ExtractionFailure[];
};

export interface LibraryBuildService {
  /**
   * 掃描 → 分組 → 解析中繼資料，產生資料庫快照。不會寫入任何檔案。
   */
  build(
    root: string,
    options?: { recursive?: boolean; includeHidden?: boolean }
  ): Promise<Result<BuildResult, ScanError>>;
}
