import type { Logger } from "~shared/Logger";
import { type Result, err, isErr, ok } from "~shared/utils/Result";

import type { FileRole, Metadata, PhotoFile, PhotoGroup } from "@/types";

import type { ExtractError, MetadataStrategy } from "./MetadataStrategy";
import type {
  ExtractionAttempt,
  ExtractionFailure,
  MetadataResolver,
  Resolution,
} from "./MetadataResolver";

const rolePriority: Record<FileRole, number> = {
  raw: 0,
  primary: 1,
  sidecar: 2,
};

/**
 * 挑出中繼資料來源檔案。同角色時取發現順序較前者。
 */
export function selectMetadataSource(group: Pick<PhotoGroup, "files">): PhotoFile | undefined {
  let best: PhotoFile | undefined;
  for (const file of group.files) {
    if (!best || rolePriority[file.role] < rolePriority[best.role]) {
      best = file;
    }
  }
  return best;
}

/**
 * 將解析結果寫回群組。失敗時 metadata 清空、移除 metadataSource。
 */
export function applyResolution(
  group: PhotoGroup,
  result: Result<Resolution, ExtractionFailure>
): PhotoGroup {
  const { metadataSource: _previous, ...rest } = group;
  if (isErr(result)) {
    return { ...rest, metadata: {} };
  }
  return {
    ...rest,
    metadata: result.value.metadata,
    metadataSource: result.value.source,
  };
}

export class MetadataResolverDefault implements MetadataResolver {
  private readonly strategies: readonly MetadataStrategy[];
  private readonly logger: Logger;

  constructor(deps: { strategies: readonly MetadataStrategy[]; logger: Logger }) {
    this.strategies = deps.strategies;
    this.logger = deps.logger.extend("MetadataResolverDefault");
  }

  async resolve(group: PhotoGroup): Promise<Result<Resolution, ExtractionFailure>> {
    const source = selectMetadataSource(group);
    if (!source) {
      return err(this.failure(group, "", [], "群組沒有任何檔案"));
    }

    const logger = this.logger.extend("resolve", { key: group.key });
    const attempts: ExtractionAttempt[] = [];

    for (const strategy of this.strategies) {
      if (!strategy.supports(source)) {
        logger.trace()`${strategy.name} 不支援 ${source.extension}，略過`;
        continue;
      }

      let result: Result<Metadata, ExtractError>;
      try {
        result = await strategy.extract(source.path);
      } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.debug({ backend: strategy.name, error })`${strategy.name} 擲出例外，改用下一個後端`;
        attempts.push({ backend: strategy.name, reason });
        continue;
      }

      if (isErr(result)) {
        logger.debug({ backend: strategy.name })`${strategy.name} 失敗: ${result.error.message}`;
        attempts.push({
          backend: strategy.name,
          reason: `${result.error.type}: ${result.error.message}`,
        });
        continue;
      }

      if (result.value.captureTime === undefined) {
        logger.debug({ backend: strategy.name })`${strategy.name} 沒有拍攝時間，改用下一個後端`;
        attempts.push({ backend: strategy.name, reason: "沒有拍攝時間" });
        continue;
      }

      logger.debug({ backend: strategy.name })`由 ${strategy.name} 取得拍攝時間 ${result.value.captureTime}`;
      return ok({
        metadata: result.value,
        source: { path: source.path, backend: strategy.name },
      });
    }

    return err(
      this.failure(
        group,
        source.path,
        attempts,
        attempts.length === 0
          ? `沒有後端支援 ${source.extension}`
          : `所有後端都無法取得拍攝時間`
      )
    );
  }

  private failure(
    group: PhotoGroup,
    sourcePath: string,
    attempts: ExtractionAttempt[],
    message: string
  ): ExtractionFailure {
    return {
      type: "EXTRACTION_FAILED",
      key: group.key,
      directory: group.directory,
      sourcePath,
      attempts,
      message,
    };
  }
}
