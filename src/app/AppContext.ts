import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";

import { getAppConfig } from "@/config";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import {
  MetadataResolverDefault,
  type MetadataStrategyChain,
  createMetadataStrategies,
} from "@/services/MetadataService";
import { PhotoGroupingServiceDefault } from "@/services/PhotoGroupingServiceDefault";

export type VerboseOption = { verbose?: boolean };

export function commandLogger(baseLogger: Logger, name: string, options: VerboseOption) {
  return (options.verbose ? baseLogger.withLevel("debug") : baseLogger).extend(name);
}

/**
 * build / validate 共用的掃描與中繼資料元件。
 * 用完必須 dispose `chain`，否則 ExifTool 子行程不會結束。
 */
export function createLibraryContext(logger: Logger) {
  const config = getAppConfig();
  const chain: MetadataStrategyChain = createMetadataStrategies(config.METADATA_BACKENDS, {
    exiftoolTaskTimeoutMillis: config.EXIFTOOL_TASK_TIMEOUT_MS,
  });
  logger.debug({
    backends: config.METADATA_BACKENDS,
  })`中繼資料後端: ${config.METADATA_BACKENDS.join(" → ")}`;
  return {
    config,
    chain,
    scanner: new FileSystemScannerDefault(),
    groupingService: new PhotoGroupingServiceDefault(),
    resolver: new MetadataResolverDefault({ strategies: chain.strategies, logger }),
    writer: new DumpWriterDefault(logger, config.REPORT_DIR),
  };
}
