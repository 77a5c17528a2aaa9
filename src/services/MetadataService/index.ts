import { ExifTool } from "exiftool-vendored";

import type { MetadataStrategy } from "./MetadataStrategy";
import { MetadataStrategyExifTool } from "./MetadataStrategyExifTool";
import { MetadataStrategyExifr } from "./MetadataStrategyExifr";
import { MetadataStrategyFileName } from "./MetadataStrategyFileName";

export * from "./MetadataResolver";
export * from "./MetadataResolverDefault";
export * from "./MetadataStrategy";
export * from "./MetadataStrategyExifTool";
export * from "./MetadataStrategyExifr";
export * from "./MetadataStrategyFileName";

export const metadataBackendNames = ["exiftool", "exifr", "filename"] as const;

export type MetadataBackendName = (typeof metadataBackendNames)[number];

export function isMetadataBackendName(value: string): value is MetadataBackendName {
  return metadataBackendNames.some((name) => name === value);
}

export type MetadataStrategyChain = AsyncDisposable & {
  strategies: MetadataStrategy[];
};

/**
 * 依名稱順序建立後端鏈。ExifTool 子行程只在名單中有 exiftool 時才啟動，
 * 結束時必須呼叫 `Symbol.asyncDispose` 關閉。
 */
export function createMetadataStrategies(
  names: readonly MetadataBackendName[],
  options: { exiftoolTaskTimeoutMillis: number }
): MetadataStrategyChain {
  const disposables: AsyncDisposable[] = [];
  const strategies = names.map((name): MetadataStrategy => {
    switch (name) {
      case "exiftool": {
        const strategy = new MetadataStrategyExifTool(
          new ExifTool({
            maxProcs: 1,
            taskTimeoutMillis: options.exiftoolTaskTimeoutMillis,
          })
        );
        disposables.push(strategy);
        return strategy;
      }
      case "exifr":
        return new MetadataStrategyExifr();
      case "filename":
        return new MetadataStrategyFileName();
    }
  });

  return {
    strategies,
    async [Symbol.asyncDispose]() {
      for (const disposable of disposables.splice(0)) {
        await disposable[Symbol.asyncDispose]();
      }
    },
  };
}
