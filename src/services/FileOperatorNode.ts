import fs from "node:fs/promises";

import type { Logger } from "~shared/Logger";

import { errorCode, exists } from "@/utils/helper";

import type { FileOperator } from "./FileOperator";

export class FileOperatorNode implements FileOperator {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("FileOperatorNode");
  }

  exists(path: string): Promise<boolean> {
    return exists(path);
  }

  async size(path: string): Promise<number> {
    return (await fs.stat(path)).size;
  }

  async makeDirs(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  async copy(from: string, to: string): Promise<void> {
    await fs.copyFile(from, to, fs.constants.COPYFILE_EXCL);
  }

  async move(from: string, to: string): Promise<void> {
    // rename 在 POSIX 上會覆蓋目的地，先檢查
    if (await exists(to)) {
      throw Object.assign(new Error(`目的地已存在: ${to}`), { code: "EEXIST" });
    }
    try {
      await fs.rename(from, to);
      return;
    } catch (error) {
      if (errorCode(error) !== "EXDEV") throw error;
    }

    this.logger.debug()`跨磁碟搬移，改為複製後刪除: ${from}`;
    await fs.copyFile(from, to, fs.constants.COPYFILE_EXCL);
    const [sourceSize, targetSize] = await Promise.all([
      this.size(from),
      this.size(to),
    ]);
    if (sourceSize !== targetSize) {
      await fs.unlink(to);
      throw Object.assign(
        new Error(`複製後大小不符 (${sourceSize} != ${targetSize}): ${to}`),
        { code: "EVERIFY" }
      );
    }
    await fs.unlink(from);
  }
}
