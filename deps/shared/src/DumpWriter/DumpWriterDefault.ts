import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { DumpWriter } from "./DumpWriter";

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;
  private counter = 0;

  constructor(
    logger: Logger,
    private readonly dir = "reports"
  ) {
    this.logger = logger.extend("DumpWriter");
  }

  async dump(name: string, data: unknown): Promise<string> {
    this.counter++;
    const stamp = format(new Date(), "yyyyMMdd-HHmmss");
    const safeName = name.replace(/[<>:"/\\|?*\s]+/g, "_");
    const filePath = path.join(
      this.dir,
      `${stamp}-${String(this.counter).padStart(3, "0")}-${safeName}.json`
    );
    await mkdir(this.dir, { recursive: true });
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", event: "dump" })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
