import kleur from "kleur";
import { readFile, rm } from "node:fs/promises";
import path from "node:path";
import { describe, expect, test } from "vitest";

import { type LogRecord, type LogTransport, LoggerConsole } from "~shared/Logger";
import { RfsTransport } from "~shared/Logger/RfsTransport";
import { dispose } from "~shared/utils/Disposeable";

function captureConsole(fn: () => void): { output: string; errorOutput: string } {
  let logOut = "";
  let errorOut = "";
  const original = {
    debug: console.debug,
    info: console.info,
    warn: console.warn,
    error: console.error,
  };

  console.debug = (...args) => (logOut += args.join(" ") + "\n");
  console.info = (...args) => (logOut += args.join(" ") + "\n");
  console.warn = (...args) => (logOut += args.join(" ") + "\n");
  console.error = (...args) => (errorOut += args.join(" ") + "\n");

  try {
    fn();
  } finally {
    Object.assign(console, original);
  }
  return { output: logOut.trim(), errorOutput: errorOut.trim() };
}

function collectingTransport() {
  const records: LogRecord[] = [];
  const transport: LogTransport = {
    write(record) {
      records.push(record);
    },
    async [Symbol.asyncDispose]() {},
  };
  return { records, transport };
}

const emojiMap = {
  start: "🏁",
  done: "✅",
  info: "ℹ️",
  error: "❌",
  warn: "⚠️",
  debug: "🐛",
};

describe("LoggerConsole", () => {
  test("context 的 emoji 優先於對照表", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const { output } = captureConsole(() =>
      logger.info({ event: "start", emoji: "🌟", groupKey: "IMG_0001" }, "開始")
    );
    expect(output).toBe('🌟 start: 開始 {"groupKey":"IMG_0001"}');
  });

  test("沒有 emoji 時依事件名稱挑選", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => logger.info({ event: "start" }, "掃描開始"));
    expect(output).toBe("🏁 start: 掃描開始");
  });

  test("沒有事件時依層級挑選", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => logger.info("預設 info emoji"));
    expect(output).toBe("ℹ️ info: 預設 info emoji");
  });

  test("extend 的 emoji 會被子 logger 繼承，warn 以層級為準", () => {
    const base = new LoggerConsole("info", [], {}, emojiMap).extend("build", {
      emoji: "🌟",
    });
    expect(captureConsole(() => base.info()`A`).output).toBe("🌟 build:info: A");

    const resolve = base.extend("resolve", { emoji: "🚀" });
    expect(captureConsole(() => resolve.info()`B`).output).toBe("🚀 build:resolve:info: B");
    expect(captureConsole(() => resolve.info({ event: "start" })`C`).output).toBe(
      "🏁 build:resolve:start: C"
    );
    expect(captureConsole(() => resolve.warn()`D`).output).toBe("⚠️ build:resolve:warn: D");

    const plain = base.extend("plain");
    expect(captureConsole(() => plain.info()`E`).output).toBe("🌟 build:plain:info: E");
  });

  test("template 的值會上色並記錄在 context", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    const { output } = captureConsole(() => {
      logger.info({ event: "done", count: 10 })`完成 ${10} 個群組`;
    });
    expect(output).toBe(`✅ done: 完成 ${kleur.green("10")} 個群組 {"count":10,"__0":10}`);
  });

  test("append 只合併 context，不改變命名空間", () => {
    const root = new LoggerConsole("debug", [], {}, emojiMap);
    const logger = root.append({ root: "/photos" });
    const { output } = captureConsole(() => logger.info({ event: "done" }, "完成"));
    expect(output).toBe('✅ done: 完成 {"root":"/photos"}');
  });

  test("低於門檻的層級不輸出，withLevel 可調整", () => {
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    expect(captureConsole(() => logger.debug("隱藏")).output).toBe("");

    const verbose = logger.withLevel("debug");
    expect(captureConsole(() => verbose.debug("顯示")).output).toBe("🐛 debug: 顯示");
  });

  test("error 輸出到 stderr 並附上 stack", () => {
    const err = new Error("爆炸了");
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const { output, errorOutput } = captureConsole(() => logger.error({ error: err }, "錯誤"));
    expect(output).toBe("");
    expect(errorOutput.startsWith("❌ error: 錯誤\nError: 爆炸了")).toBe(true);
  });

  test("非 Error 的 error 保留在 context", () => {
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const { errorOutput } = captureConsole(() =>
      logger.error({ error: { type: "SCAN_FAILED" } })`掃描失敗`
    );
    expect(errorOutput).toBe('❌ error: 掃描失敗 {"error":{"type":"SCAN_FAILED"}}');
  });

  test("transport 收到結構化的紀錄，extend 出來的 logger 共用 transport", () => {
    const { records, transport } = collectingTransport();
    const root = new LoggerConsole("info", [], {}, emojiMap);
    root.attachTransport(transport);
    const child = root.extend("rename", { mode: "move" });

    captureConsole(() => child.info({ event: "done" })`搬移 ${3} 個檔案`);

    expect(records).toHaveLength(1);
    expect(records[0]).toMatchObject({
      level: "info",
      path: "rename",
      event: "done",
      msg: "搬移 3 個檔案",
      context: { mode: "move", __0: 3 },
    });
  });

  test("dispose 後釋放所有 transport", async () => {
    let disposed = 0;
    const logger = new LoggerConsole("info", [], {}, emojiMap);
    logger.attachTransport({
      write() {},
      async [Symbol.asyncDispose]() {
        disposed++;
      },
    });
    await dispose(logger);
    await dispose(logger);
    expect(disposed).toBe(1);
  });

  test("使用 RfsTransport", async () => {
    const dir = "test/tmp/logs";
    await rm(dir, { recursive: true, force: true });
    const logger = new LoggerConsole("debug", [], {}, emojiMap);
    const transport = new RfsTransport({ filename: "test.log", rfs: { path: dir } });
    logger.attachTransport(transport);

    captureConsole(() => {
      logger.info({ event: "start", emoji: "🌟", groupKey: "IMG_0001" }, "開始");
      logger.error({ error: new Error("爆炸了"), event: "error" }, "錯誤");
    });
    await dispose(transport);

    const lines = (await readFile(path.join(dir, "test.log"), "utf8"))
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatchObject({
      level: "info",
      event: "start",
      msg: "開始",
      groupKey: "IMG_0001",
    });
    expect(lines[1]).toMatchObject({
      level: "error",
      event: "error",
      msg: "錯誤",
      err: { name: "Error", message: "爆炸了" },
    });
  });
});
