import { LoggerConsole, isLogLevel } from "~shared/Logger";

/**
 * 測試用 logger：預設只輸出 error，可用 TEST_LOG_LEVEL 調整。
 */
export function buildTestLogger(): LoggerConsole {
  const level = process.env.TEST_LOG_LEVEL ?? "error";
  return new LoggerConsole(isLogLevel(level) ? level : "error");
}
