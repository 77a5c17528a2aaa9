export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，會顯示在訊息前並用來挑選 emoji */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type SerializedError = {
  name: string;
  message: string;
  stack?: string;
};

export type LogRecord = {
  level: LogLevel;
  time: string;
  /** extend 累積的命名空間，以 `:` 串接 */
  path: string;
  event?: string;
  msg: string;
  context: Record<string, unknown>;
  err?: SerializedError;
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (message: string): void;
  (context: LogContext, message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger extends AsyncDisposable {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger：命名空間加上 name，並合併 context */
  extend(name: string, context?: LogContext): Logger;

  /** 只合併 context，不改變命名空間 */
  append(context: LogContext): Logger;

  withLevel(level: LogLevel): Logger;

  attachTransport(transport: LogTransport): void;

  /** 釋放所有 transport（extend 出來的 logger 共用同一組 transport） */
  [Symbol.asyncDispose](): Promise<void>;
}

export function isLogLevel(value: string): value is LogLevel {
  return logLevels.some((level) => level === value);
}
