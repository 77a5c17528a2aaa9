import kleur from "kleur";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type SerializedError,
  type TemplateLog,
  logLevels,
} from "./Logger";

export type EmojiMap = Record<string, string>;

const RESERVED_KEYS = new Set(["event", "emoji", "error"]);

/** warn / error 的 emoji 優先於 extend 時指定的 emoji */
const LOUD_LEVELS: ReadonlySet<LogLevel> = new Set(["warn", "error"]);

export class LoggerConsole implements Logger {
  readonly trace: LogMethod = this.createMethod("trace");
  readonly debug: LogMethod = this.createMethod("debug");
  readonly info: LogMethod = this.createMethod("info");
  readonly warn: LogMethod = this.createMethod("warn");
  readonly error: LogMethod = this.createMethod("error");

  constructor(
    private readonly level: LogLevel,
    private readonly transports: LogTransport[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly path: readonly string[] = []
  ) {}

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      [...this.path, name]
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.transports,
      { ...this.context, ...context },
      this.emojiMap,
      this.path
    );
  }

  withLevel(level: LogLevel): LoggerConsole {
    return new LoggerConsole(
      level,
      this.transports,
      this.context,
      this.emojiMap,
      this.path
    );
  }

  attachTransport(transport: LogTransport): void {
    this.transports.push(transport);
  }

  async [Symbol.asyncDispose](): Promise<void> {
    const transports = this.transports.splice(0);
    for (const transport of transports) {
      await transport[Symbol.asyncDispose]();
    }
  }

  private createMethod(level: LogLevel): LogMethod {
    const logger = this;
    function log(message: string): void;
    function log(context: LogContext, message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | undefined {
      if (typeof contextOrMessage === "string") {
        logger.write(level, {}, contextOrMessage, contextOrMessage);
        return undefined;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        logger.write(level, context, message, message);
        return undefined;
      }
      return (strings, ...values) => {
        const plain: string[] = [];
        const colored: string[] = [];
        const templateValues: Record<string, unknown> = {};
        strings.forEach((str, i) => {
          plain.push(str);
          colored.push(str);
          if (i < values.length) {
            const value = values[i];
            plain.push(String(value));
            colored.push(kleur.green(String(value)));
            templateValues[`__${i}`] = value;
          }
        });
        logger.write(
          level,
          { ...context, ...templateValues },
          plain.join(""),
          colored.join("")
        );
      };
    }
    return log;
  }

  private isEnabled(level: LogLevel): boolean {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private resolveEmoji(level: LogLevel, context: LogContext): string {
    if (context.emoji) return context.emoji;
    if (context.event && this.emojiMap[context.event])
      return this.emojiMap[context.event];
    if (LOUD_LEVELS.has(level) && this.emojiMap[level])
      return this.emojiMap[level];
    if (this.context.emoji) return this.context.emoji;
    return this.emojiMap[level] ?? "";
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    message: string,
    coloredMessage: string
  ): void {
    if (!this.isEnabled(level)) return;

    const event = callContext.event;
    const merged: Record<string, unknown> = {};
    for (const [key, value] of Object.entries({
      ...this.context,
      ...callContext,
    })) {
      if (!RESERVED_KEYS.has(key)) merged[key] = value;
    }

    const error = callContext.error;
    const err = error instanceof Error ? serializeError(error) : undefined;
    if (error !== undefined && !(error instanceof Error)) {
      merged.error = error;
    }

    const scope = this.path.length > 0 ? `${this.path.join(":")}:` : "";
    const emoji = this.resolveEmoji(level, callContext);
    const contextJson =
      Object.keys(merged).length > 0 ? ` ${safeStringify(merged)}` : "";
    const line = `${emoji ? `${emoji} ` : ""}${scope}${event ?? level}: ${coloredMessage}${contextJson}`;

    switch (level) {
      case "error":
        console.error(err?.stack ? `${line}\n${err.stack}` : line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "info":
        console.info(line);
        break;
      default:
        console.debug(line);
    }

    const record: LogRecord = {
      level,
      time: new Date().toISOString(),
      path: this.path.join(":"),
      event,
      msg: message,
      context: merged,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

function serializeError(error: Error): SerializedError {
  return { name: error.name, message: error.message, stack: error.stack };
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable context]";
  }
}
