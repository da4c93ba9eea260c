import kleur from "kleur";

import { dispose } from "~shared/utils/Disposeable";

import {
  type LogContext,
  type LogLevel,
  type LogMethod,
  type LogRecord,
  type LogTransport,
  type Logger,
  type TemplateLog,
  logLevels,
} from "./Logger";

export type EmojiMap = Record<string, string>;

export class LoggerConsole implements Logger {
  readonly trace: LogMethod;
  readonly debug: LogMethod;
  readonly info: LogMethod;
  readonly warn: LogMethod;
  readonly error: LogMethod;

  constructor(
    private readonly level: LogLevel,
    private readonly path: string[] = [],
    private readonly context: LogContext = {},
    private readonly emojiMap: EmojiMap = {},
    private readonly transports: LogTransport[] = []
  ) {
    this.trace = this.method("trace");
    this.debug = this.method("debug");
    this.info = this.method("info");
    this.warn = this.method("warn");
    this.error = this.method("error");
  }

  extend(name: string, context: LogContext = {}): LoggerConsole {
    return new LoggerConsole(
      this.level,
      [...this.path, name],
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  append(context: LogContext): LoggerConsole {
    return new LoggerConsole(
      this.level,
      this.path,
      { ...this.context, ...context },
      this.emojiMap,
      this.transports
    );
  }

  attachTransport(transport: LogTransport) {
    // 共用同一個陣列，extend 出去的子 logger 也會收到
    this.transports.push(transport);
  }

  /** 關閉所有 transport，extend 出去的子 logger 一併停止寫入 */
  async [Symbol.asyncDispose]() {
    for (const transport of this.transports.splice(0)) {
      await dispose(transport);
    }
  }

  private method(level: LogLevel): LogMethod {
    const logger = this;
    function log(context: LogContext, message: string): void;
    function log(message: string): void;
    function log(context?: LogContext): TemplateLog;
    function log(
      contextOrMessage?: LogContext | string,
      message?: string
    ): TemplateLog | undefined {
      if (typeof contextOrMessage === "string") {
        const stack = callSite(level, contextOrMessage, log);
        logger.write(level, {}, contextOrMessage, contextOrMessage, stack);
        return undefined;
      }
      const context = contextOrMessage ?? {};
      if (message !== undefined) {
        const stack = callSite(level, message, log);
        logger.write(level, context, message, message, stack);
        return undefined;
      }
      const template: TemplateLog = (strings, ...values) => {
        const indexed: Record<string, unknown> = {};
        let plain = strings[0] ?? "";
        let colored = strings[0] ?? "";
        values.forEach((value, i) => {
          indexed[`__${i}`] = value;
          const text = stringify(value);
          const tail = strings[i + 1] ?? "";
          plain += text + tail;
          colored += kleur.green(text) + tail;
        });
        logger.write(
          level,
          { ...context, ...indexed },
          plain,
          colored,
          callSite(level, plain, template)
        );
      };
      return template;
    }
    return log;
  }

  private enabled(level: LogLevel) {
    return logLevels.indexOf(level) >= logLevels.indexOf(this.level);
  }

  private write(
    level: LogLevel,
    callContext: LogContext,
    plainMessage: string,
    coloredMessage: string,
    stack: string | undefined
  ) {
    if (!this.enabled(level)) return;

    const { event, emoji, error, ...rest } = { ...this.context, ...callContext };
    const resolvedEvent = callContext.event ?? event ?? level;
    // warn/error 的 level emoji 優先於繼承來的 context emoji
    const resolvedEmoji =
      callContext.emoji ??
      (callContext.event ? this.emojiMap[callContext.event] : undefined) ??
      (level === "warn" || level === "error"
        ? this.emojiMap[level]
        : undefined) ??
      emoji ??
      this.emojiMap[resolvedEvent] ??
      this.emojiMap[level] ??
      "";

    const err = toErrorInfo(error, plainMessage, stack);
    const label = [...this.path, resolvedEvent].join(":");
    const extra = Object.keys(rest).length > 0 ? ` ${safeJson(rest)}` : "";
    const line = `${resolvedEmoji} ${label}: ${coloredMessage}${extra}`.trim();

    switch (level) {
      case "trace":
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.info(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(err?.stack ? `${line}\n${err.stack}` : line);
        break;
    }

    const record: LogRecord = {
      time: new Date().toISOString(),
      level,
      path: this.path,
      event: resolvedEvent,
      msg: plainMessage,
      context: rest,
      err,
    };
    for (const transport of this.transports) {
      transport.write(record);
    }
  }
}

/** error 等級記下呼叫者的位置，stack 從 fn 的呼叫端開始 */
function callSite(
  level: LogLevel,
  message: string,
  fn: Function
): string | undefined {
  if (level !== "error") return undefined;
  const captured = new Error(message);
  Error.captureStackTrace(captured, fn);
  return captured.stack;
}

function toErrorInfo(
  error: unknown,
  message: string,
  callStack: string | undefined
): LogRecord["err"] {
  if (error instanceof Error) {
    return { name: error.name, message: error.message, stack: error.stack };
  }
  if (error !== undefined) {
    return { name: "Error", message: stringify(error), stack: callStack };
  }
  if (callStack !== undefined) {
    // 沒有附 error 時補上呼叫位置
    return { name: "Error", message, stack: callStack };
  }
  return undefined;
}

function stringify(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "object" && value !== null) return safeJson(value);
  return String(value);
}

function safeJson(value: unknown) {
  try {
    return JSON.stringify(value);
  } catch {
    return "[unserializable]";
  }
}
