export const logLevels = ["trace", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof logLevels)[number];

export type LogContext = {
  /** 事件名稱，未指定時以 level 代替 */
  event?: string;
  emoji?: string;
  error?: unknown;
  [key: string]: unknown;
};

export type LogRecord = {
  time: string;
  level: LogLevel;
  path: string[];
  event: string;
  msg: string;
  context: Record<string, unknown>;
  err?: { name: string; message: string; stack?: string };
};

export interface LogTransport extends AsyncDisposable {
  write(record: LogRecord): void;
}

export type TemplateLog = (
  strings: TemplateStringsArray,
  ...values: unknown[]
) => void;

export interface LogMethod {
  (context: LogContext, message: string): void;
  (message: string): void;
  (context?: LogContext): TemplateLog;
}

export interface Logger extends AsyncDisposable {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;

  /** 建立子 logger，name 會接在 path 之後 */
  extend(name: string, context?: LogContext): Logger;

  /** 合併 context，但不改變 path */
  append(context: LogContext): Logger;

  attachTransport(transport: LogTransport): void;
}
