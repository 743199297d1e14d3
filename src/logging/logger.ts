/**
 * Logger
 * 標準エラー出力へのログ（ASYNC_FSM_SILENT=1 または NODE_ENV=test で抑止）
 */

import { z } from "zod";

/** ログレベル */
export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const DEFAULT_LEVEL: LogLevel = "info";

/**
 * エンジンが利用するロガー
 * テストでは vi.fn() で差し替える
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/**
 * ロガー生成オプション
 */
export interface LoggerOptions {
  /** 未指定時は環境変数から解決 */
  level?: LogLevel;
  /** 出力先（デフォルト: console.error） */
  write?: (...args: unknown[]) => void;
}

/**
 * 環境変数からログレベルを解決
 * 不正な値はデフォルトにフォールバック
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.ASYNC_FSM_SILENT === "1" || env.NODE_ENV === "test") {
    return "silent";
  }
  const result = LogLevelSchema.safeParse(env.ASYNC_FSM_LOG_LEVEL?.toLowerCase());
  return result.success ? result.data : DEFAULT_LEVEL;
}

/**
 * スコープ付きロガーを生成
 * @param scope - 行頭に付与する名前（例: マシン名）
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? resolveLogLevel();
  const write = options.write ?? ((...args: unknown[]) => console.error(...args));
  const threshold = LEVEL_ORDER[level];

  const emit = (entryLevel: Exclude<LogLevel, "silent">, message: string, args: unknown[]) => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    write(`[${scope}] ${entryLevel.toUpperCase()} ${message}`, ...args);
  };

  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    error: (message, ...args) => emit("error", message, args),
  };
}

/**
 * 値をログ用の短い文字列に変換
 */
export function formatValue(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "symbol") {
    return value.description ?? value.toString();
  }
  if (value !== null && typeof value === "object") {
    const ctor = value.constructor;
    if (typeof ctor === "function" && ctor.name && ctor.name !== "Object") {
      return ctor.name;
    }
    try {
      return JSON.stringify(value);
    } catch {
      return Object.prototype.toString.call(value);
    }
  }
  return String(value);
}
