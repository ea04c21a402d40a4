// 日志配置：从环境变量读取，不依赖 config.json 以尽早可用

import type { LogLevel } from "./types.js";

const LEVEL_ORDER: LogLevel[] = ["debug", "info", "warn", "error"];

function isLogLevel(s: string): s is LogLevel {
  return LEVEL_ORDER.some((l) => l === s);
}

function parseLevel(s: string | undefined, fallback: LogLevel): LogLevel {
  if (!s) return fallback;
  const v = s.toLowerCase();
  return isLogLevel(v) ? v : fallback;
}

/** 当前控制台最低输出级别（默认 info，生产可设为 warn） */
export function getConsoleLevel(): LogLevel {
  return parseLevel(process.env.LOG_LEVEL, "info");
}

/** 日志文件路径（LOG_FILE），未设置则不写文件 */
export function getLogFile(): string | null {
  const v = process.env.LOG_FILE?.trim();
  return v ? v : null;
}

/** 写文件的最低级别（默认 debug，即全部） */
export function getFileLevel(): LogLevel {
  return parseLevel(process.env.LOG_FILE_LEVEL, "debug");
}

export function levelOrder(l: LogLevel): number {
  return LEVEL_ORDER.indexOf(l);
}

/** 是否达到阈值 */
export function shouldLog(threshold: LogLevel, entryLevel: LogLevel): boolean {
  return levelOrder(entryLevel) >= levelOrder(threshold);
}
