// 统一日志：按级别输出到控制台，可选追加到 LOG_FILE

import { appendFile } from "node:fs/promises";
import { getConsoleLevel, getFileLevel, getLogFile, shouldLog } from "./config.js";
import type { LogCategory, LogEntry, LogLevel, LogMeta } from "./types.js";

export type { LogCategory, LogLevel, LogMeta } from "./types.js";

function now(): string {
  return new Date().toISOString();
}

function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr = entry.payload != null ? " " + JSON.stringify(entry.payload) : "";
  return `${tag} ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function writeFileLine(file: string, entry: LogEntry): void {
  appendFile(file, JSON.stringify(entry) + "\n", "utf-8").catch((err: unknown) => {
    // 写文件失败只打 stderr，避免循环
    process.stderr.write(`[logger] 写入日志文件失败: ${err instanceof Error ? err.message : String(err)}\n`);
  });
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: LogMeta): void {
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
    created_at: now(),
  };
  if (shouldLog(getConsoleLevel(), level)) {
    writeConsole(entry);
  }
  const file = getLogFile();
  if (file && shouldLog(getFileLevel(), level)) {
    writeFileLine(file, entry);
  }
}

/** 把任意异常转成日志里的 err 字段 */
export function errMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤，LOG_FILE 可选落盘 */
export const logger = {
  error(category: LogCategory, message: string, meta?: LogMeta) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: LogMeta) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: LogMeta) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: LogMeta) {
    emit("debug", category, message, meta);
  },
};
