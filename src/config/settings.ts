// 全局设置：从 .refeed/config.json 读取，缺失字段用环境变量或默认值补全

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { logger, errMessage } from "../logger/index.js";
import { CONFIG_PATH } from "./paths.js";


/** 外部下载器（默认 yt-dlp）；args 中的 {output} 与 {url} 会被替换 */
export interface DownloaderSettings {
  command: string;
  args: string[];
  timeoutMs: number;
}


/** 媒体探测工具（默认 mediainfo） */
export interface MediainfoSettings {
  command: string;
  timeoutMs: number;
}


export interface RefeedSettings {
  userAgent: string;
  acceptLanguage: string;
  fetchTimeoutMs: number;
  maxRedirects: number;
  /** 单个 feed 内并发解析的条目数，1 为逐条顺序解析 */
  itemConcurrency: number;
  /** 播客媒体文件的公网前缀，不带结尾斜杠 */
  publicBaseUrl: string;
  downloader: DownloaderSettings;
  mediainfo: MediainfoSettings;
}


export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";


/** 默认配置 */
export const DEFAULT_SETTINGS: RefeedSettings = {
  userAgent: DEFAULT_USER_AGENT,
  acceptLanguage: "en-GB,en-US;q=0.9,en;q=0.8",
  fetchTimeoutMs: 30_000,
  maxRedirects: 10,
  itemConcurrency: 1,
  publicBaseUrl: "http://127.0.0.1:3751/public",
  downloader: {
    command: "yt-dlp",
    args: ["--no-progress", "-o", "{output}", "{url}"],
    timeoutMs: 10 * 60_000,
  },
  mediainfo: {
    command: "mediainfo",
    timeoutMs: 60_000,
  },
};


const fileSchema = z
  .object({
    userAgent: z.string().min(1),
    acceptLanguage: z.string().min(1),
    fetchTimeoutMs: z.number().int().positive(),
    maxRedirects: z.number().int().min(0),
    itemConcurrency: z.number().int().min(1),
    publicBaseUrl: z.string().url(),
    downloader: z
      .object({
        command: z.string().min(1),
        args: z.array(z.string()),
        timeoutMs: z.number().int().positive(),
      })
      .partial(),
    mediainfo: z
      .object({
        command: z.string().min(1),
        timeoutMs: z.number().int().positive(),
      })
      .partial(),
  })
  .partial();


type FileSettings = z.infer<typeof fileSchema>;


function envInt(name: string): number | undefined {
  const raw = process.env[name];
  if (raw == null || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isInteger(n) && n > 0 ? n : undefined;
}


function envStr(name: string): string | undefined {
  const raw = process.env[name]?.trim();
  return raw ? raw : undefined;
}


/** 读取 config.json；文件不存在时为空，格式错误打警告后忽略 */
async function readSettingsFile(path: string): Promise<FileSettings> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    logger.warn("config", "读取 config.json 失败，使用默认配置", { path, err: errMessage(err) });
    return {};
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    logger.warn("config", "config.json 不是合法 JSON，使用默认配置", { path, err: errMessage(err) });
    return {};
  }
  const parsed = fileSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn("config", "config.json 字段无效，使用默认配置", { path, err: parsed.error.message });
    return {};
  }
  return parsed.data;
}


/** 合并顺序：config.json > 环境变量 > 默认值 */
export async function loadSettings(path: string = CONFIG_PATH): Promise<RefeedSettings> {
  const file = await readSettingsFile(path);
  const publicBaseUrl = file.publicBaseUrl ?? envStr("PUBLIC_BASE_URL") ?? DEFAULT_SETTINGS.publicBaseUrl;
  return {
    userAgent: file.userAgent ?? envStr("USER_AGENT") ?? DEFAULT_SETTINGS.userAgent,
    acceptLanguage: file.acceptLanguage ?? DEFAULT_SETTINGS.acceptLanguage,
    fetchTimeoutMs: file.fetchTimeoutMs ?? envInt("FETCH_TIMEOUT_MS") ?? DEFAULT_SETTINGS.fetchTimeoutMs,
    maxRedirects: file.maxRedirects ?? DEFAULT_SETTINGS.maxRedirects,
    itemConcurrency: file.itemConcurrency ?? envInt("ITEM_CONCURRENCY") ?? DEFAULT_SETTINGS.itemConcurrency,
    publicBaseUrl: publicBaseUrl.replace(/\/+$/, ""),
    downloader: {
      command: file.downloader?.command ?? envStr("DOWNLOADER_COMMAND") ?? DEFAULT_SETTINGS.downloader.command,
      args: file.downloader?.args ?? DEFAULT_SETTINGS.downloader.args,
      timeoutMs: file.downloader?.timeoutMs ?? DEFAULT_SETTINGS.downloader.timeoutMs,
    },
    mediainfo: {
      command: file.mediainfo?.command ?? envStr("MEDIAINFO_COMMAND") ?? DEFAULT_SETTINGS.mediainfo.command,
      timeoutMs: file.mediainfo?.timeoutMs ?? DEFAULT_SETTINGS.mediainfo.timeoutMs,
    },
  };
}
