// 外部媒体工具：下载器（yt-dlp）与 mediainfo 通过子进程调用，MIME 用 file-type 按文件头判断

import { spawn } from "node:child_process";
import { fileTypeFromFile } from "file-type";
import type { DownloaderSettings, MediainfoSettings } from "../config/settings.js";
import { logger, errMessage } from "../logger/index.js";


/** 下载、探测、MIME 判断；测试中替换为进程内假实现 */
export interface MediaTools {
  /** 下载 url 到 destPath，成功返回 true */
  download(url: string, destPath: string): Promise<boolean>;
  /** 时长（秒），失败返回 null */
  probeDuration(path: string): Promise<number | null>;
  /** 按文件头判断 MIME，无法识别返回 null */
  sniffMime(path: string): Promise<string | null>;
}


const EXTENSIONS: Readonly<Record<string, string>> = {
  "image/jpeg": "jpg",
  "image/png": "png",
  "audio/mpeg": "mp3",
  "audio/x-m4a": "m4a",
  "audio/mp4": "m4a",
};


/** 个别 MP3 会被误判为字体类型 */
const MIME_CORRECTIONS: Readonly<Record<string, string>> = {
  "application/x-font-gdos": "audio/mpeg",
};


export function normalizeMime(mime: string): string {
  return MIME_CORRECTIONS[mime] ?? mime;
}


/** MIME → 扩展名，未知类型返回 null */
export function extensionForMime(mime: string): string | null {
  return EXTENSIONS[normalizeMime(mime)] ?? null;
}


/** 从 mediainfo --Output=JSON 的输出中取第一条轨道的 Duration（秒，四舍五入） */
export function parseMediainfoDuration(json: string): number | null {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch {
    return null;
  }
  if (data == null || typeof data !== "object" || !("media" in data)) return null;
  const media = data.media;
  if (media == null || typeof media !== "object" || !("track" in media) || !Array.isArray(media.track)) return null;
  const first: unknown = media.track[0];
  if (first == null || typeof first !== "object" || !("Duration" in first)) return null;
  const seconds = Number(first.Duration);
  return Number.isFinite(seconds) ? Math.round(seconds) : null;
}


export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
}


/** 运行子进程并收集输出；命令不存在等启动错误会 reject */
export function runCommand(command: string, args: string[], timeoutMs: number): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    const proc = spawn(command, args, { stdio: ["ignore", "pipe", "pipe"] });
    let stdout = "";
    let stderr = "";
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      proc.kill("SIGKILL");
    }, timeoutMs);
    proc.stdout.on("data", (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on("data", (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(err);
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({ code, stdout, stderr, timedOut });
    });
  });
}


/** 截断过长的工具输出再写日志 */
function tail(text: string, max = 2000): string {
  return text.length > max ? text.slice(-max) : text;
}


export class ExternalMediaTools implements MediaTools {
  constructor(
    private readonly downloader: DownloaderSettings,
    private readonly mediainfo: MediainfoSettings
  ) {}

  async download(url: string, destPath: string): Promise<boolean> {
    const args = this.downloader.args.map((a) => a.replace("{output}", destPath).replace("{url}", url));
    try {
      const res = await runCommand(this.downloader.command, args, this.downloader.timeoutMs);
      if (res.code === 0) return true;
      logger.warn("podcast", "下载器执行失败", {
        item_url: url,
        code: res.code,
        timedOut: res.timedOut,
        output: tail(res.stderr || res.stdout),
      });
      return false;
    } catch (err) {
      logger.warn("podcast", "无法启动下载器", { command: this.downloader.command, err: errMessage(err) });
      return false;
    }
  }

  async probeDuration(path: string): Promise<number | null> {
    try {
      const res = await runCommand(this.mediainfo.command, ["--Output=JSON", path], this.mediainfo.timeoutMs);
      if (res.code !== 0) {
        logger.warn("podcast", "mediainfo 执行失败", { path, code: res.code, output: tail(res.stderr) });
        return null;
      }
      return parseMediainfoDuration(res.stdout);
    } catch (err) {
      logger.warn("podcast", "无法启动 mediainfo", { command: this.mediainfo.command, err: errMessage(err) });
      return null;
    }
  }

  async sniffMime(path: string): Promise<string | null> {
    try {
      const type = await fileTypeFromFile(path);
      return type?.mime ?? null;
    } catch (err) {
      logger.warn("podcast", "无法识别文件类型", { path, err: errMessage(err) });
      return null;
    }
  }
}
