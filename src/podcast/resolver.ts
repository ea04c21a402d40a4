// 播客解析：音频附件与封面，流程同正文：先查缓存，未命中则下载、探测、落盘、写缓存
// 任何失败都只影响当前条目：附件返回 status=error，封面返回空串

import { randomBytes } from "node:crypto";
import { access, mkdir, rename, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { EnclosureRow, ImageKind, ItemCache } from "../db/index.js";
import type { Fetcher } from "../fetcher/types.js";
import type { FeedDescriptor } from "../feeds/types.js";
import { logger, errMessage } from "../logger/index.js";
import { cacheKeyFor, type ResolveStatus } from "../resolver/content.js";
import { prepareCoverImage } from "./image.js";
import { extensionForMime, normalizeMime, type MediaTools } from "./media.js";


export interface ResolvedEnclosure {
  status: ResolveStatus;
  /** 公网 URL，失败为空串 */
  url: string;
  length: number;
  type: string;
  duration: number;
}


export interface PodcastResolverDeps {
  cache: ItemCache;
  fetcher: Fetcher;
  tools: MediaTools;
  publicDir: string;
  /** 不带结尾斜杠 */
  publicBaseUrl: string;
  /** 生成文件名中的唯一部分 */
  uniqueId?: () => string;
}


/** 封面原图地址的来源，由 feed 的 podcast.image / podcast.itemImage 提供 */
export type ImageSource = () => Promise<string | null | undefined> | string | null | undefined;


const FAILED_ENCLOSURE: ResolvedEnclosure = { status: "error", url: "", length: 0, type: "", duration: 0 };


async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}


function defaultUniqueId(): string {
  return Date.now().toString(16) + randomBytes(4).toString("hex");
}


export class PodcastResolver {
  private readonly uniqueId: () => string;

  constructor(private readonly deps: PodcastResolverDeps) {
    this.uniqueId = deps.uniqueId ?? defaultUniqueId;
  }

  /** public 目录下文件的公网 URL */
  publicUrl(file: string): string {
    return `${this.deps.publicBaseUrl}/${encodeURIComponent(file)}`;
  }

  /** public 目录下文件的本地路径 */
  publicPath(file: string): string {
    return join(this.deps.publicDir, file);
  }

  private fromRow(row: EnclosureRow): ResolvedEnclosure {
    return { status: "cache", url: this.publicUrl(row.enclosure), length: row.length, type: row.type, duration: row.duration };
  }

  /**
   * 解析条目的音频附件：下载器 → feed 备用下载 → 判断类型 → 补扩展名 → 探测时长 → 写缓存。
   * 缓存键与正文一致（cacheKeyFor），清理时才能按正文行级联。
   */
  async resolveEnclosure(feed: FeedDescriptor, url: string): Promise<ResolvedEnclosure> {
    const { cache } = this.deps;
    const meta = { feed: feed.name, item_url: url };
    const cached = cache.getEnclosure(feed.name, cacheKeyFor(feed, url));
    if (cached) {
      logger.debug("podcast", "附件命中缓存", meta);
      return this.fromRow(cached);
    }
    try {
      return await this.downloadEnclosure(feed, url);
    } catch (err) {
      logger.warn("podcast", "附件处理失败", { ...meta, err: errMessage(err) });
      return { ...FAILED_ENCLOSURE };
    }
  }

  private async downloadEnclosure(feed: FeedDescriptor, url: string): Promise<ResolvedEnclosure> {
    const { cache, tools, fetcher } = this.deps;
    const meta = { feed: feed.name, item_url: url };
    await mkdir(this.deps.publicDir, { recursive: true });
    const base = `${feed.name}_enclosure_${this.uniqueId()}`;
    const destPath = this.publicPath(base);
    let ok = (await tools.download(url, destPath)) && (await fileExists(destPath));
    const fallback = feed.podcast?.enclosureFallback;
    if (!ok && fallback) {
      logger.info("podcast", "下载器失败，尝试备用下载", meta);
      try {
        ok = (await fallback({ feed, url, destPath, fetcher })) && (await fileExists(destPath));
      } catch (err) {
        logger.warn("podcast", "备用下载异常", { ...meta, err: errMessage(err) });
        ok = false;
      }
    }
    if (!ok) {
      logger.warn("podcast", "附件下载失败", meta);
      await rm(destPath, { force: true });
      return { ...FAILED_ENCLOSURE };
    }

    const sniffed = await tools.sniffMime(destPath);
    const type = sniffed ? normalizeMime(sniffed) : "application/octet-stream";
    const ext = extensionForMime(type);
    let file = base;
    if (ext) {
      file = `${base}.${ext}`;
      await rename(destPath, this.publicPath(file));
    } else {
      logger.warn("podcast", "未知的附件类型，不加扩展名", { ...meta, type });
    }
    const filePath = this.publicPath(file);
    const { size } = await stat(filePath);
    let duration = await tools.probeDuration(filePath);
    if (duration == null) {
      logger.warn("podcast", "无法获取附件时长，记为 0", { ...meta, file });
      duration = 0;
    }
    const key = cacheKeyFor(feed, url);
    if (!cache.putEnclosure({ feed: feed.name, url: key, enclosure: file, length: size, type, duration }) && cache.available) {
      // 并发解析时已有别的请求写入：删掉本次文件，沿用已有记录
      const existing = cache.getEnclosure(feed.name, key);
      if (existing) {
        await rm(filePath, { force: true });
        logger.info("podcast", "附件已由其它请求写入，丢弃本次下载", { ...meta, file, kept: existing.enclosure });
        return this.fromRow(existing);
      }
    }
    logger.info("podcast", "附件已下载", { ...meta, file, type, length: size, duration });
    return { status: "new", url: this.publicUrl(file), length: size, type, duration };
  }

  /** 解析封面：缓存行指向的文件丢失时删除该行并重新解析 */
  async resolveImage(feed: FeedDescriptor, type: ImageKind, id: string, source: ImageSource): Promise<string> {
    const { cache, fetcher } = this.deps;
    const meta = { feed: feed.name, image_type: type, image_id: id };
    const cached = cache.getImage(feed.name, type, id);
    if (cached) {
      if (await fileExists(this.publicPath(cached.file))) return this.publicUrl(cached.file);
      logger.info("podcast", "封面文件已丢失，重新解析", { ...meta, file: cached.file });
      cache.deleteImage(feed.name, type, id);
    }

    let sourceUrl: string | null | undefined;
    try {
      sourceUrl = await source();
    } catch (err) {
      logger.warn("podcast", "封面回调异常", { ...meta, err: errMessage(err) });
      return "";
    }
    if (!sourceUrl) {
      logger.debug("podcast", "未找到封面地址", meta);
      return "";
    }

    const res = await fetcher.fetch(sourceUrl);
    if (res.statusCode !== 200 || res.body.length === 0) {
      logger.warn("podcast", "封面下载失败", { ...meta, source: sourceUrl, status: res.statusCode });
      return "";
    }
    const prepared = await prepareCoverImage(res.body);
    if (!prepared.ok) {
      logger.warn("podcast", "封面不可用", { ...meta, source: sourceUrl, err: prepared.reason });
      return "";
    }
    const file = `${feed.name}_${type}_${this.uniqueId()}.${prepared.ext}`;
    try {
      await mkdir(this.deps.publicDir, { recursive: true });
      await writeFile(this.publicPath(file), prepared.data);
    } catch (err) {
      logger.warn("podcast", "封面写入失败", { ...meta, file, err: errMessage(err) });
      return "";
    }
    if (!cache.putImage({ feed: feed.name, type, id, file }) && cache.available) {
      const existing = cache.getImage(feed.name, type, id);
      if (existing) {
        await rm(this.publicPath(file), { force: true });
        logger.info("podcast", "封面已由其它请求写入，丢弃本次文件", { ...meta, file, kept: existing.file });
        return this.publicUrl(existing.file);
      }
    }
    return this.publicUrl(file);
  }
}
