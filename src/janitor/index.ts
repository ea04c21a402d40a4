// 缓存清理：按 feed 的 cacheLimit 删除过久未访问的条目；播客 feed 同时删除音频、封面文件及对应行

import { rm } from "node:fs/promises";
import { join } from "node:path";
import type { ItemCache } from "../db/index.js";
import type { FeedDescriptor } from "../feeds/types.js";
import { logger, errMessage } from "../logger/index.js";
import { systemClock, type Clock } from "../utils/time.js";


export interface CacheJanitorDeps {
  cache: ItemCache;
  publicDir: string;
  now?: Clock;
}


export interface CacheStats {
  bytes: number;
  rows: number;
}


export interface JanitorReport {
  /** feed 名称 → 删除的条目数 */
  expired: Record<string, number>;
  /** 播客 feed 名称 → 清理的无正文行媒体记录数 */
  orphaned: Record<string, number>;
  before: CacheStats;
  after: CacheStats;
}


const UNITS = ["B", "KB", "MB", "GB", "TB"];


/** 1536 → "1.5 KB" */
export function humanFilesize(bytes: number, decimals = 1): string {
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < UNITS.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} B` : `${value.toFixed(decimals)} ${UNITS[unit]}`;
}


export class CacheJanitor {
  private readonly now: Clock;

  constructor(private readonly deps: CacheJanitorDeps) {
    this.now = deps.now ?? systemClock;
  }

  private stats(): CacheStats {
    return { bytes: this.deps.cache.sizeBytes(), rows: this.deps.cache.countArticles() };
  }

  /** 删除 public 目录下的文件；不存在不算错误 */
  private async unlink(file: string, feed: string): Promise<void> {
    try {
      await rm(join(this.deps.publicDir, file), { force: true });
    } catch (err) {
      logger.warn("janitor", "删除文件失败", { feed, file, err: errMessage(err) });
    }
  }

  /** 顺序：音频文件 → podcast_entry → 封面文件 → image → feed_entry */
  private async evictPodcastEntry(feed: string, url: string): Promise<void> {
    const { cache } = this.deps;
    const enclosure = cache.getEnclosure(feed, url);
    if (enclosure) await this.unlink(enclosure.enclosure, feed);
    cache.deleteEnclosure(feed, url);
    const image = cache.getImage(feed, "entry", url);
    if (image) await this.unlink(image.file, feed);
    cache.deleteImage(feed, "entry", url);
    cache.deleteArticle(feed, url);
  }

  async clean(feeds: readonly FeedDescriptor[]): Promise<JanitorReport> {
    const { cache } = this.deps;
    const before = this.stats();
    const expired: Record<string, number> = {};
    const orphaned: Record<string, number> = {};
    for (const feed of feeds) {
      const cutoff = this.now() - feed.cacheLimit;
      if (feed.podcast) {
        const urls = cache.listExpiredArticles(feed.name, cutoff);
        for (const url of urls) await this.evictPodcastEntry(feed.name, url);
        expired[feed.name] = urls.length;
        const orphans = cache.listOrphanMediaUrls(feed.name);
        for (const url of orphans) await this.evictPodcastEntry(feed.name, url);
        orphaned[feed.name] = orphans.length;
        if (orphans.length > 0) {
          logger.info("janitor", "已清理无正文记录的媒体", { feed: feed.name, count: orphans.length });
        }
      } else {
        expired[feed.name] = cache.deleteExpiredArticles(feed.name, cutoff);
      }
      if (expired[feed.name] > 0) {
        logger.info("janitor", "已清理过期条目", { feed: feed.name, count: expired[feed.name] });
      }
    }
    cache.vacuum();
    const after = this.stats();
    logger.info("janitor", "清理完成", { before_bytes: before.bytes, after_bytes: after.bytes, before_rows: before.rows, after_rows: after.rows });
    return { expired, orphaned, before, after };
  }
}
