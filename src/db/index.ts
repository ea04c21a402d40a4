// 缓存数据库：管理 SQLite 连接、schema 初始化与三张缓存表的读写
// 数据库不可用时降级为直通：查询一律未命中，写入一律跳过

import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { logger, errMessage } from "../logger/index.js";
import { systemClock, type Clock } from "../utils/time.js";


/** 正文缓存行 */
export interface ArticleRow {
  feed: string;
  url: string;
  title: string;
  content: string;
  time: number;
  last_access: number;
}


/** 播客音频缓存行 */
export interface EnclosureRow {
  feed: string;
  url: string;
  /** public 目录下的文件名 */
  enclosure: string;
  length: number;
  type: string;
  duration: number;
}


export type ImageKind = "feed" | "entry";


/** 封面缓存行：feed 级 id 为空串，条目级 id 为条目 URL */
export interface ImageRow {
  feed: string;
  type: ImageKind;
  id: string;
  file: string;
}


export interface ArticleFields {
  title: string;
  content: string;
  time: number;
}


export interface ItemCacheOptions {
  now?: Clock;
}


type FeedUrl = { feed: string; url: string };
type ImageKey = { feed: string; type: ImageKind; id: string };


/** 建表：三张表均以业务键为主键，INSERT OR IGNORE 保证同键最多一行 */
function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS feed_entry (
      feed        TEXT NOT NULL,
      url         TEXT NOT NULL,
      title       TEXT NOT NULL DEFAULT '',
      content     TEXT NOT NULL DEFAULT '',
      time        INTEGER NOT NULL DEFAULT 0,
      last_access INTEGER NOT NULL,
      PRIMARY KEY (feed, url)
    );
    CREATE INDEX IF NOT EXISTS idx_feed_entry_access ON feed_entry(feed, last_access);
    CREATE TABLE IF NOT EXISTS podcast_entry (
      feed      TEXT NOT NULL,
      url       TEXT NOT NULL,
      enclosure TEXT NOT NULL,
      length    INTEGER NOT NULL,
      type      TEXT NOT NULL,
      duration  INTEGER NOT NULL DEFAULT 0,
      PRIMARY KEY (feed, url)
    );
    CREATE TABLE IF NOT EXISTS image (
      feed TEXT NOT NULL,
      type TEXT NOT NULL,
      id   TEXT NOT NULL,
      file TEXT NOT NULL,
      PRIMARY KEY (feed, type, id)
    );
  `);
}


/** 条目缓存：唯一允许读写缓存表的组件 */
export class ItemCache {
  private readonly now: Clock;

  private constructor(private readonly db: Database.Database | null, options: ItemCacheOptions) {
    this.now = options.now ?? systemClock;
  }

  /** 打开（或创建）数据库；失败时返回不可用的直通缓存 */
  static open(path: string, options: ItemCacheOptions = {}): ItemCache {
    try {
      if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
      const db = new Database(path);
      db.pragma("journal_mode = WAL");
      db.pragma("synchronous = NORMAL");
      initSchema(db);
      return new ItemCache(db, options);
    } catch (err) {
      logger.warn("db", "缓存数据库不可用，降级为直通模式", { path, err: errMessage(err) });
      return new ItemCache(null, options);
    }
  }

  /** 不落库的直通缓存 */
  static unavailable(options: ItemCacheOptions = {}): ItemCache {
    return new ItemCache(null, options);
  }

  get available(): boolean {
    return this.db != null;
  }

  /** 执行一次数据库操作；出错只记警告并返回兜底值 */
  private run<T>(op: string, fallback: T, fn: (db: Database.Database) => T): T {
    if (!this.db) return fallback;
    try {
      return fn(this.db);
    } catch (err) {
      logger.warn("db", `缓存操作失败: ${op}`, { err: errMessage(err) });
      return fallback;
    }
  }

  getArticle(feed: string, url: string): ArticleRow | null {
    return this.run("getArticle", null, (db) => {
      const row = db
        .prepare<FeedUrl, ArticleRow>("SELECT * FROM feed_entry WHERE feed = @feed AND url = @url")
        .get({ feed, url });
      return row ?? null;
    });
  }

  /** 刷新最后访问时间 */
  touchArticle(feed: string, url: string): void {
    this.run("touchArticle", undefined, (db) => {
      db.prepare("UPDATE feed_entry SET last_access = @now WHERE feed = @feed AND url = @url").run({
        feed,
        url,
        now: this.now(),
      });
    });
  }

  /** 写入正文，已存在则忽略；返回是否新增 */
  putArticle(feed: string, url: string, fields: ArticleFields): boolean {
    return this.run("putArticle", false, (db) => {
      const info = db
        .prepare(
          `INSERT OR IGNORE INTO feed_entry (feed, url, title, content, time, last_access)
           VALUES (@feed, @url, @title, @content, @time, @lastAccess)`
        )
        .run({ feed, url, ...fields, lastAccess: this.now() });
      return info.changes > 0;
    });
  }

  deleteArticle(feed: string, url: string): void {
    this.run("deleteArticle", undefined, (db) => {
      db.prepare("DELETE FROM feed_entry WHERE feed = @feed AND url = @url").run({ feed, url });
    });
  }

  /** 最后访问时间早于 cutoff 的条目 URL */
  listExpiredArticles(feed: string, cutoff: number): string[] {
    return this.run("listExpiredArticles", [], (db) =>
      db
        .prepare<{ feed: string; cutoff: number }, { url: string }>(
          "SELECT url FROM feed_entry WHERE feed = @feed AND last_access < @cutoff"
        )
        .all({ feed, cutoff })
        .map((r) => r.url)
    );
  }

  /** 批量删除过期条目，返回删除行数 */
  deleteExpiredArticles(feed: string, cutoff: number): number {
    return this.run("deleteExpiredArticles", 0, (db) =>
      db.prepare("DELETE FROM feed_entry WHERE feed = @feed AND last_access < @cutoff").run({ feed, cutoff }).changes
    );
  }

  /** 没有对应正文行的附件与条目封面（详情解析失败的播客条目会留下这类记录） */
  listOrphanMediaUrls(feed: string): string[] {
    return this.run("listOrphanMediaUrls", [], (db) =>
      db
        .prepare<{ feed: string }, { url: string }>(
          `SELECT p.url AS url FROM podcast_entry p
             WHERE p.feed = @feed
               AND NOT EXISTS (SELECT 1 FROM feed_entry f WHERE f.feed = p.feed AND f.url = p.url)
           UNION
           SELECT i.id AS url FROM image i
             WHERE i.feed = @feed AND i.type = 'entry'
               AND NOT EXISTS (SELECT 1 FROM feed_entry f WHERE f.feed = i.feed AND f.url = i.id)`
        )
        .all({ feed })
        .map((r) => r.url)
    );
  }

  countArticles(feed?: string): number {
    return this.run("countArticles", 0, (db) => {
      const row = feed == null
        ? db.prepare<[], { n: number }>("SELECT COUNT(*) AS n FROM feed_entry").get()
        : db.prepare<{ feed: string }, { n: number }>("SELECT COUNT(*) AS n FROM feed_entry WHERE feed = @feed").get({ feed });
      return row?.n ?? 0;
    });
  }

  getEnclosure(feed: string, url: string): EnclosureRow | null {
    return this.run("getEnclosure", null, (db) => {
      const row = db
        .prepare<FeedUrl, EnclosureRow>("SELECT * FROM podcast_entry WHERE feed = @feed AND url = @url")
        .get({ feed, url });
      return row ?? null;
    });
  }

  putEnclosure(row: EnclosureRow): boolean {
    return this.run("putEnclosure", false, (db) => {
      const info = db
        .prepare(
          `INSERT OR IGNORE INTO podcast_entry (feed, url, enclosure, length, type, duration)
           VALUES (@feed, @url, @enclosure, @length, @type, @duration)`
        )
        .run(row);
      return info.changes > 0;
    });
  }

  deleteEnclosure(feed: string, url: string): void {
    this.run("deleteEnclosure", undefined, (db) => {
      db.prepare("DELETE FROM podcast_entry WHERE feed = @feed AND url = @url").run({ feed, url });
    });
  }

  getImage(feed: string, type: ImageKind, id: string): ImageRow | null {
    return this.run("getImage", null, (db) => {
      const row = db
        .prepare<ImageKey, { file: string }>("SELECT file FROM image WHERE feed = @feed AND type = @type AND id = @id")
        .get({ feed, type, id });
      return row ? { feed, type, id, file: row.file } : null;
    });
  }

  putImage(row: ImageRow): boolean {
    return this.run("putImage", false, (db) => {
      const info = db
        .prepare("INSERT OR IGNORE INTO image (feed, type, id, file) VALUES (@feed, @type, @id, @file)")
        .run(row);
      return info.changes > 0;
    });
  }

  deleteImage(feed: string, type: ImageKind, id: string): void {
    this.run("deleteImage", undefined, (db) => {
      db.prepare("DELETE FROM image WHERE feed = @feed AND type = @type AND id = @id").run({ feed, type, id });
    });
  }

  /** 数据库占用字节数（page_count × page_size） */
  sizeBytes(): number {
    return this.run("sizeBytes", 0, (db) => {
      const pages = Number(db.pragma("page_count", { simple: true }));
      const pageSize = Number(db.pragma("page_size", { simple: true }));
      return pages * pageSize;
    });
  }

  /** 回收空间 */
  vacuum(): void {
    this.run("vacuum", undefined, (db) => {
      db.exec("VACUUM");
    });
  }

  close(): void {
    this.run("close", undefined, (db) => {
      db.close();
    });
  }
}
