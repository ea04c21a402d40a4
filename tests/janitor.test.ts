import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { access, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { ItemCache } from "../src/db/index.js";
import { FeedAssembler } from "../src/feeder/index.js";
import { CacheJanitor, humanFilesize } from "../src/janitor/index.js";
import { PodcastResolver } from "../src/podcast/index.js";
import { ContentResolver } from "../src/resolver/index.js";
import { FakeFetcher, FakeMediaTools, StubExtractor, makeFeed } from "./helpers/fakes.js";


const DAY = 24 * 3600;


async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}


describe("CacheJanitor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "refeed-janitor-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("last_access 恰好等于 cutoff 的条目保留，早 1 秒的删除", async () => {
    let writeTime = 0;
    const cache = ItemCache.open(":memory:", { now: () => writeTime });
    const feed = makeFeed({ name: "blog", url: "https://blog.example.org/rss.xml", cacheLimit: DAY });
    const now = 10 * DAY;
    writeTime = now - DAY;
    cache.putArticle("blog", "https://blog.example.org/keep", { title: "t", content: "c", time: 0 });
    writeTime = now - DAY - 1;
    cache.putArticle("blog", "https://blog.example.org/drop", { title: "t", content: "c", time: 0 });

    const janitor = new CacheJanitor({ cache, publicDir: dir, now: () => now });
    const report = await janitor.clean([feed]);
    expect(report.expired).toEqual({ blog: 1 });
    expect(report.before.rows).toBe(2);
    expect(report.after.rows).toBe(1);
    expect(cache.getArticle("blog", "https://blog.example.org/keep")).not.toBeNull();
    expect(cache.getArticle("blog", "https://blog.example.org/drop")).toBeNull();
  });

  it("每个 feed 使用自己的 cacheLimit", async () => {
    const cache = ItemCache.open(":memory:", { now: () => 0 });
    cache.putArticle("short", "https://a.example/1", { title: "t", content: "c", time: 0 });
    cache.putArticle("long", "https://a.example/1", { title: "t", content: "c", time: 0 });
    const feeds = [
      makeFeed({ name: "short", url: "https://a.example/rss", cacheLimit: 10 }),
      makeFeed({ name: "long", url: "https://a.example/rss", cacheLimit: 1000 }),
    ];
    const report = await new CacheJanitor({ cache, publicDir: dir, now: () => 100 }).clean(feeds);
    expect(report.expired).toEqual({ short: 1, long: 0 });
  });

  it("播客 feed 级联删除音频文件、附件行、封面文件与封面行", async () => {
    const cache = ItemCache.open(":memory:", { now: () => 0 });
    const url = "https://radio.example.org/ep/1";
    const feed = makeFeed({
      name: "radio",
      sourceKind: "page",
      url: "https://radio.example.org/shows",
      title: "Radio",
      itemsXpath: "//li",
      itemLinkXpath: "./a/@href",
      cacheLimit: 10,
      podcast: {},
    });
    await writeFile(join(dir, "radio_enclosure_1.mp3"), "audio");
    await writeFile(join(dir, "radio_entry_1.jpg"), "image");
    await writeFile(join(dir, "radio_feed_1.png"), "image");
    cache.putArticle("radio", url, { title: "t", content: "c", time: 0 });
    cache.putEnclosure({ feed: "radio", url, enclosure: "radio_enclosure_1.mp3", length: 5, type: "audio/mpeg", duration: 1 });
    cache.putImage({ feed: "radio", type: "entry", id: url, file: "radio_entry_1.jpg" });
    cache.putImage({ feed: "radio", type: "feed", id: "", file: "radio_feed_1.png" });

    const report = await new CacheJanitor({ cache, publicDir: dir, now: () => 100 }).clean([feed]);
    expect(report.expired).toEqual({ radio: 1 });
    expect(await exists(join(dir, "radio_enclosure_1.mp3"))).toBe(false);
    expect(await exists(join(dir, "radio_entry_1.jpg"))).toBe(false);
    expect(cache.getEnclosure("radio", url)).toBeNull();
    expect(cache.getImage("radio", "entry", url)).toBeNull();
    expect(cache.getArticle("radio", url)).toBeNull();
    // feed 级封面不随条目删除
    expect(await exists(join(dir, "radio_feed_1.png"))).toBe(true);
    expect(cache.getImage("radio", "feed", "")?.file).toBe("radio_feed_1.png");
  });

  it("附件文件已不存在时照常删除行", async () => {
    const cache = ItemCache.open(":memory:", { now: () => 0 });
    const url = "https://radio.example.org/ep/2";
    const feed = makeFeed({
      name: "radio",
      sourceKind: "json",
      url: "https://radio.example.org/api",
      title: "Radio",
      json: { items: () => [], link: "url" },
      cacheLimit: 10,
      podcast: {},
    });
    cache.putArticle("radio", url, { title: "t", content: "c", time: 0 });
    cache.putEnclosure({ feed: "radio", url, enclosure: "gone.mp3", length: 5, type: "audio/mpeg", duration: 1 });
    await new CacheJanitor({ cache, publicDir: dir, now: () => 100 }).clean([feed]);
    expect(cache.getEnclosure("radio", url)).toBeNull();
    expect(cache.getArticle("radio", url)).toBeNull();
  });

  it("没有正文行的附件与条目封面一并清理，有正文行的保留", async () => {
    const cache = ItemCache.open(":memory:", { now: () => 90 });
    const feed = makeFeed({
      name: "radio",
      sourceKind: "page",
      url: "https://radio.example.org/shows",
      title: "Radio",
      itemsXpath: "//li",
      itemLinkXpath: "./a/@href",
      cacheLimit: 1000,
      podcast: {},
    });
    const orphan = "https://radio.example.org/ep/9";
    const kept = "https://radio.example.org/ep/10";
    await writeFile(join(dir, "radio_enclosure_9.mp3"), "audio");
    await writeFile(join(dir, "radio_entry_9.jpg"), "image");
    await writeFile(join(dir, "radio_enclosure_10.mp3"), "audio");
    cache.putEnclosure({ feed: "radio", url: orphan, enclosure: "radio_enclosure_9.mp3", length: 5, type: "audio/mpeg", duration: 1 });
    cache.putImage({ feed: "radio", type: "entry", id: orphan, file: "radio_entry_9.jpg" });
    cache.putArticle("radio", kept, { title: "t", content: "c", time: 0 });
    cache.putEnclosure({ feed: "radio", url: kept, enclosure: "radio_enclosure_10.mp3", length: 5, type: "audio/mpeg", duration: 1 });

    const report = await new CacheJanitor({ cache, publicDir: dir, now: () => 100 }).clean([feed]);
    expect(report.expired).toEqual({ radio: 0 });
    expect(report.orphaned).toEqual({ radio: 1 });
    expect(await readdir(dir)).toEqual(["radio_enclosure_10.mp3"]);
    expect(cache.getEnclosure("radio", orphan)).toBeNull();
    expect(cache.getImage("radio", "entry", orphan)).toBeNull();
    expect(cache.getEnclosure("radio", kept)?.enclosure).toBe("radio_enclosure_10.mp3");
  });

  it("列表字段齐全的 page 播客条目也会登记正文行，过期后音频随之删除", async () => {
    const NOW = 5_000;
    const cache = ItemCache.open(":memory:", { now: () => NOW });
    const fetcher = new FakeFetcher().route("https://radio.example.org/shows", {
      body: `<html><body><li class="episode"><a href="https://radio.example.org/ep/1">Ep 1</a><p>About ep 1</p></li></body></html>`,
    });
    const extractor = new StubExtractor(() => null);
    const assembler = new FeedAssembler({
      fetcher,
      resolver: new ContentResolver({ cache, fetcher, extractor }),
      podcast: new PodcastResolver({
        cache,
        fetcher,
        tools: new FakeMediaTools(),
        publicDir: dir,
        publicBaseUrl: "http://cdn.example.org/public",
        uniqueId: () => "u1",
      }),
      now: () => NOW,
    });
    const feed = makeFeed({
      name: "radio",
      sourceKind: "page",
      url: "https://radio.example.org/shows",
      title: "Radio",
      itemsXpath: "//li[@class='episode']",
      itemLinkXpath: "./a/@href",
      itemTitleXpath: "./a",
      itemContentXpath: "./p",
      cacheLimit: 100,
      podcast: {},
    });
    const r = await assembler.generate(feed);
    if (!r.ok) throw new Error(r.reason);
    expect(extractor.calls).toBe(0);
    expect(cache.getArticle("radio", "https://radio.example.org/ep/1")).toMatchObject({ title: "Ep 1", content: "About ep 1" });
    expect(await readdir(dir)).toEqual(["radio_enclosure_u1.mp3"]);

    // 未过期时不动
    const early = await new CacheJanitor({ cache, publicDir: dir, now: () => NOW + 50 }).clean([feed]);
    expect(early.expired).toEqual({ radio: 0 });
    expect(early.orphaned).toEqual({ radio: 0 });
    expect(await readdir(dir)).toEqual(["radio_enclosure_u1.mp3"]);

    const report = await new CacheJanitor({ cache, publicDir: dir, now: () => NOW + 10_000 }).clean([feed]);
    expect(report.expired).toEqual({ radio: 1 });
    expect(await readdir(dir)).toEqual([]);
    expect(cache.getEnclosure("radio", "https://radio.example.org/ep/1")).toBeNull();
  });
});


describe("humanFilesize", () => {
  it("按 1024 进位", () => {
    expect(humanFilesize(512)).toBe("512 B");
    expect(humanFilesize(1536)).toBe("1.5 KB");
    expect(humanFilesize(5 * 1024 * 1024)).toBe("5.0 MB");
  });
});
