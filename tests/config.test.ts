import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { DEFAULT_SETTINGS, loadSettings } from "../src/config/settings.js";
import { loadFeedDefinitions } from "../src/feeds/loader.js";
import { logger } from "../src/logger/index.js";
import { shouldLog } from "../src/logger/config.js";


describe("loadSettings", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "refeed-config-"));
    for (const name of ["PUBLIC_BASE_URL", "USER_AGENT", "FETCH_TIMEOUT_MS", "ITEM_CONCURRENCY", "DOWNLOADER_COMMAND", "MEDIAINFO_COMMAND"]) {
      vi.stubEnv(name, "");
    }
    vi.spyOn(logger, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("文件不存在时使用默认值", async () => {
    expect(await loadSettings(join(dir, "config.json"))).toEqual(DEFAULT_SETTINGS);
  });

  it("config.json 优先于环境变量，环境变量优先于默认值", async () => {
    vi.stubEnv("PUBLIC_BASE_URL", "https://env.example.org/public");
    vi.stubEnv("ITEM_CONCURRENCY", "3");
    vi.stubEnv("MEDIAINFO_COMMAND", "/opt/bin/mediainfo");
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ publicBaseUrl: "https://media.example.org/pub/", downloader: { command: "yt-dlp-nightly" } }));
    const s = await loadSettings(path);
    expect(s.publicBaseUrl).toBe("https://media.example.org/pub");
    expect(s.itemConcurrency).toBe(3);
    expect(s.downloader).toEqual({ ...DEFAULT_SETTINGS.downloader, command: "yt-dlp-nightly" });
    expect(s.mediainfo.command).toBe("/opt/bin/mediainfo");
  });

  it("字段无效时整体忽略文件", async () => {
    const path = join(dir, "config.json");
    await writeFile(path, JSON.stringify({ itemConcurrency: 0 }));
    expect((await loadSettings(path)).itemConcurrency).toBe(1);
  });

  it("非法的数字环境变量被忽略", async () => {
    vi.stubEnv("FETCH_TIMEOUT_MS", "soon");
    expect((await loadSettings(join(dir, "config.json"))).fetchTimeoutMs).toBe(30_000);
  });
});


describe("loadFeedDefinitions", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "refeed-feeds-"));
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "info").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("文件名作为默认名称，跳过非 feed 文件与无默认导出的文件", async () => {
    await writeFile(join(dir, "package.json"), JSON.stringify({ type: "module" }));
    await writeFile(join(dir, "tech.feed.js"), 'export default { url: "https://tech.example.org/rss" };\n');
    await writeFile(join(dir, "named.feed.js"), 'export default { name: "custom", url: "https://named.example.org/rss" };\n');
    await writeFile(join(dir, "helper.feed.js"), "export const x = 1;\n");
    await writeFile(join(dir, "notes.txt"), "not a feed");
    const feeds = await loadFeedDefinitions(dir);
    expect([...feeds.keys()].sort()).toEqual(["custom", "tech"]);
    expect(feeds.get("tech")).toEqual({ name: "tech", url: "https://tech.example.org/rss" });
  });

  it("目录不存在时返回空表", async () => {
    expect((await loadFeedDefinitions(join(dir, "missing"))).size).toBe(0);
  });
});


describe("日志级别", () => {
  it("达到阈值才输出", () => {
    expect(shouldLog("info", "debug")).toBe(false);
    expect(shouldLog("info", "warn")).toBe(true);
    expect(shouldLog("error", "error")).toBe(true);
  });
});
