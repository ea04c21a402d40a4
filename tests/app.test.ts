import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { DEFAULT_SETTINGS } from "../src/config/settings.js";
import { ItemCache } from "../src/db/index.js";
import { createApp, feedNameFromQuery } from "../src/app/router.js";
import { FeedConfigError, FeedNotFoundError } from "../src/feeds/errors.js";
import type { FeedDefinition } from "../src/feeds/types.js";
import { logger } from "../src/logger/index.js";
import { RefeedService } from "../src/service.js";
import { FakeFetcher, FakeMediaTools, StubExtractor } from "./helpers/fakes.js";


const RSS = `<?xml version="1.0"?><rss version="2.0"><channel><title>Blog</title>
<item><title>One</title><link>https://blog.example.org/1</link><description>short</description></item>
</channel></rss>`;


function makeService(fetcher: FakeFetcher, definitions: Record<string, FeedDefinition>): RefeedService {
  return new RefeedService({
    settings: DEFAULT_SETTINGS,
    cache: ItemCache.open(":memory:", { now: () => 1_000 }),
    fetcher,
    definitions: new Map(Object.entries(definitions)),
    publicDir: "public",
    extractor: new StubExtractor(() => ({ title: "One", content: "<p>Full</p>" })),
    tools: new FakeMediaTools(),
    now: () => 1_000,
  });
}


describe("feedNameFromQuery", () => {
  it("取第一个查询参数的名称", () => {
    expect(feedNameFromQuery("http://localhost/?blog")).toBe("blog");
    expect(feedNameFromQuery("http://localhost/?blog=&x=1")).toBe("blog");
    expect(feedNameFromQuery("http://localhost/")).toBe("");
    expect(feedNameFromQuery("http://localhost/?%E0")).toBeNull();
  });
});


describe("HTTP 路由", () => {
  let fetcher: FakeFetcher;
  let service: RefeedService;

  beforeEach(() => {
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "error").mockImplementation(() => {});
    fetcher = new FakeFetcher()
      .route("https://blog.example.org/rss.xml", { body: RSS, contentType: "application/xml" })
      .route("https://blog.example.org/1", { body: "<html><body>page</body></html>" });
    service = makeService(fetcher, {
      blog: { name: "blog", url: "https://blog.example.org/rss.xml" },
      down: { name: "down", url: "https://down.example.org/rss.xml", title: "Down" },
      broken: { name: "broken", sourceKind: "page", url: "https://broken.example.org/" },
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("GET /?name 返回 XML", async () => {
    const app = createApp(service, "public");
    const res = await app.request("/?blog");
    expect(res.status).toBe(200);
    expect(res.headers.get("Content-Type")).toBe("application/xml; charset=UTF-8");
    const body = await res.text();
    expect(body).toContain("<description><![CDATA[<p>Full</p>]]></description>");
  });

  it("未知 feed 返回 404", async () => {
    const res = await createApp(service, "public").request("/?nope");
    expect(res.status).toBe(404);
    expect(await res.text()).toBe('Feed "nope" 不存在');
  });

  it("定义无效返回 500，且不发起请求", async () => {
    const res = await createApp(service, "public").request("/?broken");
    expect(res.status).toBe(500);
    expect(await res.text()).toContain('Feed "broken"');
    expect(fetcher.urls()).not.toContain("https://broken.example.org/");
  });

  it("信源抓取失败返回 502 与错误 RSS", async () => {
    const res = await createApp(service, "public").request("/?down");
    expect(res.status).toBe(502);
    expect(res.headers.get("Content-Type")).toBe("application/xml; charset=UTF-8");
    const body = await res.text();
    expect(body).toContain("<title>Down</title>");
    expect(body).toContain("<description>信源返回 404</description>");
    expect(body).toContain("<title><![CDATA[抓取失败]]></title>");
  });

  it("名称转义非法时返回 400", async () => {
    const res = await createApp(service, "public").request("/?%E0");
    expect(res.status).toBe(400);
    expect(await res.text()).toBe("feed 名称编码无效");
    expect(fetcher.calls).toHaveLength(0);
  });

  it("缺少名称时返回 400 与可用列表", async () => {
    const res = await createApp(service, "public").request("/");
    expect(res.status).toBe(400);
    expect(await res.text()).toContain("可用: blog, down, broken");
  });
});


describe("RefeedService", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("getFeed：未知名称与无效定义分别抛出对应错误，有效定义被缓存", () => {
    const service = makeService(new FakeFetcher(), {
      blog: { name: "blog", url: "https://blog.example.org/rss.xml" },
      broken: { name: "broken", sourceKind: "page", url: "https://broken.example.org/" },
    });
    expect(() => service.getFeed("nope")).toThrow(FeedNotFoundError);
    expect(() => service.getFeed("broken")).toThrow(FeedConfigError);
    expect(service.getFeed("blog")).toBe(service.getFeed("blog"));
  });

  it("clean 跳过无效定义", async () => {
    vi.spyOn(logger, "error").mockImplementation(() => {});
    const service = makeService(new FakeFetcher(), {
      blog: { name: "blog", url: "https://blog.example.org/rss.xml" },
      broken: { name: "broken", sourceKind: "page", url: "https://broken.example.org/" },
    });
    const report = await service.clean();
    expect(report.expired).toEqual({ blog: 0 });
  });
});
