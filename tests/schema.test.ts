import { describe, it, expect } from "vitest";
import { DEFAULT_CACHE_LIMIT, FeedConfigError, createFeedDescriptor } from "../src/feeds/index.js";
import type { FeedDefinition } from "../src/feeds/types.js";


function configError(definition: FeedDefinition): FeedConfigError {
  try {
    createFeedDescriptor(definition);
  } catch (err) {
    if (err instanceof FeedConfigError) return err;
    throw err;
  }
  throw new Error("expected FeedConfigError");
}


describe("createFeedDescriptor", () => {
  it("feed 信源补全默认值并冻结", () => {
    const d = createFeedDescriptor({ name: "blog", url: "https://blog.example.org/rss.xml" });
    expect(d.sourceKind).toBe("feed");
    expect(d.itemsXpath).toBe("//item");
    expect(d.itemLinkXpath).toBe("./link");
    expect(d.itemTitleXpath).toBe("./title");
    expect(d.itemContentXpath).toBe("./description");
    expect(d.readability).toBe(true);
    expect(d.cacheLimit).toBe(DEFAULT_CACHE_LIMIT);
    expect(d.cacheLimit).toBe(604_800);
    expect(d.cacheKeyStripQuery).toBe(false);
    expect(d.language).toBe("en");
    expect(Object.isFrozen(d)).toBe(true);
  });

  it("page 信源没有标题与正文的默认 XPath", () => {
    const d = createFeedDescriptor({
      name: "news",
      sourceKind: "page",
      url: "https://news.example.org/",
      title: "News",
      itemsXpath: "//article",
      itemLinkXpath: ".//a/@href",
    });
    expect(d.itemTitleXpath).toBeNull();
    expect(d.itemContentXpath).toBeNull();
    expect(d.itemLinkPrefix).toBe("");
  });

  it("page 信源缺少必填字段", () => {
    const err = configError({ name: "news", sourceKind: "page", url: "https://news.example.org/" });
    expect(err.feedName).toBe("news");
    expect(err.message).toBe(
      'Feed "news": title: page 信源必须提供 title; itemsXpath: page 信源必须提供 itemsXpath; itemLinkXpath: page 信源必须提供 itemLinkXpath'
    );
  });

  it("url 必须是 http(s) 地址", () => {
    expect(configError({ name: "x", url: "ftp://example.org/feed" }).message).toContain("url 必须是 http(s) 地址");
    expect(configError({ name: "x", url: "not a url" }).message).toContain("url: url 不是合法 URL");
  });

  it("cacheLimit 必须是正整数", () => {
    expect(configError({ name: "x", url: "https://x.example.org/", cacheLimit: 1.5 }).message).toContain("cacheLimit 必须是整数");
    expect(() => createFeedDescriptor({ name: "x", url: "https://x.example.org/", cacheLimit: 0 })).toThrow(FeedConfigError);
  });

  it("json 信源必须提供 json 配置；json 配置不能用于其它信源", () => {
    expect(configError({ name: "api", sourceKind: "json", url: "https://api.example.org/", title: "API" }).message).toContain("json:");
    expect(
      configError({ name: "x", url: "https://x.example.org/", json: { items: () => [], link: "url" } }).message
    ).toContain("json 选项只用于 json 信源");
  });

  it("itemLinkPrefix 与 itemTimeXpath 只用于 page 信源", () => {
    const err = configError({ name: "x", url: "https://x.example.org/", itemLinkPrefix: "https://x.example.org", itemTimeXpath: "./time" });
    expect(err.message).toContain("itemLinkPrefix 只用于 page 信源");
    expect(err.message).toContain("itemTimeXpath 只用于 page 信源");
  });

  it("feed 信源不支持播客", () => {
    expect(configError({ name: "x", url: "https://x.example.org/", podcast: {} }).message).toContain("播客只支持 page 与 json 信源");
  });

  it("播客选项默认 block=true、explicit=false", () => {
    const d = createFeedDescriptor({
      name: "radio",
      sourceKind: "page",
      url: "https://radio.example.org/",
      title: "Radio",
      itemsXpath: "//li",
      itemLinkXpath: "./a/@href",
      podcast: { category: "News" },
    });
    expect(d.podcast).toEqual({ category: "News", block: true, explicit: false });
  });

  it("名称只能包含字母、数字、_ 与 -", () => {
    expect(configError({ name: "bad name", url: "https://x.example.org/" }).message).toContain("name 只能包含字母、数字、_ 与 -");
  });

  it("未知字段报错", () => {
    const definition = { name: "x", url: "https://x.example.org/", itemz: "typo" };
    expect(() => createFeedDescriptor(definition)).toThrow(FeedConfigError);
  });

  it("播客 owner 的 email 必须合法", () => {
    const err = configError({
      name: "radio",
      sourceKind: "page",
      url: "https://radio.example.org/",
      title: "Radio",
      itemsXpath: "//li",
      itemLinkXpath: "./a/@href",
      podcast: { owner: { name: "Radio", email: "nobody" } },
    });
    expect(err.message).toContain("podcast.owner.email");
  });
});
