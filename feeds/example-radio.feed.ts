// 播客：节目页列表，音频由下载器获取，失败时走第三方下载页

import { defineFeed, downloadViaForm } from "../src/feeds/index.js";


function ogImage(document: Document): string | null {
  return document.querySelector("meta[property='og:image']")?.getAttribute("content") ?? null;
}


export default defineFeed({
  sourceKind: "page",
  url: "https://radio.example.org/shows/weekly",
  title: "Example Weekly",
  description: "Weekly show from radio.example.org",
  language: "en",
  itemsXpath: "//li[@class='episode']",
  itemLinkXpath: "./a/@href",
  itemTitleXpath: "./a",
  itemContentXpath: "./p[@class='summary']",
  podcast: {
    category: "News",
    author: "Example Radio",
    owner: { name: "Example Radio", email: "podcast@example.org" },
    explicit: false,
    image: (ctx) => (ctx.kind === "page" ? ogImage(ctx.document) : null),
    // 每期节目页下都有同名封面
    itemImage: (ctx) => `${ctx.link.replace(/\/$/, "")}/cover.jpg`,
    enclosureFallback: ({ url, destPath, fetcher }) =>
      downloadViaForm(fetcher, {
        downloaderUrl: "https://downloader.example.org/",
        submitButton: "Download",
        urlInput: "url",
        resultLink: { by: "text", value: "Download MP3" },
        sourceUrl: url,
        destPath,
      }),
  },
});
